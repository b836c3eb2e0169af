import { RawPlayerRecord } from './dto/understat.dto';

const LEAGUE_MAP: Record<string, string> = {
  epl: 'EPL', premierleague: 'EPL',
  laliga: 'La_liga',
  bundesliga: 'Bundesliga',
  seriea: 'Serie_A',
  ligue1: 'Ligue_1',
  rfpl: 'RFPL',
};

/**
 * Traduce alias habituales ("epl", "Premier League", "la_liga") al slug de Understat.
 * Si no se reconoce se devuelve tal cual (trim).
 */
export function toUnderstatLeague(raw: string): string {
  const trimmed = raw.trim();
  const key = trimmed.replace(/[^a-z0-9]/gi, '').toLowerCase();
  return LEAGUE_MAP[key] ?? trimmed;
}

// Los datos van embebidos como JSON.parse('\x5B\x7B...') dentro de un <script>
const PLAYERS_DATA_RE = /playersData\s*=\s*JSON\.parse\('([^']*)'\)/;

export function decodeHexEscapes(s: string): string {
  return s.replace(/\\x([0-9a-fA-F]{2})/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)));
}

function isRecord(v: unknown): v is RawPlayerRecord {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Extrae las filas de jugadores de la respuesta del proveedor.
 * Acepta el HTML de la página de liga o un JSON con `players`.
 * @returns null si el payload no tiene la forma esperada.
 */
export function extractPlayers(payload: unknown): RawPlayerRecord[] | null {
  let data: unknown = payload;

  if (typeof payload === 'string') {
    const m = payload.match(PLAYERS_DATA_RE);
    if (m) {
      try {
        data = JSON.parse(decodeHexEscapes(m[1]));
      } catch {
        return null;
      }
    } else {
      try {
        data = JSON.parse(payload);
      } catch {
        return null;
      }
    }
  }

  if (isRecord(data) && 'players' in data) data = data.players;
  if (!Array.isArray(data)) return null;
  return data.every(isRecord) ? data : null;
}
