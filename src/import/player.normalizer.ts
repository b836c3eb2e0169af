import { RawPlayerRecord, UnderstatPlayerRow } from '../understat/dto/understat.dto';
import { ValidationError } from './import.errors';

export interface PlayerStats {
  matches: number;
  minutes: number;
  goals: number;
  assists: number;
  shots: number;
  keyPasses: number;
  yellowCards: number;
  redCards: number;
  xg: number;
  xa: number;
}

export interface NormalizedPlayer extends PlayerStats {
  name: string;
  team: string;
  position: string | null;
  understatId: string | null;
}

const POSITION_MAP: Record<string, string> = {
  GK: 'Goalkeeper',
  D: 'Defender',
  M: 'Midfielder',
  F: 'Forward',
};

// Solo decimales simples, sin signo, hex ni exponente
const DECIMAL_RE = /^\s*(\d+\.?\d*|\.\d+)\s*$/;

// Política laxa: el proveedor manda '', null o basura a menudo → 0 en vez de rechazar.
export function toFloat(v: unknown): number {
  if (typeof v === 'string' && !DECIMAL_RE.test(v)) return 0;
  if (typeof v !== 'number' && typeof v !== 'string') return 0;
  const n = Number(v);
  return Number.isFinite(n) && n > 0 ? n : 0;
}

export function toInt(v: unknown): number {
  return Math.trunc(toFloat(v));
}

function requiredText(raw: RawPlayerRecord, key: keyof UnderstatPlayerRow, field: string): string {
  const v = raw[key];
  const s = typeof v === 'string' ? v.trim() : typeof v === 'number' ? String(v) : '';
  if (!s) throw new ValidationError(field, `${field} is missing or empty`);
  return s;
}

/**
 * Expande códigos de posición (GK/D/M/F) manteniendo el orden del proveedor.
 * Acepta "F M S", "F/M", ["F","M"]. Códigos desconocidos pasan sin cambios,
 * así que aplicarla sobre un valor ya expandido no lo altera.
 */
export function expandPosition(raw: unknown): string | null {
  const parts: string[] = Array.isArray(raw)
    ? raw.filter((x): x is string => typeof x === 'string')
    : typeof raw === 'string'
      ? [raw]
      : [];

  const codes = parts
    .flatMap((p) => p.split(/[\s/,]+/))
    .map((c) => c.trim())
    .filter(Boolean);
  if (!codes.length) return null;

  return codes.map((c) => POSITION_MAP[c.toUpperCase()] ?? c).join(' / ');
}

/**
 * Fila cruda de Understat → jugador interno. Pura.
 * Solo lanza ValidationError si falta name o team (la clave natural).
 */
export function normalizePlayer(raw: RawPlayerRecord): NormalizedPlayer {
  const name = requiredText(raw, 'player_name', 'name');
  const team = requiredText(raw, 'team_title', 'team');
  const id = raw.id;

  return {
    name,
    team,
    position: expandPosition(raw.position),
    understatId: typeof id === 'string' || typeof id === 'number' ? String(id).trim() || null : null,
    matches: toInt(raw.games),
    minutes: toInt(raw.time),
    goals: toInt(raw.goals),
    assists: toInt(raw.assists),
    shots: toInt(raw.shots),
    keyPasses: toInt(raw.key_passes),
    yellowCards: toInt(raw.yellow_cards),
    redCards: toInt(raw.red_cards),
    xg: toFloat(raw.xG),
    xa: toFloat(raw.xA),
  };
}
