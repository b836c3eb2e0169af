export const DEFAULT_LEAGUE = 'epl';
export const DEFAULT_SEASON = '2025';

export interface ImportTarget {
  league: string;
  season: string;
}

/**
 * Resuelve liga/temporada: argumento explícito > variable de entorno > default.
 * La temporada debe ser un entero (año de inicio, p.ej. "2025").
 */
export function resolveImportTarget(
  env: Record<string, string | undefined>,
  league?: string,
  season?: string,
): ImportTarget {
  const lg = (league?.trim() || env.LEAGUE?.trim() || DEFAULT_LEAGUE);
  const rawSeason = (season?.trim() || env.SEASON?.trim() || DEFAULT_SEASON);
  if (!/^\d+$/.test(rawSeason)) {
    throw new Error(`Invalid SEASON value: "${rawSeason}". Must be integer.`);
  }
  return { league: lg, season: String(Number(rawSeason)) };
}
