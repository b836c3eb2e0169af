type Env = Record<string, string | undefined>;

/**
 * DATABASE_URL si viene completa; si no, se compone una sola vez desde
 * POSTGRES_USER / POSTGRES_PASSWORD / POSTGRES_DB / DB_HOST / DB_PORT.
 */
export function resolveDatabaseUrl(env: Env): string {
  const url = env.DATABASE_URL?.trim();
  if (url) return url;

  const user = env.POSTGRES_USER || 'admin';
  const pass = env.POSTGRES_PASSWORD || '';
  const db = env.POSTGRES_DB || 'football_db';
  const host = env.DB_HOST || 'localhost';
  const port = env.DB_PORT || '5432';
  const auth = pass ? `${encodeURIComponent(user)}:${encodeURIComponent(pass)}` : encodeURIComponent(user);
  return `postgresql://${auth}@${host}:${port}/${db}`;
}

// Para logs: nunca imprimir la contraseña
export function maskDatabaseUrl(url: string): string {
  return url.replace(/(\/\/[^:/@]+:)[^@]*@/, '$1***@');
}

export function envFlag(v: string | undefined, def: boolean): boolean {
  if (v == null || v === '') return def;
  return ['1', 'true', 'yes', 'y'].includes(v.toLowerCase());
}
