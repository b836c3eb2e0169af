import { envFlag } from '../database/database.url';

// Se evalúa en cada request, no al arrancar
export function isAuthEnabled(): boolean {
  return envFlag(process.env.ENABLE_AUTH, false);
}
