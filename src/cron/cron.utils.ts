import { envFlag } from '../database/database.url';
import { DataSource } from 'typeorm';

export class CronLock {
  constructor(private readonly ds: DataSource) {}

  /**
   * Usa pg_try_advisory_lock para evitar ejecuciones concurrentes del mismo job.
   * @returns true si se adquirió el lock, false si ya estaba tomado.
   */
  async tryLock(key: number): Promise<boolean> {
    const rows: Array<{ locked: boolean }> = await this.ds.query('SELECT pg_try_advisory_lock($1) AS locked', [key]);
    return !!rows?.[0]?.locked;
  }

  async unlock(key: number): Promise<void> {
    await this.ds.query('SELECT pg_advisory_unlock($1)', [key]);
  }
}

export function parseBoolEnv(name: string, def = false): boolean {
  return envFlag(process.env[name], def);
}
