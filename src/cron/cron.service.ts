import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { DataSource } from 'typeorm';
import { PlayerImportService, ImportRunResult } from '../import/player-import.service';
import { resolveImportTarget } from '../import/import.config';
import { errorMessage } from '../import/import.errors';
import { CronLock, parseBoolEnv } from './cron.utils';

export const IMPORT_LOCK_KEY = 20_001;
export const IMPORT_CRON_EXPRESSION = '15 5 * * *';

@Injectable()
export class CronJobsService {
  private readonly logger = new Logger(CronJobsService.name);
  private readonly lock: CronLock;

  constructor(
    private readonly ds: DataSource,
    private readonly importer: PlayerImportService,
  ) {
    this.lock = new CronLock(this.ds);
  }

  // -------------------------------------------------------------------------
  // Import diario de jugadores (05:15 UTC). Opt-in por ENV.
  // -------------------------------------------------------------------------
  @Cron(IMPORT_CRON_EXPRESSION, { name: 'players-import', timeZone: 'UTC' })
  async importDaily(): Promise<void> {
    if (!parseBoolEnv('IMPORT_CRON_ENABLED')) return;
    try {
      await this.runLocked();
    } catch (e) {
      // El scheduler no debe recibir la excepción; queda en log
      this.logger.error(`[importDaily] error: ${errorMessage(e)}`);
    }
  }

  /**
   * Ejecuta el import bajo advisory lock (un solo run programado a la vez).
   * @returns null si otro proceso tiene el lock.
   */
  async runLocked(league?: string, season?: string): Promise<ImportRunResult | null> {
    const target = resolveImportTarget(process.env, league, season);
    if (!(await this.lock.tryLock(IMPORT_LOCK_KEY))) {
      this.logger.warn('[importDaily] lock busy, skipping');
      return null;
    }
    this.logger.log(`[importDaily] start ${target.league}/${target.season}`);
    try {
      return await this.importer.runImport(target.league, target.season);
    } finally {
      await this.lock.unlock(IMPORT_LOCK_KEY);
      this.logger.log('[importDaily] done');
    }
  }
}
