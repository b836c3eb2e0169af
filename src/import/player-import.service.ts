import { Inject, Injectable, Logger } from '@nestjs/common';
import { UnderstatClient } from '../understat/understat.client';
import { ImportSummary, reconcilePlayers } from './player.reconciler';
import { PLAYER_UNIT_OF_WORK, PlayerUnitOfWork } from './player.store';

export interface ImportRunResult extends ImportSummary {
  league: string;
  season: string;
  startedAt: string;
  finishedAt: string;
}

@Injectable()
export class PlayerImportService {
  private readonly logger = new Logger(PlayerImportService.name);

  constructor(
    private readonly understat: UnderstatClient,
    @Inject(PLAYER_UNIT_OF_WORK) private readonly uow: PlayerUnitOfWork,
  ) {}

  /**
   * Fetch → normalize → upsert en una sola transacción.
   * FetchError y StorageError se propagan al caller (CLI, cron, endpoint admin).
   */
  async runImport(league: string, season: string): Promise<ImportRunResult> {
    const started = new Date();
    this.logger.log(`[runImport] start league=${league} season=${season}`);

    const records = await this.understat.fetchLeaguePlayers(league, season);

    let summary: ImportSummary;
    if (!records.length) {
      this.logger.warn('[runImport] no player data returned; nothing to store');
      summary = { fetched: 0, inserted: 0, updated: 0, skipped: 0, skipReasons: [] };
    } else {
      summary = await this.uow.transaction((store) => reconcilePlayers(store, records, started));
    }

    const finished = new Date();
    this.logger.log(
      `[runImport] done fetched=${summary.fetched} inserted=${summary.inserted} ` +
      `updated=${summary.updated} skipped=${summary.skipped} (${finished.getTime() - started.getTime()}ms)`,
    );
    return {
      league,
      season,
      ...summary,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
    };
  }
}
