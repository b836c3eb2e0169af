import { Logger } from '@nestjs/common';
import { RawPlayerRecord } from '../understat/dto/understat.dto';
import { ValidationError } from './import.errors';
import { NormalizedPlayer, normalizePlayer } from './player.normalizer';
import { PlayerStore } from './player.store';

export interface ImportSummary {
  fetched: number;
  inserted: number;
  updated: number;
  skipped: number;
  skipReasons: string[];
}

const logger = new Logger('PlayerReconciler');

function tryNormalize(raw: RawPlayerRecord): NormalizedPlayer | ValidationError {
  try {
    return normalizePlayer(raw);
  } catch (e) {
    if (e instanceof ValidationError) return e;
    throw e;
  }
}

function describe(raw: RawPlayerRecord): string {
  const name = typeof raw.player_name === 'string' ? raw.player_name.trim() : '';
  const team = typeof raw.team_title === 'string' ? raw.team_title.trim() : '';
  return `name="${name}", team="${team}"`;
}

/**
 * Recorre los registros en orden y hace upsert por (name, team).
 * Un registro inválido se omite y queda anotado; cualquier otro error se propaga
 * (el caller hace rollback). Dentro de un run gana la última aparición de cada clave.
 */
export async function reconcilePlayers(
  store: PlayerStore,
  records: Iterable<RawPlayerRecord>,
  at: Date = new Date(),
): Promise<ImportSummary> {
  const summary: ImportSummary = { fetched: 0, inserted: 0, updated: 0, skipped: 0, skipReasons: [] };

  let index = 0;
  for (const raw of records) {
    index++;
    summary.fetched++;

    const player = tryNormalize(raw);
    if (player instanceof ValidationError) {
      const reason = `record #${index} (${describe(raw)}): ${player.message}`;
      logger.warn(`skip ${reason}`);
      summary.skipped++;
      summary.skipReasons.push(reason);
      continue;
    }

    const outcome = await store.upsertByNaturalKey(player, at);
    if (outcome === 'inserted') summary.inserted++;
    else summary.updated++;
  }

  return summary;
}
