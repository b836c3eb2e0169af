import { Injectable } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';
import { T } from '../database/schema.util';
import { ImportError, StorageError, errorMessage } from './import.errors';
import { NormalizedPlayer } from './player.normalizer';
import { PlayerStore, PlayerUnitOfWork, UpsertOutcome } from './player.store';

export class TypeOrmPlayerStore implements PlayerStore {
  constructor(private readonly trx: EntityManager) {}

  async upsertByNaturalKey(p: NormalizedPlayer, at: Date): Promise<UpsertOutcome> {
    // xmax = 0 solo en filas recién insertadas (Postgres)
    const rows: Array<{ id: number; inserted: boolean }> = await this.trx.query(
      `
      INSERT INTO ${T('player')} (name, team, position, understat_id,
                                  matches, minutes, goals, assists, shots, key_passes,
                                  yellow_cards, red_cards, xg, xa, last_updated, created_at)
      VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15,$15)
      ON CONFLICT (name, team) DO UPDATE SET
        position = EXCLUDED.position,
        understat_id = EXCLUDED.understat_id,
        matches = EXCLUDED.matches,
        minutes = EXCLUDED.minutes,
        goals = EXCLUDED.goals,
        assists = EXCLUDED.assists,
        shots = EXCLUDED.shots,
        key_passes = EXCLUDED.key_passes,
        yellow_cards = EXCLUDED.yellow_cards,
        red_cards = EXCLUDED.red_cards,
        xg = EXCLUDED.xg,
        xa = EXCLUDED.xa,
        last_updated = EXCLUDED.last_updated
      RETURNING id, (xmax = 0) AS inserted
      `,
      [
        p.name,
        p.team,
        p.position,
        p.understatId,
        p.matches,
        p.minutes,
        p.goals,
        p.assists,
        p.shots,
        p.keyPasses,
        p.yellowCards,
        p.redCards,
        p.xg,
        p.xa,
        at,
      ],
    );
    return rows[0]?.inserted ? 'inserted' : 'updated';
  }
}

@Injectable()
export class TypeOrmPlayerUnitOfWork implements PlayerUnitOfWork {
  constructor(@InjectDataSource() private readonly ds: DataSource) {}

  async transaction<R>(work: (store: PlayerStore) => Promise<R>): Promise<R> {
    try {
      return await this.ds.transaction((trx) => work(new TypeOrmPlayerStore(trx)));
    } catch (e) {
      // Errores de dominio se respetan; el resto viene de BD (query, commit, conexión)
      if (e instanceof ImportError) throw e;
      throw new StorageError(`Player upsert rolled back: ${errorMessage(e)}`, { cause: e });
    }
  }
}
