import { NormalizedPlayer } from './player.normalizer';

export type UpsertOutcome = 'inserted' | 'updated';

/**
 * Handle transaccional sobre la tabla de jugadores. Se crea uno por run y se
 * pasa explícitamente al reconciliador (nada de instancia global).
 */
export interface PlayerStore {
  /**
   * Find-or-create por clave natural (name, team). Si existe se sobreescriben
   * todas las estadísticas y last_updated; si no, se inserta y la BD asigna el id.
   */
  upsertByNaturalKey(player: NormalizedPlayer, at: Date): Promise<UpsertOutcome>;
}

export interface PlayerUnitOfWork {
  /**
   * Ejecuta `work` en una única transacción. Commit si resuelve, rollback si lanza.
   * Los fallos de almacenamiento salen como StorageError.
   */
  transaction<T>(work: (store: PlayerStore) => Promise<T>): Promise<T>;
}

export const PLAYER_UNIT_OF_WORK = Symbol('PLAYER_UNIT_OF_WORK');
