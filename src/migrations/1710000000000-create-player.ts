import { MigrationInterface, QueryRunner } from "typeorm";

/**
 * Tabla de jugadores + índice único por clave natural (name, team).
 * Se aplica en el schema activo (DB_SCHEMA o public).
 */
export class CreatePlayer1710000000000 implements MigrationInterface {
  name = 'CreatePlayer1710000000000';

  private schema(): string {
    return process.env.DB_SCHEMA || 'public';
  }

  public async up(qr: QueryRunner): Promise<void> {
    const schema = this.schema();
    await qr.query(`CREATE SCHEMA IF NOT EXISTS "${schema}"`);
    await qr.query(`
      CREATE TABLE IF NOT EXISTS "${schema}"."player" (
        id            SERIAL PRIMARY KEY,
        name          TEXT NOT NULL,
        team          TEXT NOT NULL,
        position      TEXT NULL,
        understat_id  TEXT NULL,
        matches       INT NOT NULL DEFAULT 0,
        minutes       INT NOT NULL DEFAULT 0,
        goals         INT NOT NULL DEFAULT 0,
        assists       INT NOT NULL DEFAULT 0,
        shots         INT NOT NULL DEFAULT 0,
        key_passes    INT NOT NULL DEFAULT 0,
        yellow_cards  INT NOT NULL DEFAULT 0,
        red_cards     INT NOT NULL DEFAULT 0,
        xg            DOUBLE PRECISION NOT NULL DEFAULT 0,
        xa            DOUBLE PRECISION NOT NULL DEFAULT 0,
        last_updated  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        created_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`);
    await qr.query(`CREATE UNIQUE INDEX IF NOT EXISTS ux_player_name_team ON "${schema}"."player" (name, team)`);
    // Búsquedas ILIKE por nombre/equipo desde la API
    await qr.query(`CREATE INDEX IF NOT EXISTS idx_player_team ON "${schema}"."player" (team)`);
  }

  public async down(qr: QueryRunner): Promise<void> {
    const schema = this.schema();
    await qr.query(`DROP INDEX IF EXISTS "${schema}".idx_player_team`);
    await qr.query(`DROP INDEX IF EXISTS "${schema}".ux_player_name_team`);
    await qr.query(`DROP TABLE IF EXISTS "${schema}"."player"`);
  }
}
