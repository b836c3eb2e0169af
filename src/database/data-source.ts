// DataSource para la CLI de TypeORM (migration:run / migration:revert)
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { Player } from '../entities/player.entity';
import { CreatePlayer1710000000000 } from '../migrations/1710000000000-create-player';
import { envFlag, resolveDatabaseUrl } from './database.url';

export default new DataSource({
  type: 'postgres',
  url: resolveDatabaseUrl(process.env),
  schema: process.env.DB_SCHEMA || 'public',
  ssl: envFlag(process.env.DB_SSL, false) ? { rejectUnauthorized: false } : false,
  entities: [Player],
  migrations: [CreatePlayer1710000000000],
});
