import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Player } from '../entities/player.entity';
import { CreatePlayer1710000000000 } from '../migrations/1710000000000-create-player';
import { envFlag, maskDatabaseUrl, resolveDatabaseUrl } from './database.url';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => {
        const url = resolveDatabaseUrl({
          DATABASE_URL: cfg.get<string>('DATABASE_URL'),
          POSTGRES_USER: cfg.get<string>('POSTGRES_USER'),
          POSTGRES_PASSWORD: cfg.get<string>('POSTGRES_PASSWORD'),
          POSTGRES_DB: cfg.get<string>('POSTGRES_DB'),
          DB_HOST: cfg.get<string>('DB_HOST'),
          DB_PORT: cfg.get<string>('DB_PORT'),
        });
        new Logger('Database').log(`Connecting to ${maskDatabaseUrl(url)}`);

        return {
          type: 'postgres',
          url,
          schema: cfg.get<string>('DB_SCHEMA') || 'public',
          synchronize: false,
          logging: ['error'],
          ssl: envFlag(cfg.get<string>('DB_SSL'), false) ? { rejectUnauthorized: false } : false,
          entities: [Player],
          migrations: [CreatePlayer1710000000000],
          migrationsRun: envFlag(cfg.get<string>('DB_MIGRATIONS_RUN'), true),
        };
      },
    }),
  ],
})
export class DatabaseModule {}
