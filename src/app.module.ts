import { Module } from '@nestjs/common';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DatabaseModule } from './database/database.module';
import { ConfigModule } from '@nestjs/config';
import { CronModule } from './cron/cron.module';
import { AuthModule } from './auth/auth.module';
import { PlayersModule } from './players/players.module';
import { HealthController } from './health/health.controller';
import { APP_GUARD } from '@nestjs/core';
import { GlobalAuthGuard } from './auth/global-auth.guard';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    // Throttler (se puede ajustar por ENV)
    ThrottlerModule.forRoot([{ ttl: Number(process.env.RATE_LIMIT_TTL_MS || 60_000), limit: Number(process.env.RATE_LIMIT_LIMIT || 120) }]),
    DatabaseModule,
    AuthModule,
    PlayersModule,
    CronModule,
  ],
  controllers: [AppController, HealthController],
  providers: [
    AppService,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    // Guard global estilo @Public + Optional JWT
    { provide: APP_GUARD, useClass: GlobalAuthGuard },
  ],
})
export class AppModule {}
