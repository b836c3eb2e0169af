import { Controller, Get, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { Public } from '../auth/public.decorator';
import { errorMessage } from '../import/import.errors';

@Public()
@Controller('health')
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(@InjectDataSource() private readonly ds: DataSource) {}

  @Get()
  async get() {
    const db = await this.ping();
    return { status: db === 'up' ? 'ok' : 'degraded', uptime: process.uptime(), db };
  }

  private async ping(): Promise<'up' | 'down'> {
    try {
      await this.ds.query('SELECT 1');
      return 'up';
    } catch (e) {
      this.logger.warn(`DB ping failed: ${errorMessage(e)}`);
      return 'down';
    }
  }
}
