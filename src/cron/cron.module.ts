import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ImportModule } from '../import/import.module';
import { CronJobsService } from './cron.service';
import { CronController } from './cron.controller';

@Module({
  imports: [
    ScheduleModule.forRoot(),
    ImportModule,
  ],
  providers: [CronJobsService],
  controllers: [CronController],
  exports: [CronJobsService]
})
export class CronModule {}
