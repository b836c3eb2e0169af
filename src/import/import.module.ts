import { Module } from '@nestjs/common';
import { UnderstatModule } from '../understat/understat.module';
import { PlayerImportService } from './player-import.service';
import { PLAYER_UNIT_OF_WORK } from './player.store';
import { TypeOrmPlayerUnitOfWork } from './typeorm-player.store';

@Module({
  imports: [UnderstatModule],
  providers: [
    PlayerImportService,
    { provide: PLAYER_UNIT_OF_WORK, useClass: TypeOrmPlayerUnitOfWork },
  ],
  exports: [PlayerImportService],
})
export class ImportModule {}
