import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { UnderstatClient } from './understat.client';

@Module({
  imports: [HttpModule],
  providers: [UnderstatClient],
  exports: [UnderstatClient],
})
export class UnderstatModule {}
