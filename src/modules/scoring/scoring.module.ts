import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { ScoringService } from './scoring.service';

@Module({
  imports: [StoreModule],
  providers: [ScoringService],
  exports: [ScoringService],
})
export class ScoringModule {}
