import { Module } from '@nestjs/common';
import { ScoringService } from './scoring.service';
import { FundamentalsChecker } from './fundamentals-checker.service';
import { DataModule } from '../data/data.module';

@Module({
  imports: [DataModule],
  providers: [ScoringService, FundamentalsChecker],
  exports: [ScoringService, FundamentalsChecker],
})
export class StrategyModule {}
