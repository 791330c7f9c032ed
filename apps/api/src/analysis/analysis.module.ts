import { Module } from '@nestjs/common';
import { AnalyzerService } from './analyzer.service';
import { PatternFinderService } from './pattern-finder.service';
import { AnalysisController } from './analysis.controller';
import { DataModule } from '../data/data.module';
import { IndicatorsModule } from '../indicators/indicators.module';
import { StrategyModule } from '../strategy/strategy.module';

@Module({
  imports: [DataModule, IndicatorsModule, StrategyModule],
  controllers: [AnalysisController],
  providers: [AnalyzerService, PatternFinderService],
  exports: [AnalyzerService, PatternFinderService],
})
export class AnalysisModule {}
