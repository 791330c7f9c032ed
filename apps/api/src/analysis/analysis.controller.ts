import { Controller, Get, Param, Query } from '@nestjs/common';
import { AnalyzerService } from './analyzer.service';
import { PatternFinderService } from './pattern-finder.service';
import { AnalysisQueryDto } from './dto/analysis-query.dto';
import { PatternQueryDto } from './dto/pattern-query.dto';
import { AnalysisResult, PatternSearchResult } from './analysis.types';

@Controller('analysis')
export class AnalysisController {
  constructor(
    private readonly analyzerService: AnalyzerService,
    private readonly patternFinder: PatternFinderService,
  ) {}

  @Get(':ticker')
  async analyze(
    @Param('ticker') ticker: string,
    @Query() query: AnalysisQueryDto,
  ): Promise<AnalysisResult> {
    const result = await this.analyzerService.analyze(ticker, {
      period: query.period,
      strategy: query.strategy,
      applyFundamentals: query.fundamentals,
    });

    // Chart rows are large; only send them when asked
    if (result.success && !query.series) {
      return { ...result, series: [] };
    }
    return result;
  }

  @Get(':ticker/patterns')
  async patterns(
    @Param('ticker') ticker: string,
    @Query() query: PatternQueryDto,
  ): Promise<PatternSearchResult> {
    return this.patternFinder.findSimilarPatterns(ticker, {
      lookbackDays: query.lookback,
      topN: query.top,
    });
  }
}
