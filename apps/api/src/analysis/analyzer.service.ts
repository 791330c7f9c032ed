import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/error-message';
import { LiveQuoteProvider, LIVE_QUOTE_PROVIDER, StockBar } from '../data/data.types';
import { PriceHistoryClient } from '../data/price-history.client';
import { IndicatorEngine } from '../indicators/indicator-engine.service';
import { FundamentalsChecker } from '../strategy/fundamentals-checker.service';
import { applyFundamentalsPenalty } from '../strategy/scoring.functions';
import { ScoringService } from '../strategy/scoring.service';
import { detectRsiHookFailed, detectWaterfall } from '../strategy/signal-filters';
import { FilterFlags, FundamentalsResult } from '../strategy/strategy.types';
import { classifyVerdict, dynamicStopLoss } from '../strategy/verdict';
import {
  AnalysisBaseError,
  AnalysisError,
  AnalysisErrorType,
  DataFetchError,
} from './analysis.errors';
import {
  AnalysisFailure,
  AnalysisOptions,
  AnalysisPhase,
  AnalysisResult,
  DEFAULT_ANALYSIS_OPTIONS,
} from './analysis.types';
import { buildDetailInfo } from './detail-builder';

/**
 * Runs one ticker through fetch, indicators, filters, scoring and the optional
 * fundamentals check. Every failure comes back as an AnalysisFailure.
 */
@Injectable()
export class AnalyzerService {
  private readonly logger = new Logger(AnalyzerService.name);

  constructor(
    private readonly priceHistory: PriceHistoryClient,
    @Inject(LIVE_QUOTE_PROVIDER)
    private readonly liveQuotes: LiveQuoteProvider,
    private readonly indicatorEngine: IndicatorEngine,
    private readonly scoringService: ScoringService,
    private readonly fundamentalsChecker: FundamentalsChecker,
  ) {}

  async analyze(rawTicker: string, options: AnalysisOptions = {}): Promise<AnalysisResult> {
    const ticker = rawTicker.trim().toUpperCase();
    // Unset query fields arrive as explicit undefined
    const period = options.period ?? DEFAULT_ANALYSIS_OPTIONS.period;
    const applyFundamentals = options.applyFundamentals ?? DEFAULT_ANALYSIS_OPTIONS.applyFundamentals;
    const strategy = options.strategy ?? DEFAULT_ANALYSIS_OPTIONS.strategy;
    let phase: AnalysisPhase = 'fetching';

    try {
      if (!ticker) {
        return this.toFailure(rawTicker, phase, new DataFetchError('Ticker symbol is empty'));
      }

      const history = await this.priceHistory.fetch(ticker, period);
      if (!history.ok) {
        return this.toFailure(ticker, phase, history.error);
      }
      const { bars } = history;
      const currentPrice = await this.resolveCurrentPrice(ticker, bars);

      phase = 'computing';
      const { snapshot, rows, series } = this.indicatorEngine.compute(bars, currentPrice);

      phase = 'scoring';
      const waterfall = detectWaterfall(
        bars.map((bar) => bar.close),
        currentPrice,
      );
      const filters: FilterFlags = {
        isWaterfall: waterfall.isWaterfall,
        isRsiHookFailed: detectRsiHookFailed(series.rsi, strategy),
      };
      const technical = this.scoringService.score(snapshot, filters, strategy);
      if (!Number.isFinite(technical.score)) {
        throw new AnalysisError(`Score for ${ticker} is not a finite number`);
      }

      let fundamentals: FundamentalsResult | null = null;
      let score = technical.score;
      if (applyFundamentals) {
        phase = 'fundamentals';
        fundamentals = await this.fundamentalsChecker.check(ticker);
        score = applyFundamentalsPenalty(technical.score, fundamentals.penalty);
      }

      const stopLoss = dynamicStopLoss(currentPrice, snapshot.atr);
      const detailInfo = buildDetailInfo({
        snapshot,
        strategy,
        finalScore: score,
        subScores: technical.subScores,
        waterfall,
        isRsiHookFailed: filters.isRsiHookFailed,
        fundamentals,
      });

      phase = 'done';
      return {
        ticker,
        success: true,
        strategy,
        score,
        technicalScore: technical.score,
        verdict: classifyVerdict(score, strategy),
        currentPrice,
        stopLoss,
        indicators: snapshot,
        subScores: technical.subScores,
        filters,
        fundamentals,
        detailInfo,
        series: rows,
      };
    } catch (error) {
      return this.toFailure(ticker || rawTicker, phase, error);
    }
  }

  /**
   * Prefers a real-time quote; falls back to the last close whenever the quote
   * provider has nothing or fails.
   */
  private async resolveCurrentPrice(ticker: string, bars: readonly StockBar[]): Promise<number> {
    const lastClose = bars[bars.length - 1].close;
    try {
      const live = await this.liveQuotes.getLastPrice(ticker);
      if (live !== null && Number.isFinite(live) && live > 0) {
        return live;
      }
    } catch (error) {
      this.logger.warn(`Live quote for ${ticker} failed, using last close: ${errorMessage(error)}`);
    }
    return lastClose;
  }

  private toFailure(ticker: string, phase: AnalysisPhase, error: unknown): AnalysisFailure {
    let errorType: AnalysisErrorType;
    let errorMsg: string;

    if (error instanceof AnalysisBaseError) {
      errorType = error.errorType;
      errorMsg = error.message;
    } else {
      errorType = 'Analysis';
      errorMsg = `Unexpected error while analyzing ${ticker}: ${errorMessage(error)}`;
    }

    switch (errorType) {
      case 'InsufficientData':
        this.logger.warn(`${ticker}: ${errorMsg}`);
        break;
      case 'DataFetch':
        this.logger.error(`${ticker}: ${errorMsg}`);
        break;
      default:
        this.logger.error(
          `${ticker} failed during ${phase}: ${errorMsg}`,
          error instanceof Error ? error.stack : undefined,
        );
    }

    return {
      ticker,
      success: false,
      errorType,
      errorMsg: errorMsg || `${errorType} error for ${ticker}`,
      failedPhase: phase,
    };
  }
}
