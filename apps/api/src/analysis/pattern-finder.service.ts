import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/error-message';
import { HistoryPeriod } from '../data/data.types';
import { PriceHistoryClient } from '../data/price-history.client';
import { AnalysisBaseError, DataFetchError, InsufficientDataError } from './analysis.errors';
import { PatternSearchFailure, PatternSearchResult } from './analysis.types';
import { DEFAULT_PATTERN_OPTIONS, findSimilarPatterns, PatternSearchOptions } from './pattern-matching';

export const PATTERN_HISTORY_PERIOD: HistoryPeriod = '3y';

/**
 * Finds past stretches of a ticker's chart shaped like its latest closes and
 * reports what the price did afterwards. Like the analyzer, it answers with a
 * failure object rather than throwing.
 */
@Injectable()
export class PatternFinderService {
  private readonly logger = new Logger(PatternFinderService.name);

  constructor(private readonly priceHistory: PriceHistoryClient) {}

  async findSimilarPatterns(
    rawTicker: string,
    options: PatternSearchOptions = {},
  ): Promise<PatternSearchResult> {
    const ticker = rawTicker.trim().toUpperCase();
    const lookbackDays = options.lookbackDays ?? DEFAULT_PATTERN_OPTIONS.lookbackDays;

    try {
      if (!ticker) {
        return this.toFailure(rawTicker, new DataFetchError('Ticker symbol is empty'));
      }

      const history = await this.priceHistory.fetch(ticker, PATTERN_HISTORY_PERIOD);
      if (!history.ok) {
        return this.toFailure(ticker, history.error);
      }

      const { bars } = history;
      const outcome = findSimilarPatterns(bars, { ...options, lookbackDays });
      if (!outcome.ok) {
        return this.toFailure(ticker, new InsufficientDataError(`[${ticker}] ${outcome.reason}`));
      }

      this.logger.log(`${ticker}: ${outcome.matches.length} similar patterns in ${bars.length} bars`);
      return {
        ticker,
        success: true,
        lookbackDays,
        currentWindow: {
          startDate: bars[bars.length - lookbackDays].timestamp.toISOString().slice(0, 10),
          endDate: bars[bars.length - 1].timestamp.toISOString().slice(0, 10),
        },
        averageReturns: outcome.averageReturns,
        matches: outcome.matches,
      };
    } catch (error) {
      return this.toFailure(ticker || rawTicker, error);
    }
  }

  private toFailure(ticker: string, error: unknown): PatternSearchFailure {
    if (error instanceof AnalysisBaseError) {
      this.logger.warn(`${ticker}: pattern search failed: ${error.message}`);
      return { ticker, success: false, errorType: error.errorType, errorMsg: error.message };
    }

    const errorMsg = `Unexpected error while matching patterns for ${ticker}: ${errorMessage(error)}`;
    this.logger.error(errorMsg, error instanceof Error ? error.stack : undefined);
    return { ticker, success: false, errorType: 'Analysis', errorMsg };
  }
}
