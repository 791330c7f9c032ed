import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/error-message';
import { DataFetchError, InsufficientDataError } from '../analysis/analysis.errors';
import {
  StockBar,
  HistoryPeriod,
  PriceHistoryProvider,
  PRICE_HISTORY_PROVIDER,
} from './data.types';

export const MIN_HISTORY_ROWS = 30;

export interface FetchAttempt {
  period: HistoryPeriod;
  adjusted: boolean;
}

export type FetchAttemptOutcome =
  | { status: 'ok'; bars: StockBar[] }
  | { status: 'short'; rows: number }
  | { status: 'failed'; reason: string };

export type PriceHistoryResult =
  | { ok: true; bars: StockBar[]; attempt: FetchAttempt }
  | { ok: false; error: DataFetchError | InsufficientDataError };

const FALLBACK_PERIODS: HistoryPeriod[] = ['1y', '2y'];

/**
 * Requested period first, then longer ones; each unadjusted before adjusted.
 */
export function buildFetchAttempts(period: HistoryPeriod): FetchAttempt[] {
  const periods = [period, ...FALLBACK_PERIODS.filter((p) => p !== period)];
  return periods.flatMap((p) => [
    { period: p, adjusted: false },
    { period: p, adjusted: true },
  ]);
}

/**
 * Sorts ascending, forward-fills non-finite fields, drops leading rows that
 * cannot be filled and replaces zero volume with 1.
 */
export function cleanBars(bars: readonly StockBar[]): StockBar[] {
  const sorted = [...bars].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const cleaned: StockBar[] = [];
  let previous: StockBar | undefined;

  for (const bar of sorted) {
    const filled = {
      open: Number.isFinite(bar.open) ? bar.open : previous?.open,
      high: Number.isFinite(bar.high) ? bar.high : previous?.high,
      low: Number.isFinite(bar.low) ? bar.low : previous?.low,
      close: Number.isFinite(bar.close) ? bar.close : previous?.close,
      volume: Number.isFinite(bar.volume) ? bar.volume : previous?.volume,
    };

    if (
      filled.open === undefined ||
      filled.high === undefined ||
      filled.low === undefined ||
      filled.close === undefined ||
      filled.volume === undefined
    ) {
      continue;
    }

    const row: StockBar = {
      open: filled.open,
      high: filled.high,
      low: filled.low,
      close: filled.close,
      volume: filled.volume > 0 ? filled.volume : 1,
      timestamp: bar.timestamp,
    };
    cleaned.push(row);
    previous = row;
  }

  return cleaned;
}

@Injectable()
export class PriceHistoryClient {
  private readonly logger = new Logger(PriceHistoryClient.name);

  constructor(
    @Inject(PRICE_HISTORY_PROVIDER)
    private readonly provider: PriceHistoryProvider,
  ) {}

  async fetch(ticker: string, period: HistoryPeriod): Promise<PriceHistoryResult> {
    let longestAnswer: number | null = null;
    let lastFailure = 'no attempt was made';

    for (const attempt of buildFetchAttempts(period)) {
      const outcome = await this.runAttempt(ticker, attempt);

      switch (outcome.status) {
        case 'ok':
          return { ok: true, bars: outcome.bars, attempt };
        case 'short':
          longestAnswer = Math.max(longestAnswer ?? 0, outcome.rows);
          break;
        case 'failed':
          lastFailure = outcome.reason;
          break;
      }
    }

    if (longestAnswer !== null) {
      return {
        ok: false,
        error: new InsufficientDataError(
          `[${ticker}] could not collect ${MIN_HISTORY_ROWS} rows of history ` +
            `(best attempt returned ${longestAnswer}); delisted or invalid ticker?`,
        ),
      };
    }

    return {
      ok: false,
      error: new DataFetchError(`[${ticker}] price history request failed: ${lastFailure}`),
    };
  }

  private async runAttempt(ticker: string, attempt: FetchAttempt): Promise<FetchAttemptOutcome> {
    let raw: StockBar[];
    try {
      raw = await this.provider.getDailyBars(ticker, attempt.period, attempt.adjusted);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.debug(
        `${ticker} ${attempt.period} adjusted=${attempt.adjusted} failed: ${reason}`,
      );
      return { status: 'failed', reason };
    }

    const bars = cleanBars(raw);
    if (bars.length < MIN_HISTORY_ROWS) {
      this.logger.debug(
        `${ticker} ${attempt.period} adjusted=${attempt.adjusted} returned ${bars.length} usable rows`,
      );
      return { status: 'short', rows: bars.length };
    }

    return { status: 'ok', bars };
  }
}
