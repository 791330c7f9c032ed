import { Series } from '../indicators/indicator.types';
import { ScoringStrategy } from './strategy.types';

export const WATERFALL_LONG_MA = 120;
export const WATERFALL_SHORT_MA = 60;
export const WATERFALL_LOOKBACK = 20;
export const HOOK_RSI_CEILING = 40;

export interface WaterfallCheck {
  isWaterfall: boolean;
  /** Moving-average window used, or null when the history was too short for any. */
  window: number | null;
  maNow: number | null;
  maBefore: number | null;
}

function meanOf(values: readonly number[], end: number, window: number): number {
  let sum = 0;
  for (let i = end - window; i < end; i++) {
    sum += values[i];
  }
  return sum / window;
}

/**
 * Severe downtrend: price below the long moving average while that average is
 * itself lower than it was WATERFALL_LOOKBACK bars ago. Uses the 120-bar
 * average, or the 60-bar one when the history cannot support 120.
 */
export function detectWaterfall(closes: readonly number[], currentPrice: number): WaterfallCheck {
  const window =
    closes.length >= WATERFALL_LONG_MA + WATERFALL_LOOKBACK
      ? WATERFALL_LONG_MA
      : closes.length >= WATERFALL_SHORT_MA + WATERFALL_LOOKBACK
        ? WATERFALL_SHORT_MA
        : null;

  if (window === null) {
    return { isWaterfall: false, window: null, maNow: null, maBefore: null };
  }

  const maNow = meanOf(closes, closes.length, window);
  const maBefore = meanOf(closes, closes.length - WATERFALL_LOOKBACK, window);

  return {
    isWaterfall: currentPrice < maNow && maNow < maBefore,
    window,
    maNow,
    maBefore,
  };
}

/**
 * Mean-reversion only: RSI is oversold (<= 40) and did not rise since the
 * previous bar, so the bottom has not turned yet.
 */
export function detectRsiHookFailed(rsiSeries: Series, strategy: ScoringStrategy): boolean {
  if (strategy !== 'mean_reversion' || rsiSeries.length < 2) {
    return false;
  }
  const today = rsiSeries[rsiSeries.length - 1];
  const yesterday = rsiSeries[rsiSeries.length - 2];
  if (today === null || yesterday === null) {
    return false;
  }
  return today <= HOOK_RSI_CEILING && today <= yesterday;
}
