import { FILTER_SCORE_CAP, FilterFlags, SubScores } from './strategy.types';

export function clamp(min: number, max: number, value: number): number {
  return Math.max(min, Math.min(max, value));
}

export function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Oversold strength, 0-20. RSI <= 20 scores 20, RSI >= 60 scores 0. */
export function scoreRsi(rsi: number): number {
  return round1(clamp(0, 20, (60 - rsi) * 0.5));
}

/** Money-flow oversold strength, same shape as RSI, 0-20. */
export function scoreMfi(mfi: number): number {
  return round1(clamp(0, 20, (60 - mfi) * 0.5));
}

/** Reward for price at or under the lower Bollinger band, 0-15. */
export function scoreBb(price: number, bbLower: number): number {
  if (!(bbLower > 0)) return 0;
  const ratio = price / bbLower;
  if (ratio > 1.05) return 0;
  return round1(clamp(0, 15, (1.05 - ratio) * 300));
}

/**
 * Positive MACD histogram earns a base of 7 plus a size bonus up to 8, 0-15.
 * The bonus uses the price-normalized distance when it is available.
 */
export function scoreMacd(macdDiff: number, macdDiffPct?: number | null): number {
  if (!(macdDiff > 0)) return 0;
  const bonus =
    macdDiffPct !== undefined && macdDiffPct !== null && macdDiffPct > 0
      ? Math.min(8, macdDiffPct * 200)
      : Math.min(8, Math.abs(macdDiff) * 5);
  return round1(Math.min(15, 7 + bonus));
}

/** Position relative to the cloud, 0-15; neutral 7.5 without cloud data. */
export function scoreIchimoku(price: number, ichimokuA: number | null | undefined, ichimokuB: number | null | undefined): number {
  if (ichimokuA === null || ichimokuA === undefined || ichimokuB === null || ichimokuB === undefined) {
    return 7.5;
  }
  const cloudTop = Math.max(ichimokuA, ichimokuB);
  const cloudBottom = Math.min(ichimokuA, ichimokuB);

  let base = 0;
  if (price < cloudBottom) base = 12;
  else if (price < cloudTop) base = 6;

  const bonus = ichimokuA > ichimokuB ? 3 : 0;
  return round1(Math.min(15, base + bonus));
}

/** Discount to VWAP, 0-15; neutral 7.5 without VWAP. */
export function scoreVwap(price: number, vwap: number | null | undefined): number {
  if (vwap === null || vwap === undefined || !(vwap > 0)) return 7.5;
  const divergence = (vwap - price) / vwap;
  if (divergence <= 0) return 0;
  return round1(clamp(0, 15, divergence * 300));
}

export interface SharpScoreInput {
  rsi: number;
  mfi: number;
  bbLower: number;
  price: number;
  macdDiff: number;
  macdDiffPct?: number | null;
  ichimokuA?: number | null;
  ichimokuB?: number | null;
  vwap?: number | null;
}

export function meanReversionSubScores(input: SharpScoreInput): SubScores {
  return {
    rsi: scoreRsi(input.rsi),
    mfi: scoreMfi(input.mfi),
    bollinger: scoreBb(input.price, input.bbLower),
    macd: scoreMacd(input.macdDiff, input.macdDiffPct),
    ichimoku: scoreIchimoku(input.price, input.ichimokuA, input.ichimokuB),
    vwap: scoreVwap(input.price, input.vwap),
  };
}

export function sumSubScores(subScores: SubScores): number {
  return (
    subScores.rsi +
    subScores.mfi +
    subScores.bollinger +
    subScores.macd +
    subScores.ichimoku +
    subScores.vwap
  );
}

/**
 * Multi-factor mean-reversion score: six capped factors summed, clamped to
 * 0-100 and rounded to one decimal. Filters are applied separately.
 */
export function calculateSharpScore(input: SharpScoreInput): number {
  return round1(clamp(0, 100, sumSubScores(meanReversionSubScores(input))));
}

export interface TrendScoreInput {
  rsi: number;
  mfi: number;
  bbUpper: number;
  price: number;
  macdDiff: number;
  ichimokuA?: number | null;
  ichimokuB?: number | null;
  vwap?: number | null;
}

/** Breakout-mode factor scores: strength is rewarded instead of weakness. */
export function trendSubScores(input: TrendScoreInput): SubScores {
  const { rsi, mfi, bbUpper, price, macdDiff, ichimokuA, ichimokuB, vwap } = input;

  let rsiScore = 0;
  if (rsi > 75) rsiScore = 20;
  else if (rsi >= 50) rsiScore = 20 * ((rsi - 50) / 25);

  const mfiScore = mfi >= 50 ? Math.min(20, (mfi - 50) * 0.8) : 0;

  let bollingerScore = 0;
  if (bbUpper > 0) {
    const ratio = price / bbUpper;
    bollingerScore = ratio >= 0.98 ? 15 : Math.max(0, (ratio - 0.9) * 150);
  }

  let ichimokuScore = 0;
  if (ichimokuA !== null && ichimokuA !== undefined && ichimokuB !== null && ichimokuB !== undefined) {
    const cloudTop = Math.max(ichimokuA, ichimokuB);
    if (cloudTop > 0 && price > cloudTop) {
      ichimokuScore = ichimokuA > ichimokuB ? 20 : 15;
    }
  }

  return {
    rsi: round1(rsiScore),
    mfi: round1(mfiScore),
    bollinger: round1(bollingerScore),
    macd: macdDiff > 0 ? 15 : 0,
    ichimoku: ichimokuScore,
    vwap: vwap !== null && vwap !== undefined && vwap > 0 && price > vwap ? 15 : 0,
  };
}

export function calculateTrendScore(input: TrendScoreInput): number {
  return round1(clamp(0, 100, sumSubScores(trendSubScores(input))));
}

/** Waterfall or a failed RSI hook caps the score regardless of the factor sum. */
export function applyFilterCaps(score: number, flags: FilterFlags): number {
  if (flags.isWaterfall || flags.isRsiHookFailed) {
    return Math.min(score, FILTER_SCORE_CAP);
  }
  return score;
}

export function applyFundamentalsPenalty(technicalScore: number, penalty: number): number {
  return round1(clamp(0, 100, technicalScore - penalty));
}
