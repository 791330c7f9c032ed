import { ScoringStrategy } from './strategy.types';

export const Verdict = {
  STRONG_BUY: 'STRONG BUY - rare opportunity, scale in',
  CAUTIOUS: 'CAUTIOUS - weak rebound, starter position only',
  HOLD: 'HOLD - downtrend, stay on the sidelines',
  AVOID: 'AVOID - collapse, stay out or exit',
  BREAKOUT: 'STRONG BREAKOUT - ride the trend',
  WATCH: 'WATCH - trend forming, wait for volume',
  NO_TREND: 'NO TREND - not enough momentum',
} as const;

export type Verdict = (typeof Verdict)[keyof typeof Verdict];

export function classifyVerdict(score: number, strategy: ScoringStrategy): Verdict {
  if (strategy === 'trend') {
    if (score >= 75) return Verdict.BREAKOUT;
    if (score <= 40) return Verdict.NO_TREND;
    return Verdict.WATCH;
  }

  if (score >= 80) return Verdict.STRONG_BUY;
  if (score >= 50) return Verdict.CAUTIOUS;
  if (score >= 30) return Verdict.HOLD;
  return Verdict.AVOID;
}

function floorToCents(value: number): number {
  return Math.floor(value * 100 + 1e-9) / 100;
}

/**
 * Two ATRs under the price with a hard floor 15% below it. Without an ATR the
 * stop sits 10% below the price. Rounded down to cents so it stays under the price.
 */
export function dynamicStopLoss(price: number, atr: number): number {
  if (atr > 0) {
    const stop = floorToCents(Math.max(price - 2 * atr, price * 0.85));
    return stop < price ? stop : Math.round((stop - 0.01) * 100) / 100;
  }
  return Math.round(price * 0.9 * 100) / 100;
}
