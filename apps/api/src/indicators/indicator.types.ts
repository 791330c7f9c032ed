import { StockBar } from '../data/data.types';

/** One value per bar, aligned with the input; null during an indicator's warm-up. */
export type Series = ReadonlyArray<number | null>;

export interface IndicatorSeries {
  rsi: Series;
  mfi: Series;
  bbLower: Series;
  bbUpper: Series;
  macd: Series;
  macdSignal: Series;
  macdDiff: Series;
  ichimokuA: Series;
  ichimokuB: Series;
  vwap: Series;
  obv: Series;
  atr: Series;
}

export type IndicatorProviderId = 'library' | 'manual';

export interface IndicatorProvider {
  readonly id: IndicatorProviderId;
  calculate(bars: readonly StockBar[]): IndicatorSeries;
}

export const INDICATOR_PROVIDER = 'INDICATOR_PROVIDER';

export const INDICATOR_PERIODS = {
  rsi: 14,
  mfi: 14,
  bollinger: 20,
  bollingerStdDev: 2,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  ichimokuConversion: 9,
  ichimokuBase: 26,
  ichimokuSpan: 52,
  vwap: 20,
  atr: 14,
} as const;

/**
 * Latest indicator values for one instrument. Cloud bounds and VWAP stay null
 * when the history is too short to produce them; scorers treat that as neutral.
 */
export interface IndicatorSnapshot {
  readonly rsi: number;
  readonly mfi: number;
  readonly macdDiff: number;
  readonly macdDiffPct: number;
  readonly bbLower: number;
  readonly bbUpper: number;
  readonly ichimokuA: number | null;
  readonly ichimokuB: number | null;
  readonly vwap: number | null;
  readonly atr: number;
  readonly obv: number;
  readonly currentPrice: number;
}

export interface IndicatorRow extends StockBar {
  rsi: number | null;
  mfi: number | null;
  bbLower: number | null;
  bbUpper: number | null;
  macd: number | null;
  macdSignal: number | null;
  macdDiff: number | null;
  ichimokuA: number | null;
  ichimokuB: number | null;
  vwap: number | null;
  obv: number | null;
  atr: number | null;
}

export interface IndicatorComputation {
  snapshot: IndicatorSnapshot;
  rows: IndicatorRow[];
  series: IndicatorSeries;
}
