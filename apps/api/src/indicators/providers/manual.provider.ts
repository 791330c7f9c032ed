import { StockBar } from '../../data/data.types';
import { IndicatorProvider, IndicatorSeries, INDICATOR_PERIODS as P } from '../indicator.types';
import { atr, bollinger, ichimoku, macd, mfi, obv, rollingVwap, rsi } from '../indicator.math';

/**
 * Hand-written formulas for every indicator. Used when the indicator library
 * is switched off; values track the library closely but are not identical
 * (plain rolling RSI/MFI instead of smoothed ones).
 */
export class ManualIndicatorProvider implements IndicatorProvider {
  readonly id = 'manual' as const;

  calculate(bars: readonly StockBar[]): IndicatorSeries {
    const closes = bars.map((b) => b.close);
    const highs = bars.map((b) => b.high);
    const lows = bars.map((b) => b.low);
    const volumes = bars.map((b) => b.volume);

    const bands = bollinger(closes, P.bollinger, P.bollingerStdDev);
    const trend = macd(closes, P.macdFast, P.macdSlow, P.macdSignal);
    const cloud = ichimoku(highs, lows, P.ichimokuConversion, P.ichimokuBase, P.ichimokuSpan);

    return {
      rsi: rsi(closes, P.rsi),
      mfi: mfi(highs, lows, closes, volumes, P.mfi),
      bbLower: bands.lower,
      bbUpper: bands.upper,
      macd: trend.line,
      macdSignal: trend.signal,
      macdDiff: trend.diff,
      ichimokuA: cloud.spanA,
      ichimokuB: cloud.spanB,
      vwap: rollingVwap(highs, lows, closes, volumes, P.vwap),
      obv: obv(closes, volumes),
      atr: atr(highs, lows, closes, P.atr),
    };
  }
}
