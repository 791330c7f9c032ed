import { RSI, MFI, BollingerBands, MACD, IchimokuCloud, OBV, ATR } from 'technicalindicators';
import { StockBar } from '../../data/data.types';
import { IndicatorProvider, IndicatorSeries, INDICATOR_PERIODS as P } from '../indicator.types';
import { alignRight, rollingVwap } from '../indicator.math';

/**
 * Indicator series from the `technicalindicators` package, right-aligned to
 * the bars. The package only has a cumulative VWAP, so the rolling window is
 * computed locally.
 */
export class TechnicalIndicatorsProvider implements IndicatorProvider {
  readonly id = 'library' as const;

  calculate(bars: readonly StockBar[]): IndicatorSeries {
    const n = bars.length;
    const close = bars.map((b) => b.close);
    const high = bars.map((b) => b.high);
    const low = bars.map((b) => b.low);
    const volume = bars.map((b) => b.volume);

    const bands = BollingerBands.calculate({ values: close, period: P.bollinger, stdDev: P.bollingerStdDev });
    const macd = MACD.calculate({
      values: close,
      fastPeriod: P.macdFast,
      slowPeriod: P.macdSlow,
      signalPeriod: P.macdSignal,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    });
    const cloud = IchimokuCloud.calculate({
      high,
      low,
      conversionPeriod: P.ichimokuConversion,
      basePeriod: P.ichimokuBase,
      spanPeriod: P.ichimokuSpan,
      displacement: P.ichimokuBase,
    });

    return {
      rsi: alignRight(RSI.calculate({ values: close, period: P.rsi }), n),
      mfi: alignRight(MFI.calculate({ high, low, close, volume, period: P.mfi }), n),
      bbLower: alignRight(bands.map((b) => b.lower), n),
      bbUpper: alignRight(bands.map((b) => b.upper), n),
      macd: alignRight(macd.map((m) => m.MACD), n),
      macdSignal: alignRight(macd.map((m) => m.signal), n),
      macdDiff: alignRight(macd.map((m) => m.histogram), n),
      ichimokuA: alignRight(cloud.map((c) => c.spanA), n),
      ichimokuB: alignRight(cloud.map((c) => c.spanB), n),
      vwap: rollingVwap(high, low, close, volume, P.vwap),
      obv: alignRight(OBV.calculate({ close, volume }), n),
      atr: alignRight(ATR.calculate({ high, low, close, period: P.atr }), n),
    };
  }
}
