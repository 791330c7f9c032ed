import { Inject, Injectable, Logger } from '@nestjs/common';
import { StockBar } from '../data/data.types';
import {
  IndicatorComputation,
  IndicatorProvider,
  IndicatorRow,
  IndicatorSeries,
  IndicatorSnapshot,
  INDICATOR_PROVIDER,
} from './indicator.types';
import { lastValue } from './indicator.math';

// Values used when an indicator has no output yet for the latest bar
const NEUTRAL_RSI = 50;
const NEUTRAL_MFI = 50;

export function macdDiffPercent(macdDiff: number, currentPrice: number): number {
  return currentPrice > 0 ? (Math.abs(macdDiff) / currentPrice) * 100 : 0;
}

@Injectable()
export class IndicatorEngine {
  private readonly logger = new Logger(IndicatorEngine.name);

  constructor(
    @Inject(INDICATOR_PROVIDER)
    private readonly provider: IndicatorProvider,
  ) {
    this.logger.log(`Using ${provider.id} indicator provider`);
  }

  compute(bars: readonly StockBar[], currentPrice: number): IndicatorComputation {
    const series = this.provider.calculate(bars);
    const macdDiff = lastValue(series.macdDiff) ?? 0;

    const snapshot: IndicatorSnapshot = Object.freeze({
      rsi: lastValue(series.rsi) ?? NEUTRAL_RSI,
      mfi: lastValue(series.mfi) ?? NEUTRAL_MFI,
      macdDiff,
      macdDiffPct: macdDiffPercent(macdDiff, currentPrice),
      bbLower: lastValue(series.bbLower) ?? 0,
      bbUpper: lastValue(series.bbUpper) ?? 0,
      ichimokuA: lastValue(series.ichimokuA),
      ichimokuB: lastValue(series.ichimokuB),
      vwap: lastValue(series.vwap),
      atr: lastValue(series.atr) ?? 0,
      obv: lastValue(series.obv) ?? 0,
      currentPrice,
    });

    return { snapshot, rows: this.toRows(bars, series), series };
  }

  private toRows(bars: readonly StockBar[], series: IndicatorSeries): IndicatorRow[] {
    return bars.map((bar, i) => ({
      ...bar,
      rsi: series.rsi[i] ?? null,
      mfi: series.mfi[i] ?? null,
      bbLower: series.bbLower[i] ?? null,
      bbUpper: series.bbUpper[i] ?? null,
      macd: series.macd[i] ?? null,
      macdSignal: series.macdSignal[i] ?? null,
      macdDiff: series.macdDiff[i] ?? null,
      ichimokuA: series.ichimokuA[i] ?? null,
      ichimokuB: series.ichimokuB[i] ?? null,
      vwap: series.vwap[i] ?? null,
      obv: series.obv[i] ?? null,
      atr: series.atr[i] ?? null,
    }));
  }
}
