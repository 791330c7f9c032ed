import { Test } from '@nestjs/testing';
import {
  FundamentalsInfo,
  FundamentalsProvider,
  FUNDAMENTALS_PROVIDER,
  HistoryPeriod,
  LiveQuoteProvider,
  LIVE_QUOTE_PROVIDER,
  PriceHistoryProvider,
  PRICE_HISTORY_PROVIDER,
  StockBar,
} from '../data/data.types';
import { PriceHistoryClient } from '../data/price-history.client';
import { IndicatorEngine } from '../indicators/indicator-engine.service';
import { IndicatorProvider, IndicatorSeries, INDICATOR_PROVIDER } from '../indicators/indicator.types';
import { ManualIndicatorProvider } from '../indicators/providers/manual.provider';
import { FundamentalsChecker } from '../strategy/fundamentals-checker.service';
import { ScoringService } from '../strategy/scoring.service';
import { Verdict } from '../strategy/verdict';
import { linearCloses, makeBars } from '../testing/bar-fixtures';
import { AnalyzerService } from './analyzer.service';
import { AnalysisResult, AnalysisSuccess } from './analysis.types';

class FakeHistory implements PriceHistoryProvider {
  bars: StockBar[] | Error = [];
  readonly periods: HistoryPeriod[] = [];

  async getDailyBars(_ticker: string, period: HistoryPeriod): Promise<StockBar[]> {
    this.periods.push(period);
    if (this.bars instanceof Error) throw this.bars;
    return this.bars;
  }
}

class FakeQuotes implements LiveQuoteProvider {
  price: number | null | Error = null;

  async getLastPrice(): Promise<number | null> {
    if (this.price instanceof Error) throw this.price;
    return this.price;
  }
}

class FakeFundamentals implements FundamentalsProvider {
  info: FundamentalsInfo = {};

  async getInfo(): Promise<FundamentalsInfo> {
    return this.info;
  }
}

class BrokenIndicators implements IndicatorProvider {
  readonly id = 'manual' as const;

  calculate(): IndicatorSeries {
    throw new Error('matrix is singular');
  }
}

function expectSuccess(result: AnalysisResult): AnalysisSuccess {
  if (!result.success) {
    throw new Error(`expected success, got ${result.errorType}: ${result.errorMsg}`);
  }
  return result;
}

describe('AnalyzerService', () => {
  let history: FakeHistory;
  let quotes: FakeQuotes;
  let fundamentals: FakeFundamentals;

  async function createAnalyzer(indicators: IndicatorProvider = new ManualIndicatorProvider()) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AnalyzerService,
        PriceHistoryClient,
        IndicatorEngine,
        ScoringService,
        FundamentalsChecker,
        { provide: PRICE_HISTORY_PROVIDER, useValue: history },
        { provide: LIVE_QUOTE_PROVIDER, useValue: quotes },
        { provide: FUNDAMENTALS_PROVIDER, useValue: fundamentals },
        { provide: INDICATOR_PROVIDER, useValue: indicators },
      ],
    }).compile();
    return moduleRef.get(AnalyzerService);
  }

  beforeEach(() => {
    history = new FakeHistory();
    quotes = new FakeQuotes();
    fundamentals = new FakeFundamentals();
  });

  describe('success path', () => {
    // Flat tape at 100 with a live quote just under it
    beforeEach(() => {
      history.bars = makeBars(new Array<number>(80).fill(100));
      quotes.price = 99;
    });

    it('scores the snapshot and assembles the result', async () => {
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze(' acme ', { period: '6mo' }));

      expect(result.ticker).toBe('ACME');
      expect(result.strategy).toBe('mean_reversion');
      expect(result.currentPrice).toBe(99);
      expect(result.subScores).toEqual({
        rsi: 5,
        mfi: 5,
        bollinger: 15,
        macd: 0,
        ichimoku: 12,
        vwap: 3,
      });
      expect(result.score).toBe(40);
      expect(result.technicalScore).toBe(40);
      expect(result.verdict).toBe(Verdict.HOLD);
      expect(result.stopLoss).toBe(95);
      expect(result.filters).toEqual({ isWaterfall: false, isRsiHookFailed: false });
      expect(result.fundamentals).toBeNull();
      expect(result.series).toHaveLength(80);
    });

    it('lists indicator cards before the final narrative', async () => {
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('ACME'));

      expect(result.detailInfo.map((d) => d.title)).toEqual([
        'RSI (momentum)',
        'MFI (money flow)',
        'MACD (trend signal)',
        'Ichimoku cloud',
        'Bollinger Bands (volatility)',
        'ATR (dynamic stop)',
        'VWAP (volume weighted)',
        'Long-term trend',
        'RSI turnaround (hook)',
        'Final verdict',
      ]);
      expect(result.detailInfo[0].comment).toBe('50.0 (normal)');
      expect(result.detailInfo[5].comment).toBe('ATR=2.00 -> stop 95.0');
      expect(result.detailInfo[9].comment).toContain('[HOLD - not enough evidence]');
      expect(result.detailInfo[9].comment).toContain('- VWAP (discount): +3 / 15');
    });

    it('falls back to the last close without a live quote', async () => {
      quotes.price = null;
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('ACME'));

      expect(result.currentPrice).toBe(100);
      expect(result.score).toBe(25);
    });

    it('falls back to the last close when the quote provider fails', async () => {
      quotes.price = new Error('quote service down');
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('ACME'));

      expect(result.currentPrice).toBe(100);
    });

    it('reduces the score by exactly the fundamentals penalty', async () => {
      fundamentals.info = { marketCap: 100e6 };
      const analyzer = await createAnalyzer();

      const plain = expectSuccess(await analyzer.analyze('ACME'));
      const checked = expectSuccess(await analyzer.analyze('ACME', { applyFundamentals: true }));

      expect(checked.technicalScore).toBe(plain.score);
      expect(checked.score).toBe(plain.score - 25);
      expect(checked.verdict).toBe(Verdict.AVOID);
      expect(checked.fundamentals).toEqual({
        penalty: 25,
        messages: ['Market cap $100M below $200M floor (-25)'],
        isExempt: false,
      });
      const titles = checked.detailInfo.map((d) => d.title);
      expect(titles[titles.length - 2]).toBe('Fundamentals check');
      expect(checked.detailInfo[titles.length - 1].comment).toContain('Fundamentals risk: -25 points');
    });

    it('clamps the penalized score at zero', async () => {
      fundamentals.info = { marketCap: 100e6, trailingEps: -1, debtToEquity: 500 };
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('ACME', { applyFundamentals: true }));

      expect(result.fundamentals?.penalty).toBe(55);
      expect(result.score).toBe(0);
    });
  });

  describe('filters', () => {
    it('caps a waterfall decline at 29', async () => {
      history.bars = makeBars(linearCloses(150, 250, -1));
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('FALL'));

      expect(result.filters.isWaterfall).toBe(true);
      expect(result.score).toBeLessThanOrEqual(29);
      expect(result.detailInfo.find((d) => d.title === 'Long-term trend')?.comment).toBe(
        'Danger - waterfall decline (price under a falling 120-day average)',
      );
    });

    it('caps a failed RSI hook at 29 before any waterfall can form', async () => {
      history.bars = makeBars(linearCloses(60, 200, -1));
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('SLIDE'));

      expect(result.strategy).toBe('mean_reversion');
      expect(result.filters).toEqual({ isWaterfall: false, isRsiHookFailed: true });
      expect(result.score).toBeLessThanOrEqual(29);
      expect(result.verdict).toBe(Verdict.AVOID);
      expect(result.detailInfo[result.detailInfo.length - 1].comment).toContain(
        '[WAIT - falling knife]',
      );
    });

    it('scores a clean uptrend as a breakout in trend mode', async () => {
      history.bars = makeBars(linearCloses(150, 100, 1));
      const analyzer = await createAnalyzer();

      const result = expectSuccess(await analyzer.analyze('RISE', { strategy: 'trend' }));

      expect(result.strategy).toBe('trend');
      expect(result.filters).toEqual({ isWaterfall: false, isRsiHookFailed: false });
      expect(result.score).toBeGreaterThanOrEqual(90);
      expect(result.verdict).toBe(Verdict.BREAKOUT);
      expect(result.detailInfo.map((d) => d.title)).not.toContain('RSI turnaround (hook)');
    });
  });

  describe('options', () => {
    it('treats explicitly undefined options as the defaults', async () => {
      history.bars = makeBars(linearCloses(60, 200, -1));
      const analyzer = await createAnalyzer();

      const implicit = await analyzer.analyze('ACME', {
        period: undefined,
        strategy: undefined,
        applyFundamentals: undefined,
      });
      const explicit = await analyzer.analyze('ACME', {
        period: '6mo',
        strategy: 'mean_reversion',
        applyFundamentals: false,
      });

      expect(implicit).toEqual(explicit);
      expect(expectSuccess(implicit).strategy).toBe('mean_reversion');
      expect(history.periods).toEqual(['6mo', '6mo']);
    });
  });

  describe('failure path', () => {
    it('reports a blank ticker as a fetch failure', async () => {
      const analyzer = await createAnalyzer();

      await expect(analyzer.analyze('   ')).resolves.toEqual({
        ticker: '   ',
        success: false,
        errorType: 'DataFetch',
        errorMsg: 'Ticker symbol is empty',
        failedPhase: 'fetching',
      });
    });

    it('reports upstream errors as DataFetch', async () => {
      history.bars = new Error('503 Service Unavailable');
      const analyzer = await createAnalyzer();

      const result = await analyzer.analyze('ACME');

      expect(result).toEqual({
        ticker: 'ACME',
        success: false,
        errorType: 'DataFetch',
        errorMsg: '[ACME] price history request failed: 503 Service Unavailable',
        failedPhase: 'fetching',
      });
    });

    it('reports short history as InsufficientData', async () => {
      history.bars = makeBars(linearCloses(12, 50, 1));
      const analyzer = await createAnalyzer();

      const result = await analyzer.analyze('NEW');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errorType).toBe('InsufficientData');
        expect(result.errorMsg).toContain('best attempt returned 12');
      }
    });

    it('reports faults in the math as Analysis', async () => {
      history.bars = makeBars(new Array<number>(40).fill(10));
      const analyzer = await createAnalyzer(new BrokenIndicators());

      const result = await analyzer.analyze('ACME');

      expect(result).toEqual({
        ticker: 'ACME',
        success: false,
        errorType: 'Analysis',
        errorMsg: 'Unexpected error while analyzing ACME: matrix is singular',
        failedPhase: 'computing',
      });
    });
  });
});
