import { Test } from '@nestjs/testing';
import { HistoryPeriod, PriceHistoryProvider, PRICE_HISTORY_PROVIDER, StockBar } from '../data/data.types';
import { PriceHistoryClient } from '../data/price-history.client';
import { echoedCloses, linearCloses, makeBars } from '../testing/bar-fixtures';
import { PatternFinderService } from './pattern-finder.service';

class FakeHistory implements PriceHistoryProvider {
  bars: StockBar[] | Error = [];
  readonly periods: HistoryPeriod[] = [];

  async getDailyBars(_ticker: string, period: HistoryPeriod): Promise<StockBar[]> {
    this.periods.push(period);
    if (this.bars instanceof Error) throw this.bars;
    return this.bars;
  }
}

describe('PatternFinderService', () => {
  let history: FakeHistory;
  let finder: PatternFinderService;

  beforeEach(async () => {
    history = new FakeHistory();
    const moduleRef = await Test.createTestingModule({
      providers: [
        PatternFinderService,
        PriceHistoryClient,
        { provide: PRICE_HISTORY_PROVIDER, useValue: history },
      ],
    }).compile();
    finder = moduleRef.get(PatternFinderService);
  });

  it('matches the recent window against three years of history', async () => {
    history.bars = makeBars(echoedCloses());

    const result = await finder.findSimilarPatterns(' acme ');

    expect(history.periods).toEqual(['3y']);
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.ticker).toBe('ACME');
    expect(result.lookbackDays).toBe(20);
    expect(result.currentWindow).toEqual({ startDate: '2024-06-29', endDate: '2024-07-18' });
    expect(result.matches.map((m) => m.index)).toEqual([50, 16, 84]);
    expect(result.averageReturns.map((r) => r.horizon)).toEqual([20, 60]);
  });

  it('honours the requested number of matches', async () => {
    history.bars = makeBars(echoedCloses());

    const result = await finder.findSimilarPatterns('ACME', { topN: 1 });

    expect(result.success && result.matches.map((m) => m.index)).toEqual([50]);
  });

  it('reports short history as InsufficientData', async () => {
    history.bars = makeBars(linearCloses(45, 100, 1));

    await expect(finder.findSimilarPatterns('ACME')).resolves.toEqual({
      ticker: 'ACME',
      success: false,
      errorType: 'InsufficientData',
      errorMsg: '[ACME] needs at least 60 bars, got 45',
    });
  });

  it('reports upstream failures as DataFetch', async () => {
    history.bars = new Error('timeout');

    await expect(finder.findSimilarPatterns('ACME')).resolves.toEqual({
      ticker: 'ACME',
      success: false,
      errorType: 'DataFetch',
      errorMsg: '[ACME] price history request failed: timeout',
    });
  });

  it('rejects a blank ticker without fetching', async () => {
    const result = await finder.findSimilarPatterns('  ');

    expect(result).toEqual({
      ticker: '  ',
      success: false,
      errorType: 'DataFetch',
      errorMsg: 'Ticker symbol is empty',
    });
    expect(history.periods).toEqual([]);
  });

  it('turns invalid options into an Analysis failure', async () => {
    history.bars = makeBars(echoedCloses());

    await expect(finder.findSimilarPatterns('ACME', { lookbackDays: 1 })).resolves.toEqual({
      ticker: 'ACME',
      success: false,
      errorType: 'Analysis',
      errorMsg: 'Unexpected error while matching patterns for ACME: lookbackDays must be an integer >= 2, got 1',
    });
  });
});
