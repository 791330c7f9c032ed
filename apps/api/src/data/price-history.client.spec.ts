import { Test } from '@nestjs/testing';
import { DataFetchError, InsufficientDataError } from '../analysis/analysis.errors';
import { linearCloses, makeBars } from '../testing/bar-fixtures';
import { HistoryPeriod, PriceHistoryProvider, PRICE_HISTORY_PROVIDER, StockBar } from './data.types';
import { buildFetchAttempts, cleanBars, PriceHistoryClient } from './price-history.client';

type Answer = StockBar[] | Error;

class FakeHistory implements PriceHistoryProvider {
  calls: string[] = [];
  answer: (period: HistoryPeriod, adjusted: boolean) => Answer = () => [];

  async getDailyBars(_ticker: string, period: HistoryPeriod, adjusted: boolean): Promise<StockBar[]> {
    this.calls.push(`${period}:${adjusted ? 'adj' : 'raw'}`);
    const answer = this.answer(period, adjusted);
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

describe('buildFetchAttempts', () => {
  it('tries the requested period then longer ones, unadjusted first', () => {
    expect(buildFetchAttempts('6mo')).toEqual([
      { period: '6mo', adjusted: false },
      { period: '6mo', adjusted: true },
      { period: '1y', adjusted: false },
      { period: '1y', adjusted: true },
      { period: '2y', adjusted: false },
      { period: '2y', adjusted: true },
    ]);
  });

  it('does not repeat a fallback period', () => {
    expect(buildFetchAttempts('1y').map((a) => a.period)).toEqual(['1y', '1y', '2y', '2y']);
  });
});

describe('cleanBars', () => {
  it('sorts, forward-fills and replaces zero volume', () => {
    const [first, second, third] = makeBars([10, 11, 12]);
    const cleaned = cleanBars([
      { ...third, close: Number.NaN },
      first,
      { ...second, volume: 0 },
    ]);

    expect(cleaned.map((bar) => bar.close)).toEqual([10, 11, 11]);
    expect(cleaned.map((bar) => bar.volume)).toEqual([1000, 1, 1000]);
    expect(cleaned[2].timestamp).toEqual(third.timestamp);
  });

  it('drops leading rows that cannot be filled', () => {
    const [first, second] = makeBars([10, 11]);
    const cleaned = cleanBars([{ ...first, open: Number.NaN }, second]);
    expect(cleaned).toEqual([second]);
  });
});

describe('PriceHistoryClient', () => {
  let client: PriceHistoryClient;
  let provider: FakeHistory;

  beforeEach(async () => {
    provider = new FakeHistory();
    const moduleRef = await Test.createTestingModule({
      providers: [PriceHistoryClient, { provide: PRICE_HISTORY_PROVIDER, useValue: provider }],
    }).compile();
    client = moduleRef.get(PriceHistoryClient);
  });

  it('returns the first attempt with enough rows', async () => {
    provider.answer = () => makeBars(linearCloses(40, 100, 1));

    const result = await client.fetch('ACME', '6mo');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.bars).toHaveLength(40);
      expect(result.attempt).toEqual({ period: '6mo', adjusted: false });
    }
    expect(provider.calls).toEqual(['6mo:raw']);
  });

  it('moves on to the adjusted series when the raw one is short', async () => {
    provider.answer = (_period, adjusted) => makeBars(linearCloses(adjusted ? 35 : 10, 100, 1));

    const result = await client.fetch('ACME', '3mo');

    expect(result.ok && result.attempt).toEqual({ period: '3mo', adjusted: true });
    expect(provider.calls).toEqual(['3mo:raw', '3mo:adj']);
  });

  it('reports insufficient data when answers were all too short', async () => {
    provider.answer = (period) =>
      period === '2y' ? makeBars(linearCloses(12, 5, 0.1)) : new Error('not found');

    const result = await client.fetch('GONE', '6mo');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InsufficientDataError);
      expect(result.error.message).toBe(
        '[GONE] could not collect 30 rows of history (best attempt returned 12); delisted or invalid ticker?',
      );
    }
    expect(provider.calls).toHaveLength(6);
  });

  it('reports a fetch failure when every request failed', async () => {
    provider.answer = () => new Error('socket hang up');

    const result = await client.fetch('ACME', '6mo');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DataFetchError);
      expect(result.error.message).toBe('[ACME] price history request failed: socket hang up');
    }
  });
});
