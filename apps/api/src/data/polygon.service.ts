import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { errorMessage } from '../common/error-message';
import {
  StockBar,
  HistoryPeriod,
  PERIOD_DAYS,
  PriceHistoryProvider,
  LiveQuoteProvider,
} from './data.types';

// Polygon sends null for missing fields on thinly traded tickers
const nullableNumber = z.number().nullish();

const aggsResponseSchema = z.object({
  status: z.string().optional(),
  resultsCount: z.number().optional(),
  results: z
    .array(
      z.object({
        o: nullableNumber,
        h: nullableNumber,
        l: nullableNumber,
        c: nullableNumber,
        v: nullableNumber,
        t: z.number(),
      }),
    )
    .optional(),
});

const snapshotResponseSchema = z.object({
  ticker: z
    .object({
      day: z.object({ c: nullableNumber }).optional(),
      min: z.object({ c: nullableNumber }).optional(),
      lastTrade: z.object({ p: nullableNumber }).optional(),
      prevDay: z.object({ c: nullableNumber }).optional(),
    })
    .optional(),
});

const tickerDetailsResponseSchema = z.object({
  results: z
    .object({
      ticker: z.string().optional(),
      name: z.string().optional(),
      type: z.string().optional(),
      market: z.string().optional(),
    })
    .optional(),
});

export interface TickerDetails {
  name?: string;
  type?: string;
  market?: string;
}

const CRYPTO_PAIR = /^([A-Z0-9]+)-USD$/;

/**
 * Maps Yahoo-style symbols to Polygon tickers. BTC-USD becomes X:BTCUSD,
 * everything else passes through upper-cased.
 */
export function toPolygonTicker(ticker: string): string {
  const symbol = ticker.trim().toUpperCase();
  const crypto = CRYPTO_PAIR.exec(symbol);
  return crypto ? `X:${crypto[1]}USD` : symbol;
}

export function isCryptoTicker(ticker: string): boolean {
  return toPolygonTicker(ticker).startsWith('X:');
}

function numberOrNaN(value: number | null | undefined): number {
  return value ?? Number.NaN;
}

@Injectable()
export class PolygonService implements PriceHistoryProvider, LiveQuoteProvider {
  private readonly logger = new Logger(PolygonService.name);
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly baseUrl = 'https://api.polygon.io';

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('POLYGON_API_KEY', '');
    this.timeoutMs = Number(this.configService.get<string>('MARKET_DATA_TIMEOUT_MS', '10000'));
    if (!this.apiKey) {
      this.logger.warn('POLYGON_API_KEY not configured');
    }
  }

  private async fetch<S extends z.ZodTypeAny>(endpoint: string, schema: S): Promise<z.infer<S>> {
    const url = `${this.baseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}apiKey=${this.apiKey}`;
    const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });

    if (!response.ok) {
      throw new Error(`Polygon API error: ${response.status} ${response.statusText}`);
    }

    return schema.parse(await response.json());
  }

  /**
   * Missing OHLCV fields come back as NaN so the history client can
   * forward-fill them.
   */
  async getDailyBars(ticker: string, period: HistoryPeriod, adjusted: boolean): Promise<StockBar[]> {
    const symbol = encodeURIComponent(toPolygonTicker(ticker));
    const to = new Date().toISOString().split('T')[0];
    const from = new Date(Date.now() - PERIOD_DAYS[period] * 24 * 60 * 60 * 1000)
      .toISOString()
      .split('T')[0];

    const data = await this.fetch(
      `/v2/aggs/ticker/${symbol}/range/1/day/${from}/${to}?adjusted=${adjusted}&sort=asc&limit=50000`,
      aggsResponseSchema,
    );

    if (!data.results) {
      return [];
    }

    return data.results.map((bar) => ({
      open: numberOrNaN(bar.o),
      high: numberOrNaN(bar.h),
      low: numberOrNaN(bar.l),
      close: numberOrNaN(bar.c),
      volume: numberOrNaN(bar.v),
      timestamp: new Date(bar.t),
    }));
  }

  async getLastPrice(ticker: string): Promise<number | null> {
    const symbol = toPolygonTicker(ticker);
    const locale = symbol.startsWith('X:') ? 'global/markets/crypto' : 'us/markets/stocks';

    try {
      const snapshot = await this.fetch(
        `/v2/snapshot/locale/${locale}/tickers/${encodeURIComponent(symbol)}`,
        snapshotResponseSchema,
      );
      const current = snapshot.ticker;
      const price = current?.lastTrade?.p || current?.min?.c || current?.day?.c;
      return price && price > 0 ? price : null;
    } catch (error) {
      this.logger.debug(`No live quote for ${ticker}: ${errorMessage(error)}`);
      return null;
    }
  }

  async getTickerDetails(ticker: string): Promise<TickerDetails | null> {
    const symbol = encodeURIComponent(toPolygonTicker(ticker));
    const data = await this.fetch(`/v3/reference/tickers/${symbol}`, tickerDetailsResponseSchema);
    if (!data.results) {
      return null;
    }
    return {
      name: data.results.name,
      type: data.results.type,
      market: data.results.market,
    };
  }
}
