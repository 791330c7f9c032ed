import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { errorMessage } from '../common/error-message';
import { FundamentalsInfo, FundamentalsProvider } from './data.types';
import { PolygonService, isCryptoTicker } from './polygon.service';

const profileSchema = z.object({
  name: z.string().optional(),
  ticker: z.string().optional(),
  finnhubIndustry: z.string().optional(),
  marketCapitalization: z.number().nullish(), // millions
});

const metricResponseSchema = z.object({
  metric: z.record(z.union([z.number(), z.string(), z.null()])).optional(),
});

// Polygon reference types -> quote types understood by the fundamentals checker
const POLYGON_QUOTE_TYPES: Record<string, string> = {
  ETF: 'ETF',
  ETN: 'ETF',
  ETV: 'ETF',
  ETS: 'ETF',
  FUND: 'MUTUALFUND',
  CS: 'EQUITY',
  ADRC: 'EQUITY',
  PFD: 'EQUITY',
};

function finiteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

@Injectable()
export class FinnhubService implements FundamentalsProvider {
  private readonly logger = new Logger(FinnhubService.name);
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly baseUrl = 'https://finnhub.io/api/v1';

  constructor(
    private readonly configService: ConfigService,
    private readonly polygonService: PolygonService,
  ) {
    this.apiKey = this.configService.get<string>('FINNHUB_API_KEY', '');
    this.timeoutMs = Number(this.configService.get<string>('MARKET_DATA_TIMEOUT_MS', '10000'));
    if (!this.apiKey) {
      this.logger.warn('FINNHUB_API_KEY not configured');
    }
  }

  private async fetch<S extends z.ZodTypeAny>(endpoint: string, schema: S): Promise<z.infer<S>> {
    const url = `${this.baseUrl}${endpoint}${endpoint.includes('?') ? '&' : '?'}token=${this.apiKey}`;
    const response = await fetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });

    if (!response.ok) {
      throw new Error(`Finnhub API error: ${response.status} ${response.statusText}`);
    }

    return schema.parse(await response.json());
  }

  async getInfo(ticker: string): Promise<FundamentalsInfo> {
    if (isCryptoTicker(ticker)) {
      return { quoteType: 'CRYPTOCURRENCY', shortName: ticker };
    }

    const symbol = encodeURIComponent(ticker.toUpperCase());
    const [profile, metrics, quoteType] = await Promise.all([
      this.fetch(`/stock/profile2?symbol=${symbol}`, profileSchema),
      this.fetch(`/stock/metric?symbol=${symbol}&metric=all`, metricResponseSchema),
      this.getQuoteType(ticker),
    ]);

    const metric = metrics.metric ?? {};
    const marketCapMillions = finiteNumber(profile.marketCapitalization);
    const revenueGrowthPct = finiteNumber(metric['revenueGrowthTTMYoy']);
    const debtToEquityRatio = finiteNumber(metric['totalDebt/totalEquityQuarterly']);

    return {
      quoteType,
      shortName: profile.name,
      marketCap: marketCapMillions !== undefined ? marketCapMillions * 1_000_000 : undefined,
      trailingEps: finiteNumber(metric['epsTTM']) ?? finiteNumber(metric['epsBasicExclExtraItemsTTM']),
      revenueGrowth: revenueGrowthPct !== undefined ? revenueGrowthPct / 100 : undefined,
      debtToEquity: debtToEquityRatio !== undefined ? debtToEquityRatio * 100 : undefined,
      industry: profile.finnhubIndustry,
    };
  }

  private async getQuoteType(ticker: string): Promise<string | undefined> {
    try {
      const details = await this.polygonService.getTickerDetails(ticker);
      return details?.type ? POLYGON_QUOTE_TYPES[details.type] ?? details.type : undefined;
    } catch (error) {
      this.logger.debug(`Ticker type unavailable for ${ticker}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
