export interface StockBar {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  timestamp: Date;
}

export type HistoryPeriod = '1mo' | '3mo' | '6mo' | '1y' | '2y' | '3y' | '5y';

export const HISTORY_PERIODS: readonly HistoryPeriod[] = ['1mo', '3mo', '6mo', '1y', '2y', '3y', '5y'];

// Calendar days requested from the provider for each period hint
export const PERIOD_DAYS: Record<HistoryPeriod, number> = {
  '1mo': 31,
  '3mo': 92,
  '6mo': 183,
  '1y': 366,
  '2y': 731,
  '3y': 1096,
  '5y': 1827,
};

/**
 * Optional fields of the fundamentals info bag. Every field may be absent.
 * revenueGrowth is a fraction (0.25 = 25%), debtToEquity a percentage (150 = 150%).
 */
export interface FundamentalsInfo {
  quoteType?: string;
  shortName?: string;
  marketCap?: number;
  trailingEps?: number;
  revenueGrowth?: number;
  debtToEquity?: number;
  industry?: string;
  sector?: string;
}

export interface PriceHistoryProvider {
  getDailyBars(ticker: string, period: HistoryPeriod, adjusted: boolean): Promise<StockBar[]>;
}

export interface LiveQuoteProvider {
  /** Real-time last price, or null when no quote is available. */
  getLastPrice(ticker: string): Promise<number | null>;
}

export interface FundamentalsProvider {
  getInfo(ticker: string): Promise<FundamentalsInfo>;
}

export const PRICE_HISTORY_PROVIDER = 'PRICE_HISTORY_PROVIDER';
export const LIVE_QUOTE_PROVIDER = 'LIVE_QUOTE_PROVIDER';
export const FUNDAMENTALS_PROVIDER = 'FUNDAMENTALS_PROVIDER';
