import { Inject, Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '../common/error-message';
import {
  FundamentalsInfo,
  FundamentalsProvider,
  FUNDAMENTALS_PROVIDER,
} from '../data/data.types';
import { FundamentalsResult } from './strategy.types';

const EXEMPT_QUOTE_TYPES = new Set(['ETF', 'MUTUALFUND', 'CRYPTOCURRENCY']);
const DOMESTIC_SUFFIXES = ['.KS', '.KQ'];
const FINANCIAL_KEYWORDS = ['bank', 'financial', 'insurance'];

export const MARKET_CAP_FLOOR_DOMESTIC = 30_000_000_000; // KRW 30B
export const MARKET_CAP_FLOOR_FOREIGN = 200_000_000; // USD 200M
export const MARKET_CAP_PENALTY = 25;
export const NEGATIVE_EPS_PENALTY = 20;
export const HIGH_DEBT_PENALTY = 10;
export const GROWTH_EXEMPTION_THRESHOLD = 0.2;
export const DEBT_TO_EQUITY_LIMIT = 200;

export const FUNDAMENTALS_UNAVAILABLE_MESSAGE = 'Fundamentals unavailable (data missing)';

function isDomesticTicker(ticker: string): boolean {
  const symbol = ticker.toUpperCase();
  return DOMESTIC_SUFFIXES.some((suffix) => symbol.endsWith(suffix));
}

function positive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

/**
 * Penalizes small, loss-making or over-leveraged companies. Funds and crypto
 * are exempt. Missing fields never trigger a penalty.
 */
@Injectable()
export class FundamentalsChecker {
  private readonly logger = new Logger(FundamentalsChecker.name);

  constructor(
    @Inject(FUNDAMENTALS_PROVIDER)
    private readonly provider: FundamentalsProvider,
  ) {}

  async check(ticker: string): Promise<FundamentalsResult> {
    let info: FundamentalsInfo;
    try {
      info = await this.provider.getInfo(ticker);
    } catch (error) {
      this.logger.warn(`Fundamentals for ${ticker} unavailable: ${errorMessage(error)}`);
      return { penalty: 0, messages: [FUNDAMENTALS_UNAVAILABLE_MESSAGE], isExempt: false };
    }
    return this.evaluate(ticker, info);
  }

  evaluate(ticker: string, info: FundamentalsInfo): FundamentalsResult {
    const quoteType = (info.quoteType ?? '').toUpperCase();
    const shortName = info.shortName ?? '';
    if (EXEMPT_QUOTE_TYPES.has(quoteType) || shortName.includes('ETF')) {
      return {
        penalty: 0,
        messages: ['ETF / fund / crypto - fundamentals check exempt'],
        isExempt: true,
      };
    }

    let penalty = 0;
    const messages: string[] = [];

    // 1. Market cap floor
    if (positive(info.marketCap)) {
      if (isDomesticTicker(ticker)) {
        if (info.marketCap < MARKET_CAP_FLOOR_DOMESTIC) {
          penalty += MARKET_CAP_PENALTY;
          messages.push(
            `Market cap KRW ${(info.marketCap / 1e9).toFixed(1)}B below KRW 30B floor (-${MARKET_CAP_PENALTY})`,
          );
        }
      } else if (info.marketCap < MARKET_CAP_FLOOR_FOREIGN) {
        penalty += MARKET_CAP_PENALTY;
        messages.push(
          `Market cap $${(info.marketCap / 1e6).toFixed(0)}M below $200M floor (-${MARKET_CAP_PENALTY})`,
        );
      }
    }

    // 2. Negative EPS, waived for fast revenue growth
    const eps = info.trailingEps;
    if (eps !== undefined && Number.isFinite(eps) && eps < 0) {
      const growth = info.revenueGrowth ?? 0;
      if (growth > GROWTH_EXEMPTION_THRESHOLD) {
        messages.push(
          `Growth exemption - revenue up ${(growth * 100).toFixed(0)}%, EPS penalty waived`,
        );
      } else {
        penalty += NEGATIVE_EPS_PENALTY;
        messages.push(`Persistent losses (EPS < 0) (-${NEGATIVE_EPS_PENALTY})`);
      }
    }

    // 3. Leverage, waived for financials
    const debtToEquity = info.debtToEquity;
    if (debtToEquity !== undefined && Number.isFinite(debtToEquity) && debtToEquity > DEBT_TO_EQUITY_LIMIT) {
      const industry = (info.industry ?? '').toLowerCase();
      const sector = (info.sector ?? '').toLowerCase();
      const isFinancial = FINANCIAL_KEYWORDS.some(
        (keyword) => industry.includes(keyword) || sector.includes(keyword),
      );
      if (isFinancial) {
        messages.push('Financial sector - debt ratio penalty waived');
      } else {
        penalty += HIGH_DEBT_PENALTY;
        messages.push(`Debt/equity above ${DEBT_TO_EQUITY_LIMIT}% (-${HIGH_DEBT_PENALTY})`);
      }
    }

    if (penalty === 0 && messages.length === 0) {
      messages.push('Fundamentals healthy');
    }

    return { penalty, messages, isExempt: false };
  }
}
