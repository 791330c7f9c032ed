import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Bottleneck from 'bottleneck';
import { errorMessage } from '../common/error-message';
import { AnalyzerService } from '../analysis/analyzer.service';
import { AnalysisFailure, AnalysisOptions, AnalysisResult, AnalysisSuccess } from '../analysis/analysis.types';

export const DEFAULT_SCAN_CONCURRENCY = 4;
export const MAX_SCAN_CONCURRENCY = 16;

export interface ScanReport {
  requested: number;
  succeeded: number;
  failed: number;
  startedAt: string;
  durationMs: number;
  /** Successes by score descending, then failures in request order. */
  results: AnalysisResult[];
}

/** Unset or unparsable means the default; anything else is clamped to 1..16. */
export function resolveScanConcurrency(raw: string | number | undefined): number {
  if (raw === undefined || raw === '') {
    return DEFAULT_SCAN_CONCURRENCY;
  }
  const value = Math.trunc(Number(raw));
  if (!Number.isFinite(value)) {
    return DEFAULT_SCAN_CONCURRENCY;
  }
  return Math.min(Math.max(value, 1), MAX_SCAN_CONCURRENCY);
}

export function normalizeTickers(tickers: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const ticker of tickers) {
    const symbol = ticker.trim().toUpperCase();
    if (symbol) seen.add(symbol);
  }
  return [...seen];
}

@Injectable()
export class ScannerService {
  private readonly logger = new Logger(ScannerService.name);
  private readonly limiter: Bottleneck;

  constructor(
    private readonly analyzerService: AnalyzerService,
    private readonly configService: ConfigService,
  ) {
    const maxConcurrent = resolveScanConcurrency(
      this.configService.get<string>('SCAN_CONCURRENCY'),
    );
    this.limiter = new Bottleneck({ maxConcurrent });
    this.logger.log(`Scanner limited to ${maxConcurrent} concurrent analyses`);
  }

  async scan(tickers: readonly string[], options: AnalysisOptions = {}): Promise<ScanReport> {
    const symbols = normalizeTickers(tickers);
    const startedAt = new Date();
    this.logger.log(`Scanning ${symbols.length} tickers`);

    const results = await Promise.all(
      symbols.map((symbol) => this.limiter.schedule(() => this.analyzeOne(symbol, options))),
    );

    const successes = results
      .filter((r): r is AnalysisSuccess => r.success)
      .sort((a, b) => b.score - a.score)
      .map((r) => ({ ...r, series: [] }));
    const failures = results.filter((r): r is AnalysisFailure => !r.success);

    const durationMs = Date.now() - startedAt.getTime();
    this.logger.log(
      `Scan complete: ${successes.length} analyzed, ${failures.length} failed in ${durationMs}ms`,
    );

    return {
      requested: symbols.length,
      succeeded: successes.length,
      failed: failures.length,
      startedAt: startedAt.toISOString(),
      durationMs,
      results: [...successes, ...failures],
    };
  }

  // The analyzer does not throw, but one ticker must never sink the batch
  private async analyzeOne(symbol: string, options: AnalysisOptions): Promise<AnalysisResult> {
    try {
      return await this.analyzerService.analyze(symbol, options);
    } catch (error) {
      this.logger.error(`Scan of ${symbol} failed: ${errorMessage(error)}`);
      return {
        ticker: symbol,
        success: false,
        errorType: 'Analysis',
        errorMsg: `Unexpected error while analyzing ${symbol}: ${errorMessage(error)}`,
        failedPhase: 'fetching',
      };
    }
  }
}
