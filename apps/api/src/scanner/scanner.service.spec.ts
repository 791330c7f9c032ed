import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AnalyzerService } from '../analysis/analyzer.service';
import { AnalysisOptions, AnalysisResult } from '../analysis/analysis.types';
import { Verdict } from '../strategy/verdict';
import { normalizeTickers, resolveScanConcurrency, ScannerService } from './scanner.service';

function success(ticker: string, score: number): AnalysisResult {
  return {
    ticker,
    success: true,
    strategy: 'mean_reversion',
    score,
    technicalScore: score,
    verdict: Verdict.HOLD,
    currentPrice: 10,
    stopLoss: 9,
    indicators: {
      rsi: 50,
      mfi: 50,
      macdDiff: 0,
      macdDiffPct: 0,
      bbLower: 9,
      bbUpper: 11,
      ichimokuA: null,
      ichimokuB: null,
      vwap: null,
      atr: 0,
      obv: 0,
      currentPrice: 10,
    },
    subScores: { rsi: 0, mfi: 0, bollinger: 0, macd: 0, ichimoku: 0, vwap: 0 },
    filters: { isWaterfall: false, isRsiHookFailed: false },
    fundamentals: null,
    detailInfo: [],
    series: [],
  };
}

function failure(ticker: string): AnalysisResult {
  return {
    ticker,
    success: false,
    errorType: 'InsufficientData',
    errorMsg: `[${ticker}] not enough history`,
    failedPhase: 'fetching',
  };
}

class FakeAnalyzer {
  calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;
  answers = new Map<string, AnalysisResult | Error>();

  async analyze(ticker: string, _options?: AnalysisOptions): Promise<AnalysisResult> {
    this.calls.push(ticker);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight--;

    const answer = this.answers.get(ticker) ?? success(ticker, 50);
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

describe('ScannerService', () => {
  let scanner: ScannerService;
  let analyzer: FakeAnalyzer;

  beforeEach(async () => {
    analyzer = new FakeAnalyzer();
    const moduleRef = await Test.createTestingModule({
      providers: [
        ScannerService,
        { provide: AnalyzerService, useValue: analyzer },
        { provide: ConfigService, useValue: new ConfigService({ SCAN_CONCURRENCY: '2' }) },
      ],
    }).compile();
    scanner = moduleRef.get(ScannerService);
  });

  it('analyzes each ticker once and ranks the results', async () => {
    analyzer.answers.set('AAPL', success('AAPL', 40));
    analyzer.answers.set('MSFT', success('MSFT', 70.5));
    analyzer.answers.set('BAD', failure('BAD'));

    const report = await scanner.scan(['aapl', 'AAPL', ' msft ', '', 'bad']);

    expect([...analyzer.calls].sort()).toEqual(['AAPL', 'BAD', 'MSFT']);
    expect(report.requested).toBe(3);
    expect(report.succeeded).toBe(2);
    expect(report.failed).toBe(1);
    expect(report.results.map((r) => r.ticker)).toEqual(['MSFT', 'AAPL', 'BAD']);
  });

  it('records a thrown error without aborting the batch', async () => {
    analyzer.answers.set('BOOM', new Error('socket closed'));

    const report = await scanner.scan(['BOOM', 'OK']);

    expect(report.succeeded).toBe(1);
    expect(report.results[1]).toEqual({
      ticker: 'BOOM',
      success: false,
      errorType: 'Analysis',
      errorMsg: 'Unexpected error while analyzing BOOM: socket closed',
      failedPhase: 'fetching',
    });
  });

  it('never runs more analyses at once than configured', async () => {
    await scanner.scan(['A', 'B', 'C', 'D', 'E', 'F']);

    expect(analyzer.calls).toHaveLength(6);
    expect(analyzer.maxInFlight).toBeLessThanOrEqual(2);
  });
});

describe('scanner helpers', () => {
  it('normalizes and de-duplicates tickers', () => {
    expect(normalizeTickers([' spy', 'SPY', 'btc-usd', '  '])).toEqual(['SPY', 'BTC-USD']);
  });

  it('clamps the configured concurrency', () => {
    expect(resolveScanConcurrency(undefined)).toBe(4);
    expect(resolveScanConcurrency('')).toBe(4);
    expect(resolveScanConcurrency('lots')).toBe(4);
    expect(resolveScanConcurrency('0')).toBe(1);
    expect(resolveScanConcurrency('-3')).toBe(1);
    expect(resolveScanConcurrency('8')).toBe(8);
    expect(resolveScanConcurrency(99)).toBe(16);
  });
});
