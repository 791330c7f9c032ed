import { HistoryPeriod } from '../data/data.types';
import { IndicatorRow, IndicatorSnapshot } from '../indicators/indicator.types';
import {
  FilterFlags,
  FundamentalsResult,
  ScoringStrategy,
  SubScores,
} from '../strategy/strategy.types';
import { Verdict } from '../strategy/verdict';
import { AnalysisErrorType } from './analysis.errors';
import { ForwardReturn, PatternMatch } from './pattern-matching';

export type AnalysisPhase = 'fetching' | 'computing' | 'scoring' | 'fundamentals' | 'done';

export interface AnalysisOptions {
  period?: HistoryPeriod;
  applyFundamentals?: boolean;
  strategy?: ScoringStrategy;
}

export const DEFAULT_ANALYSIS_OPTIONS: Required<AnalysisOptions> = {
  period: '6mo',
  applyFundamentals: false,
  strategy: 'mean_reversion',
};

export interface DetailEntry {
  title: string;
  comment: string;
}

export interface AnalysisSuccess {
  ticker: string;
  success: true;
  strategy: ScoringStrategy;
  score: number;
  /** Score after filter caps, before the fundamentals penalty. */
  technicalScore: number;
  verdict: Verdict;
  currentPrice: number;
  stopLoss: number;
  indicators: IndicatorSnapshot;
  subScores: SubScores;
  filters: FilterFlags;
  fundamentals: FundamentalsResult | null;
  detailInfo: DetailEntry[];
  series: IndicatorRow[];
}

export interface AnalysisFailure {
  ticker: string;
  success: false;
  errorType: AnalysisErrorType;
  errorMsg: string;
  failedPhase: AnalysisPhase;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export interface PatternSearchSuccess {
  ticker: string;
  success: true;
  lookbackDays: number;
  /** First and last date of the recent window that was matched. */
  currentWindow: { startDate: string; endDate: string };
  averageReturns: ForwardReturn[];
  matches: PatternMatch[];
}

export interface PatternSearchFailure {
  ticker: string;
  success: false;
  errorType: AnalysisErrorType;
  errorMsg: string;
}

export type PatternSearchResult = PatternSearchSuccess | PatternSearchFailure;
