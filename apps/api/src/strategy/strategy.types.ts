export type ScoringStrategy = 'mean_reversion' | 'trend';

export const SCORING_STRATEGIES: readonly ScoringStrategy[] = ['mean_reversion', 'trend'];

export interface SubScores {
  rsi: number;
  mfi: number;
  bollinger: number;
  macd: number;
  ichimoku: number;
  vwap: number;
}

// Maximum points per factor; sums to 100
export const SUB_SCORE_MAX: SubScores = {
  rsi: 20,
  mfi: 20,
  bollinger: 15,
  macd: 15,
  ichimoku: 15,
  vwap: 15,
};

export interface FilterFlags {
  isWaterfall: boolean;
  isRsiHookFailed: boolean;
}

// Hard ceiling applied when a falling-knife filter fires
export const FILTER_SCORE_CAP = 29.0;

export interface TechnicalScore {
  strategy: ScoringStrategy;
  /** Sum of the factor scores, clamped to 0-100, before filter caps. */
  rawScore: number;
  /** Score after waterfall / hook caps. */
  score: number;
  subScores: SubScores;
  capped: boolean;
}

export interface FundamentalsResult {
  penalty: number;
  messages: string[];
  isExempt: boolean;
}
