export type AnalysisErrorType = 'DataFetch' | 'InsufficientData' | 'Analysis';

export abstract class AnalysisBaseError extends Error {
  abstract readonly errorType: AnalysisErrorType;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Upstream or network failure while fetching market data. Transient. */
export class DataFetchError extends AnalysisBaseError {
  readonly errorType = 'DataFetch' as const;
}

/** Not enough price history to analyze (delisted, wrong ticker, too young). */
export class InsufficientDataError extends AnalysisBaseError {
  readonly errorType = 'InsufficientData' as const;
}

/** Unexpected fault while computing indicators or scores. */
export class AnalysisError extends AnalysisBaseError {
  readonly errorType = 'Analysis' as const;
}
