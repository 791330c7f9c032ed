import { StockBar } from '../data/data.types';

export interface PatternSearchOptions {
  /** Bars in the recent window that is matched against history. */
  lookbackDays?: number;
  /** Forward horizons, in bars, at which each match's return is measured. */
  horizons?: readonly number[];
  topN?: number;
}

export const DEFAULT_PATTERN_OPTIONS: Required<PatternSearchOptions> = {
  lookbackDays: 20,
  horizons: [20, 60],
  topN: 3,
};

export interface ForwardReturn {
  horizon: number;
  returnPct: number;
}

export interface PatternMatch {
  /** Index of the first bar of the matched window. */
  index: number;
  startDate: string;
  endDate: string;
  /** Pearson correlation of the z-normalized windows, times 100. */
  similarity: number;
  forwardReturns: ForwardReturn[];
}

export type PatternSearchOutcome =
  | { ok: true; matches: PatternMatch[]; averageReturns: ForwardReturn[] }
  | { ok: false; reason: string };

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function populationStd(values: readonly number[]): number {
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

export function zNormalize(values: readonly number[]): number[] {
  const m = mean(values);
  const std = populationStd(values);
  return values.map((v) => (v - m) / std);
}

export function pearson(a: readonly number[], b: readonly number[]): number {
  const ma = mean(a);
  const mb = mean(b);
  let cov = 0;
  let va = 0;
  let vb = 0;
  for (let i = 0; i < a.length; i++) {
    cov += (a[i] - ma) * (b[i] - mb);
    va += (a[i] - ma) ** 2;
    vb += (b[i] - mb) ** 2;
  }
  return cov / Math.sqrt(va * vb);
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function assertOptions(lookbackDays: number, horizons: readonly number[], topN: number): void {
  const positiveInt = (v: number) => Number.isInteger(v) && v > 0;
  if (!Number.isInteger(lookbackDays) || lookbackDays < 2) {
    throw new RangeError(`lookbackDays must be an integer >= 2, got ${lookbackDays}`);
  }
  if (horizons.length === 0 || !horizons.every(positiveInt)) {
    throw new RangeError(`horizons must be positive integers, got [${horizons.join(', ')}]`);
  }
  if (!positiveInt(topN)) {
    throw new RangeError(`topN must be a positive integer, got ${topN}`);
  }
}

/**
 * Slides a window over the history and ranks every past window by how closely
 * its shape follows the latest `lookbackDays` closes. Windows that overlap an
 * already selected match by less than `lookbackDays` bars are skipped, and the
 * scan stops early enough that every horizon has a forward close.
 */
export function findSimilarPatterns(
  bars: readonly StockBar[],
  options: PatternSearchOptions = {},
): PatternSearchOutcome {
  const lookbackDays = options.lookbackDays ?? DEFAULT_PATTERN_OPTIONS.lookbackDays;
  const horizons = options.horizons ?? DEFAULT_PATTERN_OPTIONS.horizons;
  const topN = options.topN ?? DEFAULT_PATTERN_OPTIONS.topN;
  assertOptions(lookbackDays, horizons, topN);

  const closes = bars.map((bar) => bar.close);
  if (closes.length < lookbackDays * 3) {
    return {
      ok: false,
      reason: `needs at least ${lookbackDays * 3} bars, got ${closes.length}`,
    };
  }

  const current = closes.slice(-lookbackDays);
  if (populationStd(current) === 0) {
    return { ok: false, reason: 'recent closes are flat (trading halted?)' };
  }
  const currentNorm = zNormalize(current);

  const candidates: PatternMatch[] = [];
  const scanLimit = closes.length - lookbackDays - Math.max(...horizons);
  for (let i = 0; i < scanLimit; i++) {
    const window = closes.slice(i, i + lookbackDays);
    if (populationStd(window) === 0) continue;

    const similarity = pearson(currentNorm, zNormalize(window)) * 100;
    const end = i + lookbackDays - 1;
    const base = closes[end];
    const forwardReturns = horizons.map((horizon) => ({
      horizon,
      returnPct: ((closes[end + horizon] - base) / base) * 100,
    }));
    if (!Number.isFinite(similarity) || !forwardReturns.every((r) => Number.isFinite(r.returnPct))) {
      continue;
    }

    candidates.push({
      index: i,
      startDate: isoDate(bars[i].timestamp),
      endDate: isoDate(bars[end].timestamp),
      similarity,
      forwardReturns,
    });
  }

  candidates.sort((a, b) => b.similarity - a.similarity);

  const matches: PatternMatch[] = [];
  for (const candidate of candidates) {
    if (matches.every((m) => Math.abs(m.index - candidate.index) >= lookbackDays)) {
      matches.push(candidate);
      if (matches.length >= topN) break;
    }
  }

  if (matches.length === 0) {
    return { ok: false, reason: 'no comparable pattern found in the history' };
  }

  const averageReturns = horizons.map((horizon, h) => ({
    horizon,
    returnPct: mean(matches.map((m) => m.forwardReturns[h].returnPct)),
  }));
  return { ok: true, matches, averageReturns };
}
