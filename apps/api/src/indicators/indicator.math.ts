import { Series } from './indicator.types';

type Values = readonly number[];

export function nulls(length: number): (number | null)[] {
  return new Array<number | null>(length).fill(null);
}

/**
 * Pads a shorter indicator output on the left so its last value lines up with
 * the last bar.
 */
export function alignRight(values: ReadonlyArray<number | null | undefined>, length: number): (number | null)[] {
  const out = nulls(length);
  const offset = length - values.length;
  values.forEach((value, i) => {
    const index = offset + i;
    if (index >= 0 && value !== undefined && value !== null && Number.isFinite(value)) {
      out[index] = value;
    }
  });
  return out;
}

export function lastValue(series: Series): number | null {
  return series.length > 0 ? series[series.length - 1] : null;
}

export function sma(values: Values, period: number): (number | null)[] {
  const out = nulls(values.length);
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) sum -= values[i - period];
    if (i >= period - 1) out[i] = sum / period;
  }
  return out;
}

/** Population standard deviation over a trailing window. */
export function rollingStd(values: Values, period: number): (number | null)[] {
  const means = sma(values, period);
  return means.map((mean, i) => {
    if (mean === null) return null;
    let squares = 0;
    for (let j = i - period + 1; j <= i; j++) {
      squares += (values[j] - mean) ** 2;
    }
    return Math.sqrt(squares / period);
  });
}

/**
 * Exponential moving average (alpha = 2 / (period + 1)) seeded with the first
 * available value. Output stays null until `period` values have been seen.
 */
export function ema(values: Series, period: number): (number | null)[] {
  const out = nulls(values.length);
  const alpha = 2 / (period + 1);
  let current: number | null = null;
  let seen = 0;

  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (value === null) continue;
    current = current === null ? value : alpha * value + (1 - alpha) * current;
    seen++;
    if (seen >= period) out[i] = current;
  }
  return out;
}

function rollingExtreme(values: Values, period: number, pick: (a: number, b: number) => number): (number | null)[] {
  const out = nulls(values.length);
  for (let i = period - 1; i < values.length; i++) {
    let extreme = values[i];
    for (let j = i - period + 1; j < i; j++) {
      extreme = pick(extreme, values[j]);
    }
    out[i] = extreme;
  }
  return out;
}

/**
 * RSI from the trailing mean gain / mean loss ratio.
 */
export function rsi(closes: Values, period: number): (number | null)[] {
  const out = nulls(closes.length);
  for (let i = period; i < closes.length; i++) {
    let gains = 0;
    let losses = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const change = closes[j] - closes[j - 1];
      if (change > 0) gains += change;
      else losses -= change;
    }
    if (losses === 0) {
      out[i] = gains === 0 ? 50 : 100;
    } else {
      out[i] = 100 - 100 / (1 + gains / losses);
    }
  }
  return out;
}

export function mfi(highs: Values, lows: Values, closes: Values, volumes: Values, period: number): (number | null)[] {
  const typical = closes.map((close, i) => (highs[i] + lows[i] + close) / 3);
  const out = nulls(closes.length);

  for (let i = period; i < closes.length; i++) {
    let positive = 0;
    let negative = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const flow = typical[j] * volumes[j];
      if (typical[j] > typical[j - 1]) positive += flow;
      else if (typical[j] < typical[j - 1]) negative += flow;
    }
    if (negative === 0) {
      out[i] = positive === 0 ? 50 : 100;
    } else {
      out[i] = 100 - 100 / (1 + positive / negative);
    }
  }
  return out;
}

export function bollinger(
  closes: Values,
  period: number,
  stdDev: number,
): { lower: (number | null)[]; upper: (number | null)[] } {
  const middle = sma(closes, period);
  const deviation = rollingStd(closes, period);
  return {
    lower: middle.map((m, i) => (m === null ? null : m - stdDev * (deviation[i] ?? 0))),
    upper: middle.map((m, i) => (m === null ? null : m + stdDev * (deviation[i] ?? 0))),
  };
}

export function macd(
  closes: Values,
  fast: number,
  slow: number,
  signalPeriod: number,
): { line: (number | null)[]; signal: (number | null)[]; diff: (number | null)[] } {
  const fastEma = ema(closes, fast);
  const slowEma = ema(closes, slow);
  const line = fastEma.map((f, i) => {
    const s = slowEma[i];
    return f === null || s === null ? null : f - s;
  });
  const signal = ema(line, signalPeriod);
  const diff = line.map((l, i) => {
    const s = signal[i];
    return l === null || s === null ? null : l - s;
  });
  return { line, signal, diff };
}

/**
 * Leading spans A and B of the Ichimoku cloud, not shifted forward.
 */
export function ichimoku(
  highs: Values,
  lows: Values,
  conversionPeriod: number,
  basePeriod: number,
  spanPeriod: number,
): { spanA: (number | null)[]; spanB: (number | null)[] } {
  const midpoint = (period: number) => {
    const hi = rollingExtreme(highs, period, Math.max);
    const lo = rollingExtreme(lows, period, Math.min);
    return hi.map((h, i) => {
      const l = lo[i];
      return h === null || l === null ? null : (h + l) / 2;
    });
  };

  const conversion = midpoint(conversionPeriod);
  const base = midpoint(basePeriod);
  const spanA = conversion.map((c, i) => {
    const b = base[i];
    return c === null || b === null ? null : (c + b) / 2;
  });
  return { spanA, spanB: midpoint(spanPeriod) };
}

/** Rolling volume-weighted average of the typical price. */
export function rollingVwap(highs: Values, lows: Values, closes: Values, volumes: Values, period: number): (number | null)[] {
  const out = nulls(closes.length);
  for (let i = period - 1; i < closes.length; i++) {
    let weighted = 0;
    let volume = 0;
    for (let j = i - period + 1; j <= i; j++) {
      weighted += ((highs[j] + lows[j] + closes[j]) / 3) * volumes[j];
      volume += volumes[j];
    }
    out[i] = volume > 0 ? weighted / volume : null;
  }
  return out;
}

export function obv(closes: Values, volumes: Values): (number | null)[] {
  const out = nulls(closes.length);
  let total = 0;
  for (let i = 0; i < closes.length; i++) {
    if (i > 0) {
      if (closes[i] > closes[i - 1]) total += volumes[i];
      else if (closes[i] < closes[i - 1]) total -= volumes[i];
    }
    out[i] = total;
  }
  return out;
}

/** Wilder-smoothed average true range. */
export function atr(highs: Values, lows: Values, closes: Values, period: number): (number | null)[] {
  const out = nulls(closes.length);
  let current: number | null = null;
  let sum = 0;

  for (let i = 1; i < closes.length; i++) {
    const trueRange = Math.max(
      highs[i] - lows[i],
      Math.abs(highs[i] - closes[i - 1]),
      Math.abs(lows[i] - closes[i - 1]),
    );
    if (i <= period) {
      sum += trueRange;
      if (i === period) {
        current = sum / period;
        out[i] = current;
      }
    } else if (current !== null) {
      current = (current * (period - 1) + trueRange) / period;
      out[i] = current;
    }
  }
  return out;
}
