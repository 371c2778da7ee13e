// backend/src/indicators.ts
// Series statistics + RSI/MACD over daily closes. Every function returns an
// array aligned with its input; `undefined` marks a value still in warm-up.

import type { MaybeNumber } from './types.js';

export type EmaOptions = { adjust?: boolean };

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

function assertWindow(name: string, n: number) {
  if (!Number.isInteger(n) || n <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${n}`);
  }
}

export function diff(series: readonly number[]): MaybeNumber[] {
  return series.map((v, i) => (i === 0 ? undefined : v - series[i - 1]));
}

// Naive windowed mean: each window is summed from scratch so the result is
// bit-for-bit the plain average of those `window` values.
export function rollingMean(series: readonly MaybeNumber[], window: number): MaybeNumber[] {
  assertWindow('window', window);
  const out: MaybeNumber[] = [];
  for (let i = 0; i < series.length; i++) {
    if (i + 1 < window) {
      out.push(undefined);
      continue;
    }
    let sum = 0;
    let complete = true;
    for (let j = i - window + 1; j <= i; j++) {
      const v = series[j];
      if (v === undefined) { complete = false; break; }
      sum += v;
    }
    out.push(complete ? sum / window : undefined);
  }
  return out;
}

// α = 2/(span+1), seeded from the first value (no warm-up gap).
// adjust=true gives the bias-corrected weighted form Σ(1-α)^k·x[i-k] / Σ(1-α)^k.
export function exponentialMean(series: readonly number[], span: number, opts: EmaOptions = {}): number[] {
  assertWindow('span', span);
  if (series.length === 0) return [];
  const k = 2 / (span + 1);
  const out: number[] = [];

  if (opts.adjust) {
    let num = 0;
    let den = 0;
    for (const x of series) {
      num = x + (1 - k) * num;
      den = 1 + (1 - k) * den;
      out.push(num / den);
    }
    return out;
  }

  let prev = series[0];
  out.push(prev);
  for (let i = 1; i < series.length; i++) {
    const v = series[i] * k + prev * (1 - k);
    out.push(v);
    prev = v;
  }
  return out;
}

export function lastValue<T>(series: readonly T[]): T | undefined {
  return series.length ? series[series.length - 1] : undefined;
}

/**
 * RSI from simple rolling means of gains and losses.
 * The first delta is counted as a flat day, so values start at index period-1.
 * loss = 0 saturates to 100; gain = loss = 0 (flat window) is 50.
 */
export function rsi(closes: readonly number[], period: number = 14): MaybeNumber[] {
  assertWindow('period', period);
  const deltas = diff(closes);
  const gains = deltas.map(d => Math.max(d ?? 0, 0));
  const losses = deltas.map(d => Math.max(-(d ?? 0), 0));
  const avgGain = rollingMean(gains, period);
  const avgLoss = rollingMean(losses, period);

  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === undefined || loss === undefined) return undefined;
    if (loss === 0) return gain === 0 ? 50 : 100;
    const rs = gain / loss;
    return 100 - (100 / (1 + rs));
  });
}

export function macd(
  closes: readonly number[],
  fast: number = 12,
  slow: number = 26,
  signal: number = 9,
  opts: EmaOptions = {}
): MacdSeries {
  const emaFast = exponentialMean(closes, fast, opts);
  const emaSlow = exponentialMean(closes, slow, opts);
  const line = emaFast.map((f, i) => f - emaSlow[i]);
  const signalLine = exponentialMean(line, signal, opts);
  return {
    macd: line,
    signal: signalLine,
    histogram: line.map((m, i) => m - signalLine[i]),
  };
}
