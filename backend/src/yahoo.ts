// backend/src/yahoo.ts
import fetch from 'node-fetch';
import { DEFAULT_CONFIG } from './config.js';
import type { Bar, FetchBarsResult } from './types.js';

const DAY_MS = 24 * 60 * 60_000;

export type HttpGet = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string> }
) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export type FetchBarsOptions = {
  base?: string;
  timeoutMs?: number;
  now?: () => number;
  http?: HttpGet;
};

type ParseResult = { ok: true; bars: Bar[] } | { ok: false; detail: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function numAt(arr: unknown, i: number): number | null {
  if (!Array.isArray(arr)) return null;
  const v: unknown = arr[i];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

/**
 * Narrows a /v8/finance/chart body into bars. Rows with a null close or volume
 * (halted days) are dropped, as are timestamps that don't move forward.
 */
export function parseChartResponse(json: unknown): ParseResult {
  const chart = isRecord(json) ? json.chart : undefined;
  if (!isRecord(chart)) return { ok: false, detail: 'malformed response' };

  const error = chart.error;
  if (isRecord(error)) {
    const desc = error.description ?? error.code ?? 'unknown error';
    return { ok: false, detail: String(desc) };
  }
  const result: unknown = Array.isArray(chart.result) ? chart.result[0] : undefined;
  if (!isRecord(result)) return { ok: false, detail: 'no result' };

  const timestamps: unknown[] = Array.isArray(result.timestamp) ? result.timestamp : [];
  const indicators = result.indicators;
  const quotes: unknown = isRecord(indicators) && Array.isArray(indicators.quote)
    ? indicators.quote[0]
    : undefined;
  if (!isRecord(quotes)) return { ok: false, detail: 'no quote data' };

  const bars: Bar[] = [];
  let lastTime = -Infinity;
  for (let i = 0; i < timestamps.length; i++) {
    const t = numAt(timestamps, i);
    const close = numAt(quotes.close, i);
    const volume = numAt(quotes.volume, i);
    if (t === null || close === null || volume === null) continue;
    const time = t * 1000;
    if (time <= lastTime) continue;
    lastTime = time;
    bars.push({
      time,
      open: numAt(quotes.open, i) ?? close,
      high: numAt(quotes.high, i) ?? close,
      low: numAt(quotes.low, i) ?? close,
      close,
      volume,
    });
  }
  return { ok: true, bars };
}

export function chartUrl(base: string, ticker: string, lookbackDays: number, nowMs: number): string {
  const period2 = Math.floor(nowMs / 1000);
  const period1 = Math.floor((nowMs - lookbackDays * DAY_MS) / 1000);
  return `${base}/v8/finance/chart/${encodeURIComponent(ticker)}?period1=${period1}&period2=${period2}&interval=1d`;
}

/** Daily bars for the last `lookbackDays` calendar days. Never throws. */
export async function fetchBars(
  ticker: string,
  lookbackDays: number,
  opts: FetchBarsOptions = {}
): Promise<FetchBarsResult> {
  const base = opts.base ?? DEFAULT_CONFIG.yahooBase;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_CONFIG.fetchTimeoutMs;
  const http: HttpGet = opts.http ?? fetch;
  const url = chartUrl(base, ticker, lookbackDays, (opts.now ?? Date.now)());

  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const res = await http(url, { signal: ctrl.signal, headers: { 'User-Agent': 'Mozilla/5.0' } });
    // Yahoo sends chart.error bodies with 4xx, so read the body before the status
    let body: unknown = null;
    try {
      body = await res.json();
    } catch (e) {
      if (res.ok) throw e;
    }
    const parsed = parseChartResponse(body);
    if (!parsed.ok) {
      return { ok: false, reason: 'DataUnavailable', detail: res.ok ? parsed.detail : `HTTP ${res.status}: ${parsed.detail}` };
    }
    if (!res.ok) return { ok: false, reason: 'DataUnavailable', detail: `HTTP ${res.status}` };
    if (parsed.bars.length === 0) return { ok: false, reason: 'DataUnavailable', detail: 'empty series' };
    return { ok: true, bars: parsed.bars };
  } catch (e) {
    const detail = ctrl.signal.aborted ? `timeout after ${timeoutMs}ms` : (e instanceof Error ? e.message : String(e));
    console.warn('[yahoo] fetch failed', { ticker, detail });
    return { ok: false, reason: 'DataUnavailable', detail };
  } finally {
    clearTimeout(timer);
  }
}
