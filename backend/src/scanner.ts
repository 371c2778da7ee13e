// backend/src/scanner.ts
import { screenInstrument } from './logic.js';
import { buildConfigSnapshot, computeConfigHash } from './configSnapshot.js';
import type { ScreenerConfig } from './config.js';
import type { FetchBars, FetchBarsResult, ScanFailure, ScanReport, ScreeningResult } from './types.js';

export type ScanLog = Pick<Console, 'log' | 'warn'>;

export type TickerStatus = 'OK' | 'FAILED TO FETCH DATA' | 'FAILED TO SCREEN';

export type ScanOptions = {
  config: Readonly<ScreenerConfig>;
  fetchBars: FetchBars;
  sleep?: (ms: number) => Promise<void>;
  signal?: AbortSignal;
  log?: ScanLog;
  now?: () => number;
  onTicker?: (ticker: string, index: number, status: TickerStatus) => void;
};

type Slot =
  | { kind: 'result'; result: ScreeningResult }
  | { kind: 'failure'; failure: ScanFailure };

export const defaultSleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

/** Highest score first; equal scores keep their input order. */
export function sortByScore<T extends { score: number }>(items: readonly T[]): T[] {
  return items
    .map((item, idx) => ({ item, idx }))
    .sort((a, b) => (b.item.score - a.item.score) || (a.idx - b.idx))
    .map(x => x.item);
}

async function screenTicker(ticker: string, opts: ScanOptions, log: ScanLog): Promise<Slot> {
  const { config } = opts;
  let fetched: FetchBarsResult;
  try {
    fetched = await opts.fetchBars(ticker, config.lookbackDays);
  } catch (e) {
    // collaborator broke its contract; treat like any other fetch failure
    fetched = { ok: false, reason: 'DataUnavailable', detail: e instanceof Error ? e.message : String(e) };
  }

  if (!fetched.ok || fetched.bars.length === 0) {
    const detail = fetched.ok ? 'empty series' : fetched.detail;
    log.warn('[scan] data unavailable', { ticker, detail });
    return { kind: 'failure', failure: { ticker, reason: 'DataUnavailable', detail } };
  }

  const out = screenInstrument(ticker, fetched.bars, config);
  if (!out.ok) {
    const detail = `${out.bars} bars < ${config.rsiPeriod}`;
    log.warn('[scan] insufficient history', { ticker, detail });
    return { kind: 'failure', failure: { ticker, reason: out.reason, detail } };
  }
  return { kind: 'result', result: out.result };
}

function statusFor(slot: Slot): TickerStatus {
  if (slot.kind === 'result') return 'OK';
  return slot.failure.reason === 'DataUnavailable' ? 'FAILED TO FETCH DATA' : 'FAILED TO SCREEN';
}

/**
 * One pass over the configured tickers. With concurrency 1 (default) requests go
 * out strictly one at a time with `requestDelayMs` between them; higher values
 * run a capped pool, each worker pacing its own requests. Aborting stops
 * before the next ticker and returns what was collected.
 */
export async function scanOnce(opts: ScanOptions): Promise<ScanReport> {
  const { config } = opts;
  const sleep = opts.sleep ?? defaultSleep;
  const log = opts.log ?? console;
  const now = opts.now ?? Date.now;
  const tickers = config.tickers;
  const slots: Array<Slot | undefined> = new Array(tickers.length).fill(undefined);
  const scannedAt = now();

  log.log('[scan] start', { tickers: tickers.length, lookbackDays: config.lookbackDays, concurrency: config.concurrency });

  let next = 0;
  const worker = async () => {
    let first = true;
    while (!opts.signal?.aborted) {
      const i = next++;
      if (i >= tickers.length) return;
      if (!first && config.requestDelayMs > 0) {
        await sleep(config.requestDelayMs);
        if (opts.signal?.aborted) { next = tickers.length; return; }
      }
      first = false;
      const slot = await screenTicker(tickers[i], opts, log);
      slots[i] = slot;
      opts.onTicker?.(tickers[i], i, statusFor(slot));
    }
  };

  const workers = Math.min(config.concurrency, tickers.length);
  await Promise.all(Array.from({ length: workers }, worker));

  const results: ScreeningResult[] = [];
  const failures: ScanFailure[] = [];
  for (const slot of slots) {
    if (!slot) continue;
    if (slot.kind === 'result') results.push(slot.result);
    else failures.push(slot.failure);
  }

  const aborted = Boolean(opts.signal?.aborted) && slots.some(s => s === undefined);
  log.log('[scan] done', { screened: results.length, failed: failures.length, aborted });

  return {
    results: sortByScore(results),
    failures,
    scannedAt,
    aborted,
    configHash: computeConfigHash(buildConfigSnapshot(config)),
  };
}
