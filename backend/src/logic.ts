// backend/src/logic.ts
import { buildSnapshot } from './snapshot.js';
import type { ScreenerConfig } from './config.js';
import type {
  BarSeries,
  CriterionOutcome,
  IndicatorSnapshot,
  MaybeNumber,
  ScreeningResult,
  SnapshotResult,
} from './types.js';

/** =================== Rule thresholds =================== */
const RSI_TRADING_MIN = 30;
const RSI_TRADING_MAX = 70;
const RSI_NEUTRAL_MIN = 40;
const RSI_NEUTRAL_MAX = 60;
/** ======================================================= */

// undefined never passes a comparison
function gt(a: MaybeNumber, b: MaybeNumber): boolean {
  return a !== undefined && b !== undefined && a > b;
}

function between(v: number, lo: number, hi: number) {
  return v > lo && v < hi;
}

function outcome(id: CriterionOutcome['id'], passed: boolean, points: number, reason: string): CriterionOutcome {
  return passed ? { id, passed, points, reason } : { id, passed, points: 0, reason: null };
}

/**
 * Evaluates the five swing criteria in fixed order. The RSI criterion is worth
 * two points in the neutral band and one in the wider trading band; only the
 * more specific message is recorded.
 */
export function evaluateCriteria(s: IndicatorSnapshot): CriterionOutcome[] {
  const neutral = between(s.rsi, RSI_NEUTRAL_MIN, RSI_NEUTRAL_MAX);
  const trading = between(s.rsi, RSI_TRADING_MIN, RSI_TRADING_MAX);
  const rsiText = s.rsi.toFixed(1);

  return [
    neutral
      ? outcome('rsi_zone', true, 2, `RSI ${rsiText} in neutral zone (${RSI_NEUTRAL_MIN}-${RSI_NEUTRAL_MAX})`)
      : outcome('rsi_zone', trading, 1, `RSI ${rsiText} in trading zone (${RSI_TRADING_MIN}-${RSI_TRADING_MAX})`),
    outcome('macd_histogram', gt(s.histogram, 0), 1, 'MACD histogram positive (bullish)'),
    outcome('macd_above_signal', gt(s.macd, s.signal), 1, 'MACD above signal line'),
    outcome('price_above_sma20', gt(s.price, s.sma20), 1, 'Price above 20-day SMA (short-term uptrend)'),
    outcome('price_above_sma50', gt(s.price, s.sma50), 1, 'Price above 50-day SMA (medium-term uptrend)'),
  ];
}

export function tallyCriteria(outcomes: readonly CriterionOutcome[], maxScore: number = 5) {
  let score = 0;
  const reasons: string[] = [];
  for (const o of outcomes) {
    if (!o.passed) continue;
    score += o.points;
    if (o.reason) reasons.push(o.reason);
  }
  return { score: Math.max(0, Math.min(maxScore, score)), reasons };
}

export type ScreenOutcome =
  | { ok: true; result: ScreeningResult }
  | Extract<SnapshotResult, { ok: false }>;

export function screenInstrument(
  ticker: string,
  bars: BarSeries,
  cfg: Parameters<typeof buildSnapshot>[1] & Pick<ScreenerConfig, 'maxScore'>
): ScreenOutcome {
  const snap = buildSnapshot(bars, cfg);
  if (!snap.ok) return snap;

  const { score, reasons } = tallyCriteria(evaluateCriteria(snap.snapshot), cfg.maxScore);
  return { ok: true, result: { ticker, ...snap.snapshot, score, reasons } };
}
