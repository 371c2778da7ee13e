// backend/src/snapshot.ts
import { rsi, macd, rollingMean, lastValue } from './indicators.js';
import type { ScreenerConfig } from './config.js';
import type { BarSeries, SnapshotResult } from './types.js';

type SnapshotConfig = Pick<
  ScreenerConfig,
  'rsiPeriod' | 'macdFast' | 'macdSlow' | 'macdSignal' | 'emaAdjust' | 'smaWindows' | 'volumeWindow'
>;

/** Latest-bar indicator values, or InsufficientHistory when RSI can't be formed. */
export function buildSnapshot(bars: BarSeries, cfg: SnapshotConfig): SnapshotResult {
  if (bars.length < cfg.rsiPeriod) {
    return { ok: false, reason: 'InsufficientHistory', bars: bars.length };
  }

  const closes = bars.map(b => b.close);
  const vols = bars.map(b => b.volume);
  const last = bars[bars.length - 1];

  const rsiNow = lastValue(rsi(closes, cfg.rsiPeriod));
  if (rsiNow === undefined) {
    return { ok: false, reason: 'InsufficientHistory', bars: bars.length };
  }

  const m = macd(closes, cfg.macdFast, cfg.macdSlow, cfg.macdSignal, { adjust: cfg.emaAdjust });
  const [shortW, mediumW, longW] = cfg.smaWindows;

  return {
    ok: true,
    snapshot: {
      price: last.close,
      rsi: rsiNow,
      macd: m.macd[m.macd.length - 1],
      signal: m.signal[m.signal.length - 1],
      histogram: m.histogram[m.histogram.length - 1],
      sma20: lastValue(rollingMean(closes, shortW)),
      sma50: lastValue(rollingMean(closes, mediumW)),
      sma200: lastValue(rollingMean(closes, longW)),
      volume: last.volume,
      avgVolume: lastValue(rollingMean(vols, cfg.volumeWindow)),
    },
  };
}
