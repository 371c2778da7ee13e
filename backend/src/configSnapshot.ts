import crypto from 'crypto';
import type { ScreenerConfig } from './config.js';

export type ConfigSnapshot = {
  tickers: string[];
  indicators: {
    rsiPeriod: number;
    macd: [number, number, number];
    emaAdjust: boolean;
    smaWindows: number[];
    volumeWindow: number;
  };
  scan: {
    lookbackDays: number;
  };
  scoring: {
    maxScore: number;
    strongScoreThreshold: number;
  };
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export function parseEnvValue(raw: string): string | number | boolean {
  const v = String(raw).trim();
  if (!v) return v;
  if (v.toLowerCase() === 'true') return true;
  if (v.toLowerCase() === 'false') return false;
  const n = Number(v);
  if (Number.isFinite(n)) return n;
  return v;
}

// Only the settings that change what a scan computes. Pacing (delay,
// concurrency) and transport (base URL, timeout) stay out of the hash.
export function buildConfigSnapshot(cfg: Readonly<ScreenerConfig>): ConfigSnapshot {
  return {
    tickers: [...cfg.tickers],
    indicators: {
      rsiPeriod: cfg.rsiPeriod,
      macd: [cfg.macdFast, cfg.macdSlow, cfg.macdSignal],
      emaAdjust: cfg.emaAdjust,
      smaWindows: [...cfg.smaWindows],
      volumeWindow: cfg.volumeWindow,
    },
    scan: {
      lookbackDays: cfg.lookbackDays,
    },
    scoring: {
      maxScore: cfg.maxScore,
      strongScoreThreshold: cfg.strongScoreThreshold,
    },
  };
}

export function stableStringify(obj: JsonValue): string {
  if (obj === null || typeof obj !== 'object') return JSON.stringify(obj);
  if (Array.isArray(obj)) return `[${obj.map(stableStringify).join(',')}]`;
  const keys = Object.keys(obj).sort();
  return `{${keys.map(k => `${JSON.stringify(k)}:${stableStringify(obj[k])}`).join(',')}}`;
}

export function computeConfigHash(snapshot: ConfigSnapshot) {
  return crypto.createHash('sha256').update(stableStringify(snapshot)).digest('hex');
}
