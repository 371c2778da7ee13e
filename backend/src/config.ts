// backend/src/config.ts
import { parseEnvValue } from './configSnapshot.js';

// Yahoo Finance symbols (.JK = Indonesia Stock Exchange)
export const DEFAULT_TICKERS: readonly string[] = [
  'BBCA.JK', // Bank Central Asia
  'BBRI.JK', // Bank Rakyat Indonesia
  'BMRI.JK', // Bank Mandiri
  'INDF.JK', // Indofood
  'TLKM.JK', // Telekomunikasi Indonesia
  'UNVR.JK', // Unilever Indonesia
  'GGRM.JK', // Gudang Garam
  'ASII.JK', // Astra International
  'PGAS.JK', // Perusahaan Gas Negara
  'ADRO.JK', // Adaro Energy
];

export interface ScreenerConfig {
  tickers: readonly string[];
  rsiPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  emaAdjust: boolean;
  lookbackDays: number;      // calendar days requested from the data source
  smaWindows: readonly [number, number, number];
  volumeWindow: number;
  requestDelayMs: number;
  fetchTimeoutMs: number;
  concurrency: number;
  strongScoreThreshold: number;
  maxScore: number;
  yahooBase: string;
}

export const DEFAULT_CONFIG: Readonly<ScreenerConfig> = Object.freeze({
  tickers: DEFAULT_TICKERS,
  rsiPeriod: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  emaAdjust: false,
  lookbackDays: 100,
  smaWindows: [20, 50, 200] as const,
  volumeWindow: 20,
  requestDelayMs: 500,
  fetchTimeoutMs: 10_000,
  concurrency: 1,
  strongScoreThreshold: 4,
  maxScore: 5,
  yahooBase: 'https://query1.finance.yahoo.com',
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function parseTickerList(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
}

// setTimeout treats anything larger as 1ms
export const MAX_DELAY_MS = 2_147_483_647;

function isPositiveInt(n: number) {
  return Number.isInteger(n) && n > 0;
}

/** Throws ConfigError on the first problem; returns a frozen copy otherwise. */
export function validateConfig(cfg: ScreenerConfig): Readonly<ScreenerConfig> {
  if (cfg.tickers.length === 0) throw new ConfigError('ticker list is empty');
  if (new Set(cfg.tickers).size !== cfg.tickers.length) throw new ConfigError('ticker list has duplicates');

  const periods: Array<[string, number]> = [
    ['rsiPeriod', cfg.rsiPeriod],
    ['macdFast', cfg.macdFast],
    ['macdSlow', cfg.macdSlow],
    ['macdSignal', cfg.macdSignal],
    ['lookbackDays', cfg.lookbackDays],
    ['volumeWindow', cfg.volumeWindow],
    ['concurrency', cfg.concurrency],
    ['maxScore', cfg.maxScore],
    ...cfg.smaWindows.map((w, i): [string, number] => [`smaWindows[${i}]`, w]),
  ];
  for (const [name, v] of periods) {
    if (!isPositiveInt(v)) throw new ConfigError(`${name} must be a positive integer, got ${v}`);
  }
  if (cfg.macdFast >= cfg.macdSlow) {
    throw new ConfigError(`macdFast (${cfg.macdFast}) must be below macdSlow (${cfg.macdSlow})`);
  }
  if (!Number.isFinite(cfg.requestDelayMs) || cfg.requestDelayMs < 0 || cfg.requestDelayMs > MAX_DELAY_MS) {
    throw new ConfigError(`requestDelayMs must be between 0 and ${MAX_DELAY_MS}, got ${cfg.requestDelayMs}`);
  }
  if (!Number.isFinite(cfg.fetchTimeoutMs) || cfg.fetchTimeoutMs <= 0 || cfg.fetchTimeoutMs > MAX_DELAY_MS) {
    throw new ConfigError(`fetchTimeoutMs must be between 1 and ${MAX_DELAY_MS}, got ${cfg.fetchTimeoutMs}`);
  }
  if (!Number.isFinite(cfg.strongScoreThreshold)) {
    throw new ConfigError('strongScoreThreshold must be a number');
  }

  return Object.freeze({ ...cfg, tickers: Object.freeze([...cfg.tickers]) });
}

// ── Env loading ────────────────────────────────────────────────────────
type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = parseEnvValue(raw);
  if (typeof v !== 'number') throw new ConfigError(`${key} must be numeric, got "${raw}"`);
  return v;
}

function envBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const v = parseEnvValue(raw);
  if (typeof v !== 'boolean') throw new ConfigError(`${key} must be true/false, got "${raw}"`);
  return v;
}

export function loadConfig(env: Env = process.env, overrides: Partial<ScreenerConfig> = {}): Readonly<ScreenerConfig> {
  const tickersRaw = env.SCREENER_TICKERS;
  const base: ScreenerConfig = {
    ...DEFAULT_CONFIG,
    tickers: tickersRaw ? parseTickerList(tickersRaw) : DEFAULT_CONFIG.tickers,
    rsiPeriod: envNumber(env, 'RSI_PERIOD', DEFAULT_CONFIG.rsiPeriod),
    macdFast: envNumber(env, 'MACD_FAST', DEFAULT_CONFIG.macdFast),
    macdSlow: envNumber(env, 'MACD_SLOW', DEFAULT_CONFIG.macdSlow),
    macdSignal: envNumber(env, 'MACD_SIGNAL', DEFAULT_CONFIG.macdSignal),
    emaAdjust: envBool(env, 'EMA_ADJUST', DEFAULT_CONFIG.emaAdjust),
    lookbackDays: envNumber(env, 'LOOKBACK_DAYS', DEFAULT_CONFIG.lookbackDays),
    requestDelayMs: envNumber(env, 'REQUEST_DELAY_MS', DEFAULT_CONFIG.requestDelayMs),
    fetchTimeoutMs: envNumber(env, 'FETCH_TIMEOUT_MS', DEFAULT_CONFIG.fetchTimeoutMs),
    concurrency: envNumber(env, 'SCAN_CONCURRENCY', DEFAULT_CONFIG.concurrency),
    strongScoreThreshold: envNumber(env, 'STRONG_SCORE_THRESHOLD', DEFAULT_CONFIG.strongScoreThreshold),
    yahooBase: env.YAHOO_BASE || DEFAULT_CONFIG.yahooBase,
  };
  return validateConfig({ ...base, ...overrides });
}
