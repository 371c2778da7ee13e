import { ConfigError, parseTickerList } from './config.js';
import type { ScreenerConfig } from './config.js';

function getArgValue(argv: readonly string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  const value = argv[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigError(`${name} needs a value`);
  }
  return value;
}

// --tickers A,B  --delay-ms N  --concurrency N
export function parseCliOverrides(argv: readonly string[]): Partial<ScreenerConfig> {
  const out: Partial<ScreenerConfig> = {};
  const tickers = getArgValue(argv, '--tickers');
  const delay = getArgValue(argv, '--delay-ms');
  const concurrency = getArgValue(argv, '--concurrency');
  if (tickers !== undefined) out.tickers = parseTickerList(tickers);
  if (delay !== undefined) out.requestDelayMs = Number(delay);
  if (concurrency !== undefined) out.concurrency = Number(concurrency);
  return out;
}
