#!/usr/bin/env node
import 'dotenv/config';
import { ConfigError, loadConfig } from './config.js';
import { parseCliOverrides } from './cliArgs.js';
import { fetchBars } from './yahoo.js';
import { scanOnce } from './scanner.js';
import { printReport } from './report.js';

async function main() {
  const config = loadConfig(process.env, parseCliOverrides(process.argv.slice(2)));

  // Ctrl-C stops between tickers; whatever was screened still gets reported
  const ctrl = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n[scan] interrupt received, finishing current ticker');
    ctrl.abort();
  });

  const total = config.tickers.length;
  const report = await scanOnce({
    config,
    signal: ctrl.signal,
    fetchBars: (ticker, days) => fetchBars(ticker, days, { base: config.yahooBase, timeoutMs: config.fetchTimeoutMs }),
    log: { log: () => {}, warn: console.warn },
    onTicker: (ticker, i, status) => console.log(`[${i + 1}/${total}] Screening ${ticker}... ${status}`),
  });

  console.log();
  printReport(report, config);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error('[config] invalid configuration:', err.message);
  } else {
    console.error('[scan] failed', err);
  }
  process.exit(1);
});
