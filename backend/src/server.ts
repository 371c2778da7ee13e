import express from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { ConfigError, loadConfig, parseTickerList, validateConfig } from './config.js';
import type { ScreenerConfig } from './config.js';
import { buildConfigSnapshot, computeConfigHash } from './configSnapshot.js';
import { fetchBars as yahooFetchBars } from './yahoo.js';
import { scanOnce } from './scanner.js';
import type { ScanLog } from './scanner.js';
import type { FetchBars, ScanReport } from './types.js';

export type AppDeps = {
  config: Readonly<ScreenerConfig>;
  fetchBars?: FetchBars;
  sleep?: (ms: number) => Promise<void>;
  log?: ScanLog;
};

export function createApp(deps: AppDeps) {
  const { config } = deps;
  const fetchBars: FetchBars = deps.fetchBars
    ?? ((ticker, days) => yahooFetchBars(ticker, days, { base: config.yahooBase, timeoutMs: config.fetchTimeoutMs }));

  // at most one scan per process; overlapping requests get a 409
  let running: Promise<ScanReport> | null = null;

  const app = express();
  app.use(cors());

  app.get('/api/health', (_req, res) => res.json({ ok: true }));

  app.get('/api/config', (_req, res) => {
    const snapshot = buildConfigSnapshot(config);
    res.json({ ok: true, config: snapshot, hash: computeConfigHash(snapshot) });
  });

  app.get('/api/scan', async (req, res) => {
    try {
      const raw = typeof req.query.tickers === 'string' ? req.query.tickers : '';
      const scanConfig = raw ? validateConfig({ ...config, tickers: parseTickerList(raw) }) : config;
      if (running) {
        return res.status(409).json({ ok: false, error: 'scan in progress' });
      }
      running = scanOnce({ config: scanConfig, fetchBars, sleep: deps.sleep, log: deps.log });
      try {
        const report = await running;
        res.json({ ok: true, report });
      } finally {
        running = null;
      }
    } catch (e) {
      if (e instanceof ConfigError) {
        return res.status(400).json({ ok: false, error: e.message });
      }
      console.error('[server] scan failed', e);
      res.status(500).json({ ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  });

  return app;
}

export function startServer(port = parseInt(process.env.PORT || '8080', 10)): Server {
  const app = createApp({ config: loadConfig() });
  return app.listen(port, () => console.log(`[server] on http://localhost:${port}`));
}
