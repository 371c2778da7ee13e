// backend/src/report.ts
import type { ScreenerConfig } from './config.js';
import type { MaybeNumber, ScanReport, ScreeningResult } from './types.js';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

function fmt(v: MaybeNumber, digits: number) {
  return v === undefined ? 'n/a' : v.toFixed(digits);
}

function pad2(n: number) {
  return String(n).padStart(2, '0');
}

// Local wall-clock time, YYYY-MM-DD HH:MM:SS
export function formatScanDate(ms: number): string {
  const d = new Date(ms);
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ` +
    `${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`;
}

export function stars(score: number, maxScore: number) {
  const filled = Math.max(0, Math.min(maxScore, score));
  return '★'.repeat(filled) + '☆'.repeat(maxScore - filled);
}

export function strongCandidates(results: readonly ScreeningResult[], threshold: number) {
  return results.filter(r => r.score >= threshold);
}

export function renderResult(r: ScreeningResult, maxScore: number): string[] {
  return [
    `Ticker: ${r.ticker}`,
    `Price: ${r.price.toFixed(2)} | Score: ${r.score}/${maxScore} ${stars(r.score, maxScore)}`,
    `RSI: ${fmt(r.rsi, 1)} | MACD Histogram: ${fmt(r.histogram, 4)}`,
    'Reasons:',
    ...r.reasons.map(reason => `  • ${reason}`),
    THIN_RULE,
  ];
}

type ReportConfig = Pick<
  ScreenerConfig,
  'rsiPeriod' | 'macdFast' | 'macdSlow' | 'macdSignal' | 'lookbackDays' | 'maxScore' | 'strongScoreThreshold'
>;

export function renderReport(report: ScanReport, cfg: ReportConfig): string[] {
  const lines: string[] = [
    RULE,
    'INDONESIAN STOCK SCREENER - SWING TRADING',
    RULE,
    `Scan Date: ${formatScanDate(report.scannedAt)}`,
    `Indicators: RSI (${cfg.rsiPeriod}), MACD (${cfg.macdFast},${cfg.macdSlow},${cfg.macdSignal})`,
    `Lookback Period: ${cfg.lookbackDays} days`,
    `Config: ${report.configHash.slice(0, 12)}`,
    RULE,
    '',
    RULE,
    'SCREENING RESULTS (sorted by score)',
    RULE,
    '',
  ];

  for (const r of report.results) lines.push(...renderResult(r, cfg.maxScore));

  lines.push('', `Total stocks screened: ${report.results.length}`);
  if (report.failures.length) {
    lines.push(`Failed: ${report.failures.length} (${report.failures.map(f => f.ticker).join(', ')})`);
  }
  if (report.aborted) lines.push('Scan aborted: results are partial');

  lines.push(`Strong candidates (score >= ${cfg.strongScoreThreshold}):`);
  for (const c of strongCandidates(report.results, cfg.strongScoreThreshold)) {
    lines.push(`  • ${c.ticker} (Score: ${c.score}/${cfg.maxScore})`);
  }

  lines.push(
    '',
    RULE,
    'DISCLAIMER: This screener is for educational purposes only.',
    'Always do your own research and consult a financial advisor before trading.',
    RULE,
  );
  return lines;
}

export function printReport(report: ScanReport, cfg: ReportConfig, out: (line: string) => void = console.log) {
  for (const line of renderReport(report, cfg)) out(line);
}
