import { describe, it, expect } from 'vitest'
import { formatScanDate, printReport, renderReport, renderResult, stars, strongCandidates } from '../backend/src/report.js'
import { DEFAULT_CONFIG } from '../backend/src/config.js'
import type { ScanReport, ScreeningResult } from '../backend/src/types.js'

function result(ticker: string, score: number, reasons: string[] = []): ScreeningResult {
  return {
    ticker,
    price: 9125,
    rsi: 52.34,
    macd: 12,
    signal: 10,
    histogram: 2.123456,
    sma20: 9000,
    sma50: undefined,
    sma200: undefined,
    volume: 1e6,
    avgVolume: 9e5,
    score,
    reasons,
  }
}

const scannedAt = new Date(2024, 0, 2, 3, 4, 5).getTime()

const report: ScanReport = {
  results: [result('BBCA.JK', 5, ['MACD above signal line']), result('TLKM.JK', 3)],
  failures: [{ ticker: 'GONE.JK', reason: 'DataUnavailable', detail: 'not found' }],
  scannedAt,
  aborted: false,
  configHash: 'abcdef0123456789',
}

describe('report', () => {
  it('formats the scan date in local time', () => {
    expect(formatScanDate(scannedAt)).toBe('2024-01-02 03:04:05')
  })

  it('draws filled and empty stars', () => {
    expect(stars(4, 5)).toBe('★★★★☆')
    expect(stars(0, 5)).toBe('☆☆☆☆☆')
  })

  it('renders one result block', () => {
    expect(renderResult(result('BBCA.JK', 4, ['MACD above signal line']), 5)).toEqual([
      'Ticker: BBCA.JK',
      'Price: 9125.00 | Score: 4/5 ★★★★☆',
      'RSI: 52.3 | MACD Histogram: 2.1235',
      'Reasons:',
      '  • MACD above signal line',
      '-'.repeat(80),
    ])
  })

  it('lists totals, failures and strong candidates', () => {
    const lines = renderReport(report, DEFAULT_CONFIG)
    expect(lines[1]).toBe('INDONESIAN STOCK SCREENER - SWING TRADING')
    expect(lines).toContain('Scan Date: 2024-01-02 03:04:05')
    expect(lines).toContain('Indicators: RSI (14), MACD (12,26,9)')
    expect(lines).toContain('Lookback Period: 100 days')
    expect(lines).toContain('Config: abcdef012345')
    expect(lines).toContain('Total stocks screened: 2')
    expect(lines).toContain('Failed: 1 (GONE.JK)')
    expect(lines).not.toContain('Scan aborted: results are partial')

    const strongAt = lines.indexOf('Strong candidates (score >= 4):')
    expect(lines.slice(strongAt + 1, strongAt + 3)).toEqual(['  • BBCA.JK (Score: 5/5)', ''])
  })

  it('flags partial reports', () => {
    expect(renderReport({ ...report, aborted: true }, DEFAULT_CONFIG)).toContain('Scan aborted: results are partial')
  })

  it('strongCandidates uses the threshold inclusively', () => {
    expect(strongCandidates(report.results, 3).map(r => r.ticker)).toEqual(['BBCA.JK', 'TLKM.JK'])
  })

  it('printReport writes each rendered line', () => {
    const out: string[] = []
    printReport(report, DEFAULT_CONFIG, line => out.push(line))
    expect(out).toEqual(renderReport(report, DEFAULT_CONFIG))
  })
})
