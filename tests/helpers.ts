import type { Bar } from '../backend/src/types.js'

const DAY_MS = 86_400_000

export function barsFromCloses(closes: number[], volume = 1000): Bar[] {
  return closes.map((close, i) => ({
    time: 1_700_000_000_000 + i * DAY_MS,
    open: close,
    high: close,
    low: close,
    close,
    volume,
  }))
}

// start, start+step, ... (n values)
export function linear(n: number, start = 100, step = 1): number[] {
  return Array.from({ length: n }, (_, i) => start + i * step)
}

export const silentLog = { log: () => {}, warn: () => {} }
