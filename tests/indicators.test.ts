import { describe, it, expect } from 'vitest'
import { diff, rollingMean, exponentialMean, rsi, macd, lastValue } from '../backend/src/indicators.js'
import { buildSnapshot } from '../backend/src/snapshot.js'
import { DEFAULT_CONFIG } from '../backend/src/config.js'
import { barsFromCloses, linear } from './helpers.js'

describe('series statistics', () => {
  it('diff leaves the first slot empty', () => {
    expect(diff([5, 7, 4])).toEqual([undefined, 2, -3])
  })

  it('rollingMean is the plain windowed average', () => {
    expect(rollingMean([1, 2, 3, 4, 5], 3)).toEqual([undefined, undefined, 2, 3, 4])
    expect(rollingMean([0.1, 0.2, 0.3], 3)[2]).toBe((0.1 + 0.2 + 0.3) / 3)
  })

  it('rollingMean propagates a missing input through its window', () => {
    expect(rollingMean([undefined, 2, 4, 6], 2)).toEqual([undefined, undefined, 3, 5])
  })

  it('rejects non-positive windows', () => {
    expect(() => rollingMean([1, 2], 0)).toThrow(RangeError)
    expect(() => exponentialMean([1, 2], -3)).toThrow(RangeError)
  })

  it('exponentialMean seeds from the first value', () => {
    expect(exponentialMean([1, 2, 3], 3)).toEqual([1, 1.5, 2.25])
    expect(exponentialMean([], 3)).toEqual([])
  })

  it('exponentialMean adjust=true uses normalised weights', () => {
    const e = exponentialMean([1, 2, 3], 3, { adjust: true })
    expect(e[0]).toBe(1)
    expect(e[1]).toBeCloseTo(2.5 / 1.5, 12)
    expect(e[2]).toBeCloseTo(17 / 7, 12)
  })

  it('keeps output aligned with input', () => {
    const s = linear(40)
    expect(rollingMean(s, 20)).toHaveLength(40)
    expect(exponentialMean(s, 12)).toHaveLength(40)
  })

  it('lastValue', () => {
    expect(lastValue([1, 2, 3])).toBe(3)
    expect(lastValue([])).toBeUndefined()
  })
})

describe('rsi', () => {
  it('flat prices: undefined during warm-up, then exactly 50', () => {
    const r = rsi(Array(30).fill(100), 14)
    expect(r.slice(0, 13).every(v => v === undefined)).toBe(true)
    expect(r.slice(13).every(v => v === 50)).toBe(true)
  })

  it('rising prices saturate at 100', () => {
    const r = rsi(linear(40), 14)
    expect(r.slice(13).every(v => v === 100)).toBe(true)
  })

  it('falling prices go to 0', () => {
    const r = rsi(linear(40, 200, -1), 14)
    expect(r.slice(13).every(v => v === 0)).toBe(true)
  })

  it('mixed moves', () => {
    // gains [0,1,0], losses [0,0,1] -> means [_,0.5,0.5] / [_,0,0.5]
    expect(rsi([1, 2, 1], 2)).toEqual([undefined, 100, 50])
  })
})

describe('macd', () => {
  it('is flat for a constant series', () => {
    const m = macd(Array(40).fill(50))
    expect(m.macd.every(v => v === 0)).toBe(true)
    expect(m.histogram.every(v => v === 0)).toBe(true)
  })

  it('uptrend keeps the histogram positive after the first bar', () => {
    const m = macd(linear(60))
    expect(m.macd).toHaveLength(60)
    expect(m.histogram[0]).toBe(0)
    expect(m.histogram.slice(1).every(v => v > 0)).toBe(true)
    expect(m.macd.at(-1)!).toBeGreaterThan(m.signal.at(-1)!)
  })

  it('histogram is macd minus signal', () => {
    const m = macd([10, 12, 11, 15, 14, 13, 18])
    m.histogram.forEach((h, i) => expect(h).toBe(m.macd[i] - m.signal[i]))
  })
})

describe('buildSnapshot', () => {
  it('refuses fewer bars than the RSI period', () => {
    expect(buildSnapshot(barsFromCloses(Array(13).fill(100)), DEFAULT_CONFIG))
      .toEqual({ ok: false, reason: 'InsufficientHistory', bars: 13 })
    expect(buildSnapshot([], DEFAULT_CONFIG))
      .toEqual({ ok: false, reason: 'InsufficientHistory', bars: 0 })
  })

  it('exactly RSI-period bars: RSI defined, long SMAs missing', () => {
    const out = buildSnapshot(barsFromCloses(Array(14).fill(100)), DEFAULT_CONFIG)
    expect(out.ok).toBe(true)
    if (!out.ok) return
    expect(out.snapshot.rsi).toBe(50)
    expect(out.snapshot.sma20).toBeUndefined()
    expect(out.snapshot.sma50).toBeUndefined()
    expect(out.snapshot.sma200).toBeUndefined()
    expect(out.snapshot.avgVolume).toBeUndefined()
    expect(out.snapshot.macd).toBe(0)
  })

  it('100-bar linear rise', () => {
    const out = buildSnapshot(barsFromCloses(linear(100), 1000), DEFAULT_CONFIG)
    if (!out.ok) throw new Error('expected a snapshot')
    expect(out.snapshot).toMatchObject({
      price: 199,
      rsi: 100,
      sma20: 189.5,
      sma50: 174.5,
      sma200: undefined,
      volume: 1000,
      avgVolume: 1000,
    })
    expect(out.snapshot.histogram).toBeGreaterThan(0)
  })
})
