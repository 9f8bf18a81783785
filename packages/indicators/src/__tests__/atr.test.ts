import { describe, it, expect } from 'vitest';
import { trueRange, trueRangeSeries, type OHLC } from '../core/true-range';
import { atr } from '../core/atr';

const bars: OHLC[] = [
  { open: 100, high: 105, low: 95, close: 102 },
  { open: 103, high: 108, low: 100, close: 106 },
  { open: 107, high: 112, low: 104, close: 110 },
  // Gap down: |low - prevClose| = 9 but high - low = 10
  { open: 108, high: 111, low: 101, close: 103 },
];

describe('True Range', () => {
  it('calculates TR as high-low when that is largest', () => {
    expect(trueRange(110, 100, 105)).toBe(10);
  });

  it('calculates TR as |high-prevClose| on a gap up', () => {
    expect(trueRange(115, 110, 100)).toBe(15);
  });

  it('calculates TR as |low-prevClose| on a gap down', () => {
    expect(trueRange(105, 100, 110)).toBe(10);
  });

  it('uses H-L for the first bar of a series', () => {
    expect(trueRangeSeries(bars)).toEqual([10, 8, 8, 10]);
    expect(trueRangeSeries([])).toEqual([]);
  });
});

describe('ATR (Average True Range)', () => {
  it('smooths the TR series with RMA', () => {
    const result = atr(bars, 3);

    expect(result[0]).toBeNaN();
    expect(result[1]).toBeNaN();
    expect(result[2]).toBeCloseTo(26 / 3);
    expect(result[3]).toBeCloseTo(82 / 9);
  });

  it('throws error for non-positive period', () => {
    expect(() => atr(bars, 0)).toThrow('ATR period must be positive');
  });
});
