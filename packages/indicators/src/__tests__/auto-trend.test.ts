import { describe, it, expect } from 'vitest';
import type { IndicatorCandle } from '@candlesync/schemas';
import { applyAutoTrend } from '../engine/auto-trend';

// 2024-01-01T00:00:00Z
const BASE = 1704067200;
const HALF_HOUR = 1800;

function indicatorCandle(timestamp: number, trend: number): IndicatorCandle {
  return {
    timestamp,
    open: 1,
    high: 1,
    low: 1,
    close: 1,
    volume: 1,
    isCurrent: false,
    rsi14: null,
    atr: null,
    ema7: null,
    ma20: null,
    ma200: null,
    trendState: trend,
    autoTrendState: 0,
  };
}

// 30 half-hour candles: bearish until the last one turns bullish
const dependency = Array.from({ length: 30 }, (_, k) =>
  indicatorCandle(BASE + k * HALF_HOUR, k < 29 ? -1 : 1)
);

describe('applyAutoTrend()', () => {
  it('forward-fills the newest dependency state at or before each candle', () => {
    const lastBucket = BASE + 29 * HALF_HOUR;
    const candles = [
      indicatorCandle(lastBucket - 300, 0),
      indicatorCandle(lastBucket, 0),
      indicatorCandle(lastBucket + 300, 0),
    ];

    const result = applyAutoTrend(candles, dependency);

    expect(result.map((c) => c.autoTrendState)).toEqual([-1, 1, 1]);
  });

  it('is 0 before the first dependency candle', () => {
    const result = applyAutoTrend([indicatorCandle(BASE - 300, 0)], dependency);

    expect(result[0].autoTrendState).toBe(0);
  });

  it('is 0 when the dependency has fewer than 30 candles', () => {
    const candles = [indicatorCandle(BASE + 29 * HALF_HOUR, 0)];

    expect(applyAutoTrend(candles, dependency.slice(1))[0].autoTrendState).toBe(0);
    expect(applyAutoTrend(candles, null)[0].autoTrendState).toBe(0);
  });
});
