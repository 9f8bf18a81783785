/**
 * True Range (TR)
 *
 * TR[t] = max(high[t] - low[t], |high[t] - close[t-1]|, |low[t] - close[t-1]|)
 */

export interface OHLC {
  open: number;
  high: number;
  low: number;
  close: number;
}

export function trueRange(high: number, low: number, prevClose: number): number {
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

/**
 * TR for each bar (oldest first). The first bar has no previous close and uses H-L.
 */
export function trueRangeSeries(bars: OHLC[]): number[] {
  return bars.map((bar, i) =>
    i === 0 ? bar.high - bar.low : trueRange(bar.high, bar.low, bars[i - 1].close)
  );
}
