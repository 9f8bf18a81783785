/**
 * Average True Range (ATR): Wilder's smoothing (RMA) of the True Range series
 */

import { type OHLC, trueRangeSeries } from './true-range';
import { rma } from './rma';

/**
 * @param bars - Array of OHLC bars (oldest first)
 * @param period - ATR period (default: 14)
 * @returns ATR per bar, NaN until `period` bars are seen
 */
export function atr(bars: OHLC[], period: number = 14): number[] {
  if (period <= 0) {
    throw new Error('ATR period must be positive');
  }
  return rma(trueRangeSeries(bars), period);
}
