/**
 * Wilder's Smoothed Moving Average (RMA / SMMA)
 *
 * - Seed: RMA[period-1] = SMA(values[0..period-1])
 * - Recursive: RMA[t] = (RMA[t-1] * (period - 1) + value[t]) / period
 *
 * Same as an EMA with alpha = 1/period. Smooths both RSI and ATR.
 */

import { smaSeed } from './sma';

/**
 * @param values - Array of numeric values
 * @param period - RMA period
 * @param offset - Index of the first meaningful value; earlier entries are ignored
 * @returns Array of RMA values (same length as input, with NaN for insufficient data)
 */
export function rma(values: number[], period: number, offset = 0): number[] {
  if (period <= 0) {
    throw new Error('RMA period must be positive');
  }

  const result: number[] = new Array(values.length).fill(NaN);
  const seed = smaSeed(values.slice(offset), period);
  if (seed === null) {
    return result;
  }

  const seedIndex = offset + period - 1;
  result[seedIndex] = seed;
  for (let i = seedIndex + 1; i < values.length; i++) {
    result[i] = (result[i - 1] * (period - 1) + values[i]) / period;
  }

  return result;
}
