/**
 * Simple Moving Average (SMA)
 *
 * Arithmetic mean of the last N values. Also seeds EMA and RMA.
 */

/**
 * Calculate SMA for an array of values
 * @param values - Array of numeric values (oldest first)
 * @param period - Number of periods for the average
 * @returns Array of SMA values, same length as input, NaN until `period` values are seen
 */
export function sma(values: number[], period: number): number[] {
  if (period <= 0) {
    throw new Error('SMA period must be positive');
  }

  const result: number[] = new Array(values.length).fill(NaN);
  if (values.length < period) {
    return result;
  }

  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= period) {
      sum -= values[i - period];
    }
    if (i >= period - 1) {
      result[i] = sum / period;
    }
  }

  return result;
}

/**
 * Mean of the first `period` values, or null if there are fewer
 */
export function smaSeed(values: number[], period: number): number | null {
  if (values.length < period) {
    return null;
  }

  let sum = 0;
  for (let i = 0; i < period; i++) {
    sum += values[i];
  }
  return sum / period;
}
