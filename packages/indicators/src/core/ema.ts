/**
 * Exponential Moving Average (EMA)
 *
 * - alpha = 2 / (period + 1)
 * - EMA[t] = alpha * value[t] + (1 - alpha) * EMA[t-1]
 * - Seed: EMA[period-1] = SMA(values[0..period-1])
 */

import { smaSeed } from './sma';

export function emaAlpha(period: number): number {
  if (period <= 0) {
    throw new Error('EMA period must be positive');
  }
  return 2 / (period + 1);
}

/**
 * Calculate EMA for an array of values
 * @returns Array of EMA values (same length as input, with NaN for insufficient data)
 */
export function ema(values: number[], period: number): number[] {
  const alpha = emaAlpha(period);
  const result: number[] = new Array(values.length).fill(NaN);

  const seed = smaSeed(values, period);
  if (seed === null) {
    return result;
  }

  result[period - 1] = seed;
  for (let i = period; i < values.length; i++) {
    result[i] = alpha * values[i] + (1 - alpha) * result[i - 1];
  }

  return result;
}
