/**
 * Relative Strength Index, Wilder's variant
 *
 * Gains and losses of consecutive closes are smoothed with RMA. The first
 * value appears at index `period` (it needs `period` price changes).
 *
 * RSI = 100 - 100 / (1 + avgGain / avgLoss)
 */

import { rma } from './rma';

export function rsi(closes: number[], period: number = 14): number[] {
  if (period <= 0) {
    throw new Error('RSI period must be positive');
  }

  const gains: number[] = new Array(closes.length).fill(0);
  const losses: number[] = new Array(closes.length).fill(0);
  for (let i = 1; i < closes.length; i++) {
    const change = closes[i] - closes[i - 1];
    gains[i] = Math.max(change, 0);
    losses[i] = Math.max(-change, 0);
  }

  // Index 0 has no change; smoothing starts at the first real one
  const avgGain = rma(gains, period, 1);
  const avgLoss = rma(losses, period, 1);

  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (Number.isNaN(gain) || Number.isNaN(loss)) return NaN;
    if (loss === 0) return gain === 0 ? 50 : 100;
    return 100 - 100 / (1 + gain / loss);
  });
}
