import type { Candle, IndicatorCandle } from '@candlesync/schemas';
import { atr } from '../core/atr';
import { ema } from '../core/ema';
import { rsi } from '../core/rsi';
import { sma } from '../core/sma';

/**
 * Lookback periods of the indicator fields
 */
export const INDICATOR_PERIODS = {
  rsi: 14,
  atr: 14,
  ema: 7,
  maFast: 20,
  maSlow: 200,
} as const;

export interface ComputeIndicatorsOptions {
  /** Shortest series the engine accepts */
  minCandles: number;
}

export class InsufficientCandlesError extends Error {
  constructor(
    public readonly received: number,
    public readonly required: number
  ) {
    super(`Indicator computation needs at least ${required} candles, got ${received}`);
    this.name = 'InsufficientCandlesError';
  }
}

function toNullable(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

/**
 * -1, 0 or 1 from the short EMA, the 20-period average and the close
 */
export function trendState(close: number, ema7: number | null, ma20: number | null): number {
  if (ema7 === null || ma20 === null) return 0;
  if (ema7 > ma20 && close > ma20) return 1;
  if (ema7 < ma20 && close < ma20) return -1;
  return 0;
}

/**
 * Compute indicator fields over an ascending candle window.
 *
 * Pure: the input is not modified. Fields whose lookback is not satisfied
 * are null; `autoTrendState` is left at 0 for `applyAutoTrend`.
 *
 * @throws InsufficientCandlesError if `candles.length < minCandles`
 */
export function computeIndicators(
  candles: Candle[],
  options: ComputeIndicatorsOptions
): IndicatorCandle[] {
  if (candles.length < options.minCandles) {
    throw new InsufficientCandlesError(candles.length, options.minCandles);
  }

  const closes = candles.map((candle) => candle.close);
  const rsiValues = rsi(closes, INDICATOR_PERIODS.rsi);
  const atrValues = atr(candles, INDICATOR_PERIODS.atr);
  const emaValues = ema(closes, INDICATOR_PERIODS.ema);
  const maFast = sma(closes, INDICATOR_PERIODS.maFast);
  const maSlow = sma(closes, INDICATOR_PERIODS.maSlow);

  return candles.map((candle, i) => {
    const ema7 = toNullable(emaValues[i]);
    const ma20 = toNullable(maFast[i]);
    return {
      ...candle,
      rsi14: toNullable(rsiValues[i]),
      atr: toNullable(atrValues[i]),
      ema7,
      ma20,
      ma200: toNullable(maSlow[i]),
      trendState: trendState(candle.close, ema7, ma20),
      autoTrendState: 0,
    };
  });
}
