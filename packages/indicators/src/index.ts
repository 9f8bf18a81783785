/**
 * @candlesync/indicators
 *
 * Moving averages, oscillators and the candle indicator engine
 */

// Core functions
export { sma, smaSeed } from './core/sma';
export { ema, emaAlpha } from './core/ema';
export { rma } from './core/rma';
export { rsi } from './core/rsi';
export { trueRange, trueRangeSeries, type OHLC } from './core/true-range';
export { atr } from './core/atr';

// Engine
export {
  computeIndicators,
  trendState,
  InsufficientCandlesError,
  INDICATOR_PERIODS,
  type ComputeIndicatorsOptions,
} from './engine/compute-indicators';
export { applyAutoTrend, AUTO_TREND_MIN_CANDLES } from './engine/auto-trend';
