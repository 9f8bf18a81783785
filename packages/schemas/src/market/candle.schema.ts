import { z } from 'zod';

/**
 * Timeframe codes known to the registry.
 *
 * Each code maps to a fixed minute count (see `toMinutes` in @candlesync/utils).
 * Codes at or above 6h are requested from exchanges in their UTC-anchored form
 * so that buckets line up with `align()`.
 */
export const TIMEFRAME_CODES = [
  '1m',   // 1 minute
  '3m',   // 3 minutes
  '5m',   // 5 minutes
  '15m',  // 15 minutes
  '30m',  // 30 minutes
  '1h',   // 60 minutes
  '4h',   // 240 minutes
  '6h',   // 360 minutes
  '12h',  // 720 minutes
  '1d',   // 1440 minutes
] as const;

export const TimeframeSchema = z.enum(TIMEFRAME_CODES);
export type Timeframe = z.infer<typeof TimeframeSchema>;

/** Bucket width of each registry code, in minutes */
export const TIMEFRAME_MINUTES = {
  '1m': 1,
  '3m': 3,
  '5m': 5,
  '15m': 15,
  '30m': 30,
  '1h': 60,
  '4h': 240,
  '6h': 360,
  '12h': 720,
  '1d': 1440,
} as const satisfies Record<Timeframe, number>;

/**
 * Candle (OHLCV) data schema
 *
 * `timestamp` is epoch seconds, aligned to the start of its timeframe bucket.
 */
export const CandleSchema = z.object({
  /** Bucket start, unix seconds */
  timestamp: z.number().int().nonnegative(),
  open: z.number().finite(),
  high: z.number().finite(),
  low: z.number().finite(),
  close: z.number().finite(),
  volume: z.number().finite().nonnegative(),
  /** True while the bucket has not closed yet */
  isCurrent: z.boolean().default(false),
});

/**
 * Candle augmented with indicator fields.
 *
 * Indicator values are null where the lookback is not yet satisfied.
 * `humanTime` and `displayTime` are for observability only, never for ordering.
 */
export const IndicatorCandleSchema = CandleSchema.extend({
  rsi14: z.number().nullable(),
  atr: z.number().nullable(),
  ema7: z.number().nullable(),
  ma20: z.number().nullable(),
  ma200: z.number().nullable(),
  /** -1 bearish, 0 neutral, 1 bullish */
  trendState: z.number().int().min(-1).max(1),
  /** trendState of the coarser dependency timeframe, forward-filled */
  autoTrendState: z.number().int().min(-1).max(1),
  humanTime: z.string().optional(),
  displayTime: z.string().optional(),
});

export type Candle = z.infer<typeof CandleSchema>;
export type IndicatorCandle = z.infer<typeof IndicatorCandleSchema>;
export type IndicatorFields = Omit<IndicatorCandle, keyof Candle>;

/**
 * Gap recorded when a backfill had to be clamped.
 * `start` and `end` are inclusive bucket timestamps (seconds) still missing.
 */
export const UnresolvedGapSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  missing: z.number().int().positive(),
  detectedAt: z.string(),
});

export type UnresolvedGap = z.infer<typeof UnresolvedGapSchema>;
