import type { Timeframe } from '@candlesync/schemas';

/**
 * Cache key builders for consistent key naming across the application
 *
 * Series:   candles:{symbol}:{tf}, candles_with_indicators:{symbol}:{tf}
 * Slots:    current_candle:*, latest:*, current_candle_with_indicators:*, latest_with_indicators:*
 * Locks:    lock:{kind}:{symbol}:{tf}, lock:fetch_all_candles
 * Gaps:     gaps:{symbol}:{tf} (hash of unresolved ranges)
 */

/**
 * Raw OHLCV series
 *
 * @example rawSeriesKey('BTC-USDT-SWAP', '1h') // 'candles:BTC-USDT-SWAP:1h'
 */
export function rawSeriesKey(symbol: string, timeframe: Timeframe): string {
  return `candles:${symbol}:${timeframe}`;
}

/**
 * Indicator-augmented series read by downstream consumers
 */
export function indicatorSeriesKey(symbol: string, timeframe: Timeframe): string {
  return `candles_with_indicators:${symbol}:${timeframe}`;
}

export function currentCandleKey(symbol: string, timeframe: Timeframe): string {
  return `current_candle:${symbol}:${timeframe}`;
}

export function latestCandleKey(symbol: string, timeframe: Timeframe): string {
  return `latest:${symbol}:${timeframe}`;
}

export function currentWithIndicatorsKey(symbol: string, timeframe: Timeframe): string {
  return `current_candle_with_indicators:${symbol}:${timeframe}`;
}

export function latestWithIndicatorsKey(symbol: string, timeframe: Timeframe): string {
  return `latest_with_indicators:${symbol}:${timeframe}`;
}

/**
 * Kinds of periodic work guarded by a per-(symbol, timeframe) lock
 */
export type LockKind = 'completed' | 'current' | 'backfill';

/**
 * @example lockKey('completed', 'BTC-USDT-SWAP', '5m') // 'lock:completed:BTC-USDT-SWAP:5m'
 */
export function lockKey(kind: LockKind, symbol: string, timeframe: Timeframe): string {
  return `lock:${kind}:${symbol}:${timeframe}`;
}

/** Held for the whole initial load across all symbols */
export const INITIAL_LOAD_LOCK_KEY = 'lock:fetch_all_candles';

/** Pattern matching every lock, for diagnostics */
export const LOCK_KEY_PATTERN = 'lock:*';

export function unresolvedGapsKey(symbol: string, timeframe: Timeframe): string {
  return `gaps:${symbol}:${timeframe}`;
}

/** 'connected' or 'disconnected', written by the streaming supervisor */
export const STREAM_STATUS_KEY = 'websocket_status';
