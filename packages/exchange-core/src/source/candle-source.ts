import type { Timeframe } from '@candlesync/schemas';

/**
 * Raw OHLCV row as returned by an exchange:
 * [timestampMs, open, high, low, close, volume, ...extra]
 *
 * Fields may be numbers or numeric strings; rows are validated by `parseOhlcvRows`.
 */
export type OhlcvRow = ReadonlyArray<unknown> | null;

export interface FetchCandlesParams {
  /** Rows wanted; sources cap it at their own per-request maximum */
  limit: number;
  /** Epoch ms. When set, rows at or after `since`, oldest first; otherwise the newest rows */
  since?: number;
}

/**
 * Exchange data-source contract used by the fetcher.
 * Implementations throw `ExchangeRequestError` on failure.
 */
export interface CandleSource {
  readonly name: string;
  /** Single-call row limit */
  readonly maxCandlesPerRequest: number;
  fetchCandles(symbol: string, timeframe: Timeframe, params: FetchCandlesParams): Promise<OhlcvRow[]>;
}
