/**
 * Exchange data-source contract, OHLCV parsing, paginated fetching and gap backfill
 */

export * from './source/candle-source';
export * from './errors';
export * from './parser/parse-ohlcv';
export * from './fetcher/candle-fetcher';
export * from './backfill/gap-backfill-service';
