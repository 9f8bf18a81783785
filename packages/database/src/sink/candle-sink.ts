import type { CandleRow } from '../schema/candles';

/**
 * Destination of durable candle writes.
 * The writer owns one sink at a time and replaces it on reconnect.
 */
export interface CandleSink {
  /** Trivial round trip; rejects when the store is unreachable */
  ping(): Promise<void>;
  /** Insert or update rows of one per-symbol table, keyed by (time, timeframe) */
  upsert(table: string, rows: CandleRow[]): Promise<void>;
  close(): Promise<void>;
}

export type SinkFactory = () => Promise<CandleSink>;
