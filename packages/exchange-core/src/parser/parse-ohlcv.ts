import { CandleSchema, type Candle } from '@candlesync/schemas';
import { align } from '@candlesync/utils';
import type { OhlcvRow } from '../source/candle-source';

export interface ParsedCandles {
  /** Ascending, one per bucket (the last row of a bucket wins) */
  candles: Candle[];
  /** Newest bucket that has closed, null if none */
  lastCompleted: number | null;
  /** Rows dropped as malformed or as empty completed buckets */
  skipped: number;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Turn raw exchange rows into aligned candles.
 *
 * - rows that are null, shorter than 6 fields or non-numeric are skipped
 * - timestamps are snapped to the bucket start
 * - a candle is current while `bucketStart + interval > now`
 * - completed candles with zero volume are skipped (no trades, no bar)
 */
export function parseOhlcvRows(
  rows: readonly OhlcvRow[],
  minutes: number,
  nowMs: number
): ParsedCandles {
  const intervalSec = minutes * 60;
  const byTimestamp = new Map<number, Candle>();
  let skipped = 0;

  for (const row of rows) {
    if (!row || row.length < 6) {
      skipped++;
      continue;
    }

    const fields = row.slice(0, 6).map(toNumber);
    const [tsMs, open, high, low, close, volume] = fields;
    if (
      tsMs === null ||
      open === null ||
      high === null ||
      low === null ||
      close === null ||
      volume === null
    ) {
      skipped++;
      continue;
    }

    const timestamp = align(tsMs, minutes);
    const isCurrent = (timestamp + intervalSec) * 1000 > nowMs;
    if (volume === 0 && !isCurrent) {
      skipped++;
      continue;
    }

    const parsed = CandleSchema.safeParse({ timestamp, open, high, low, close, volume, isCurrent });
    if (!parsed.success) {
      skipped++;
      continue;
    }
    byTimestamp.set(timestamp, parsed.data);
  }

  const candles = [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
  let lastCompleted: number | null = null;
  for (const candle of candles) {
    if (!candle.isCurrent) lastCompleted = candle.timestamp;
  }

  return { candles, lastCompleted, skipped };
}
