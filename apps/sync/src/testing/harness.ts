import { vi } from 'vitest';
import { MemoryRedis } from '@candlesync/cache/testing';
import { DurableWriter, type CandleRow, type CandleSink } from '@candlesync/database';
import { FakeCandleSource } from '@candlesync/exchange-core/testing';
import type { Candle, IndicatorCandle, SyncSettings } from '@candlesync/schemas';
import { createSyncContext, type SyncContext } from '../context';

export const SYMBOL = 'BTC-USDT-SWAP';
/** 2024-01-01T00:00:00Z, in seconds */
export const T0 = 1704067200;

export const TEST_SETTINGS: SyncSettings = {
  symbols: [SYMBOL],
  timeframes: ['1m'],
  maxLen: 50,
  warmUp: 20,
  minCandles: 20,
  pollFetchCount: 5,
  pollTickMs: 1000,
  streamSaveIntervalMs: 5000,
  enableStreaming: true,
  enablePolling: true,
  displayTimeZone: 'Asia/Seoul',
};

/**
 * Durable sink that keeps every upsert in memory
 */
export class RecordingSink implements CandleSink {
  readonly upserts: Array<{ table: string; rows: CandleRow[] }> = [];
  readonly ping = vi.fn(async (): Promise<void> => {});
  readonly close = vi.fn(async (): Promise<void> => {});

  async upsert(table: string, rows: CandleRow[]): Promise<void> {
    this.upserts.push({ table, rows });
  }
}

export interface SyncHarness {
  ctx: SyncContext;
  redis: MemoryRedis;
  source: FakeCandleSource;
  sink: RecordingSink;
  clock: { now: number };
}

/**
 * Sync context over in-process stand-ins with an enabled writer.
 * The clock starts 30 s into the bucket that opens at T0.
 */
export async function createHarness(overrides: Partial<SyncSettings> = {}): Promise<SyncHarness> {
  const redis = new MemoryRedis();
  const source = new FakeCandleSource();
  const sink = new RecordingSink();
  const clock = { now: (T0 + 30) * 1000 };

  const writer = new DurableWriter({
    enabled: true,
    maxRetries: 0,
    baseDelayMs: 1,
    healthCheckIntervalMs: 60000,
    createSink: async () => sink,
    sleep: async () => {},
    now: () => clock.now,
  });
  await writer.init();

  const ctx = createSyncContext({
    settings: { ...TEST_SETTINGS, ...overrides },
    redis,
    source,
    writer,
    now: () => clock.now,
    sleep: async () => {},
  });
  return { ctx, redis, source, sink, clock };
}

/**
 * Same values `makeRows` produces for a row with this close
 */
export function candleAt(timestamp: number, close: number): Candle {
  return { timestamp, open: close - 0.5, high: close + 1, low: close - 1, close, volume: 10, isCurrent: false };
}

export function indicatorCandleAt(timestamp: number, trendState: number, autoTrendState = 0): IndicatorCandle {
  return {
    ...candleAt(timestamp, 100),
    rsi14: null,
    atr: null,
    ema7: null,
    ma20: null,
    ma200: null,
    trendState,
    autoTrendState,
  };
}
