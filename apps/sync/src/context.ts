import {
  CandleSeriesStore,
  DistributedLock,
  UnresolvedGapRegistry,
  type RedisCommands,
} from '@candlesync/cache';
import type { DurableWriter } from '@candlesync/database';
import { CandleFetcher, GapBackfillService, type CandleSource } from '@candlesync/exchange-core';
import type { SyncSettings } from '@candlesync/schemas';
import { createLogger, sleep as defaultSleep, type Logger } from '@candlesync/utils';
import { IndicatorPipeline } from './services/indicator-pipeline';

/**
 * Shared services of one sync process
 *
 * Built once in main.ts and handed to every worker. The polling worker and the
 * streaming supervisor share nothing but the cache behind `redis`.
 */
export interface SyncContext {
  settings: SyncSettings;
  redis: RedisCommands;
  store: CandleSeriesStore;
  gaps: UnresolvedGapRegistry;
  lock: DistributedLock;
  fetcher: CandleFetcher;
  backfill: GapBackfillService;
  pipeline: IndicatorPipeline;
  writer: DurableWriter;
  logger: Logger;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export interface SyncContextDependencies {
  settings: SyncSettings;
  redis: RedisCommands;
  source: CandleSource;
  writer: DurableWriter;
  logger?: Logger;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function createSyncContext(deps: SyncContextDependencies): SyncContext {
  const { settings, redis, source, writer } = deps;
  const logger = deps.logger ?? createLogger('sync');
  const now = deps.now ?? Date.now;
  const sleep = deps.sleep ?? defaultSleep;

  const store = new CandleSeriesStore(redis, { maxLen: settings.maxLen });
  const gaps = new UnresolvedGapRegistry(redis);
  const lock = new DistributedLock(redis);
  const fetcher = new CandleFetcher(source, { sleep, now });
  const pipeline = new IndicatorPipeline({ settings, store, fetcher, writer, now });
  // Backfilled candles go through the pipeline so their indicators are stored too
  const backfill = new GapBackfillService(fetcher, store, gaps, {
    apply: (symbol, timeframe, candles) => pipeline.updateCandleData(symbol, timeframe, candles),
    now,
  });

  return { settings, redis, store, gaps, lock, fetcher, backfill, pipeline, writer, logger, now, sleep };
}
