import { LockLostError, lockKey } from '@candlesync/cache';
import { HARDCODED_CONFIG, type Timeframe } from '@candlesync/schemas';
import {
  bucketStart,
  createLogger,
  currentCandleRefreshSeconds,
  timeframeSeconds,
  type Logger,
} from '@candlesync/utils';
import type { SyncContext } from '../context';

export type PollAction = 'completed' | 'current' | 'idle';

/**
 * Polling Worker
 *
 * One loop over every (symbol, timeframe) pair per tick:
 * - once per closed bucket, `barEndDelayMs` after the boundary, sync the
 *   completed candles (fetch, gap backfill, indicators, stale current slot)
 * - otherwise refresh the open candle every `currentCandleRefreshSeconds(tf)`
 *
 * Both kinds of work run under a per-pair lock; a refused lock means another
 * worker is doing it and the bucket counts as handled.
 */
export class PollingWorker {
  private running = false;
  /** Start (s) of the newest bucket whose completed-candle sync ran, per pair */
  private readonly handledBuckets = new Map<string, number>();
  /** Epoch ms of the last current-candle refresh, per pair */
  private readonly lastCurrentRefresh = new Map<string, number>();
  private lastHealthCheck: number;
  private lastStats: number;
  private readonly logger: Logger;

  constructor(private readonly ctx: SyncContext) {
    this.logger = createLogger('sync:poller');
    this.lastHealthCheck = ctx.now();
    this.lastStats = ctx.now();
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Tick until `stop()`; resolves after the tick in progress finishes
   */
  async run(): Promise<void> {
    this.running = true;
    this.logger.info(
      { symbols: this.ctx.settings.symbols, timeframes: this.ctx.settings.timeframes, tickMs: this.ctx.settings.pollTickMs },
      'Polling worker started'
    );

    while (this.running) {
      await this.tick(this.ctx.now());
      if (!this.running) break;
      await this.ctx.sleep(this.ctx.settings.pollTickMs);
    }

    this.logger.info('Polling worker stopped');
  }

  stop(): void {
    this.running = false;
  }

  /**
   * One pass over every pair plus the periodic maintenance
   */
  async tick(nowMs: number): Promise<void> {
    const { symbols, timeframes } = this.ctx.settings;
    for (const symbol of symbols) {
      for (const timeframe of timeframes) {
        await this.pollPair(symbol, timeframe, nowMs);
      }
    }
    await this.maintenance(nowMs);
  }

  /**
   * @returns which kind of work was attempted for the pair
   */
  async pollPair(symbol: string, timeframe: Timeframe, nowMs: number): Promise<PollAction> {
    const key = `${symbol}:${timeframe}`;
    const openBucket = bucketStart(nowMs, timeframe);
    const closedBucket = openBucket - timeframeSeconds(timeframe);

    if (
      this.handledBuckets.get(key) !== closedBucket &&
      nowMs >= openBucket * 1000 + HARDCODED_CONFIG.worker.barEndDelayMs
    ) {
      // Marked up front: a failed sync is not retried every tick, the next
      // bucket's gap check picks up whatever it missed
      this.handledBuckets.set(key, closedBucket);
      await this.syncCompleted(symbol, timeframe, nowMs);
      return 'completed';
    }

    const lastRefresh = this.lastCurrentRefresh.get(key);
    if (lastRefresh === undefined || nowMs - lastRefresh >= currentCandleRefreshSeconds(timeframe) * 1000) {
      this.lastCurrentRefresh.set(key, nowMs);
      await this.refreshCurrent(symbol, timeframe);
      return 'current';
    }

    return 'idle';
  }

  private async syncCompleted(symbol: string, timeframe: Timeframe, nowMs: number): Promise<void> {
    const { fetcher, backfill, pipeline, store, lock, settings } = this.ctx;
    try {
      const outcome = await lock.withLock(
        lockKey('completed', symbol, timeframe),
        async (lease) => {
          const candles = await fetcher.fetchLatest(symbol, timeframe, settings.pollFetchCount);
          await lease.renew();
          const gap = await backfill.detectAndFillGap(symbol, timeframe);
          await lease.renew();
          const resolved = await backfill.resolveRecordedGaps(symbol, timeframe);
          await lease.renew();
          const update = candles.length > 0 ? await pipeline.updateCandleData(symbol, timeframe, candles) : null;
          await store.clearCurrentIfCompleted(symbol, timeframe, nowMs);
          return { fetched: candles.length, gap: gap.status, resolved, written: update?.written ?? 0 };
        },
        HARDCODED_CONFIG.locks.completedTtlMs
      );

      if (!outcome.acquired) {
        this.logger.debug({ symbol, timeframe }, 'Completed-candle sync held by another worker');
        return;
      }
      this.logger.debug({ event: 'bar_end_sync', symbol, timeframe, ...outcome.result }, 'Completed candles synced');
    } catch (error) {
      if (error instanceof LockLostError) {
        this.logger.warn({ symbol, timeframe, key: error.key }, 'Completed-candle lock expired mid-sync, stopping');
        return;
      }
      this.logger.error({ symbol, timeframe, err: error }, 'Completed-candle sync failed');
    }
  }

  private async refreshCurrent(symbol: string, timeframe: Timeframe): Promise<void> {
    try {
      const outcome = await this.ctx.lock.withLock(lockKey('current', symbol, timeframe), () =>
        this.ctx.pipeline.updateCurrentCandle(symbol, timeframe)
      );
      if (!outcome.acquired) {
        this.logger.debug({ symbol, timeframe }, 'Current-candle refresh held by another worker');
      }
    } catch (error) {
      this.logger.error({ symbol, timeframe, err: error }, 'Current-candle refresh failed');
    }
  }

  private async maintenance(nowMs: number): Promise<void> {
    const { worker } = HARDCODED_CONFIG;

    if (nowMs - this.lastHealthCheck >= worker.healthCheckIntervalMs) {
      this.lastHealthCheck = nowMs;
      const writerHealthy = await this.ctx.writer.healthCheck();
      try {
        await this.ctx.redis.ping();
        this.logger.info({ event: 'health_check', writerHealthy, redis: 'ok' }, 'Health check complete');
      } catch (error) {
        this.logger.error({ event: 'health_check', writerHealthy, err: error }, 'Redis ping failed');
      }
    }

    if (nowMs - this.lastStats >= worker.statsIntervalMs) {
      this.lastStats = nowMs;
      this.ctx.writer.logStats();
      this.logger.info(
        { event: 'poller_stats', pairs: this.handledBuckets.size, locks: await this.heldLocks() },
        'Polling worker stats'
      );
    }
  }

  private async heldLocks(): Promise<string[]> {
    try {
      return await this.ctx.lock.listLocks();
    } catch (error) {
      this.logger.warn({ err: error }, 'Listing locks failed');
      return [];
    }
  }
}
