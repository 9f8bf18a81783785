import type { Timeframe, WriterSettings } from '@candlesync/schemas';
import {
  createLogger,
  normalizeSymbol,
  retryWithBackoff,
  sleep as defaultSleep,
  type Logger,
} from '@candlesync/utils';
import { isConnectionError } from '../errors';
import type { CandleSink, SinkFactory } from '../sink/candle-sink';
import { toCandleRow, type PersistableCandle } from './rows';

export interface DurableWriterOptions extends WriterSettings {
  createSink: SinkFactory;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface DurableWriterStats {
  enabled: boolean;
  /** Rows written */
  successCount: number;
  /** Rows of upserts that failed for good */
  failureCount: number;
  /** Individual attempts that threw, retried ones included */
  attemptFailures: number;
  totalCount: number;
  /** successCount / totalCount, in percent */
  successRate: number;
  lastFailureTime: number | null;
  lastHealthCheck: number;
  pending: number;
}

/**
 * DurableWriter
 *
 * Eventually-consistent mirror of the cache in the durable store.
 *
 * disabled --init()--> enabled --failure--> disabled --healthCheck()--> enabled
 *
 * While disabled every upsert is a no-op. Writes never throw to the caller:
 * the cache write has already happened and stays authoritative.
 */
export class DurableWriter {
  private sink: CandleSink | null = null;
  private enabled = false;

  private successCount = 0;
  private failureCount = 0;
  private attemptFailures = 0;
  private lastFailureTime: number | null = null;
  private lastHealthCheck = 0;

  private readonly pending = new Set<Promise<boolean>>();
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(private readonly options: DurableWriterOptions) {
    this.logger = options.logger ?? createLogger('writer');
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Open a sink and verify it with a ping
   *
   * @returns true when the writer is enabled afterwards
   */
  async init(): Promise<boolean> {
    if (!this.options.enabled) {
      this.logger.info('Durable writer disabled by configuration');
      return false;
    }

    let sink: CandleSink | null = null;
    try {
      sink = await this.options.createSink();
      await sink.ping();
      this.sink = sink;
      this.enabled = true;
      this.logger.info('Durable writer enabled');
      return true;
    } catch (error) {
      this.enabled = false;
      this.logger.error({ err: error }, 'Durable writer initialization failed');
      if (sink) await this.closeSink(sink);
      return false;
    }
  }

  /**
   * Ping when enabled, reconnect when disabled.
   * Runs at most once per `healthCheckIntervalMs` unless forced.
   */
  async healthCheck(force = false): Promise<boolean> {
    if (!this.options.enabled) return false;

    const now = this.now();
    if (!force && now - this.lastHealthCheck < this.options.healthCheckIntervalMs) {
      return this.enabled;
    }
    this.lastHealthCheck = now;

    if (this.enabled && this.sink) {
      try {
        await this.sink.ping();
        this.logger.debug('Durable writer health check OK');
        return true;
      } catch (error) {
        this.logger.warn({ err: error }, 'Durable writer health check failed');
        this.enabled = false;
      }
    }

    return this.reconnect();
  }

  /**
   * Insert or update candles of one (symbol, timeframe)
   *
   * @returns true if the rows were written
   */
  async upsert(symbol: string, timeframe: Timeframe, candles: PersistableCandle[]): Promise<boolean> {
    const sink = this.sink;
    if (!this.enabled || !sink || candles.length === 0) {
      return false;
    }

    const table = normalizeSymbol(symbol);
    const rows = candles.map((candle) => toCandleRow(candle, timeframe));

    try {
      await retryWithBackoff(() => sink.upsert(table, rows), {
        maxAttempts: this.options.maxRetries + 1,
        baseDelayMs: this.options.baseDelayMs,
        shouldRetry: isConnectionError,
        sleep: this.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          this.attemptFailures++;
          this.logger.warn(
            { symbol, timeframe, attempt, delayMs, err: error },
            'Durable upsert failed, retrying'
          );
        },
      });

      this.successCount += rows.length;
      this.logger.debug({ symbol, timeframe, rows: rows.length }, 'Durable upsert complete');
      return true;
    } catch (error) {
      this.attemptFailures++;
      this.failureCount += rows.length;
      this.lastFailureTime = this.now();

      // A sink replaced by a reconnect in the meantime says nothing about the current one
      const connectionLost = isConnectionError(error) && this.sink === sink;
      if (connectionLost) {
        this.enabled = false;
      }
      this.logger.error(
        {
          symbol,
          timeframe,
          rows: rows.length,
          err: error,
          disabled: connectionLost,
          successCount: this.successCount,
          failureCount: this.failureCount,
        },
        'Durable upsert failed'
      );
      return false;
    }
  }

  async upsertSingle(symbol: string, timeframe: Timeframe, candle: PersistableCandle): Promise<boolean> {
    return this.upsert(symbol, timeframe, [candle]);
  }

  /**
   * Start an upsert without waiting for it; `drain()` awaits all of them
   */
  enqueue(symbol: string, timeframe: Timeframe, candles: PersistableCandle[]): void {
    if (!this.enabled || candles.length === 0) return;

    const task: Promise<boolean> = this.upsert(symbol, timeframe, candles).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  getStats(): DurableWriterStats {
    const totalCount = this.successCount + this.failureCount;
    return {
      enabled: this.enabled,
      successCount: this.successCount,
      failureCount: this.failureCount,
      attemptFailures: this.attemptFailures,
      totalCount,
      successRate: totalCount > 0 ? (this.successCount / totalCount) * 100 : 0,
      lastFailureTime: this.lastFailureTime,
      lastHealthCheck: this.lastHealthCheck,
      pending: this.pending.size,
    };
  }

  logStats(): void {
    const stats = this.getStats();
    this.logger.info(
      {
        enabled: stats.enabled,
        successCount: stats.successCount,
        failureCount: stats.failureCount,
        attemptFailures: stats.attemptFailures,
        successRate: Number(stats.successRate.toFixed(1)),
      },
      'Durable writer stats'
    );
  }

  /**
   * Wait for queued upserts, then release the sink
   */
  async close(): Promise<void> {
    await this.drain();
    this.enabled = false;
    if (this.sink) {
      await this.closeSink(this.sink);
      this.sink = null;
    }
  }

  private async reconnect(): Promise<boolean> {
    this.logger.info('Attempting to reconnect durable writer...');
    if (this.sink) {
      await this.closeSink(this.sink);
      this.sink = null;
    }

    const ok = await this.init();
    if (ok) {
      this.logger.info('Durable writer reconnected');
    } else {
      this.logger.warn('Durable writer reconnection failed');
    }
    return ok;
  }

  private async closeSink(sink: CandleSink): Promise<void> {
    try {
      await sink.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'Closing durable sink failed');
    }
  }
}
