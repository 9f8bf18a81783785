import { STREAM_STATUS_KEY, type CandleSeriesStore, type RedisCommands } from '@candlesync/cache';
import type { OkxStreamingClient, StreamCandle } from '@candlesync/okx-client';
import { HARDCODED_CONFIG, type Candle, type Timeframe } from '@candlesync/schemas';
import { createLogger, sleep as defaultSleep, type Logger } from '@candlesync/utils';

export type StreamStatus = 'connected' | 'disconnected';

export interface StreamingServiceOptions {
  /** A fresh client per connection attempt */
  createClient: () => OkxStreamingClient;
  store: CandleSeriesStore;
  redis: RedisCommands;
  /** Minimum time between two flushes of the same symbol */
  saveIntervalMs: number;
  reconnectDelayMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Streaming Service
 *
 * Keeps one stream connection alive and mirrors its pushes into the
 * `latest:{symbol}:{timeframe}` slots. Pushes are buffered per symbol and
 * written at most once per `saveIntervalMs`.
 *
 * connect -> connected -> (close or error) -> disconnected -> wait -> connect ...
 */
export class StreamingService {
  private running = false;
  private client: OkxStreamingClient | null = null;
  private readonly buffers = new Map<string, Map<Timeframe, Candle>>();
  private readonly lastFlush = new Map<string, number>();
  private readonly pendingFlushes = new Set<Promise<void>>();
  private connections = 0;

  private readonly reconnectDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(private readonly options: StreamingServiceOptions) {
    this.reconnectDelayMs = options.reconnectDelayMs ?? HARDCODED_CONFIG.streaming.reconnectDelayMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger('sync:stream');
  }

  /**
   * Supervise connections until `stop()`
   */
  async run(): Promise<void> {
    this.running = true;

    while (this.running) {
      const client = this.options.createClient();
      this.client = client;
      client.on('candle', (update) => this.onCandle(update));

      try {
        await client.connect();
        this.connections++;
        await this.setStatus('connected');
        await client.waitForDisconnect();
      } catch (error) {
        this.logger.error({ err: error, connections: this.connections }, 'Stream connection failed');
      }

      this.client = null;
      client.removeAllListeners();
      client.close();
      await this.setStatus('disconnected');
      await this.flushAll();

      if (!this.running) break;
      this.logger.info({ delayMs: this.reconnectDelayMs }, 'Stream disconnected, reconnecting');
      await this.sleep(this.reconnectDelayMs);
    }

    this.logger.info('Streaming service stopped');
  }

  stop(): void {
    this.running = false;
    this.client?.close();
  }

  private onCandle(update: StreamCandle): void {
    let buffer = this.buffers.get(update.symbol);
    if (!buffer) {
      buffer = new Map();
      this.buffers.set(update.symbol, buffer);
    }
    buffer.set(update.timeframe, update.candle);

    const last = this.lastFlush.get(update.symbol) ?? 0;
    if (this.now() - last >= this.options.saveIntervalMs) {
      this.track(this.flush(update.symbol));
    }
  }

  private async flush(symbol: string): Promise<void> {
    const buffer = this.buffers.get(symbol);
    if (!buffer || buffer.size === 0) return;

    this.buffers.delete(symbol);
    this.lastFlush.set(symbol, this.now());

    try {
      await Promise.all(
        [...buffer].map(([timeframe, candle]) => this.options.store.setLatestCandle(symbol, timeframe, candle))
      );
      this.logger.debug({ symbol, timeframes: [...buffer.keys()] }, 'Streamed candles saved');
    } catch (error) {
      this.logger.error({ symbol, err: error }, 'Saving streamed candles failed');
    }
  }

  private async flushAll(): Promise<void> {
    for (const symbol of [...this.buffers.keys()]) {
      this.track(this.flush(symbol));
    }
    await Promise.all([...this.pendingFlushes]);
  }

  private track(flush: Promise<void>): void {
    const task: Promise<void> = flush.finally(() => {
      this.pendingFlushes.delete(task);
    });
    this.pendingFlushes.add(task);
  }

  private async setStatus(status: StreamStatus): Promise<void> {
    try {
      await this.options.redis.set(STREAM_STATUS_KEY, status);
    } catch (error) {
      this.logger.warn({ status, err: error }, 'Updating stream status failed');
    }
  }
}
