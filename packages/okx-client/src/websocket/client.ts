import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { z } from 'zod';
import { CandleSchema, HARDCODED_CONFIG, type Candle, type Timeframe } from '@candlesync/schemas';
import { align, createLogger, timeframeMinutes, type Logger } from '@candlesync/utils';
import { candleChannel, timeframeFromChannel } from '../bars';

/**
 * The part of a `ws` socket the client uses
 */
export interface StreamSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: WebSocket.RawData) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export interface StreamCandle {
  symbol: string;
  timeframe: Timeframe;
  candle: Candle;
}

export type OkxStreamEvents = {
  candle: [StreamCandle];
  connected: [];
  disconnected: [{ code: number; reason: string }];
};

export interface OkxStreamingOptions {
  url: string;
  symbols: string[];
  timeframes: Timeframe[];
  heartbeatIntervalMs?: number;
  statusReportIntervalMs?: number;
  createSocket?: (url: string) => StreamSocket;
  logger?: Logger;
}

const CandlePushSchema = z.object({
  arg: z.object({ channel: z.string(), instId: z.string() }),
  data: z.array(z.array(z.string())),
});

const EventMessageSchema = z.object({
  event: z.string(),
  code: z.string().optional(),
  msg: z.string().optional(),
  arg: z.object({ channel: z.string(), instId: z.string() }).optional(),
});

/**
 * Candle stream over the OKX business WebSocket
 *
 * One connection carries a `candle<bar>` channel per (symbol, timeframe).
 * OKX drops idle connections after 30s, so a text "ping" goes out every 20s.
 * Reconnection is left to the caller: wait for `disconnected`, then `connect()` again.
 *
 * Reference: https://www.okx.com/docs-v5/en/#order-book-trading-market-data-ws-candlesticks-channel
 */
export class OkxStreamingClient extends EventEmitter<OkxStreamEvents> {
  private socket: StreamSocket | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private statusTimer: NodeJS.Timeout | null = null;
  /** Pushes received per `instId:channel` since the last status report */
  private readonly messageCounts = new Map<string, number>();

  private readonly heartbeatIntervalMs: number;
  private readonly statusReportIntervalMs: number;
  private readonly createSocket: (url: string) => StreamSocket;
  private readonly logger: Logger;

  constructor(private readonly options: OkxStreamingOptions) {
    super();
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HARDCODED_CONFIG.streaming.heartbeatIntervalMs;
    this.statusReportIntervalMs = options.statusReportIntervalMs ?? HARDCODED_CONFIG.streaming.statusReportIntervalMs;
    this.createSocket = options.createSocket ?? ((url) => new WebSocket(url));
    this.logger = options.logger ?? createLogger('exchange:okx-ws');
  }

  /**
   * Open the socket and subscribe every configured pair.
   * Resolves once open, rejects if the socket fails or closes before that.
   */
  connect(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('OKX stream is already connected'));
    }

    return new Promise((resolve, reject) => {
      this.logger.info({ url: this.options.url }, 'Connecting to OKX WebSocket');
      const socket = this.createSocket(this.options.url);
      this.socket = socket;
      let opened = false;

      socket.on('open', () => {
        opened = true;
        this.send({ op: 'subscribe', args: this.channelArgs() });
        this.startTimers();
        this.logger.info({ channels: this.options.symbols.length * this.options.timeframes.length }, 'Connected to OKX WebSocket');
        this.emit('connected');
        resolve();
      });

      socket.on('message', (data) => this.handleMessage(data.toString()));

      socket.on('error', (error) => {
        this.logger.error({ error: error.message }, 'OKX WebSocket error');
        if (!opened) reject(error);
      });

      socket.on('close', (code, reason) => {
        this.stopTimers();
        if (this.socket === socket) this.socket = null;
        this.logger.warn({ code, reason: reason.toString() }, 'OKX WebSocket closed');
        if (!opened) reject(new Error(`OKX WebSocket closed before opening (${code})`));
        this.emit('disconnected', { code, reason: reason.toString() });
      });
    });
  }

  isConnected(): boolean {
    return this.socket !== null && this.socket.readyState === WebSocket.OPEN;
  }

  /**
   * Resolves when the current connection is gone
   */
  waitForDisconnect(): Promise<void> {
    if (!this.socket) return Promise.resolve();
    return new Promise((resolve) => {
      this.once('disconnected', () => resolve());
    });
  }

  /**
   * Unsubscribe (when still open) and close the socket
   */
  close(): void {
    this.stopTimers();
    const socket = this.socket;
    if (!socket) return;

    if (socket.readyState === WebSocket.OPEN) {
      this.send({ op: 'unsubscribe', args: this.channelArgs() });
    }
    socket.close();
    this.logger.info('OKX WebSocket closed intentionally');
  }

  private handleMessage(raw: string): void {
    if (raw === 'pong') return;

    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.logger.warn({ data: raw.slice(0, 200) }, 'Failed to parse OKX WebSocket message');
      return;
    }

    const push = CandlePushSchema.safeParse(message);
    if (push.success) {
      this.handleCandlePush(push.data);
      return;
    }

    const event = EventMessageSchema.safeParse(message);
    if (!event.success) {
      this.logger.debug({ data: raw.slice(0, 200) }, 'Ignoring unknown OKX message');
      return;
    }
    if (event.data.event === 'error') {
      this.logger.error({ code: event.data.code, msg: event.data.msg }, 'OKX WebSocket request rejected');
    } else {
      this.logger.debug({ event: event.data.event, arg: event.data.arg }, 'OKX WebSocket event');
    }
  }

  private handleCandlePush(push: z.infer<typeof CandlePushSchema>): void {
    const { channel, instId } = push.arg;
    const timeframe = timeframeFromChannel(channel);
    if (!timeframe) {
      this.logger.warn({ channel, instId }, 'Push on an unknown candle channel');
      return;
    }

    const countKey = `${instId}:${channel}`;
    this.messageCounts.set(countKey, (this.messageCounts.get(countKey) ?? 0) + 1);

    for (const row of push.data) {
      const candle = toStreamCandle(row, timeframeMinutes(timeframe));
      if (!candle) {
        this.logger.warn({ channel, instId, row }, 'Skipping malformed candle push');
        continue;
      }
      this.emit('candle', { symbol: instId, timeframe, candle });
    }
  }

  private startTimers(): void {
    this.stopTimers();
    this.heartbeatTimer = setInterval(() => {
      if (this.isConnected()) this.socket?.send('ping');
    }, this.heartbeatIntervalMs);
    this.statusTimer = setInterval(() => this.reportStatus(), this.statusReportIntervalMs);
  }

  private stopTimers(): void {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    if (this.statusTimer) clearInterval(this.statusTimer);
    this.heartbeatTimer = null;
    this.statusTimer = null;
  }

  private reportStatus(): void {
    const counts: Record<string, number> = {};
    for (const symbol of this.options.symbols) {
      for (const timeframe of this.options.timeframes) {
        const key = `${symbol}:${candleChannel(timeframe)}`;
        counts[key] = this.messageCounts.get(key) ?? 0;
      }
    }
    this.logger.info(
      { event: 'stream_status', counts, windowMs: this.statusReportIntervalMs },
      'OKX subscription status'
    );
    this.messageCounts.clear();
  }

  private channelArgs(): Array<{ channel: string; instId: string }> {
    return this.options.symbols.flatMap((instId) =>
      this.options.timeframes.map((timeframe) => ({ channel: candleChannel(timeframe), instId }))
    );
  }

  private send(payload: object): void {
    this.socket?.send(JSON.stringify(payload));
  }
}

/**
 * [ts, o, h, l, c, vol, volCcy, volCcyQuote, confirm] -> candle.
 * confirm "1" marks a closed bar; anything else is still open.
 */
export function toStreamCandle(row: readonly string[], minutes: number): Candle | null {
  if (row.length < 6) return null;

  const [ts, open, high, low, close, volume] = row.slice(0, 6).map(Number);
  const parsed = CandleSchema.safeParse({
    timestamp: Number.isFinite(ts) ? align(ts, minutes) : ts,
    open,
    high,
    low,
    close,
    volume,
    isCurrent: row[8] !== '1',
  });
  return parsed.success ? parsed.data : null;
}
