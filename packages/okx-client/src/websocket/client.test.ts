import { EventEmitter } from 'events';
import WebSocket from 'ws';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLogger } from '@candlesync/utils';
import { OkxStreamingClient, toStreamCandle, type StreamCandle, type StreamSocket } from './client';

class FakeSocket extends EventEmitter implements StreamSocket {
  readyState: number = WebSocket.CONNECTING;
  readonly sent: string[] = [];

  send(data: string): void {
    this.sent.push(data);
  }

  close(): void {
    this.readyState = WebSocket.CLOSED;
    this.emit('close', 1000, Buffer.from(''));
  }

  open(): void {
    this.readyState = WebSocket.OPEN;
    this.emit('open');
  }

  push(message: unknown): void {
    this.emit('message', Buffer.from(typeof message === 'string' ? message : JSON.stringify(message)));
  }
}

const SYMBOL = 'BTC-USDT-SWAP';
// 2024-01-01T00:00:00Z
const BASE_MS = 1704067200000;

function pushFor(channel: string, row: string[]) {
  return { arg: { channel, instId: SYMBOL }, data: [row] };
}

describe('OkxStreamingClient', () => {
  let socket: FakeSocket;
  let client: OkxStreamingClient;
  const logger = createLogger({ name: 'test:okx-ws', level: 'silent' });

  async function connect(): Promise<void> {
    const connecting = client.connect();
    socket.open();
    await connecting;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    client = new OkxStreamingClient({
      url: 'wss://example.test/ws/v5/business',
      symbols: [SYMBOL],
      timeframes: ['1m', '1h'],
      createSocket: () => {
        socket = new FakeSocket();
        return socket;
      },
      logger,
    });
  });

  afterEach(() => {
    client.close();
    vi.useRealTimers();
  });

  it('subscribes a candle channel per symbol and timeframe on open', async () => {
    await connect();

    expect(JSON.parse(socket.sent[0])).toEqual({
      op: 'subscribe',
      args: [
        { channel: 'candle1m', instId: SYMBOL },
        { channel: 'candle1H', instId: SYMBOL },
      ],
    });
    expect(client.isConnected()).toBe(true);
  });

  it('rejects when the socket fails before opening', async () => {
    const connecting = client.connect();
    socket.emit('error', new Error('connect ECONNREFUSED'));

    await expect(connecting).rejects.toThrow('connect ECONNREFUSED');
  });

  it('rejects when the socket closes before opening', async () => {
    const connecting = client.connect();
    socket.close();

    await expect(connecting).rejects.toThrow('OKX WebSocket closed before opening (1000)');
  });

  it('emits aligned candles and reads the confirm flag', async () => {
    const received: StreamCandle[] = [];
    client.on('candle', (update) => received.push(update));
    await connect();

    socket.push(pushFor('candle1m', [String(BASE_MS + 15000), '100', '101', '99', '100.5', '12', '0', '0', '0']));
    socket.push(pushFor('candle1H', [String(BASE_MS), '100', '110', '95', '105', '300', '0', '0', '1']));

    expect(received).toEqual([
      {
        symbol: SYMBOL,
        timeframe: '1m',
        candle: { timestamp: 1704067200, open: 100, high: 101, low: 99, close: 100.5, volume: 12, isCurrent: true },
      },
      {
        symbol: SYMBOL,
        timeframe: '1h',
        candle: { timestamp: 1704067200, open: 100, high: 110, low: 95, close: 105, volume: 300, isCurrent: false },
      },
    ]);
  });

  it('ignores pong frames, event acks and unknown channels', async () => {
    const candle = vi.fn();
    client.on('candle', candle);
    await connect();

    socket.push('pong');
    socket.push({ event: 'subscribe', arg: { channel: 'candle1m', instId: SYMBOL } });
    socket.push(pushFor('candle2D', [String(BASE_MS), '1', '1', '1', '1', '1', '0', '0', '1']));
    socket.push('not json');

    expect(candle).not.toHaveBeenCalled();
  });

  it('sends a text ping every 20 seconds', async () => {
    await connect();

    vi.advanceTimersByTime(40000);

    expect(socket.sent.slice(1)).toEqual(['ping', 'ping']);
  });

  it('reports per-channel message counts and resets them', async () => {
    const info = vi.spyOn(logger, 'info');
    await connect();
    const row = [String(BASE_MS), '1', '1', '1', '1', '1', '0', '0', '0'];
    socket.push(pushFor('candle1m', row));
    socket.push(pushFor('candle1m', row));

    vi.advanceTimersByTime(300000);
    vi.advanceTimersByTime(300000);

    const reports = info.mock.calls.filter(([fields]) => typeof fields === 'object' && fields.event === 'stream_status');
    expect(reports.map(([fields]) => (typeof fields === 'object' ? fields.counts : null))).toEqual([
      { 'BTC-USDT-SWAP:candle1m': 2, 'BTC-USDT-SWAP:candle1H': 0 },
      { 'BTC-USDT-SWAP:candle1m': 0, 'BTC-USDT-SWAP:candle1H': 0 },
    ]);
  });

  it('unsubscribes on close and reports the disconnect', async () => {
    const disconnected = vi.fn();
    client.on('disconnected', disconnected);
    await connect();

    client.close();

    expect(JSON.parse(socket.sent[socket.sent.length - 1])).toMatchObject({ op: 'unsubscribe' });
    expect(disconnected).toHaveBeenCalledWith({ code: 1000, reason: '' });
    expect(client.isConnected()).toBe(false);
  });

  it('waitForDisconnect() settles when the server drops the connection', async () => {
    await connect();
    const waiting = client.waitForDisconnect();

    socket.emit('close', 1006, Buffer.from('abnormal'));

    await expect(waiting).resolves.toBeUndefined();
    expect(client.isConnected()).toBe(false);
  });
});

describe('toStreamCandle', () => {
  it('treats a push without a confirm flag as the open bar', () => {
    expect(toStreamCandle([String(BASE_MS), '1', '2', '0.5', '1.5', '3'], 1)?.isCurrent).toBe(true);
  });

  it('rejects rows that are short or non-numeric', () => {
    expect(toStreamCandle([String(BASE_MS), '1', '2'], 1)).toBeNull();
    expect(toStreamCandle([String(BASE_MS), 'x', '2', '0.5', '1.5', '3'], 1)).toBeNull();
  });
});
