import { describe, expect, it, vi, type Mock } from 'vitest';
import { ExchangeRequestError } from '@candlesync/exchange-core';
import { HARDCODED_CONFIG } from '@candlesync/schemas';
import { OkxRestClient } from './client';

const SYMBOL = 'ETH-USDT-SWAP';
// 2024-01-01T00:00:00Z
const NOW = 1704067200000;
const HOUR_MS = 3600000;
const MINUTE_MS = 60000;

function row(tsMs: number): string[] {
  return [String(tsMs), '2000', '2010', '1990', '2005', '15', '0', '0', '1'];
}

function okxResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status });
}

function requestedUrl(fetchMock: Mock<typeof fetch>, call = 0): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

describe('OkxRestClient', () => {
  it('requests the newest bars without a since', async () => {
    const rows = [row(NOW), row(NOW - HOUR_MS)];
    const fetchMock = vi.fn<typeof fetch>(async () => okxResponse({ code: '0', msg: '', data: rows }));
    const client = new OkxRestClient({ baseUrl: 'https://okx.test', fetch: fetchMock, now: () => NOW });

    const result = await client.fetchCandles(SYMBOL, '1h', { limit: 500 });

    const url = requestedUrl(fetchMock);
    expect(url.pathname).toBe('/api/v5/market/candles');
    expect(Object.fromEntries(url.searchParams)).toEqual({ instId: SYMBOL, bar: '1H', limit: '300' });
    expect(client.maxCandlesPerRequest).toBe(HARDCODED_CONFIG.exchange.maxCandlesPerRequest);
    expect(result).toEqual(rows);
  });

  it('uses UTC-anchored bars for the daily chart', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => okxResponse({ code: '0', msg: '', data: [] }));
    const client = new OkxRestClient({ baseUrl: 'https://okx.test', fetch: fetchMock, now: () => NOW });

    await client.fetchCandles(SYMBOL, '1d', { limit: 10 });

    expect(requestedUrl(fetchMock).searchParams.get('bar')).toBe('1Dutc');
  });

  it('reads forward from since within the recent window, oldest first', async () => {
    const since = NOW - 10 * HOUR_MS;
    const fetchMock = vi.fn<typeof fetch>(async () =>
      okxResponse({
        code: '0',
        msg: '',
        data: [row(since + 2 * HOUR_MS), row(since + HOUR_MS), row(since), row(since - HOUR_MS)],
      })
    );
    const client = new OkxRestClient({ baseUrl: 'https://okx.test', fetch: fetchMock, now: () => NOW });

    const result = await client.fetchCandles(SYMBOL, '1h', { limit: 3, since });

    expect(requestedUrl(fetchMock).searchParams.get('after')).toBe(String(since + 3 * HOUR_MS));
    expect(result.map((r) => r?.[0])).toEqual([
      String(since),
      String(since + HOUR_MS),
      String(since + 2 * HOUR_MS),
    ]);
  });

  it('walks history pages for ranges older than the recent window', async () => {
    const since = NOW - 2000 * MINUTE_MS;
    // Serves 100 one-minute rows older than `after`, newest first
    const fetchMock = vi.fn<typeof fetch>(async (input) => {
      const after = Number(new URL(String(input)).searchParams.get('after'));
      const data = Array.from({ length: 100 }, (_, i) => row(after - (i + 1) * MINUTE_MS));
      return okxResponse({ code: '0', msg: '', data });
    });
    const client = new OkxRestClient({ baseUrl: 'https://okx.test', fetch: fetchMock, now: () => NOW });

    const result = await client.fetchCandles(SYMBOL, '1m', { limit: 150, since });

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestedUrl(fetchMock, 0).pathname).toBe('/api/v5/market/history-candles');
    expect(requestedUrl(fetchMock, 0).searchParams.get('after')).toBe(String(since + 150 * MINUTE_MS));
    expect(requestedUrl(fetchMock, 1).searchParams.get('after')).toBe(String(since + 50 * MINUTE_MS));
    expect(result).toHaveLength(150);
    expect(result[0]?.[0]).toBe(String(since));
    expect(result[149]?.[0]).toBe(String(since + 149 * MINUTE_MS));
  });

  describe('errors', () => {
    const failWith = (response: () => Response | Promise<Response>) =>
      new OkxRestClient({ baseUrl: 'https://okx.test', fetch: vi.fn<typeof fetch>(async () => response()) });

    it('maps HTTP 429 to a rate-limit error', async () => {
      const client = failWith(() => okxResponse({}, 429));

      await expect(client.fetchCandles(SYMBOL, '1m', { limit: 5 })).rejects.toMatchObject({
        kind: 'rate_limited',
        status: 429,
      });
    });

    it('maps OKX code 50011 to a rate-limit error', async () => {
      const client = failWith(() => okxResponse({ code: '50011', msg: 'Too Many Requests', data: [] }));

      await expect(client.fetchCandles(SYMBOL, '1m', { limit: 5 })).rejects.toMatchObject({
        kind: 'rate_limited',
        code: '50011',
      });
    });

    it('reports other OKX codes as rejected', async () => {
      const client = failWith(() => okxResponse({ code: '51001', msg: 'Instrument ID does not exist', data: [] }));

      await expect(client.fetchCandles(SYMBOL, '1m', { limit: 5 })).rejects.toThrow(
        'OKX error 51001: Instrument ID does not exist'
      );
    });

    it('reports unexpected payloads as malformed', async () => {
      const client = failWith(() => okxResponse({ result: 'ok' }));

      await expect(client.fetchCandles(SYMBOL, '1m', { limit: 5 })).rejects.toMatchObject({ kind: 'malformed' });
    });

    it('wraps transport failures as network errors', async () => {
      const client = failWith(() => Promise.reject(new TypeError('fetch failed')));

      const error = await client.fetchCandles(SYMBOL, '1m', { limit: 5 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExchangeRequestError);
      expect(error).toMatchObject({ kind: 'network', message: 'OKX request failed: fetch failed' });
    });
  });
});
