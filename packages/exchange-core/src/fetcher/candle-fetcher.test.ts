import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ExchangeRequestError } from '../errors';
import { FakeCandleSource, makeRows } from '../testing/fake-candle-source';
import { CandleFetcher } from './candle-fetcher';

const SYMBOL = 'BTC-USDT-SWAP';
// 2024-01-01T00:00:00Z
const BASE = 1704067200;
const MINUTE = 60;
const at = (index: number) => BASE + index * MINUTE;
// Half-way through bucket 999, so rows 0..998 are completed
const NOW = (at(999) + 30) * 1000;

describe('CandleFetcher', () => {
  let source: FakeCandleSource;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let fetcher: CandleFetcher;

  beforeEach(() => {
    source = new FakeCandleSource();
    source.setRows(SYMBOL, '1m', makeRows(BASE, MINUTE, 1000));
    sleep = vi.fn(async (_ms: number) => undefined);
    fetcher = new CandleFetcher(source, { sleep, now: () => NOW });
  });

  describe('fetchLatest()', () => {
    it('serves small counts with one call and leaves out the open bucket', async () => {
      const candles = await fetcher.fetchLatest(SYMBOL, '1m', 10);

      expect(source.calls.map((call) => call.params)).toEqual([{ limit: 11 }]);
      expect(candles).toHaveLength(10);
      expect(candles[0].timestamp).toBe(at(989));
      expect(candles[9].timestamp).toBe(at(998));
    });

    it('keeps the open bucket when asked to', async () => {
      const candles = await fetcher.fetchLatest(SYMBOL, '1m', 10, { includeCurrent: true });

      expect(candles[0].timestamp).toBe(at(990));
      expect(candles[9]).toMatchObject({ timestamp: at(999), isCurrent: true });
    });

    it('pages backwards beyond the single-call limit', async () => {
      const candles = await fetcher.fetchLatest(SYMBOL, '1m', 700);

      expect(source.calls.map((call) => call.params)).toEqual([
        { limit: 300 },
        { limit: 300, since: at(400) * 1000 },
        { limit: 300, since: at(100) * 1000 },
      ]);
      expect(sleep.mock.calls).toEqual([[500], [500]]);
      expect(candles).toHaveLength(700);
      expect(candles[0].timestamp).toBe(at(299));
      expect(candles[699].timestamp).toBe(at(998));
    });

    it('stops paging once a page adds nothing', async () => {
      source.setRows(SYMBOL, '1m', makeRows(BASE, MINUTE, 400));
      const shortHistory = new CandleFetcher(source, { sleep, now: () => (at(399) + 30) * 1000 });

      const candles = await shortHistory.fetchLatest(SYMBOL, '1m', 1000);

      expect(source.calls).toHaveLength(3);
      expect(candles).toHaveLength(399);
      expect(candles[0].timestamp).toBe(BASE);
    });
  });

  describe('fetchRange()', () => {
    it('pages forward over (from, to]', async () => {
      const candles = await fetcher.fetchRange(SYMBOL, '1m', at(100), at(800));

      expect(source.calls.map((call) => call.params)).toEqual([
        { limit: 300, since: (at(100) + 1) * 1000 },
        { limit: 300, since: (at(400) + 1) * 1000 },
        { limit: 100, since: (at(700) + 1) * 1000 },
      ]);
      expect(sleep.mock.calls).toEqual([[500], [500]]);
      expect(candles).toHaveLength(700);
      expect(candles[0].timestamp).toBe(at(101));
      expect(candles[699].timestamp).toBe(at(800));
    });

    it('walks past windows without traded candles', async () => {
      // Candles 100..499 never traded
      source.setRows(
        SYMBOL,
        '1m',
        makeRows(BASE, MINUTE, 1000).map((row, i) => (i >= 100 && i < 500 ? [...row.slice(0, 5), 0] : row))
      );

      const candles = await fetcher.fetchRange(SYMBOL, '1m', at(99), at(998));

      expect(source.calls.map((call) => call.params)).toEqual([
        { limit: 300, since: (at(99) + 1) * 1000 },
        { limit: 300, since: (at(399) + 1) * 1000 },
        { limit: 299, since: (at(699) + 1) * 1000 },
      ]);
      expect(sleep.mock.calls).toEqual([[500], [500]]);
      expect(candles).toHaveLength(499);
      expect(candles[0].timestamp).toBe(at(500));
      expect(candles[498].timestamp).toBe(at(998));
    });

    it('stops when the exchange has nothing newer', async () => {
      const candles = await fetcher.fetchRange(SYMBOL, '1m', at(998), at(1010));

      expect(candles).toEqual([]);
      expect(source.calls).toHaveLength(1);
    });
  });

  it('fetchNewest() returns the newest completed candle', async () => {
    expect((await fetcher.fetchNewest(SYMBOL, '1m'))?.timestamp).toBe(at(998));
  });

  describe('rate limiting', () => {
    it('backs off 2s then 4s and succeeds', async () => {
      source.failWith(
        new ExchangeRequestError('rate_limited', 'Too Many Requests', { status: 429 }),
        new ExchangeRequestError('rate_limited', 'Too Many Requests', { status: 429 })
      );

      const newest = await fetcher.fetchNewest(SYMBOL, '1m');

      expect(newest?.timestamp).toBe(at(998));
      expect(source.calls).toHaveLength(3);
      expect(sleep.mock.calls).toEqual([[2000], [4000]]);
    });

    it('gives up after five attempts', async () => {
      const limited = () => new ExchangeRequestError('rate_limited', 'Too Many Requests', { status: 429 });
      source.failWith(limited(), limited(), limited(), limited(), limited());

      await expect(fetcher.fetchNewest(SYMBOL, '1m')).rejects.toThrow('Too Many Requests');

      expect(source.calls).toHaveLength(5);
      expect(sleep.mock.calls).toEqual([[2000], [4000], [8000], [16000]]);
    });

    it('does not retry other failures', async () => {
      source.failWith(new ExchangeRequestError('network', 'socket hang up'));

      await expect(fetcher.fetchLatest(SYMBOL, '1m', 5)).rejects.toMatchObject({ kind: 'network' });

      expect(source.calls).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});
