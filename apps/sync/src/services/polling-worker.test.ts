import { beforeEach, describe, expect, it, vi } from 'vitest';
import { lockKey } from '@candlesync/cache';
import { makeRows } from '@candlesync/exchange-core/testing';
import { SYMBOL, T0, createHarness, type SyncHarness } from '../testing/harness';
import { InitialLoadService } from './initial-load';
import { PollingWorker } from './polling-worker';

const HISTORY_START = T0 - 6000;

describe('PollingWorker', () => {
  describe('per-pair polling', () => {
    let h: SyncHarness;
    let worker: PollingWorker;

    beforeEach(async () => {
      h = await createHarness();
      // Closed candles up to 23:59, stored as rows 50..99
      h.source.setRows(SYMBOL, '1m', makeRows(HISTORY_START, 60, 100));
      await new InitialLoadService(h.ctx).loadInitialData();
      h.source.calls.splice(0);
      worker = new PollingWorker(h.ctx);
    });

    it('syncs a closed bucket once, then refreshes the open candle on its interval', async () => {
      // The 00:00 candle has closed
      h.source.setRows(SYMBOL, '1m', makeRows(HISTORY_START, 60, 101));
      h.clock.now = (T0 + 65) * 1000;

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('completed');
      expect(h.source.calls.map((call) => call.params)).toEqual([{ limit: 6 }, { limit: 2 }]);
      expect(await h.ctx.store.getLastTimestamp(SYMBOL, '1m')).toBe(T0);
      const series = await h.ctx.store.getIndicatorSeries(SYMBOL, '1m');
      expect(series[series.length - 1]).toMatchObject({ timestamp: T0, close: 200 });

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('current');
      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('idle');
    });

    it('waits for the bar-end delay before syncing a closed bucket', async () => {
      h.clock.now = (T0 + 62) * 1000;

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('current');
    });

    it('treats a bucket locked by another worker as handled', async () => {
      h.clock.now = (T0 + 65) * 1000;
      await h.ctx.lock.acquire(lockKey('completed', SYMBOL, '1m'), 60000);

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('completed');
      expect(h.source.calls).toEqual([]);
      expect(await h.ctx.store.getLastTimestamp(SYMBOL, '1m')).toBe(T0 - 60);

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('current');
    });

    it('renews the completed-candle lock between steps', async () => {
      h.source.setRows(SYMBOL, '1m', makeRows(HISTORY_START, 60, 101));
      h.clock.now = (T0 + 65) * 1000;
      const extend = vi.spyOn(h.ctx.lock, 'extend');

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('completed');

      expect(extend.mock.calls.map((call) => [call[0], call[2]])).toEqual([
        [lockKey('completed', SYMBOL, '1m'), 120000],
        [lockKey('completed', SYMBOL, '1m'), 120000],
        [lockKey('completed', SYMBOL, '1m'), 120000],
      ]);
      expect(await h.ctx.store.getLastTimestamp(SYMBOL, '1m')).toBe(T0);
    });

    it('stops the sync when the lock was lost', async () => {
      h.source.setRows(SYMBOL, '1m', makeRows(HISTORY_START, 60, 101));
      h.clock.now = (T0 + 65) * 1000;
      vi.spyOn(h.ctx.lock, 'extend').mockResolvedValueOnce(false);

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('completed');

      expect(h.source.calls.map((call) => call.params)).toEqual([{ limit: 6 }]);
      expect(await h.ctx.store.getLastTimestamp(SYMBOL, '1m')).toBe(T0 - 60);
      expect(await h.ctx.lock.listLocks()).toEqual([]);
    });

    it('backfills a gap before merging the fetched candles', async () => {
      // Ten candles, 00:00 to 00:09, closed while nobody polled
      h.source.setRows(SYMBOL, '1m', makeRows(HISTORY_START, 60, 110));
      h.clock.now = (T0 + 605) * 1000;

      expect(await worker.pollPair(SYMBOL, '1m', h.clock.now)).toBe('completed');

      expect(h.source.calls.map((call) => call.params)).toEqual([
        { limit: 6 },
        { limit: 2 },
        { limit: 10, since: (T0 - 59) * 1000 },
      ]);
      const raw = await h.ctx.store.getRawSeries(SYMBOL, '1m');
      expect(raw).toHaveLength(50);
      expect(raw.slice(-10).map((candle) => candle.timestamp)).toEqual(
        Array.from({ length: 10 }, (_, i) => T0 + i * 60)
      );
      const series = await h.ctx.store.getIndicatorSeries(SYMBOL, '1m');
      expect(series).toHaveLength(50);
      expect(series[49].timestamp).toBe(T0 + 540);
      expect(await h.ctx.gaps.list(SYMBOL, '1m')).toEqual([]);
    });

    it('keeps going when a pair fails', async () => {
      h.clock.now = (T0 + 65) * 1000;
      h.source.failWith(new Error('socket hang up'));

      await expect(worker.pollPair(SYMBOL, '1m', h.clock.now)).resolves.toBe('completed');
      expect(await h.ctx.lock.listLocks()).toEqual([]);
    });
  });

  describe('maintenance', () => {
    let h: SyncHarness;
    let worker: PollingWorker;
    let start: number;

    beforeEach(async () => {
      h = await createHarness({ symbols: [] });
      start = h.clock.now;
      worker = new PollingWorker(h.ctx);
    });

    it('checks health every 5 minutes and logs stats every 10', async () => {
      const ping = vi.spyOn(h.redis, 'ping');
      const logStats = vi.spyOn(h.ctx.writer, 'logStats');

      await worker.tick(start + 299999);
      expect(ping).not.toHaveBeenCalled();

      await worker.tick(start + 300000);
      expect(ping).toHaveBeenCalledTimes(1);
      // Once by init(), once by the health check
      expect(h.sink.ping).toHaveBeenCalledTimes(2);
      expect(logStats).not.toHaveBeenCalled();

      await worker.tick(start + 600000);
      expect(ping).toHaveBeenCalledTimes(2);
      expect(logStats).toHaveBeenCalledTimes(1);
    });

    it('run() ticks until stopped', async () => {
      const tick = vi.spyOn(worker, 'tick');
      h.ctx.sleep = async () => {
        worker.stop();
      };

      await worker.run();

      expect(tick).toHaveBeenCalledTimes(1);
      expect(worker.isRunning).toBe(false);
    });
  });
});
