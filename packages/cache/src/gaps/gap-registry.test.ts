import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryRedis } from '../testing/memory-redis';
import { unresolvedGapsKey } from '../keys';
import { UnresolvedGapRegistry } from './gap-registry';

const SYMBOL = 'ETH-USDT-SWAP';

describe('UnresolvedGapRegistry', () => {
  let redis: MemoryRedis;
  let registry: UnresolvedGapRegistry;

  beforeEach(() => {
    redis = new MemoryRedis();
    registry = new UnresolvedGapRegistry(redis);
  });

  it('lists recorded gaps oldest first', async () => {
    await registry.record(SYMBOL, '1m', { start: 1200, end: 1800, missing: 11, detectedAt: '2024-01-01T00:00:00.000Z' });
    await registry.record(SYMBOL, '1m', { start: 60, end: 600, missing: 10, detectedAt: '2024-01-01T00:00:00.000Z' });

    expect((await registry.list(SYMBOL, '1m')).map((gap) => gap.start)).toEqual([60, 1200]);
  });

  it('replaces a marker with the remaining range', async () => {
    await registry.record(SYMBOL, '1m', { start: 60, end: 600, missing: 10, detectedAt: 'x' });

    await registry.update(SYMBOL, '1m', 60, { start: 360, end: 600, missing: 5, detectedAt: 'x' });

    expect(await registry.list(SYMBOL, '1m')).toEqual([
      { start: 360, end: 600, missing: 5, detectedAt: 'x' },
    ]);
  });

  it('drops a marker once the range is filled', async () => {
    await registry.record(SYMBOL, '1m', { start: 60, end: 600, missing: 10, detectedAt: 'x' });

    await registry.update(SYMBOL, '1m', 60, null);

    expect(await registry.list(SYMBOL, '1m')).toEqual([]);
  });

  it('discards markers that cannot be decoded', async () => {
    await redis.hset(unresolvedGapsKey(SYMBOL, '1m'), '60', 'not json');

    expect(await registry.list(SYMBOL, '1m')).toEqual([]);
    expect(await redis.hgetall(unresolvedGapsKey(SYMBOL, '1m'))).toEqual({});
  });
});
