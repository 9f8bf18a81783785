/**
 * @candlesync/cache
 *
 * Redis client, key layout, candle series store and coordination locks
 */

export * from './client';
export * from './keys';
export * from './series/candle-series-store';
export * from './gaps/gap-registry';
export * from './lock/distributed-lock';
export * from './lock/scripts';
