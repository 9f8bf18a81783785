/**
 * @candlesync/database
 *
 * Postgres candle mirror and the durable writer
 */

export * from './client';
export * from './errors';
export * from './schema';
export * from './sink/candle-sink';
export * from './sink/postgres-sink';
export * from './writer/rows';
export * from './writer/durable-writer';
