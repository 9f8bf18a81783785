/**
 * @candlesync/schemas
 *
 * Single source of truth for Zod schemas, cache codecs and TypeScript types
 * shared by every package
 */

// Market data schemas
export * from './market/candle.schema';
export * from './market/candle-codec';

// Environment and configuration schemas
export * from './env/config.schema';
