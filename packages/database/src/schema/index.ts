/**
 * Database schema exports
 */

export * from './candles';
