/**
 * @candlesync/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';
export * from './logger/file-transport';
export * from './logger/performance';

// Time utilities
export * from './time/timeframe';

// Symbols
export * from './symbol/symbol';

// Async helpers
export * from './async/sleep';
export * from './async/retry';

// Validation utilities
export * from './validation/env-validator';
