import { z } from 'zod';
import { TIMEFRAME_CODES, TIMEFRAME_MINUTES, TimeframeSchema, type Timeframe } from '../market/candle.schema';

const intFromEnv = (fallback: string) =>
  z.string().default(fallback).transform((val) => parseInt(val, 10)).pipe(z.number().int().positive());

const boolFromEnv = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((val) => val === 'true');

const listFromEnv = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((val) =>
      val
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    )
    .pipe(z.array(z.string()).min(1));

/**
 * Environment configuration schema
 * Validates all environment variables on process startup
 */
export const EnvConfigSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // PostgreSQL (durable mirror)
  DATABASE_ENABLED: boolFromEnv('true'),
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: intFromEnv('5432'),
  DATABASE_USERNAME: z.string().min(1, 'Database username is required'),
  DATABASE_PASSWORD: z.string().min(1, 'Database password is required'),
  DATABASE_NAME: z.string().min(1, 'Database name is required'),
  DATABASE_SSL: boolFromEnv('false'),

  // Redis (cache and coordination)
  REDIS_HOST: z.string().min(1, 'Redis host is required'),
  REDIS_PORT: intFromEnv('6379'),
  REDIS_PASSWORD: z.string().optional(),

  // Exchange endpoints
  OKX_REST_URL: z.string().url().default('https://www.okx.com'),
  OKX_WS_URL: z.string().url().default('wss://ws.okx.com:8443/ws/v5/business'),

  // Synchronization
  SYNC_SYMBOLS: listFromEnv('BTC-USDT-SWAP,ETH-USDT-SWAP'),
  SYNC_TIMEFRAMES: listFromEnv('1,5,15,30,60,240,1440'),
  SYNC_MAX_LEN: intFromEnv('3000'),
  SYNC_WARM_UP: intFromEnv('199'),
  SYNC_MIN_CANDLES: intFromEnv('199'),
  SYNC_POLL_FETCH_COUNT: intFromEnv('10'),
  SYNC_POLL_TICK_MS: intFromEnv('1000'),
  SYNC_STREAM_SAVE_INTERVAL_MS: intFromEnv('5000'),
  SYNC_ENABLE_STREAMING: boolFromEnv('true'),
  SYNC_ENABLE_POLLING: boolFromEnv('true'),

  // Durable writer
  WRITER_MAX_RETRIES: intFromEnv('3'),
  WRITER_BASE_DELAY_MS: intFromEnv('1000'),
  WRITER_HEALTH_CHECK_INTERVAL_MS: intFromEnv('60000'),

  // Display timezone for the human-readable candle time
  DISPLAY_TIMEZONE: z.string().default('Asia/Seoul'),
});

/**
 * Validated environment configuration type
 */
export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Synchronization settings derived from the environment
 */
export interface SyncSettings {
  symbols: string[];
  timeframes: Timeframe[];
  /** Retention window per series */
  maxLen: number;
  /** Extra leading candles fetched on initial load for indicator warm-up */
  warmUp: number;
  /** Minimum series length the indicator engine is given */
  minCandles: number;
  /** Completed candles fetched per closed bucket */
  pollFetchCount: number;
  pollTickMs: number;
  streamSaveIntervalMs: number;
  enableStreaming: boolean;
  enablePolling: boolean;
  displayTimeZone: string;
}

/**
 * Durable writer settings derived from the environment
 */
export interface WriterSettings {
  enabled: boolean;
  maxRetries: number;
  baseDelayMs: number;
  healthCheckIntervalMs: number;
}

/**
 * Parse a timeframe entry given either as a minute count ("240") or a code ("4h")
 */
export function parseTimeframeEntry(entry: string): Timeframe | null {
  const direct = TimeframeSchema.safeParse(entry);
  if (direct.success) return direct.data;

  if (!/^\d+$/.test(entry)) return null;
  const minutes = parseInt(entry, 10);
  return TIMEFRAME_CODES.find((code) => TIMEFRAME_MINUTES[code] === minutes) ?? null;
}

/**
 * Resolve synchronization settings, rejecting timeframes the registry does not know
 */
export function resolveSyncSettings(config: EnvConfig): SyncSettings {
  const timeframes: Timeframe[] = [];
  for (const entry of config.SYNC_TIMEFRAMES) {
    const timeframe = parseTimeframeEntry(entry);
    if (!timeframe) {
      throw new Error(`Unsupported timeframe in SYNC_TIMEFRAMES: '${entry}'`);
    }
    if (!timeframes.includes(timeframe)) timeframes.push(timeframe);
  }

  return {
    symbols: config.SYNC_SYMBOLS,
    timeframes,
    maxLen: config.SYNC_MAX_LEN,
    warmUp: config.SYNC_WARM_UP,
    minCandles: config.SYNC_MIN_CANDLES,
    pollFetchCount: config.SYNC_POLL_FETCH_COUNT,
    pollTickMs: config.SYNC_POLL_TICK_MS,
    streamSaveIntervalMs: config.SYNC_STREAM_SAVE_INTERVAL_MS,
    enableStreaming: config.SYNC_ENABLE_STREAMING,
    enablePolling: config.SYNC_ENABLE_POLLING,
    displayTimeZone: config.DISPLAY_TIMEZONE,
  };
}

export function resolveWriterSettings(config: EnvConfig): WriterSettings {
  return {
    enabled: config.DATABASE_ENABLED,
    maxRetries: config.WRITER_MAX_RETRIES,
    baseDelayMs: config.WRITER_BASE_DELAY_MS,
    healthCheckIntervalMs: config.WRITER_HEALTH_CHECK_INTERVAL_MS,
  };
}

/**
 * Hardcoded configuration values (not from environment variables)
 */
export const HARDCODED_CONFIG = {
  // Exchange request limits
  exchange: {
    maxCandlesPerRequest: 300,
    pageDelayMs: 500,
    rateLimitMaxAttempts: 5,
    /** First rate-limit wait; doubles per attempt (2s, 4s, 8s, 16s) */
    rateLimitBaseDelayMs: 2000,
    requestTimeoutMs: 10000,
  },

  // Gap handling
  gaps: {
    /** A distance above factor x interval counts as a gap */
    detectionFactor: 1.5,
    /** Hard cap on candles fetched by one backfill */
    backfillCap: 1000,
  },

  // Streaming connection
  streaming: {
    heartbeatIntervalMs: 20000,
    statusReportIntervalMs: 300000,
    reconnectDelayMs: 5000,
  },

  // Database connection pool
  database: {
    poolMax: 10,
    connectionTimeoutMs: 5000,
    priceScale: 8,
  },

  // Redis configuration
  redis: {
    maxRetries: 3,
    retryDelayMs: 1000,
    commandTimeoutMs: 5000,
  },

  // Coordination
  locks: {
    ttlMs: 30000,
    /** Covers one request's full rate-limit backoff plus a capped backfill; renewed between steps */
    completedTtlMs: 120000,
    initialLoadTtlMs: 600000,
  },

  // Polling worker
  worker: {
    healthCheckIntervalMs: 300000,
    statsIntervalMs: 600000,
    /** Completed-candle sync waits this long after a bucket closes */
    barEndDelayMs: 5000,
  },

  /** Seconds between current-candle refreshes, per timeframe */
  currentCandleRefreshSeconds: {
    '1m': 5,
    '3m': 10,
    '5m': 15,
    '15m': 30,
    '30m': 60,
    '1h': 60,
    '4h': 120,
    '6h': 180,
    '12h': 300,
    '1d': 300,
  } satisfies Record<Timeframe, number>,
} as const;

/**
 * Helper type for hardcoded config
 */
export type HardcodedConfig = typeof HARDCODED_CONFIG;
