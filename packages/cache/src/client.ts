import Redis from 'ioredis';
import { HARDCODED_CONFIG, type EnvConfig } from '@candlesync/schemas';
import { createLogger } from '@candlesync/utils';

const logger = createLogger('cache:redis');

/**
 * Redis commands the cache layer relies on.
 *
 * Services depend on this subset rather than on the ioredis class so that
 * tests can hand them the in-memory stand-in from `@candlesync/cache/testing`.
 * An ioredis `Redis` instance satisfies it as is.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(
    key: string,
    value: string,
    expiryMode: 'PX',
    milliseconds: number,
    setMode: 'NX'
  ): Promise<'OK' | null>;
  del(...keys: string[]): Promise<number>;
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[string, string[]]>;
  hset(key: string, field: string, value: string): Promise<number>;
  hdel(key: string, ...fields: string[]): Promise<number>;
  hgetall(key: string): Promise<Record<string, string>>;
  ping(): Promise<string>;
}

/**
 * Helper type for the concrete client created at process start
 */
export type RedisClient = Redis;

/**
 * Create a Redis client instance
 *
 * @param config - Validated environment configuration
 */
export function createRedisClient(config: EnvConfig): RedisClient {
  const host = config.REDIS_HOST;
  const port = config.REDIS_PORT;
  const password = config.REDIS_PASSWORD || undefined;

  logger.info(`Redis target: redis://${password ? ':<redacted>@' : ''}${host}:${port}`);

  const redis = new Redis({
    host,
    port,
    password,
    maxRetriesPerRequest: HARDCODED_CONFIG.redis.maxRetries,
    retryStrategy: (times) => {
      // Keep reconnecting; a long outage must not kill the worker
      const delay = Math.min(times * HARDCODED_CONFIG.redis.retryDelayMs, 5000);
      logger.warn(`Redis retry attempt ${times}, waiting ${delay}ms`);
      return delay;
    },
    commandTimeout: HARDCODED_CONFIG.redis.commandTimeoutMs,
  });

  redis.on('connect', () => {
    logger.info('Redis client connected');
  });

  redis.on('ready', () => {
    logger.info('Redis client ready');
  });

  redis.on('error', (error) => {
    logger.error({ err: error }, 'Redis client error');
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  redis.on('reconnecting', () => {
    logger.info('Redis client reconnecting...');
  });

  return redis;
}

/**
 * Test Redis connection with PING command
 * Throws an error if connection fails
 */
export async function testRedisConnection(redis: RedisCommands): Promise<void> {
  try {
    const result = await redis.ping();
    if (result !== 'PONG') {
      throw new Error(`Unexpected PING response: ${result}`);
    }
    logger.info('Redis connection test passed');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, 'Redis connection test FAILED');
    throw new Error(`Redis connection failed: ${message}`);
  }
}
