/**
 * Log levels in order of verbosity (most verbose first).
 * 'silent' disables a logger entirely (used by the test runner).
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Log level priority (lower number = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: 100,
};

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'sync:polling', 'cache:series'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
  /** Enable file logging */
  enableFileLogging: boolean;
  /** Enable performance logging */
  enablePerfLogging: boolean;
  /** Log directory path */
  logDir: string;
}

/**
 * Default log configuration
 *
 * The stream client and the fetcher are chatty; they default to warn.
 * Set LOG_LEVEL=debug or LOG_LEVEL_EXCHANGE_OKX_WS=debug to see everything.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    sync: 'info',
    'sync:poller': 'info',
    'sync:indicators': 'warn',

    exchange: 'info',
    'exchange:okx-ws': 'warn',
    'exchange:fetcher': 'warn',

    candles: 'info',
    'candles:gaps': 'info',
    'candles:store': 'warn',

    writer: 'info',
    database: 'info',

    cache: 'info',
    'cache:lock': 'warn',
  },
  enableFileLogging: false,
  enablePerfLogging: false,
  logDir: 'logs',
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_POLLING_WORKER=trace)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config, then its parent ('sync' for 'sync:poller')
 * 4. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = process.env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) return envLevel;

  const globalEnvLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) return globalEnvLevel;

  const exact = config.services[serviceName];
  if (exact) return exact;

  const parent = config.services[getServiceFromName(serviceName)];
  return parent ?? config.defaultLevel;
}

/**
 * Check if a log level should be logged given the minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

/**
 * Build runtime config by merging defaults with environment
 */
export function buildRuntimeConfig(): LogConfig {
  const isDevelopment = process.env.NODE_ENV === 'development';

  return {
    ...DEFAULT_LOG_CONFIG,
    enableFileLogging: process.env.LOG_FILE_ENABLED === 'true' && isDevelopment,
    enablePerfLogging: process.env.LOG_PERF_ENABLED !== 'false' && isDevelopment,
    logDir: process.env.LOG_DIR || DEFAULT_LOG_CONFIG.logDir,
  };
}
