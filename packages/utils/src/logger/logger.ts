import pino from 'pino';
import { FileTransport } from './file-transport';
import { PerformanceTracker, createNoOpPerformanceTracker } from './performance';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  buildRuntimeConfig,
  shouldLog,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'sync:poller') */
  name: string;
  /** Service for file grouping (auto-detected from name if not provided) */
  service?: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Enable file logging (default: from config) */
  enableFileLogging?: boolean;
  /** Enable performance logging (default: from config) */
  enablePerfLogging?: boolean;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;
type EmittingLevel = Exclude<LogLevel, 'silent'>;

/**
 * Structured logger with file transport and perf tracking
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  perf: PerformanceTracker;
  flush: () => Promise<void>;
}

// One file transport per service, shared by every logger of that service
const fileTransports: Map<string, FileTransport> = new Map();

let runtimeConfig: LogConfig | null = null;

function getFileTransport(service: string, config: LogConfig): FileTransport {
  const existing = fileTransports.get(service);
  if (existing) return existing;

  const transport = new FileTransport({
    logDir: config.logDir,
    service,
    separateErrorLog: true,
  });
  fileTransports.set(service, transport);
  return transport;
}

function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

/**
 * Create a structured logger instance
 *
 * - Console output through pino (pino-pretty in development)
 * - Optional JSON file output with a separate error log
 * - Child loggers inherit bindings and add them to file entries
 *
 * @param options - Logger options, or just a name
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? getRuntimeConfig();
  const service = opts.service ?? getServiceFromName(opts.name);
  const level = opts.level ?? getLogLevel(opts.name, config);
  const enableFileLogging = opts.enableFileLogging ?? config.enableFileLogging;
  const enablePerfLogging = opts.enablePerfLogging ?? config.enablePerfLogging;

  const isDevelopment = process.env.NODE_ENV === 'development';

  const root = pino({
    name: opts.name,
    level,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  const fileTransport =
    enableFileLogging && level !== 'silent' ? getFileTransport(service, config) : null;

  const perf = enablePerfLogging
    ? new PerformanceTracker(fileTransport)
    : createNoOpPerformanceTracker();

  const flush = async (): Promise<void> => {
    if (fileTransport) await fileTransport.flush();
  };

  function wrap(instance: pino.Logger, name: string, bindings: Record<string, unknown>): Logger {
    const method = (logLevel: EmittingLevel): LogMethod => (obj, msg) => {
      if (typeof obj === 'string') {
        instance[logLevel](obj);
      } else {
        instance[logLevel](obj, msg);
      }

      if (fileTransport && shouldLog(logLevel, level)) {
        const fields = typeof obj === 'string' ? { msg: obj } : { ...obj, msg };
        fileTransport.write({
          timestamp: new Date().toISOString(),
          level: logLevel.toUpperCase(),
          name,
          service,
          ...bindings,
          ...fields,
        });
      }
    };

    return {
      trace: method('trace'),
      debug: method('debug'),
      info: method('info'),
      warn: method('warn'),
      error: method('error'),
      fatal: method('fatal'),
      child: (childBindings) => {
        const childName =
          typeof childBindings.name === 'string' ? `${name}:${childBindings.name}` : name;
        return wrap(instance.child(childBindings), childName, { ...bindings, ...childBindings });
      },
      perf,
      flush,
    };
  }

  return wrap(root, opts.name, {});
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('candlesync');

/**
 * Flush all file transports (for graceful shutdown)
 */
export async function flushAllLogs(): Promise<void> {
  await Promise.all([...fileTransports.values()].map((transport) => transport.flush()));
}

/**
 * Close all file transports (for shutdown)
 */
export function closeAllLogs(): void {
  for (const transport of fileTransports.values()) {
    transport.closeStreams();
  }
  fileTransports.clear();
}
