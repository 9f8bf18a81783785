// Loads .env before anything reads process.env
import 'dotenv/config';
import { createRedisClient, testRedisConnection, type RedisClient } from '@candlesync/cache';
import { DurableWriter, createPostgresSinkFactory } from '@candlesync/database';
import { OkxRestClient, OkxStreamingClient } from '@candlesync/okx-client';
import { resolveSyncSettings, resolveWriterSettings } from '@candlesync/schemas';
import { closeAllLogs, createLogger, flushAllLogs, validateEnv } from '@candlesync/utils';
import { createSyncContext } from './context';
import { InitialLoadService } from './services/initial-load';
import { PollingWorker } from './services/polling-worker';
import { StreamingService } from './services/streaming.service';

const logger = createLogger('sync:main');

// Created during startup; released on every exit path
let redis: RedisClient | null = null;
let writer: DurableWriter | null = null;

async function releaseResources(): Promise<void> {
  // Pending mirror writes finish before the pool closes
  if (writer) {
    await writer.close();
    writer = null;
  }
  if (redis) {
    await redis.quit();
    redis = null;
  }
}

async function start(): Promise<void> {
  const config = validateEnv();
  const settings = resolveSyncSettings(config);

  logger.info(
    { symbols: settings.symbols, timeframes: settings.timeframes, maxLen: settings.maxLen },
    'Starting candle sync'
  );

  const client = createRedisClient(config);
  redis = client;
  await testRedisConnection(client);

  // A failed init leaves the writer disabled; health checks keep retrying it
  const durable = new DurableWriter({
    ...resolveWriterSettings(config),
    createSink: createPostgresSinkFactory(config),
  });
  writer = durable;
  await durable.init();

  const ctx = createSyncContext({
    settings,
    redis: client,
    source: new OkxRestClient({ baseUrl: config.OKX_REST_URL }),
    writer: durable,
  });

  const initialLoad = new InitialLoadService(ctx);
  const worker = new PollingWorker(ctx);
  const streaming = new StreamingService({
    createClient: () =>
      new OkxStreamingClient({ url: config.OKX_WS_URL, symbols: settings.symbols, timeframes: settings.timeframes }),
    store: ctx.store,
    redis: client,
    saveIntervalMs: settings.streamSaveIntervalMs,
  });

  const tasks: Promise<unknown>[] = [];
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down candle sync...');

    initialLoad.stop();
    worker.stop();
    streaming.stop();
    await Promise.allSettled(tasks);
    await releaseResources();

    logger.info('Candle sync shut down successfully');
    await flushAllLogs();
    closeAllLogs();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const loading = initialLoad.loadInitialData();
  tasks.push(loading);
  await loading;
  if (shuttingDown) return;

  const running: Promise<void>[] = [];
  if (settings.enablePolling) running.push(worker.run());
  if (settings.enableStreaming) running.push(streaming.run());
  if (running.length === 0) {
    logger.warn('Polling and streaming are both disabled, nothing to run after the initial load');
  }
  tasks.push(...running);

  const results = await Promise.allSettled(running);
  for (const result of results) {
    if (result.status === 'rejected') {
      logger.error({ err: result.reason }, 'Sync task stopped with an error');
    }
  }
}

start().catch(async (error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during candle sync startup');
  try {
    await releaseResources();
  } catch (releaseError) {
    logger.error({ err: releaseError }, 'Releasing resources after a fatal error failed');
  }
  await flushAllLogs();
  process.exit(1);
});
