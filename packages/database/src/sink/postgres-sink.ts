import { sql } from 'drizzle-orm';
import type { EnvConfig } from '@candlesync/schemas';
import { createLogger } from '@candlesync/utils';
import { createDbClient, testDatabaseConnection, type DbClient } from '../client';
import { candleTable, createCandleTableSql, type CandleRow, type CandleTable } from '../schema/candles';
import type { CandleSink, SinkFactory } from './candle-sink';

const logger = createLogger('database:sink');

// Value proposed for insertion, inside ON CONFLICT DO UPDATE
const excluded = (column: string) => sql.raw(`excluded."${column}"`);

/**
 * Postgres-backed sink (drizzle-orm over postgres-js)
 */
export class PostgresCandleSink implements CandleSink {
  private readonly tables = new Map<string, CandleTable>();

  constructor(private readonly client: DbClient) {}

  async ping(): Promise<void> {
    await testDatabaseConnection(this.client.db);
  }

  async upsert(tableName: string, rows: CandleRow[]): Promise<void> {
    const table = await this.ensureTable(tableName);

    await this.client.db
      .insert(table)
      .values(rows)
      .onConflictDoUpdate({
        target: [table.time, table.timeframe],
        set: {
          open: excluded('open'),
          high: excluded('high'),
          low: excluded('low'),
          close: excluded('close'),
          volume: excluded('volume'),
          rsi14: excluded('rsi14'),
          atr: excluded('atr'),
          ema7: excluded('ema7'),
          ma20: excluded('ma20'),
          ma200: excluded('ma200'),
          trendState: excluded('trend_state'),
          autoTrendState: excluded('auto_trend_state'),
        },
      });
  }

  async close(): Promise<void> {
    await this.client.queryClient.end({ timeout: 5 });
    logger.info('PostgreSQL pool closed');
  }

  private async ensureTable(name: string): Promise<CandleTable> {
    const known = this.tables.get(name);
    if (known) return known;

    await this.client.db.execute(createCandleTableSql(name));
    const table = candleTable(name);
    this.tables.set(name, table);
    logger.info({ table: name }, 'Candle table ready');
    return table;
  }
}

/**
 * Factory handed to the durable writer: every call opens a fresh pool
 */
export function createPostgresSinkFactory(config: EnvConfig): SinkFactory {
  return async () => new PostgresCandleSink(createDbClient(config));
}
