import { sql, type SQL } from 'drizzle-orm';
import {
  decimal,
  integer,
  pgTable,
  primaryKey,
  timestamp,
  varchar,
} from 'drizzle-orm/pg-core';

const PRICE = { precision: 30, scale: 8 } as const;

/**
 * Per-symbol candle table (one table per instrument, e.g. `btc_usdt`).
 * Rows are unique per (time, timeframe); indicator columns are nullable.
 */
export function candleTable(name: string) {
  return pgTable(
    name,
    {
      time: timestamp('time', { withTimezone: true, mode: 'date' }).notNull(),
      timeframe: varchar('timeframe', { length: 5 }).notNull(),
      open: decimal('open', PRICE).notNull(),
      high: decimal('high', PRICE).notNull(),
      low: decimal('low', PRICE).notNull(),
      close: decimal('close', PRICE).notNull(),
      volume: decimal('volume', PRICE).notNull(),
      rsi14: decimal('rsi14', PRICE),
      atr: decimal('atr', PRICE),
      ema7: decimal('ema7', PRICE),
      ma20: decimal('ma20', PRICE),
      ma200: decimal('ma200', PRICE),
      trendState: integer('trend_state'),
      autoTrendState: integer('auto_trend_state'),
    },
    (table) => ({
      pk: primaryKey({ columns: [table.time, table.timeframe] }),
    })
  );
}

export type CandleTable = ReturnType<typeof candleTable>;
export type CandleRow = CandleTable['$inferInsert'];

/**
 * DDL for a per-symbol table, run once per table before its first upsert
 */
export function createCandleTableSql(name: string): SQL {
  return sql`
    CREATE TABLE IF NOT EXISTS ${sql.identifier(name)} (
      time timestamptz NOT NULL,
      timeframe varchar(5) NOT NULL,
      open numeric(30, 8) NOT NULL,
      high numeric(30, 8) NOT NULL,
      low numeric(30, 8) NOT NULL,
      close numeric(30, 8) NOT NULL,
      volume numeric(30, 8) NOT NULL,
      rsi14 numeric(30, 8),
      atr numeric(30, 8),
      ema7 numeric(30, 8),
      ma20 numeric(30, 8),
      ma200 numeric(30, 8),
      trend_state integer,
      auto_trend_state integer,
      PRIMARY KEY (time, timeframe)
    )
  `;
}
