import {
  bigint,
  index,
  integer,
  numeric,
  pgTable,
  serial,
  timestamp,
  unique,
  varchar,
} from 'drizzle-orm/pg-core';

// Timestamps are naive UTC ('YYYY-MM-DD HH:mm:ss'); the repository converts to ISO.
export const intradayData = pgTable(
  'intraday_data',
  {
    id: serial('id').primaryKey(),
    symbol: varchar('symbol', { length: 20 }).notNull(),
    timestamp: timestamp('timestamp', { mode: 'string' }).notNull(),
    open: numeric('open', { precision: 12, scale: 2 }),
    high: numeric('high', { precision: 12, scale: 2 }),
    low: numeric('low', { precision: 12, scale: 2 }),
    close: numeric('close', { precision: 12, scale: 2 }),
    volume: bigint('volume', { mode: 'number' }),
    interval: varchar('interval', { length: 10 }).default('5min'),
    createdAt: timestamp('created_at', { mode: 'string' }).defaultNow(),
  },
  (table) => [
    unique('intraday_data_symbol_timestamp_interval_key').on(
      table.symbol,
      table.timestamp,
      table.interval,
    ),
    index('idx_intraday_symbol_timestamp').on(table.symbol, table.timestamp),
    index('idx_intraday_timestamp').on(table.timestamp),
    index('idx_intraday_symbol').on(table.symbol),
  ],
);

export const dataFetchLog = pgTable(
  'data_fetch_log',
  {
    id: serial('id').primaryKey(),
    symbol: varchar('symbol', { length: 20 }).notNull(),
    startDate: timestamp('start_date', { mode: 'string' }).notNull(),
    endDate: timestamp('end_date', { mode: 'string' }).notNull(),
    interval: varchar('interval', { length: 10 }).notNull(),
    source: varchar('source', { length: 10, enum: ['api', 'cache'] }).notNull(),
    recordsCount: integer('records_count').notNull().default(0),
    fetchedAt: timestamp('fetched_at', { mode: 'string' }).defaultNow(),
  },
  (table) => [index('idx_fetch_log_symbol_fetched').on(table.symbol, table.fetchedAt)],
);
