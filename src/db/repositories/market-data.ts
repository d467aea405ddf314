import { and, asc, count, desc, eq, gte, lte, max, min } from 'drizzle-orm';
import type {
  Bar,
  BarInterval,
  CachedRange,
  CoverageRow,
  FetchLogEntry,
} from '../../data/types.js';
import { createLogger } from '../../utils/logger.js';
import { type Database, closeDatabase, ensureSchema, getDb } from '../index.js';
import { dataFetchLog, intradayData } from '../schema.js';

const log = createLogger('market-data-repo');

// 8 bind parameters per row keeps a chunk well under PostgreSQL's 65535 limit.
export const INSERT_CHUNK_SIZE = 1000;

export interface FetchLogQuery {
  symbol?: string;
  limit?: number;
}

/** Storage for cached bars and the fetch audit log. */
export interface MarketDataRepository {
  ensureSchema(): Promise<void>;
  saveBars(symbol: string, bars: Bar[], interval: BarInterval): Promise<number>;
  getBars(symbol: string, start: string, end: string, interval: BarInterval): Promise<Bar[]>;
  logFetch(entry: FetchLogEntry): Promise<void>;
  getCachedDateRange(symbol: string, interval: BarInterval): Promise<CachedRange | null>;
  getCoverage(interval?: BarInterval): Promise<CoverageRow[]>;
  getFetchLog(query?: FetchLogQuery): Promise<FetchLogEntry[]>;
  close(): Promise<void>;
}

export type IntradayInsert = typeof intradayData.$inferInsert;

// ── Timestamp conversion ──────────────────────────────────────────────

/** ISO → naive UTC column value, e.g. "2025-10-01 00:05:00". */
export function toDbTimestamp(iso: string): string {
  return new Date(iso)
    .toISOString()
    .replace('T', ' ')
    .replace(/\.\d{3}Z$/, '');
}

export function fromDbTimestamp(value: string): string {
  const normalized = value.includes('T') ? value : value.replace(' ', 'T');
  const zoned = /(Z|[+-]\d{2}(:?\d{2})?)$/.test(normalized) ? normalized : `${normalized}Z`;
  return new Date(zoned).toISOString();
}

interface BarRow {
  timestamp: string;
  open: string | null;
  high: string | null;
  low: string | null;
  close: string | null;
  volume: number | null;
}

function rowToBar(row: BarRow): Bar | null {
  if (row.open == null || row.close == null) return null;
  const open = Number(row.open);
  const close = Number(row.close);
  return {
    timestamp: fromDbTimestamp(row.timestamp),
    open,
    high: row.high == null ? Math.max(open, close) : Number(row.high),
    low: row.low == null ? Math.min(open, close) : Number(row.low),
    close,
    volume: row.volume ?? 0,
  };
}

function barToRow(symbol: string, bar: Bar, interval: BarInterval): IntradayInsert {
  return {
    symbol,
    timestamp: toDbTimestamp(bar.timestamp),
    open: String(bar.open),
    high: String(bar.high),
    low: String(bar.low),
    close: String(bar.close),
    volume: Math.round(bar.volume),
    interval,
  };
}

// ── PostgreSQL implementation ─────────────────────────────────────────

export class PgMarketDataRepository implements MarketDataRepository {
  private readonly db: Database;

  constructor(db: Database = getDb()) {
    this.db = db;
  }

  ensureSchema(): Promise<void> {
    return ensureSchema();
  }

  /** Inserts bars, skipping ones already stored. Returns the number actually inserted. */
  async saveBars(symbol: string, bars: Bar[], interval: BarInterval): Promise<number> {
    if (bars.length === 0) return 0;

    const rows = bars.map((bar) => barToRow(symbol, bar, interval));
    let inserted = 0;
    for (let i = 0; i < rows.length; i += INSERT_CHUNK_SIZE) {
      const chunk = rows.slice(i, i + INSERT_CHUNK_SIZE);
      const result = await this.db
        .insert(intradayData)
        .values(chunk)
        .onConflictDoNothing({
          target: [intradayData.symbol, intradayData.timestamp, intradayData.interval],
        })
        .returning({ id: intradayData.id });
      inserted += result.length;
    }

    log.debug({ symbol, interval, received: bars.length, inserted }, 'Bars saved');
    return inserted;
  }

  async getBars(
    symbol: string,
    start: string,
    end: string,
    interval: BarInterval,
  ): Promise<Bar[]> {
    const rows = await this.db
      .select({
        timestamp: intradayData.timestamp,
        open: intradayData.open,
        high: intradayData.high,
        low: intradayData.low,
        close: intradayData.close,
        volume: intradayData.volume,
      })
      .from(intradayData)
      .where(
        and(
          eq(intradayData.symbol, symbol),
          eq(intradayData.interval, interval),
          gte(intradayData.timestamp, toDbTimestamp(start)),
          lte(intradayData.timestamp, toDbTimestamp(end)),
        ),
      )
      .orderBy(asc(intradayData.timestamp));

    const bars: Bar[] = [];
    for (const row of rows) {
      const bar = rowToBar(row);
      if (bar) bars.push(bar);
    }
    return bars;
  }

  async logFetch(entry: FetchLogEntry): Promise<void> {
    try {
      await this.db.insert(dataFetchLog).values({
        symbol: entry.symbol,
        startDate: toDbTimestamp(entry.startDate),
        endDate: toDbTimestamp(entry.endDate),
        interval: entry.interval,
        source: entry.source,
        recordsCount: entry.recordsCount,
      });
    } catch (err) {
      log.warn({ err, symbol: entry.symbol, source: entry.source }, 'Failed to record fetch log');
    }
  }

  async getCachedDateRange(symbol: string, interval: BarInterval): Promise<CachedRange | null> {
    const [row] = await this.db
      .select({ first: min(intradayData.timestamp), last: max(intradayData.timestamp) })
      .from(intradayData)
      .where(and(eq(intradayData.symbol, symbol), eq(intradayData.interval, interval)));

    if (!row?.first || !row.last) return null;
    return { first: fromDbTimestamp(row.first), last: fromDbTimestamp(row.last) };
  }

  async getCoverage(interval?: BarInterval): Promise<CoverageRow[]> {
    const rows = await this.db
      .select({
        symbol: intradayData.symbol,
        interval: intradayData.interval,
        bars: count(),
        first: min(intradayData.timestamp),
        last: max(intradayData.timestamp),
      })
      .from(intradayData)
      .where(interval ? eq(intradayData.interval, interval) : undefined)
      .groupBy(intradayData.symbol, intradayData.interval)
      .orderBy(asc(intradayData.symbol), asc(intradayData.interval));

    return rows.map((row) => ({
      symbol: row.symbol,
      interval: row.interval ?? '',
      bars: row.bars,
      first: row.first ? fromDbTimestamp(row.first) : '',
      last: row.last ? fromDbTimestamp(row.last) : '',
    }));
  }

  async getFetchLog(query: FetchLogQuery = {}): Promise<FetchLogEntry[]> {
    const rows = await this.db
      .select()
      .from(dataFetchLog)
      .where(query.symbol ? eq(dataFetchLog.symbol, query.symbol) : undefined)
      .orderBy(desc(dataFetchLog.fetchedAt))
      .limit(query.limit ?? 20);

    return rows.map((row) => ({
      symbol: row.symbol,
      startDate: fromDbTimestamp(row.startDate),
      endDate: fromDbTimestamp(row.endDate),
      interval: row.interval,
      source: row.source,
      recordsCount: row.recordsCount,
      fetchedAt: row.fetchedAt ? fromDbTimestamp(row.fetchedAt) : undefined,
    }));
  }

  close(): Promise<void> {
    return closeDatabase();
  }
}
