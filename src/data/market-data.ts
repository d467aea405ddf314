import { configManager } from '../config/manager.js';
import type { MarketDataRepository } from '../db/repositories/market-data.js';
import { retryAsync } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { eachWeekday, sessionTimestamp, shiftDate } from '../utils/market-hours.js';
import { MarketDataError, RateLimitError, serializeError } from './errors.js';
import type { Bar, BarInterval, DailyBar, LimitCheck, MarketDataProvider } from './types.js';

const log = createLogger('market-data');

// Upper bounds of previous-close bands and the daily price-limit width (JPY).
const PRICE_LIMIT_BANDS: ReadonlyArray<readonly [number, number]> = [
  [100, 30],
  [200, 50],
  [500, 80],
  [700, 100],
  [1_000, 150],
  [1_500, 300],
  [2_000, 400],
  [3_000, 500],
  [5_000, 700],
  [7_000, 1_000],
  [10_000, 1_500],
  [15_000, 3_000],
  [20_000, 4_000],
];
const TOP_PRICE_LIMIT = 5_000;

// Daily bars requested for the limit check; covers a weekend plus a holiday.
const LIMIT_LOOKBACK_DAYS = 5;

export function priceLimitWidth(previousClose: number): number {
  for (const [upper, width] of PRICE_LIMIT_BANDS) {
    if (previousClose < upper) return width;
  }
  return TOP_PRICE_LIMIT;
}

export function isRetryableError(err: Error): boolean {
  return (
    err instanceof RateLimitError ||
    (err instanceof MarketDataError && err.code === 'NETWORK_ERROR')
  );
}

export interface MarketDataServiceOptions {
  useCache: boolean;
  retryAttempts: number;
  retryDelayMs: number;
  utcOffsetMinutes: number;
}

export interface PrefetchWindow {
  sessionOpen: string;
  sessionClose: string;
}

export interface PrefetchSummary {
  requests: number;
  bars: number;
}

/**
 * Database-first access to market data: bars are served from the
 * repository when present, otherwise fetched from the provider, persisted
 * and audited.
 */
export class MarketDataService {
  private provider: MarketDataProvider;
  private repository: MarketDataRepository | null;
  private options: MarketDataServiceOptions;

  constructor(
    provider: MarketDataProvider,
    repository: MarketDataRepository | null,
    options: MarketDataServiceOptions,
  ) {
    this.provider = provider;
    this.repository = repository;
    this.options = options;
  }

  get cacheEnabled(): boolean {
    return this.options.useCache && this.repository !== null;
  }

  async connect(): Promise<void> {
    await this.provider.connect();
  }

  disconnect(): void {
    this.provider.disconnect();
  }

  async getIntradayBars(
    symbol: string,
    start: string,
    end: string,
    interval: BarInterval,
  ): Promise<Bar[]> {
    const repository = this.cacheEnabled ? this.repository : null;

    if (repository) {
      const cached = await this.readCache(repository, symbol, start, end, interval);
      if (cached.length > 0) {
        await repository.logFetch({
          symbol,
          startDate: start,
          endDate: end,
          interval,
          source: 'cache',
          recordsCount: cached.length,
        });
        log.debug({ symbol, start, end, bars: cached.length }, 'Cache hit');
        return cached;
      }
    }

    let bars: Bar[];
    try {
      bars = await retryAsync(() => this.provider.getIntradayBars(symbol, start, end, interval), {
        attempts: this.options.retryAttempts,
        delay: this.options.retryDelayMs,
        shouldRetry: isRetryableError,
      });
    } catch (err) {
      log.error({ symbol, start, end, err: serializeError(err) }, 'Failed to fetch intraday bars');
      return [];
    }

    if (repository) {
      if (bars.length > 0) {
        try {
          const inserted = await repository.saveBars(symbol, bars, interval);
          log.debug({ symbol, fetched: bars.length, inserted }, 'Bars cached');
        } catch (err) {
          log.error({ symbol, err }, 'Failed to cache bars');
        }
      }
      await repository.logFetch({
        symbol,
        startDate: start,
        endDate: end,
        interval,
        source: 'api',
        recordsCount: bars.length,
      });
    }

    if (bars.length === 0) {
      log.warn({ symbol, start, end }, 'No bars returned by API');
    }
    return bars;
  }

  async getDailyBars(symbol: string, startDate: string, endDate: string): Promise<DailyBar[]> {
    return retryAsync(() => this.provider.getDailyBars(symbol, startDate, endDate), {
      attempts: this.options.retryAttempts,
      delay: this.options.retryDelayMs,
      shouldRetry: isRetryableError,
    });
  }

  /**
   * Whether the symbol traded at its daily price limit on `date`, judged
   * from the last two daily bars up to that date.
   */
  async checkLimitUpDown(symbol: string, date: string): Promise<LimitCheck> {
    try {
      const daily = (
        await this.getDailyBars(symbol, shiftDate(date, -LIMIT_LOOKBACK_DAYS), date)
      ).filter((bar) => bar.date <= date);

      if (daily.length < 2) {
        return { isLimitUp: false, isLimitDown: false };
      }

      const previousClose = daily[daily.length - 2].close;
      const today = daily[daily.length - 1];
      const width = priceLimitWidth(previousClose);

      return {
        isLimitUp: today.high >= previousClose + width,
        isLimitDown: today.low <= previousClose - width,
      };
    } catch (err) {
      log.error({ symbol, date, err: serializeError(err) }, 'Price limit check failed');
      return { isLimitUp: false, isLimitDown: false };
    }
  }

  /** Warms the cache with every weekday session in the range. */
  async prefetch(
    symbols: string[],
    startDate: string,
    endDate: string,
    interval: BarInterval,
    window: PrefetchWindow,
  ): Promise<PrefetchSummary> {
    const summary: PrefetchSummary = { requests: 0, bars: 0 };
    const offset = this.options.utcOffsetMinutes;

    for (const date of eachWeekday(startDate, endDate)) {
      const start = sessionTimestamp(date, window.sessionOpen, offset);
      const end = sessionTimestamp(date, window.sessionClose, offset);
      for (const symbol of symbols) {
        const bars = await this.getIntradayBars(symbol, start, end, interval);
        summary.requests++;
        summary.bars += bars.length;
      }
      log.info({ date, symbols: symbols.length }, 'Prefetched trading day');
    }

    return summary;
  }

  private async readCache(
    repository: MarketDataRepository,
    symbol: string,
    start: string,
    end: string,
    interval: BarInterval,
  ): Promise<Bar[]> {
    try {
      return await repository.getBars(symbol, start, end, interval);
    } catch (err) {
      log.warn({ symbol, err }, 'Cache read failed, falling back to API');
      return [];
    }
  }
}

export function marketDataOptionsFromConfig(): MarketDataServiceOptions {
  return {
    useCache: configManager.get('api.useCache'),
    retryAttempts: configManager.get('api.retryAttempts'),
    retryDelayMs: configManager.get('api.retryDelayMs'),
    utcOffsetMinutes: configManager.get('market.utcOffsetMinutes'),
  };
}
