export const BAR_INTERVALS = ['1min', '5min', '10min', '15min', '30min', '1h'] as const;

export type BarInterval = (typeof BAR_INTERVALS)[number];

/** Intraday OHLCV bar; timestamp is a UTC ISO string marking the bar start. */
export interface Bar {
  timestamp: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface DailyBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type FetchSource = 'api' | 'cache';

export interface FetchLogEntry {
  symbol: string;
  startDate: string;
  endDate: string;
  interval: string;
  source: FetchSource;
  recordsCount: number;
  fetchedAt?: string;
}

export interface CachedRange {
  first: string;
  last: string;
}

export interface CoverageRow {
  symbol: string;
  interval: string;
  bars: number;
  first: string;
  last: string;
}

export interface LimitCheck {
  isLimitUp: boolean;
  isLimitDown: boolean;
}

/** Remote source of bars. */
export interface MarketDataProvider {
  connect(): Promise<void>;
  disconnect(): void;
  getIntradayBars(symbol: string, start: string, end: string, interval: BarInterval): Promise<Bar[]>;
  getDailyBars(symbol: string, startDate: string, endDate: string): Promise<DailyBar[]>;
}
