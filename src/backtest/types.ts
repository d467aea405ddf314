import type { Bar, BarInterval, LimitCheck } from '../data/types.js';

export type Side = 'long' | 'short';

export type ExitReason = 'profit' | 'loss' | 'force' | 'day_end';

export type RunMode = 'per-symbol' | 'portfolio';

export interface OpeningRange {
  high: number;
  low: number;
  bars: number;
}

/** Clock times are exchange-local HH:MM. */
export interface StrategyParams {
  sessionOpen: string;
  rangeStart: string;
  rangeEnd: string;
  entryStart: string;
  entryEnd: string;
  forceExitTime: string;
  profitTarget: number | null;
  stopLoss: number | null;
}

export interface MarketFilterConfig {
  /** Symbols whose morning move is measured; empty means the backtest symbols. */
  symbols: string[];
  threshold: number;
  minSymbols: number;
  sessionOpen: string;
  baselineEnd: string;
  checkStart: string;
  checkEnd: string;
}

export interface BacktestConfig extends StrategyParams {
  symbols: string[];
  startDate: string;
  endDate: string;
  initialCapital: number;
  commissionRate: number;
  interval: BarInterval;
  utcOffsetMinutes: number;
  limitCheck: boolean;
  marketFilter: MarketFilterConfig | null;
}

export interface BacktestTrade {
  symbol: string;
  side: Side;
  entryTime: string;
  entryPrice: number;
  exitTime: string;
  exitPrice: number;
  quantity: number;
  grossPnl: number;
  commission: number;
  pnl: number;
  returnPct: number;
  exitReason: ExitReason;
}

export interface EquityPoint {
  date: string;
  equity: number;
}

export interface BacktestMetrics {
  totalTrades: number;
  longTrades: number;
  shortTrades: number;
  winCount: number;
  lossCount: number;
  winRate: number;
  totalPnl: number;
  avgPnl: number;
  avgWin: number | null;
  avgLoss: number | null;
  riskReward: number | null;
  profitFactor: number | null;
  maxDrawdown: number;
  maxDrawdownPct: number;
  sharpeRatio: number;
}

export interface BacktestResult {
  config: BacktestConfig;
  initialCapital: number;
  finalEquity: number;
  totalPnl: number;
  totalReturn: number;
  tradingDays: number;
  trades: BacktestTrade[];
  equityCurve: EquityPoint[];
  metrics: BacktestMetrics;
}

/** Where the engine reads bars and daily limit state from. */
export interface BarSource {
  getIntradayBars(symbol: string, start: string, end: string, interval: BarInterval): Promise<Bar[]>;
  checkLimitUpDown(symbol: string, date: string): Promise<LimitCheck>;
}
