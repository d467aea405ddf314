import type { BacktestMetrics, EquityPoint } from './types.js';

const TRADING_DAYS_PER_YEAR = 252;

type PnlRecord = { pnl: number };

// ── Trade statistics ──────────────────────────────────────────────────

export function computeTotalReturn(trades: PnlRecord[], initialCapital: number): number {
  if (trades.length === 0 || initialCapital <= 0) return 0;
  return trades.reduce((sum, t) => sum + t.pnl, 0) / initialCapital;
}

export function computeWinRate(trades: PnlRecord[]): number {
  if (trades.length === 0) return 0;
  return trades.filter((t) => t.pnl > 0).length / trades.length;
}

/**
 * Profit Factor: sum(winning_pnl) / abs(sum(losing_pnl))
 * Returns null if there is no losing trade.
 */
export function computeProfitFactor(trades: PnlRecord[]): number | null {
  const grossProfit = trades.filter((t) => t.pnl > 0).reduce((sum, t) => sum + t.pnl, 0);
  const grossLoss = Math.abs(trades.filter((t) => t.pnl < 0).reduce((sum, t) => sum + t.pnl, 0));
  if (grossLoss === 0) return null;
  return grossProfit / grossLoss;
}

export function computeAveragePnl(trades: PnlRecord[]): number {
  if (trades.length === 0) return 0;
  return trades.reduce((sum, t) => sum + t.pnl, 0) / trades.length;
}

export function computeAverageWin(trades: PnlRecord[]): number | null {
  const wins = trades.filter((t) => t.pnl > 0);
  if (wins.length === 0) return null;
  return wins.reduce((sum, t) => sum + t.pnl, 0) / wins.length;
}

/** Mean of losing trades, as a negative number. */
export function computeAverageLoss(trades: PnlRecord[]): number | null {
  const losses = trades.filter((t) => t.pnl < 0);
  if (losses.length === 0) return null;
  return losses.reduce((sum, t) => sum + t.pnl, 0) / losses.length;
}

export function computeRiskReward(trades: PnlRecord[]): number | null {
  const avgWin = computeAverageWin(trades);
  const avgLoss = computeAverageLoss(trades);
  if (avgWin === null || avgLoss === null) return null;
  return avgWin / Math.abs(avgLoss);
}

// ── Equity curve statistics ───────────────────────────────────────────

export interface DrawdownResult {
  maxDrawdown: number;
  maxDrawdownPct: number;
}

/** Peak-to-trough drawdown with the running peak seeded at the initial capital. */
export function computeMaxDrawdown(
  equityCurve: EquityPoint[],
  initialCapital: number,
): DrawdownResult {
  let peak = initialCapital;
  let maxDrawdown = 0;
  let maxDrawdownPct = 0;

  for (const point of equityCurve) {
    if (point.equity > peak) peak = point.equity;
    const dd = peak - point.equity;
    const ddPct = peak > 0 ? dd / peak : 0;
    if (dd > maxDrawdown) maxDrawdown = dd;
    if (ddPct > maxDrawdownPct) maxDrawdownPct = ddPct;
  }

  return { maxDrawdown, maxDrawdownPct };
}

export function computeDailyReturns(equityCurve: EquityPoint[], initialCapital: number): number[] {
  const returns: number[] = [];
  let previous = initialCapital;
  for (const point of equityCurve) {
    returns.push(previous > 0 ? point.equity / previous - 1 : 0);
    previous = point.equity;
  }
  return returns;
}

/**
 * Sharpe Ratio: mean(daily) / sample_std(daily) * sqrt(252)
 * Returns 0 with fewer than two returns or no variance.
 */
export function computeSharpe(dailyReturns: number[], riskFreeDaily = 0): number {
  const n = dailyReturns.length;
  if (n < 2) return 0;

  const mean = dailyReturns.reduce((a, b) => a + b, 0) / n;
  const variance = dailyReturns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / (n - 1);
  const stdDev = Math.sqrt(variance);
  if (stdDev === 0) return 0;

  return ((mean - riskFreeDaily) / stdDev) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

export interface MonthlyReturn {
  month: string;
  return: number;
}

/** Month-end equity against the previous month-end (the first month against initial capital). */
export function computeMonthlyReturns(
  equityCurve: EquityPoint[],
  initialCapital: number,
): MonthlyReturn[] {
  const monthEnd = new Map<string, number>();
  for (const point of equityCurve) {
    monthEnd.set(point.date.slice(0, 7), point.equity);
  }

  const result: MonthlyReturn[] = [];
  let previous = initialCapital;
  for (const [month, equity] of [...monthEnd].sort(([a], [b]) => a.localeCompare(b))) {
    result.push({ month, return: previous > 0 ? equity / previous - 1 : 0 });
    previous = equity;
  }
  return result;
}

// ── Aggregate ─────────────────────────────────────────────────────────

export function summarizePerformance(
  trades: Array<PnlRecord & { side: 'long' | 'short' }>,
  equityCurve: EquityPoint[],
  initialCapital: number,
): BacktestMetrics {
  const { maxDrawdown, maxDrawdownPct } = computeMaxDrawdown(equityCurve, initialCapital);

  return {
    totalTrades: trades.length,
    longTrades: trades.filter((t) => t.side === 'long').length,
    shortTrades: trades.filter((t) => t.side === 'short').length,
    winCount: trades.filter((t) => t.pnl > 0).length,
    lossCount: trades.filter((t) => t.pnl < 0).length,
    winRate: computeWinRate(trades),
    totalPnl: trades.reduce((sum, t) => sum + t.pnl, 0),
    avgPnl: computeAveragePnl(trades),
    avgWin: computeAverageWin(trades),
    avgLoss: computeAverageLoss(trades),
    riskReward: computeRiskReward(trades),
    profitFactor: computeProfitFactor(trades),
    maxDrawdown,
    maxDrawdownPct,
    sharpeRatio: computeSharpe(computeDailyReturns(equityCurve, initialCapital)),
  };
}
