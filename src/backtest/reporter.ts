import { formatCurrency, formatPercent } from '../utils/helpers.js';
import { computeMonthlyReturns } from './performance.js';
import type { BacktestResult, BacktestTrade, ExitReason, StrategyParams } from './types.js';

const EXIT_REASONS: ExitReason[] = ['profit', 'loss', 'force', 'day_end'];

function formatRatio(value: number | null): string {
  return value == null ? 'N/A' : value.toFixed(2);
}

export function formatStrategyParams(params: StrategyParams): string[] {
  return [
    `Range: ${params.rangeStart}-${params.rangeEnd}`,
    `Entry Window: ${params.entryStart}-${params.entryEnd}`,
    `Force Exit: ${params.forceExitTime}`,
    `Profit Target: ${params.profitTarget == null ? 'none' : formatPercent(params.profitTarget)}`,
    `Stop Loss: ${params.stopLoss == null ? 'none' : formatPercent(params.stopLoss)}`,
  ];
}

/**
 * Generate a text summary suitable for console output.
 */
export function generateSummary(result: BacktestResult, currency = 'JPY'): string {
  const { metrics, config } = result;
  const money = (n: number) => formatCurrency(n, currency);
  const lines: string[] = [];

  lines.push('=== Backtest Results ===');
  lines.push(`Period: ${config.startDate} to ${config.endDate} (${result.tradingDays} days)`);
  lines.push(`Symbols: ${config.symbols.join(', ')}`);
  lines.push(`Initial Capital: ${money(result.initialCapital)}`);
  lines.push('');

  lines.push('--- Strategy ---');
  lines.push(...formatStrategyParams(config));
  lines.push(`Commission: ${formatPercent(config.commissionRate)} per side`);
  lines.push('');

  lines.push('--- Performance ---');
  lines.push(`Final Equity: ${money(result.finalEquity)}`);
  lines.push(`Return: ${formatPercent(result.totalReturn)}`);
  lines.push(`Total P&L: ${money(result.totalPnl)}`);
  lines.push('');

  lines.push('--- Trade Statistics ---');
  lines.push(
    `Total Trades: ${metrics.totalTrades} (long ${metrics.longTrades}, short ${metrics.shortTrades})`,
  );
  if (metrics.totalTrades > 0) {
    lines.push(`Win Rate: ${formatPercent(metrics.winRate)}`);
    lines.push(`Wins: ${metrics.winCount} | Losses: ${metrics.lossCount}`);
    lines.push(`Avg P&L: ${money(metrics.avgPnl)}`);
    lines.push(`Avg Win: ${metrics.avgWin != null ? money(metrics.avgWin) : 'N/A'}`);
    lines.push(`Avg Loss: ${metrics.avgLoss != null ? money(metrics.avgLoss) : 'N/A'}`);
    lines.push(`Risk/Reward: ${formatRatio(metrics.riskReward)}`);
    lines.push('');

    lines.push('--- Risk Metrics ---');
    lines.push(
      `Max Drawdown: ${money(metrics.maxDrawdown)} (${formatPercent(metrics.maxDrawdownPct)})`,
    );
    lines.push(`Sharpe Ratio: ${metrics.sharpeRatio.toFixed(2)}`);
    lines.push(`Profit Factor: ${formatRatio(metrics.profitFactor)}`);
  }

  return lines.join('\n');
}

export function generateExitReasonBreakdown(trades: BacktestTrade[], currency = 'JPY'): string {
  if (trades.length === 0) return 'No trades to analyze.';

  const lines: string[] = ['=== Exit Reasons ==='];
  for (const reason of EXIT_REASONS) {
    const matching = trades.filter((t) => t.exitReason === reason);
    if (matching.length === 0) continue;
    const pnl = matching.reduce((sum, t) => sum + t.pnl, 0);
    lines.push(
      `${reason}: ${matching.length} (${formatPercent(matching.length / trades.length)}), ` +
        `P&L ${formatCurrency(pnl, currency)}`,
    );
  }
  return lines.join('\n');
}

/**
 * Generate a per-symbol breakdown of trades.
 */
export function generateSymbolBreakdown(trades: BacktestTrade[], currency = 'JPY'): string {
  if (trades.length === 0) return 'No trades to analyze.';

  const bySymbol = new Map<string, { trades: number; wins: number; totalPnl: number }>();
  for (const trade of trades) {
    const existing = bySymbol.get(trade.symbol) ?? { trades: 0, wins: 0, totalPnl: 0 };
    existing.trades++;
    if (trade.pnl > 0) existing.wins++;
    existing.totalPnl += trade.pnl;
    bySymbol.set(trade.symbol, existing);
  }

  const lines: string[] = ['=== Per-Symbol Breakdown ===', ''];

  // Sort by total P&L descending
  const entries = [...bySymbol.entries()].sort(([, a], [, b]) => b.totalPnl - a.totalPnl);
  for (const [symbol, data] of entries) {
    lines.push(
      `${symbol}: ${data.trades} trades, WR ${formatPercent(data.wins / data.trades)}, ` +
        `P&L ${formatCurrency(data.totalPnl, currency)}`,
    );
  }

  return lines.join('\n');
}

export function generateMonthlyReturns(result: BacktestResult): string {
  const months = computeMonthlyReturns(result.equityCurve, result.initialCapital);
  if (months.length === 0) return 'No equity data.';
  return [
    '=== Monthly Returns ===',
    ...months.map((m) => `${m.month}: ${formatPercent(m.return)}`),
  ].join('\n');
}
