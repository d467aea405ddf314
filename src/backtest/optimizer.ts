import {
  OPTIMIZABLE_PARAMETERS,
  type OptimizableParameter,
  type OptimizationGrid,
  parameterValues,
} from '../config/optimization.js';
import type { UniverseEntry } from '../config/universe.js';
import type { CsvValue } from '../reporting/csv.js';
import { formatCurrency, formatPercent, mean, round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { addMinutesToClock } from '../utils/market-hours.js';
import { computeProfitFactor, computeWinRate } from './performance.js';
import { runBacktests, type SymbolResult } from './runner.js';
import type { BacktestConfig, BarSource } from './types.js';

const log = createLogger('optimizer');

export interface ValueResult {
  label: string;
  value: number | string;
  symbols: number;
  profitableSymbols: number;
  totalTrades: number;
  totalPnl: number;
  /** Total P&L over the capital of every symbol tested. */
  totalReturn: number;
  winRate: number;
  avgReturn: number;
  profitFactor: number | null;
}

export interface OptimizationResult {
  parameter: OptimizableParameter;
  description: string;
  /** Ranked by total P&L, best first. */
  results: ValueResult[];
  best: ValueResult | null;
}

export const OPTIMIZATION_HEADERS = [
  'rank',
  'label',
  'value',
  'symbols',
  'profitable_symbols',
  'total_trades',
  'total_pnl',
  'total_return_pct',
  'win_rate_pct',
  'avg_return_pct',
  'profit_factor',
];

function expectNumber(parameter: OptimizableParameter, value: number | string): number {
  if (typeof value !== 'number') {
    throw new TypeError(`${parameter} takes numeric values, got "${value}"`);
  }
  return value;
}

function expectClock(parameter: OptimizableParameter, value: number | string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${parameter} takes HH:MM values, got ${value}`);
  }
  return value;
}

/**
 * Backtest config for one grid point. Every other parameter sits at its grid
 * default; the entry window always opens when the range closes.
 */
export function buildOptimizationConfig(
  grid: OptimizationGrid,
  base: BacktestConfig,
  parameter: OptimizableParameter,
  value: number | string,
): BacktestConfig {
  const { parameters, fixed } = grid;
  let profitTarget = parameters.profitTarget.default;
  let stopLoss = parameters.stopLoss.default;
  let rangeDuration = parameters.rangeDuration.default;
  let entryWindow = parameters.entryWindow.default;
  let forceExitTime = parameters.forceExitTime.default;

  switch (parameter) {
    case 'profitTarget':
      profitTarget = expectNumber(parameter, value);
      break;
    case 'stopLoss':
      stopLoss = expectNumber(parameter, value);
      break;
    case 'rangeDuration':
      rangeDuration = expectNumber(parameter, value);
      break;
    case 'entryWindow':
      entryWindow = expectNumber(parameter, value);
      break;
    case 'forceExitTime':
      forceExitTime = expectClock(parameter, value);
      break;
  }

  const rangeStart = fixed.rangeStart ?? base.rangeStart;
  const rangeEnd = addMinutesToClock(rangeStart, rangeDuration);

  return {
    ...base,
    startDate: fixed.startDate ?? base.startDate,
    endDate: fixed.endDate ?? base.endDate,
    initialCapital: fixed.initialCapital ?? base.initialCapital,
    commissionRate: fixed.commissionRate ?? base.commissionRate,
    rangeStart,
    rangeEnd,
    entryStart: rangeEnd,
    entryEnd: addMinutesToClock(rangeEnd, entryWindow),
    forceExitTime,
    profitTarget,
    stopLoss,
  };
}

export function summarizeValue(
  label: string,
  value: number | string,
  results: SymbolResult[],
  initialCapital: number,
): ValueResult {
  const trades = results.flatMap((r) => r.result.trades);
  const totalPnl = results.reduce((sum, r) => sum + r.result.totalPnl, 0);
  const invested = initialCapital * results.length;

  return {
    label,
    value,
    symbols: results.length,
    profitableSymbols: results.filter((r) => r.result.totalPnl > 0).length,
    totalTrades: trades.length,
    totalPnl,
    totalReturn: invested > 0 ? totalPnl / invested : 0,
    winRate: computeWinRate(trades),
    avgReturn: mean(trades.map((t) => t.returnPct)),
    profitFactor: computeProfitFactor(trades),
  };
}

export function rankByPnl(results: ValueResult[]): ValueResult[] {
  return [...results].sort((a, b) => b.totalPnl - a.totalPnl);
}

export function optimizationRows(result: OptimizationResult): CsvValue[][] {
  return result.results.map((r, i) => [
    i + 1,
    r.label,
    r.value,
    r.symbols,
    r.profitableSymbols,
    r.totalTrades,
    round(r.totalPnl),
    round(r.totalReturn * 100),
    round(r.winRate * 100),
    round(r.avgReturn * 100, 4),
    r.profitFactor == null ? null : round(r.profitFactor),
  ]);
}

export function formatOptimizationSummary(result: OptimizationResult, currency = 'JPY'): string {
  const money = (n: number) => formatCurrency(n, currency);
  const lines = [`=== Optimization: ${result.parameter} ===`];
  if (result.description) lines.push(result.description);
  lines.push('');

  if (result.results.length === 0) {
    lines.push('No results.');
    return `${lines.join('\n')}\n`;
  }

  for (const r of result.results) {
    lines.push(
      `${r.label.padStart(10)}  ${String(r.totalTrades).padStart(6)} trades  ` +
        `WR ${formatPercent(r.winRate).padStart(7)}  ` +
        `profitable ${r.profitableSymbols}/${r.symbols}  ` +
        `${money(r.totalPnl).padStart(16)}  ${formatPercent(r.totalReturn)}`,
    );
  }

  if (result.best) {
    const { best } = result;
    lines.push('', `Best ${result.parameter}: ${best.label}`);
    lines.push(`  Total P&L: ${money(best.totalPnl)}`);
    lines.push(`  Total Return: ${formatPercent(best.totalReturn)}`);
    lines.push(`  Trades: ${best.totalTrades}`);
    lines.push(`  Win Rate: ${formatPercent(best.winRate)}`);
    lines.push(
      `  Profit Factor: ${best.profitFactor == null ? 'N/A' : best.profitFactor.toFixed(2)}`,
    );
  }

  return `${lines.join('\n')}\n`;
}

/**
 * Brute-force, one parameter at a time: each value is backtested per symbol
 * with every other parameter at its default.
 */
export class Optimizer {
  private source: BarSource;
  private grid: OptimizationGrid;
  private base: BacktestConfig;
  private entries: UniverseEntry[];

  constructor(
    source: BarSource,
    grid: OptimizationGrid,
    base: BacktestConfig,
    entries: UniverseEntry[],
  ) {
    this.source = source;
    this.grid = grid;
    this.base = base;
    // One entry per symbol, however often its sector is listed.
    const sectors = new Set(grid.sectors.map((sector) => sector.toLowerCase()));
    const selected = new Map<string, UniverseEntry>();
    for (const entry of entries) {
      if (sectors.size > 0 && !sectors.has(entry.sector.toLowerCase())) continue;
      if (!selected.has(entry.symbol)) selected.set(entry.symbol, entry);
    }
    this.entries = [...selected.values()];
  }

  get symbols(): UniverseEntry[] {
    return this.entries;
  }

  async optimize(parameter: OptimizableParameter): Promise<OptimizationResult> {
    const values = parameterValues(this.grid, parameter);
    log.info(
      { parameter, values: values.length, symbols: this.entries.length },
      'Optimizing parameter',
    );

    const results: ValueResult[] = [];
    for (const [i, { value, label }] of values.entries()) {
      const config = buildOptimizationConfig(this.grid, this.base, parameter, value);
      log.info({ parameter, label, progress: `${i + 1}/${values.length}` }, 'Running grid point');
      const outcome = await runBacktests(this.source, config, 'per-symbol', this.entries);
      results.push(summarizeValue(label, value, outcome.results, config.initialCapital));
    }

    const ranked = rankByPnl(results);
    const best = ranked[0] ?? null;
    if (best) {
      log.info({ parameter, best: best.label, totalPnl: round(best.totalPnl) }, 'Best value');
    }
    return {
      parameter,
      description: this.grid.parameters[parameter].description,
      results: ranked,
      best,
    };
  }

  async optimizeAll(): Promise<OptimizationResult[]> {
    const results: OptimizationResult[] = [];
    for (const parameter of OPTIMIZABLE_PARAMETERS) {
      results.push(await this.optimize(parameter));
    }
    return results;
  }
}
