import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { MarketFilterStatistics } from '../backtest/market-filter.js';
import { summarizePerformance } from '../backtest/performance.js';
import {
  formatStrategyParams,
  generateExitReasonBreakdown,
  generateMonthlyReturns,
  generateSummary,
  generateSymbolBreakdown,
} from '../backtest/reporter.js';
import type { RunOutcome, SymbolResult } from '../backtest/runner.js';
import type { BacktestTrade, EquityPoint } from '../backtest/types.js';
import { formatCurrency, formatPercent, formatRunTimestamp, round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { localDateOf } from '../utils/market-hours.js';
import { barPanel, composeSvg, heatmapPanel, linePanel, writePng } from './charts.js';
import type { HeatmapData, LineSeries } from './charts.js';
import { type CsvValue, writeCsv } from './csv.js';

const log = createLogger('report-generator');

export const SUMMARY_HEADERS = [
  'symbol',
  'name',
  'sector',
  'initial_capital',
  'final_equity',
  'total_pnl',
  'return_pct',
  'trades',
  'long_trades',
  'short_trades',
  'wins',
  'losses',
  'win_rate_pct',
  'avg_win',
  'avg_loss',
  'profit_factor',
  'max_drawdown_pct',
  'sharpe_ratio',
];

export const TRADE_HEADERS = [
  'symbol',
  'side',
  'entry_time',
  'entry_price',
  'exit_time',
  'exit_price',
  'quantity',
  'gross_pnl',
  'commission',
  'pnl',
  'return_pct',
  'exit_reason',
];

export interface ReportOptions {
  outputDir: string;
  /** Prepended to every file name as `<prefix>_`. */
  prefix?: string;
  charts: boolean;
  currency: string;
  /** Run time used for the directory name; defaults to now. */
  runAt?: Date;
}

export interface ReportFiles {
  directory: string;
  files: string[];
}

export interface DailyPnlTable {
  dates: string[];
  symbols: string[];
  /** values[symbol][date]; null where the symbol has no equity point that day. */
  values: (number | null)[][];
}

function pct(ratio: number): number {
  return round(ratio * 100);
}

function nullableRound(value: number | null): number | null {
  return value == null ? null : round(value);
}

export function sortByPnl(results: SymbolResult[]): SymbolResult[] {
  return [...results].sort((a, b) => b.result.totalPnl - a.result.totalPnl);
}

/**
 * A result covering several symbols becomes one result per traded symbol.
 * Each carries the symbol's trades and an equity curve of the shared initial
 * capital plus that symbol's P&L, booked on each trade's local exit date.
 */
export function splitBySymbol(entry: SymbolResult): SymbolResult[] {
  const { result } = entry;
  if (result.config.symbols.length <= 1) return [entry];

  const { initialCapital } = result;
  const offset = result.config.utcOffsetMinutes;
  const traded = [...new Set(result.trades.map((t) => t.symbol))];

  return traded.map((symbol) => {
    const trades = result.trades.filter((t) => t.symbol === symbol);
    const pnlByDate = new Map<string, number>();
    for (const trade of trades) {
      const date = localDateOf(trade.exitTime, offset);
      pnlByDate.set(date, (pnlByDate.get(date) ?? 0) + trade.pnl);
    }

    const dates = [
      ...new Set([...result.equityCurve.map((p) => p.date), ...pnlByDate.keys()]),
    ].sort();
    let cumulative = 0;
    const equityCurve: EquityPoint[] = dates.map((date) => {
      cumulative += pnlByDate.get(date) ?? 0;
      return { date, equity: initialCapital + cumulative };
    });

    const totalPnl = trades.reduce((sum, t) => sum + t.pnl, 0);
    const member = entry.members?.find((m) => m.symbol === symbol);
    return {
      symbol,
      name: member?.name ?? '',
      sector: member?.sector ?? '',
      result: {
        ...result,
        config: { ...result.config, symbols: [symbol] },
        finalEquity: initialCapital + totalPnl,
        totalPnl,
        totalReturn: initialCapital > 0 ? totalPnl / initialCapital : 0,
        trades,
        equityCurve,
        metrics: summarizePerformance(trades, equityCurve, initialCapital),
      },
    };
  });
}

export function summaryRow({ symbol, name, sector, result }: SymbolResult): CsvValue[] {
  const { metrics } = result;
  return [
    symbol,
    name,
    sector,
    round(result.initialCapital),
    round(result.finalEquity),
    round(result.totalPnl),
    pct(result.totalReturn),
    metrics.totalTrades,
    metrics.longTrades,
    metrics.shortTrades,
    metrics.winCount,
    metrics.lossCount,
    pct(metrics.winRate),
    nullableRound(metrics.avgWin),
    nullableRound(metrics.avgLoss),
    nullableRound(metrics.profitFactor),
    pct(metrics.maxDrawdownPct),
    round(metrics.sharpeRatio, 4),
  ];
}

export function tradeRow(trade: BacktestTrade): CsvValue[] {
  return [
    trade.symbol,
    trade.side,
    trade.entryTime,
    trade.entryPrice,
    trade.exitTime,
    trade.exitPrice,
    trade.quantity,
    round(trade.grossPnl),
    round(trade.commission),
    round(trade.pnl),
    pct(trade.returnPct),
    trade.exitReason,
  ];
}

/** Net P&L per day, read as the change in each result's end-of-day equity. */
export function buildDailyPnl(results: SymbolResult[]): DailyPnlTable {
  const dates = [
    ...new Set(results.flatMap((r) => r.result.equityCurve.map((p) => p.date))),
  ].sort();

  const values = results.map(({ result }) => {
    const byDate = new Map<string, number>();
    let previous = result.initialCapital;
    for (const point of result.equityCurve) {
      byDate.set(point.date, round(point.equity - previous));
      previous = point.equity;
    }
    return dates.map((date) => byDate.get(date) ?? null);
  });

  return { dates, symbols: results.map((r) => r.symbol), values };
}

export function dailyPnlRows(table: DailyPnlTable): CsvValue[][] {
  return table.dates.map((date, d) => [date, ...table.values.map((row) => row[d])]);
}

function formatFilterStats(stats: MarketFilterStatistics): string[] {
  return [
    '--- Market Filter ---',
    `Days evaluated: ${stats.totalDays}`,
    `Longs blocked: ${stats.longRestrictedDays} (${stats.longRestrictionRate.toFixed(1)}%)`,
    `Shorts blocked: ${stats.shortRestrictedDays} (${stats.shortRestrictionRate.toFixed(1)}%)`,
    `Both allowed: ${stats.bothAllowedDays}`,
  ];
}

/** Plain-text run summary: totals, ranking, strategy parameters. */
export function buildSummaryText(outcome: RunOutcome, currency = 'JPY'): string {
  const money = (n: number) => formatCurrency(n, currency);
  const ranked = sortByPnl(outcome.results);

  if (ranked.length === 1) {
    const [{ result }] = ranked;
    const lines = [generateSummary(result, currency)];
    if (result.trades.length > 0) {
      lines.push('', generateExitReasonBreakdown(result.trades, currency));
      if (result.config.symbols.length > 1) {
        lines.push('', generateSymbolBreakdown(result.trades, currency));
      }
    }
    if (result.equityCurve.length > 0) lines.push('', generateMonthlyReturns(result));
    if (outcome.filterStats) lines.push('', ...formatFilterStats(outcome.filterStats));
    return `${lines.join('\n')}\n`;
  }

  const totalPnl = ranked.reduce((sum, r) => sum + r.result.totalPnl, 0);
  const totalTrades = ranked.reduce((sum, r) => sum + r.result.metrics.totalTrades, 0);
  const totalWins = ranked.reduce((sum, r) => sum + r.result.metrics.winCount, 0);
  const profitable = ranked.filter((r) => r.result.totalPnl > 0).length;

  const lines = ['=== Backtest Summary ===', `Mode: ${outcome.mode}`, `Symbols: ${ranked.length}`];
  const first = ranked[0]?.result.config;
  if (first) {
    lines.push(`Period: ${first.startDate} to ${first.endDate}`);
    lines.push(`Initial Capital (each): ${money(first.initialCapital)}`);
    lines.push('', '--- Strategy ---', ...formatStrategyParams(first));
  }

  lines.push('', '--- Totals ---');
  lines.push(`Total P&L: ${money(totalPnl)}`);
  lines.push(`Total Trades: ${totalTrades}`);
  lines.push(`Win Rate: ${totalTrades > 0 ? formatPercent(totalWins / totalTrades) : 'N/A'}`);
  lines.push(`Profitable Symbols: ${profitable}/${ranked.length}`);

  lines.push('', '--- Ranking ---');
  ranked.forEach((r, i) => {
    lines.push(
      `${String(i + 1).padStart(3)}. ${r.symbol.padEnd(10)} ${r.name.padEnd(20)} ` +
        `${money(r.result.totalPnl).padStart(16)}  ${r.result.metrics.totalTrades} trades, ` +
        `WR ${formatPercent(r.result.metrics.winRate)}`,
    );
  });

  if (outcome.filterStats) lines.push('', ...formatFilterStats(outcome.filterStats));
  return `${lines.join('\n')}\n`;
}

export function buildSummaryChart(results: SymbolResult[]): string {
  const ranked = sortByPnl(results);
  const series: LineSeries[] = ranked.map(({ symbol, result }) => ({
    label: symbol,
    points: result.equityCurve.map((p) => ({ x: p.date, y: p.equity })),
  }));

  return composeSvg([
    (box) =>
      barPanel(
        box,
        'Total P&L by symbol',
        ranked.map((r) => ({ label: r.symbol, value: r.result.totalPnl })),
      ),
    (box) => linePanel(box, 'Equity curve', series),
  ]);
}

export function buildHeatmapChart(table: DailyPnlTable): string {
  const data: HeatmapData = { rows: table.symbols, columns: table.dates, values: table.values };
  return composeSvg([(box) => heatmapPanel(box, 'Daily P&L', data)]);
}

export class ReportGenerator {
  private options: ReportOptions;

  constructor(options: ReportOptions) {
    this.options = options;
  }

  /** Creates `<outputDir>/<YYYYMMDD_HHMMSS>/`. */
  createRunDirectory(): string {
    const directory = join(this.options.outputDir, formatRunTimestamp(this.options.runAt));
    mkdirSync(directory, { recursive: true });
    return directory;
  }

  fileName(name: string): string {
    return this.options.prefix ? `${this.options.prefix}_${name}` : name;
  }

  generate(outcome: RunOutcome, directory = this.createRunDirectory()): ReportFiles {
    const files: string[] = [];
    const write = (name: string, writer: (path: string) => void) => {
      const path = join(directory, this.fileName(name));
      writer(path);
      files.push(path);
    };

    const ranked = sortByPnl(outcome.results);
    const trades = ranked.flatMap((r) => r.result.trades);
    const bySymbol = sortByPnl(ranked.flatMap(splitBySymbol));
    const daily = buildDailyPnl(bySymbol);

    write('summary.csv', (path) => writeCsv(path, SUMMARY_HEADERS, bySymbol.map(summaryRow)));
    write('trades.csv', (path) => writeCsv(path, TRADE_HEADERS, trades.map(tradeRow)));
    write('daily_pnl.csv', (path) =>
      writeCsv(path, ['date', ...daily.symbols], dailyPnlRows(daily)),
    );
    write('summary.txt', (path) =>
      writeFileSync(path, buildSummaryText(outcome, this.options.currency), 'utf-8'),
    );

    if (this.options.charts) {
      try {
        write('summary_chart.png', (path) => writePng(path, buildSummaryChart(bySymbol)));
        write('daily_pnl_heatmap.png', (path) => writePng(path, buildHeatmapChart(daily)));
      } catch (err) {
        log.error({ err }, 'Chart rendering failed');
      }
    }

    log.info({ directory, files: files.length }, 'Reports written');
    return { directory, files };
  }

  /** Writes a CSV and a text file into a fresh run directory. */
  writeTable(
    name: string,
    headers: string[],
    rows: CsvValue[][],
    summary: string,
    directory = this.createRunDirectory(),
  ): ReportFiles {
    const csvPath = join(directory, this.fileName(`${name}.csv`));
    const textPath = join(directory, this.fileName(`${name}.txt`));
    writeCsv(csvPath, headers, rows);
    writeFileSync(textPath, summary, 'utf-8');
    log.info({ directory, name }, 'Table written');
    return { directory, files: [csvPath, textPath] };
  }
}
