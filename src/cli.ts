import { parseArgs } from 'node:util';
import {
  OPTIMIZATION_HEADERS,
  Optimizer,
  formatOptimizationSummary,
  optimizationRows,
} from './backtest/optimizer.js';
import { buildBacktestConfig, runBacktests } from './backtest/runner.js';
import type { RunMode } from './backtest/types.js';
import { configManager } from './config/manager.js';
import {
  OPTIMIZABLE_PARAMETERS,
  isOptimizableParameter,
  loadOptimizationGrid,
} from './config/optimization.js';
import { barIntervalSchema } from './config/schema-validator.js';
import {
  type UniverseEntry,
  filterBySector,
  loadUniverse,
  resolveSymbols,
} from './config/universe.js';
import { createHistoricalPricingClient } from './data/historical-pricing.js';
import { MarketDataService, marketDataOptionsFromConfig } from './data/market-data.js';
import type { BarInterval } from './data/types.js';
import { initDatabase } from './db/index.js';
import {
  type MarketDataRepository,
  PgMarketDataRepository,
} from './db/repositories/market-data.js';
import { ReportGenerator, buildSummaryText } from './reporting/report-generator.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('cli');

export const COMMANDS = ['backtest', 'optimize', 'setup-db', 'db-status', 'fetch'] as const;
export type Command = (typeof COMMANDS)[number];

export const USAGE = `Usage: orb-backtest <command> [options]

Commands:
  backtest     Run the ORB backtest and write reports
  optimize     Sweep one parameter (--param <name>) or all of them (--all)
  setup-db     Create the cache tables and indexes
  db-status    Show cached coverage and recent fetches
  fetch        Warm the cache for a date range

Options:
  --config <path>      YAML config file (default config/config.yaml)
  --symbols <a,b,...>  Symbols to use instead of backtest.symbols
  --sector <name>      Only symbols of this sector
  --start <date>       First day (YYYY-MM-DD)
  --end <date>         Last day (YYYY-MM-DD)
  --mode <mode>        per-symbol | portfolio
  --interval <code>    Bar interval (${barIntervalSchema.options.join(', ')})
  --param <name>       Parameter to optimize (${OPTIMIZABLE_PARAMETERS.join(', ')})
  --all                Optimize every parameter in turn
  --opt-config <path>  Optimization grid (default reports.optimizationPath)
  --prefix <text>      Prefix for report file names
  --no-charts          Skip PNG charts
  -h, --help           Show this help
`;

export interface CliOptions {
  command: Command;
  help: boolean;
  config?: string;
  symbols: string[];
  sector?: string;
  start?: string;
  end?: string;
  mode?: RunMode;
  interval?: BarInterval;
  param?: string;
  all: boolean;
  optConfig?: string;
  prefix?: string;
  charts: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseMode(value: string | undefined): RunMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'per-symbol' || value === 'portfolio') return value;
  throw new Error(`Invalid --mode: ${value} (expected per-symbol or portfolio)`);
}

function parseInterval(value: string | undefined): BarInterval | undefined {
  if (value === undefined) return undefined;
  const parsed = barIntervalSchema.safeParse(value);
  if (!parsed.success) throw new Error(`Invalid --interval: ${value}`);
  return parsed.data;
}

export function parseCommandLine(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string' },
      symbols: { type: 'string' },
      sector: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      mode: { type: 'string' },
      interval: { type: 'string' },
      param: { type: 'string' },
      all: { type: 'boolean', default: false },
      'opt-config': { type: 'string' },
      prefix: { type: 'string' },
      'no-charts': { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [name = 'backtest'] = positionals;
  if (!isCommand(name)) {
    throw new Error(`Unknown command: ${name}`);
  }

  return {
    command: name,
    help: values.help ?? false,
    config: values.config,
    symbols: (values.symbols ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
    sector: values.sector,
    start: values.start,
    end: values.end,
    mode: parseMode(values.mode),
    interval: parseInterval(values.interval),
    param: values.param,
    all: values.all ?? false,
    optConfig: values['opt-config'],
    prefix: values.prefix,
    charts: !(values['no-charts'] ?? false),
  };
}

// ── Wiring ────────────────────────────────────────────────────────────

interface MarketDataContext {
  service: MarketDataService;
  repository: MarketDataRepository | null;
  close(): Promise<void>;
}

function openRepository(): PgMarketDataRepository {
  initDatabase();
  return new PgMarketDataRepository();
}

function openMarketData(): MarketDataContext {
  const repository = configManager.get('api.useCache') ? openRepository() : null;
  const service = new MarketDataService(
    createHistoricalPricingClient(),
    repository,
    marketDataOptionsFromConfig(),
  );
  return {
    service,
    repository,
    async close() {
      service.disconnect();
      if (repository) await repository.close();
    },
  };
}

/** CLI flags become validated config overrides. */
export function applyOverrides(options: CliOptions): void {
  if (options.start) configManager.set('backtest.startDate', options.start);
  if (options.end) configManager.set('backtest.endDate', options.end);
  if (options.mode) configManager.set('backtest.mode', options.mode);
  if (options.interval) configManager.set('strategy.interval', options.interval);
  if (options.symbols.length > 0) configManager.set('backtest.symbols', options.symbols);
  if (!options.charts) configManager.set('reports.charts', false);
}

export function selectSymbols(options: CliOptions, universe: UniverseEntry[]): UniverseEntry[] {
  const entries = resolveSymbols(configManager.get('backtest.symbols'), universe);
  const selected = options.sector ? filterBySector(entries, options.sector) : entries;
  if (selected.length === 0) {
    throw new Error(
      options.sector ? `No symbols in sector "${options.sector}"` : 'No symbols configured',
    );
  }
  return selected;
}

function reportGenerator(options: CliOptions): ReportGenerator {
  return new ReportGenerator({
    outputDir: configManager.get('reports.outputDir'),
    prefix: options.prefix,
    charts: configManager.get('reports.charts'),
    currency: configManager.get('market.currency'),
  });
}

// ── Commands ──────────────────────────────────────────────────────────

async function backtestCommand(options: CliOptions): Promise<void> {
  const entries = selectSymbols(options, loadUniverse());
  const context = openMarketData();
  try {
    const config = buildBacktestConfig();
    const outcome = await runBacktests(
      context.service,
      config,
      configManager.get('backtest.mode'),
      entries,
    );
    const report = reportGenerator(options).generate(outcome);
    process.stdout.write(buildSummaryText(outcome, configManager.get('market.currency')));
    process.stdout.write(`\nReports written to ${report.directory}\n`);
  } finally {
    await context.close();
  }
}

async function optimizeCommand(options: CliOptions): Promise<void> {
  if (!options.all && !options.param) {
    throw new Error('optimize needs --param <name> or --all');
  }
  if (options.param && !isOptimizableParameter(options.param)) {
    throw new Error(
      `Unknown parameter: ${options.param} (available: ${OPTIMIZABLE_PARAMETERS.join(', ')})`,
    );
  }

  const grid = loadOptimizationGrid(options.optConfig);
  const entries = selectSymbols(options, loadUniverse());
  const context = openMarketData();
  try {
    const optimizer = new Optimizer(context.service, grid, buildBacktestConfig(), entries);
    const parameters =
      options.param && isOptimizableParameter(options.param)
        ? [options.param]
        : OPTIMIZABLE_PARAMETERS;

    const reporter = reportGenerator(options);
    const directory = reporter.createRunDirectory();
    const currency = configManager.get('market.currency');
    for (const parameter of parameters) {
      const result = await optimizer.optimize(parameter);
      const summary = formatOptimizationSummary(result, currency);
      reporter.writeTable(
        `optimization_${parameter}`,
        OPTIMIZATION_HEADERS,
        optimizationRows(result),
        summary,
        directory,
      );
      process.stdout.write(`${summary}\n`);
    }
    process.stdout.write(`Results written to ${directory}\n`);
  } finally {
    await context.close();
  }
}

async function setupDbCommand(): Promise<void> {
  const repository = openRepository();
  try {
    await repository.ensureSchema();
    process.stdout.write('Database schema ready\n');
  } finally {
    await repository.close();
  }
}

async function dbStatusCommand(options: CliOptions): Promise<void> {
  const repository = openRepository();
  try {
    const coverage = await repository.getCoverage(options.interval);
    const lines = ['=== Cached bars ==='];
    if (coverage.length === 0) lines.push('No cached data.');
    for (const row of coverage) {
      lines.push(
        `${row.symbol.padEnd(10)} ${row.interval.padEnd(6)} ${String(row.bars).padStart(8)} bars  ` +
          `${row.first} .. ${row.last}`,
      );
    }

    lines.push('', '=== Recent fetches ===');
    const fetches = await repository.getFetchLog({
      symbol: options.symbols[0],
      limit: 20,
    });
    if (fetches.length === 0) lines.push('No fetches logged.');
    for (const entry of fetches) {
      lines.push(
        `${entry.fetchedAt ?? ''}  ${entry.symbol.padEnd(10)} ${entry.source.padEnd(5)} ` +
          `${String(entry.recordsCount).padStart(6)}  ${entry.startDate} .. ${entry.endDate}`,
      );
    }
    process.stdout.write(`${lines.join('\n')}\n`);
  } finally {
    await repository.close();
  }
}

async function fetchCommand(options: CliOptions): Promise<void> {
  const entries = selectSymbols(options, loadUniverse());
  const context = openMarketData();
  if (!context.repository) {
    log.warn('Cache disabled (api.useCache=false); bars will not be stored');
  }
  try {
    await context.service.connect();
    const summary = await context.service.prefetch(
      entries.map((e) => e.symbol),
      configManager.get('backtest.startDate'),
      configManager.get('backtest.endDate'),
      configManager.get('strategy.interval'),
      {
        sessionOpen: configManager.get('strategy.sessionOpen'),
        sessionClose: configManager.get('market.sessionClose'),
      },
    );
    process.stdout.write(`Fetched ${summary.bars} bars in ${summary.requests} requests\n`);
  } finally {
    await context.close();
  }
}

export async function runCommand(options: CliOptions): Promise<void> {
  configManager.load(options.config);
  applyOverrides(options);

  switch (options.command) {
    case 'backtest':
      return backtestCommand(options);
    case 'optimize':
      return optimizeCommand(options);
    case 'setup-db':
      return setupDbCommand();
    case 'db-status':
      return dbStatusCommand(options);
    case 'fetch':
      return fetchCommand(options);
  }
}

/** Returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCommandLine(argv);
  } catch (err) {
    log.error({ err }, 'Invalid arguments');
    process.stderr.write(USAGE);
    return 1;
  }

  if (options.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  try {
    await runCommand(options);
    return 0;
  } catch (err) {
    log.fatal({ err, command: options.command }, 'Command failed');
    return 1;
  }
}
