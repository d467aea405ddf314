import { configManager } from '../config/manager.js';
import type { UniverseEntry } from '../config/universe.js';
import { createLogger } from '../utils/logger.js';
import { BacktestEngine } from './engine.js';
import { MarketFilter, type MarketFilterStatistics } from './market-filter.js';
import type { BacktestConfig, BacktestResult, BarSource, RunMode } from './types.js';

const log = createLogger('backtest-runner');

export const PORTFOLIO_LABEL = 'PORTFOLIO';

export interface SymbolResult {
  symbol: string;
  name: string;
  sector: string;
  /** The symbols a portfolio result covers. */
  members?: UniverseEntry[];
  result: BacktestResult;
}

export interface RunOutcome {
  mode: RunMode;
  results: SymbolResult[];
  filterStats: MarketFilterStatistics | null;
}

export function buildBacktestConfig(overrides: Partial<BacktestConfig> = {}): BacktestConfig {
  const sessionOpen = configManager.get('strategy.sessionOpen');
  const marketFilter = configManager.get('filter.enabled')
    ? {
        symbols: [],
        threshold: configManager.get('filter.threshold'),
        minSymbols: configManager.get('filter.minSymbols'),
        sessionOpen,
        baselineEnd: configManager.get('filter.baselineEnd'),
        checkStart: configManager.get('filter.checkStart'),
        checkEnd: configManager.get('filter.checkEnd'),
      }
    : null;

  return {
    symbols: configManager.get('backtest.symbols'),
    startDate: configManager.get('backtest.startDate'),
    endDate: configManager.get('backtest.endDate'),
    initialCapital: configManager.get('backtest.initialCapital'),
    commissionRate: configManager.get('backtest.commissionRate'),
    interval: configManager.get('strategy.interval'),
    utcOffsetMinutes: configManager.get('market.utcOffsetMinutes'),
    limitCheck: configManager.get('market.limitCheck'),
    sessionOpen,
    rangeStart: configManager.get('strategy.rangeStart'),
    rangeEnd: configManager.get('strategy.rangeEnd'),
    entryStart: configManager.get('strategy.entryStart'),
    entryEnd: configManager.get('strategy.entryEnd'),
    forceExitTime: configManager.get('strategy.forceExitTime'),
    profitTarget: configManager.get('strategy.profitTarget'),
    stopLoss: configManager.get('strategy.stopLoss'),
    marketFilter,
    ...overrides,
  };
}

/**
 * `portfolio` runs one engine over every symbol with shared capital;
 * `per-symbol` gives each symbol its own engine and its own initial capital.
 */
export async function runBacktests(
  source: BarSource,
  config: BacktestConfig,
  mode: RunMode,
  entries: UniverseEntry[],
): Promise<RunOutcome> {
  const symbols = entries.map((e) => e.symbol);
  const marketFilter = config.marketFilter
    ? new MarketFilter(
        {
          ...config.marketFilter,
          symbols: config.marketFilter.symbols.length > 0 ? config.marketFilter.symbols : symbols,
        },
        config.utcOffsetMinutes,
      )
    : undefined;

  const results: SymbolResult[] = [];

  if (mode === 'portfolio') {
    const engine = new BacktestEngine({ config: { ...config, symbols }, source, marketFilter });
    results.push({
      symbol: PORTFOLIO_LABEL,
      name: `${symbols.length} symbols`,
      sector: '',
      members: entries,
      result: await engine.run(),
    });
  } else {
    for (const [i, entry] of entries.entries()) {
      log.info({ symbol: entry.symbol, progress: `${i + 1}/${entries.length}` }, 'Backtesting');
      try {
        const engine = new BacktestEngine({
          config: { ...config, symbols: [entry.symbol] },
          source,
          marketFilter,
        });
        results.push({ ...entry, result: await engine.run() });
      } catch (err) {
        log.error({ symbol: entry.symbol, err }, 'Backtest failed');
      }
    }
  }

  return { mode, results, filterStats: marketFilter ? marketFilter.getStatistics() : null };
}
