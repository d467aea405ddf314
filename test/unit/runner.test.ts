import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { PORTFOLIO_LABEL, buildBacktestConfig, runBacktests } from '../../src/backtest/runner.js';
import { configManager } from '../../src/config/manager.js';
import { stubConfigEnv } from '../helpers/config-env.js';
import { backtestConfig, createFakeSource } from '../helpers/fake-source.js';
import { LONG_BREAKOUT, SHORT_BREAKOUT, orbSession } from '../helpers/sessions.js';

const DAY = '2025-10-01';
const TOYOTA = { symbol: '7203.T', name: 'Toyota Motor', sector: 'Automotive' };
const SONY = { symbol: '6758.T', name: 'Sony Group', sector: 'Technology' };

describe('buildBacktestConfig', () => {
  beforeEach(() => {
    stubConfigEnv();
    configManager.reset();
    configManager.applyDocument({});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    configManager.reset();
  });

  it('maps config keys onto the engine config', () => {
    const config = buildBacktestConfig();

    expect(config).toMatchObject({
      symbols: [],
      startDate: '2025-10-01',
      endDate: '2025-10-31',
      initialCapital: 1_000_000,
      commissionRate: 0,
      interval: '1min',
      utcOffsetMinutes: 540,
      sessionOpen: '09:00',
      rangeStart: '09:05',
      rangeEnd: '09:15',
      entryStart: '09:15',
      entryEnd: '10:00',
      forceExitTime: '15:00',
      profitTarget: 0.02,
      stopLoss: 0.01,
      marketFilter: null,
    });
  });

  it('includes the market filter when enabled', () => {
    configManager.set('filter.enabled', true);
    configManager.set('filter.threshold', 0.015);

    expect(buildBacktestConfig().marketFilter).toEqual({
      symbols: [],
      threshold: 0.015,
      minSymbols: 10,
      sessionOpen: '09:00',
      baselineEnd: '09:05',
      checkStart: '09:25',
      checkEnd: '09:30',
    });
  });

  it('applies overrides last', () => {
    configManager.set('strategy.stopLoss', 0.005);
    const config = buildBacktestConfig({ stopLoss: 0.03, symbols: ['7203.T'] });

    expect(config.stopLoss).toBe(0.03);
    expect(config.symbols).toEqual(['7203.T']);
  });
});

describe('runBacktests', () => {
  let source: ReturnType<typeof createFakeSource>;

  beforeEach(() => {
    source = createFakeSource();
    source.setBars(TOYOTA.symbol, DAY, orbSession(DAY, [LONG_BREAKOUT, ['09:30', { close: 1040 }]]));
    source.setBars(SONY.symbol, DAY, orbSession(DAY, [SHORT_BREAKOUT, ['09:25', { close: 995 }]]));
  });

  it('gives every symbol its own engine and capital in per-symbol mode', async () => {
    const outcome = await runBacktests(source, backtestConfig(), 'per-symbol', [TOYOTA, SONY]);

    expect(outcome.mode).toBe('per-symbol');
    expect(outcome.filterStats).toBeNull();
    expect(outcome.results.map((r) => [r.symbol, r.name, r.sector])).toEqual([
      ['7203.T', 'Toyota Motor', 'Automotive'],
      ['6758.T', 'Sony Group', 'Technology'],
    ]);
    expect(outcome.results.map((r) => r.result.totalPnl)).toEqual([24_625, -10_150]);
    expect(outcome.results.map((r) => r.result.config.symbols)).toEqual([['7203.T'], ['6758.T']]);
  });

  it('runs one engine over shared capital in portfolio mode', async () => {
    const outcome = await runBacktests(source, backtestConfig(), 'portfolio', [TOYOTA, SONY]);

    expect(outcome.results).toHaveLength(1);
    const [row] = outcome.results;
    expect(row.symbol).toBe(PORTFOLIO_LABEL);
    expect(row.name).toBe('2 symbols');
    expect(row.result.config.symbols).toEqual(['7203.T', '6758.T']);
    // Each symbol's day runs to its exit before the next symbol, so 7203.T has
    // returned its cash (1,024,625) by the time 6758.T enters: 1040 shares at 985.
    expect(row.result.trades.map((t) => [t.symbol, t.quantity, t.pnl])).toEqual([
      ['7203.T', 985, 24_625],
      ['6758.T', 1040, -10_400],
    ]);
    expect(row.result.finalEquity).toBe(1_014_225);
  });

  it('shares one market filter across symbols', async () => {
    const config = backtestConfig({
      marketFilter: {
        symbols: [],
        threshold: 0.01,
        minSymbols: 1,
        sessionOpen: '09:00',
        baselineEnd: '09:05',
        checkStart: '09:25',
        checkEnd: '09:30',
      },
    });

    const outcome = await runBacktests(source, config, 'per-symbol', [TOYOTA, SONY]);

    expect(outcome.filterStats).toEqual({
      totalDays: 1,
      longRestrictedDays: 0,
      shortRestrictedDays: 0,
      bothAllowedDays: 1,
      longRestrictionRate: 0,
      shortRestrictionRate: 0,
    });
  });

  it('returns no results for an empty symbol list', async () => {
    const outcome = await runBacktests(source, backtestConfig(), 'per-symbol', []);
    expect(outcome.results).toEqual([]);
  });
});
