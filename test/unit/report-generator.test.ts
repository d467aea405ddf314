import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { MockResvg } = vi.hoisted(() => ({
  MockResvg: vi.fn(function () {
    return { render: () => ({ asPng: () => Buffer.from('png-bytes') }) };
  }),
}));

vi.mock('@resvg/resvg-js', () => ({ Resvg: MockResvg }));

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import type { RunOutcome, SymbolResult } from '../../src/backtest/runner.js';
import {
  ReportGenerator,
  SUMMARY_HEADERS,
  buildDailyPnl,
  buildSummaryText,
  dailyPnlRows,
  sortByPnl,
  splitBySymbol,
  summaryRow,
  tradeRow,
} from '../../src/reporting/report-generator.js';
import { makeResult, makeSymbolResult, makeTrade } from '../helpers/results.js';

const WIN = makeTrade();
const LOSS = makeTrade({
  symbol: '6758.T',
  side: 'short',
  entryTime: '2025-10-02T00:20:00.000Z',
  entryPrice: 2000,
  exitTime: '2025-10-02T00:40:00.000Z',
  exitPrice: 2020,
  quantity: 500,
  grossPnl: -10_000,
  pnl: -10_000,
  returnPct: -0.01,
  exitReason: 'loss',
});

const TOYOTA = makeSymbolResult(
  '7203.T',
  [WIN],
  [
    { date: '2025-10-01', equity: 1_030_000 },
    { date: '2025-10-02', equity: 1_030_000 },
  ],
  'Toyota Motor',
  'Automotive',
);
const SONY = makeSymbolResult(
  '6758.T',
  [LOSS],
  [{ date: '2025-10-02', equity: 990_000 }],
  'Sony Group',
  'Technology',
);

const OUTCOME: RunOutcome = { mode: 'per-symbol', results: [SONY, TOYOTA], filterStats: null };

const PORTFOLIO: SymbolResult = {
  symbol: 'PORTFOLIO',
  name: '2 symbols',
  sector: '',
  members: [
    { symbol: '7203.T', name: 'Toyota Motor', sector: 'Automotive' },
    { symbol: '6758.T', name: 'Sony Group', sector: 'Technology' },
  ],
  result: makeResult(
    [WIN, LOSS],
    [
      { date: '2025-10-01', equity: 1_030_000 },
      { date: '2025-10-02', equity: 1_020_000 },
    ],
    ['7203.T', '6758.T'],
  ),
};

describe('report rows', () => {
  it('sorts results by total P&L', () => {
    expect(sortByPnl([SONY, TOYOTA]).map((r) => r.symbol)).toEqual(['7203.T', '6758.T']);
  });

  it('builds a summary row with percentages', () => {
    expect(summaryRow(TOYOTA)).toEqual([
      '7203.T',
      'Toyota Motor',
      'Automotive',
      1_000_000,
      1_030_000,
      30_000,
      3,
      1,
      1,
      0,
      1,
      0,
      100,
      30_000,
      null,
      null,
      0,
      11.225,
    ]);
    expect(summaryRow(TOYOTA)).toHaveLength(SUMMARY_HEADERS.length);
  });

  it('builds a trade row', () => {
    expect(tradeRow(LOSS)).toEqual([
      '6758.T',
      'short',
      '2025-10-02T00:20:00.000Z',
      2000,
      '2025-10-02T00:40:00.000Z',
      2020,
      500,
      -10_000,
      0,
      -10_000,
      -1,
      'loss',
    ]);
  });

  it('derives daily P&L from equity changes', () => {
    const table = buildDailyPnl([TOYOTA, SONY]);

    expect(table).toEqual({
      dates: ['2025-10-01', '2025-10-02'],
      symbols: ['7203.T', '6758.T'],
      values: [
        [30_000, 0],
        [null, -10_000],
      ],
    });
    expect(dailyPnlRows(table)).toEqual([
      ['2025-10-01', 30_000, null],
      ['2025-10-02', 0, -10_000],
    ]);
  });
});

describe('splitBySymbol', () => {
  it('keeps single-symbol results as they are', () => {
    expect(splitBySymbol(TOYOTA)).toEqual([TOYOTA]);
  });

  it('gives each traded symbol of a portfolio its own result', () => {
    const split = splitBySymbol(PORTFOLIO);

    expect(split.map((r) => [r.symbol, r.name, r.sector, r.result.totalPnl])).toEqual([
      ['7203.T', 'Toyota Motor', 'Automotive', 30_000],
      ['6758.T', 'Sony Group', 'Technology', -10_000],
    ]);
    expect(split.map((r) => r.result.equityCurve)).toEqual([
      [
        { date: '2025-10-01', equity: 1_030_000 },
        { date: '2025-10-02', equity: 1_030_000 },
      ],
      [
        { date: '2025-10-01', equity: 1_000_000 },
        { date: '2025-10-02', equity: 990_000 },
      ],
    ]);
    expect(summaryRow(split[1])).toEqual([
      '6758.T',
      'Sony Group',
      'Technology',
      1_000_000,
      990_000,
      -10_000,
      -1,
      1,
      0,
      1,
      0,
      1,
      0,
      null,
      -10_000,
      null,
      1,
      -11.225,
    ]);
  });

  it('books daily P&L per symbol on the local exit date', () => {
    expect(buildDailyPnl(splitBySymbol(PORTFOLIO))).toEqual({
      dates: ['2025-10-01', '2025-10-02'],
      symbols: ['7203.T', '6758.T'],
      values: [
        [30_000, 0],
        [0, -10_000],
      ],
    });
  });
});

describe('buildSummaryText', () => {
  it('totals and ranks several symbols', () => {
    expect(buildSummaryText(OUTCOME)).toBe(
      [
        '=== Backtest Summary ===',
        'Mode: per-symbol',
        'Symbols: 2',
        'Period: 2025-10-01 to 2025-10-02',
        'Initial Capital (each): ¥1,000,000',
        '',
        '--- Strategy ---',
        'Range: 09:05-09:15',
        'Entry Window: 09:15-10:00',
        'Force Exit: 15:00',
        'Profit Target: 2.00%',
        'Stop Loss: 1.00%',
        '',
        '--- Totals ---',
        'Total P&L: ¥20,000',
        'Total Trades: 2',
        'Win Rate: 50.00%',
        'Profitable Symbols: 1/2',
        '',
        '--- Ranking ---',
        '  1. 7203.T     Toyota Motor                  ¥30,000  1 trades, WR 100.00%',
        '  2. 6758.T     Sony Group                   -¥10,000  1 trades, WR 0.00%',
        '',
      ].join('\n'),
    );
  });

  it('appends market filter statistics', () => {
    const text = buildSummaryText({
      ...OUTCOME,
      filterStats: {
        totalDays: 2,
        longRestrictedDays: 1,
        shortRestrictedDays: 0,
        bothAllowedDays: 1,
        longRestrictionRate: 50,
        shortRestrictionRate: 0,
      },
    });

    expect(text.endsWith(
      [
        '--- Market Filter ---',
        'Days evaluated: 2',
        'Longs blocked: 1 (50.0%)',
        'Shorts blocked: 0 (0.0%)',
        'Both allowed: 1',
        '',
      ].join('\n'),
    )).toBe(true);
  });

  it('uses the detailed summary for a single result', () => {
    const portfolio = {
      symbol: 'PORTFOLIO',
      name: '2 symbols',
      sector: '',
      result: makeResult([WIN, LOSS], [{ date: '2025-10-02', equity: 1_020_000 }], ['7203.T', '6758.T']),
    };

    const lines = buildSummaryText({ mode: 'portfolio', results: [portfolio], filterStats: null }).split(
      '\n',
    );

    expect(lines[0]).toBe('=== Backtest Results ===');
    expect(lines).toContain('=== Exit Reasons ===');
    expect(lines).toContain('=== Per-Symbol Breakdown ===');
    expect(lines).toContain('6758.T: 1 trades, WR 0.00%, P&L -¥10,000');
    expect(lines.slice(-3)).toEqual(['=== Monthly Returns ===', '2025-10: 2.00%', '']);
  });
});

describe('ReportGenerator', () => {
  let dir: string;
  const runAt = new Date(2025, 9, 31, 15, 30, 5);

  beforeEach(() => {
    vi.clearAllMocks();
    dir = mkdtempSync(join(tmpdir(), 'orb-report-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes tables, text and charts into a timestamped directory', () => {
    const generator = new ReportGenerator({ outputDir: dir, charts: true, currency: 'JPY', runAt });

    const report = generator.generate(OUTCOME);

    const runDir = join(dir, '20251031_153005');
    expect(report.directory).toBe(runDir);
    expect(report.files).toEqual(
      [
        'summary.csv',
        'trades.csv',
        'daily_pnl.csv',
        'summary.txt',
        'summary_chart.png',
        'daily_pnl_heatmap.png',
      ].map((name) => join(runDir, name)),
    );
    expect(readFileSync(join(runDir, 'daily_pnl.csv'), 'utf-8')).toBe(
      'date,7203.T,6758.T\n2025-10-01,30000,\n2025-10-02,0,-10000\n',
    );
    expect(readFileSync(join(runDir, 'summary.csv'), 'utf-8').split('\n')[0]).toBe(
      SUMMARY_HEADERS.join(','),
    );
    expect(readFileSync(join(runDir, 'trades.csv'), 'utf-8').split('\n')).toHaveLength(4);
    expect(readFileSync(join(runDir, 'summary.txt'), 'utf-8')).toBe(buildSummaryText(OUTCOME));
    expect(MockResvg).toHaveBeenCalledTimes(2);
  });

  it('writes one row per symbol for a portfolio run', () => {
    const generator = new ReportGenerator({ outputDir: dir, charts: false, currency: 'JPY', runAt });

    const report = generator.generate({ mode: 'portfolio', results: [PORTFOLIO], filterStats: null });

    const summary = readFileSync(join(report.directory, 'summary.csv'), 'utf-8').split('\n');
    expect(summary.slice(1).map((line) => line.split(',')[0])).toEqual(['7203.T', '6758.T', '']);
    expect(readFileSync(join(report.directory, 'daily_pnl.csv'), 'utf-8')).toBe(
      'date,7203.T,6758.T\n2025-10-01,30000,0\n2025-10-02,0,-10000\n',
    );
  });

  it('prefixes file names', () => {
    const generator = new ReportGenerator({
      outputDir: dir,
      prefix: 'sweep',
      charts: false,
      currency: 'JPY',
      runAt,
    });

    const report = generator.generate(OUTCOME);

    expect(report.files.map((f) => f.slice(report.directory.length + 1))).toEqual([
      'sweep_summary.csv',
      'sweep_trades.csv',
      'sweep_daily_pnl.csv',
      'sweep_summary.txt',
    ]);
    expect(MockResvg).not.toHaveBeenCalled();
  });

  it('keeps the text reports when charts fail to render', () => {
    MockResvg.mockImplementationOnce(function () {
      throw new Error('no fonts');
    });
    const generator = new ReportGenerator({ outputDir: dir, charts: true, currency: 'JPY', runAt });

    const report = generator.generate(OUTCOME);

    expect(report.files).toHaveLength(4);
    expect(existsSync(join(report.directory, 'summary.txt'))).toBe(true);
  });

  it('writes a table and its summary', () => {
    const generator = new ReportGenerator({ outputDir: dir, charts: false, currency: 'JPY', runAt });

    const report = generator.writeTable('optimization_stopLoss', ['rank', 'label'], [[1, '1%']], 'best\n');

    expect(report.files).toEqual([
      join(dir, '20251031_153005', 'optimization_stopLoss.csv'),
      join(dir, '20251031_153005', 'optimization_stopLoss.txt'),
    ]);
    expect(readFileSync(report.files[0], 'utf-8')).toBe('rank,label\n1,1%\n');
    expect(readFileSync(report.files[1], 'utf-8')).toBe('best\n');
  });
});
