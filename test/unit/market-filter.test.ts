import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { MarketFilter } from '../../src/backtest/market-filter.js';
import type { MarketFilterConfig } from '../../src/backtest/types.js';
import type { Bar } from '../../src/data/types.js';
import { TOKYO_OFFSET, minuteBars } from '../helpers/bars.js';

const DATE = '2025-10-01';

const CONFIG: MarketFilterConfig = {
  symbols: ['A', 'B', 'C'],
  threshold: 0.01,
  minSymbols: 3,
  sessionOpen: '09:00',
  baselineEnd: '09:05',
  checkStart: '09:25',
  checkEnd: '09:30',
};

/** 31 one-minute bars, 09:00-09:30, flat at 100 then at 100 * (1 + change) from 09:25. */
function morning(change: number, date = DATE): Bar[] {
  const closes = Array.from({ length: 31 }, (_, i) => (i >= 25 ? 100 + change * 100 : 100));
  return minuteBars(date, '09:00', closes);
}

function universe(...changes: number[]): Map<string, Bar[]> {
  return new Map(changes.map((c, i) => [`S${i}`, morning(c)]));
}

describe('MarketFilter', () => {
  const filter = () => new MarketFilter(CONFIG, TOKYO_OFFSET);

  describe('morningChange', () => {
    it('compares mean closes of the two windows', () => {
      expect(filter().morningChange(morning(0.02))).toBeCloseTo(0.02, 10);
    });

    it('ignores symbols with fewer than 10 bars', () => {
      expect(filter().morningChange(morning(0.02).slice(0, 9))).toBeNull();
    });

    it('returns null when a window has no bars', () => {
      expect(filter().morningChange(morning(0.02).slice(0, 20))).toBeNull();
    });
  });

  describe('evaluate', () => {
    it('blocks shorts in a strong uptrend', () => {
      const condition = filter().evaluate(DATE, universe(0.02, 0.03, -0.01));
      expect(condition.allowLong).toBe(true);
      expect(condition.allowShort).toBe(false);
      expect(condition.symbols).toBe(3);
      expect(condition.marketChange).toBeCloseTo(0.02, 10);
      expect(condition.reason).toBe('Strong uptrend (+2.00%), shorts blocked');
    });

    it('blocks longs in a strong downtrend', () => {
      const condition = filter().evaluate(DATE, universe(-0.02, -0.03, 0.01));
      expect(condition.allowLong).toBe(false);
      expect(condition.allowShort).toBe(true);
      expect(condition.reason).toBe('Strong downtrend (-2.00%), longs blocked');
    });

    it('allows both sides inside the threshold', () => {
      const condition = filter().evaluate(DATE, universe(0.005, -0.005, 0));
      expect(condition.allowLong).toBe(true);
      expect(condition.allowShort).toBe(true);
      expect(condition.reason).toBe('Neutral (0.00%)');
    });

    it('allows both sides with too few usable symbols', () => {
      const bars = universe(0.05, 0.05);
      bars.set('thin', morning(0.05).slice(0, 5));
      const condition = filter().evaluate(DATE, bars);
      expect(condition).toEqual({
        allowLong: true,
        allowShort: true,
        marketChange: 0,
        symbols: 2,
        reason: 'Insufficient data (2 symbols)',
      });
    });

    it('memoizes the decision per date', () => {
      const f = filter();
      const first = f.evaluate(DATE, universe(0.02, 0.03, 0.04));
      const second = f.evaluate(DATE, universe(-0.02, -0.03, -0.04));
      expect(second).toBe(first);
      expect(f.getCondition(DATE)).toBe(first);
      expect(f.getCondition('2025-10-02')).toBeUndefined();
    });
  });

  it('exposes the configured universe', () => {
    expect(filter().universe).toEqual(['A', 'B', 'C']);
  });

  describe('getStatistics', () => {
    it('summarizes restricted days', () => {
      const f = filter();
      f.evaluate('2025-10-01', universe(0.02, 0.02, 0.02));
      f.evaluate('2025-10-02', universe(-0.02, -0.02, -0.02));
      f.evaluate('2025-10-03', universe(0, 0, 0));
      f.evaluate('2025-10-06', universe(0.03, 0.03, 0.03));

      expect(f.getStatistics()).toEqual({
        totalDays: 4,
        longRestrictedDays: 1,
        shortRestrictedDays: 2,
        bothAllowedDays: 1,
        longRestrictionRate: 25,
        shortRestrictionRate: 50,
      });
    });

    it('is all zero before any evaluation', () => {
      expect(filter().getStatistics()).toEqual({
        totalDays: 0,
        longRestrictedDays: 0,
        shortRestrictedDays: 0,
        bothAllowedDays: 0,
        longRestrictionRate: 0,
        shortRestrictionRate: 0,
      });
    });
  });
});
