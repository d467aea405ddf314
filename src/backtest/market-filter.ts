import type { Bar } from '../data/types.js';
import { mean, median } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { barsInWindow } from './range-breakout.js';
import type { MarketFilterConfig } from './types.js';

const log = createLogger('market-filter');

// Symbols with fewer bars than this for the day are left out of the median.
const MIN_BARS_PER_SYMBOL = 10;

export interface MarketCondition {
  allowLong: boolean;
  allowShort: boolean;
  marketChange: number;
  symbols: number;
  reason: string;
}

export interface MarketFilterStatistics {
  totalDays: number;
  longRestrictedDays: number;
  shortRestrictedDays: number;
  bothAllowedDays: number;
  longRestrictionRate: number;
  shortRestrictionRate: number;
}

/**
 * Blocks trading against a strong market-wide morning move, measured as the
 * median change of the universe between the opening window and the check
 * window.
 */
export class MarketFilter {
  private config: MarketFilterConfig;
  private utcOffsetMinutes: number;
  private cache = new Map<string, MarketCondition>();

  constructor(config: MarketFilterConfig, utcOffsetMinutes: number) {
    this.config = config;
    this.utcOffsetMinutes = utcOffsetMinutes;
    log.info(
      { threshold: config.threshold, minSymbols: config.minSymbols },
      'Market filter enabled',
    );
  }

  /** Change between mean close of the opening window and of the check window, or null. */
  morningChange(bars: Bar[]): number | null {
    if (bars.length < MIN_BARS_PER_SYMBOL) return null;

    const { sessionOpen, baselineEnd, checkStart, checkEnd } = this.config;
    const baseline = barsInWindow(bars, sessionOpen, baselineEnd, this.utcOffsetMinutes);
    const check = barsInWindow(bars, checkStart, checkEnd, this.utcOffsetMinutes);
    if (baseline.length === 0 || check.length === 0) return null;

    const startPrice = mean(baseline.map((b) => b.close));
    const endPrice = mean(check.map((b) => b.close));
    if (startPrice <= 0) return null;
    return (endPrice - startPrice) / startPrice;
  }

  get universe(): string[] {
    return this.config.symbols;
  }

  getCondition(date: string): MarketCondition | undefined {
    return this.cache.get(date);
  }

  evaluate(date: string, barsBySymbol: Map<string, Bar[]>): MarketCondition {
    const cached = this.cache.get(date);
    if (cached) return cached;

    const changes: number[] = [];
    for (const bars of barsBySymbol.values()) {
      const change = this.morningChange(bars);
      if (change !== null) changes.push(change);
    }

    const condition = this.decide(changes);
    this.cache.set(date, condition);

    if (!condition.allowLong || !condition.allowShort) {
      log.info({ date, marketChange: condition.marketChange }, condition.reason);
    } else {
      log.debug({ date, marketChange: condition.marketChange }, condition.reason);
    }
    return condition;
  }

  getStatistics(): MarketFilterStatistics {
    const conditions = [...this.cache.values()];
    const totalDays = conditions.length;
    const longRestrictedDays = conditions.filter((c) => !c.allowLong).length;
    const shortRestrictedDays = conditions.filter((c) => !c.allowShort).length;

    return {
      totalDays,
      longRestrictedDays,
      shortRestrictedDays,
      bothAllowedDays: conditions.filter((c) => c.allowLong && c.allowShort).length,
      longRestrictionRate: totalDays > 0 ? (longRestrictedDays / totalDays) * 100 : 0,
      shortRestrictionRate: totalDays > 0 ? (shortRestrictedDays / totalDays) * 100 : 0,
    };
  }

  private decide(changes: number[]): MarketCondition {
    const symbols = changes.length;
    if (symbols < this.config.minSymbols) {
      return {
        allowLong: true,
        allowShort: true,
        marketChange: 0,
        symbols,
        reason: `Insufficient data (${symbols} symbols)`,
      };
    }

    const marketChange = median(changes);
    const pct = `${(marketChange * 100).toFixed(2)}%`;

    if (marketChange > this.config.threshold) {
      return {
        allowLong: true,
        allowShort: false,
        marketChange,
        symbols,
        reason: `Strong uptrend (+${pct}), shorts blocked`,
      };
    }
    if (marketChange < -this.config.threshold) {
      return {
        allowLong: false,
        allowShort: true,
        marketChange,
        symbols,
        reason: `Strong downtrend (${pct}), longs blocked`,
      };
    }
    return { allowLong: true, allowShort: true, marketChange, symbols, reason: `Neutral (${pct})` };
  }
}
