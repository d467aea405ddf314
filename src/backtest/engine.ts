import type { Bar } from '../data/types.js';
import { formatCurrency, formatPercent, round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import {
  eachWeekday,
  localMinutesOfDay,
  parseClockTime,
  sessionTimestamp,
} from '../utils/market-hours.js';
import { CostCalculator } from './costs.js';
import { InsufficientRangeDataError } from './errors.js';
import { MarketFilter, type MarketCondition } from './market-filter.js';
import { computeTotalReturn, summarizePerformance } from './performance.js';
import { Portfolio } from './portfolio.js';
import { Position } from './position.js';
import { RangeBreakoutDetector, barsInWindow } from './range-breakout.js';
import type {
  BacktestConfig,
  BacktestResult,
  BacktestTrade,
  BarSource,
  EquityPoint,
  ExitReason,
  OpeningRange,
} from './types.js';

const log = createLogger('backtest-engine');

const ALLOW_ALL: Pick<MarketCondition, 'allowLong' | 'allowShort'> = {
  allowLong: true,
  allowShort: true,
};

export interface BacktestEngineOptions {
  config: BacktestConfig;
  source: BarSource;
  /** Shared across engines so each day's market condition is measured once. */
  marketFilter?: MarketFilter;
}

/**
 * Replays the opening range breakout rules one trading day at a time.
 * Every position is flat by the end of its day.
 */
export class BacktestEngine {
  private config: BacktestConfig;
  private source: BarSource;
  private portfolio: Portfolio;
  private costs: CostCalculator;
  private detector: RangeBreakoutDetector;
  private marketFilter: MarketFilter | null;
  private trades: BacktestTrade[] = [];
  private equityCurve: EquityPoint[] = [];
  private lastPrices = new Map<string, number>();

  constructor(options: BacktestEngineOptions) {
    const { config } = options;
    for (const clock of [config.entryStart, config.entryEnd, config.forceExitTime]) {
      parseClockTime(clock);
    }

    this.config = config;
    this.source = options.source;
    this.portfolio = new Portfolio(config.initialCapital);
    this.costs = new CostCalculator(config.commissionRate);
    this.detector = new RangeBreakoutDetector({
      rangeStart: config.rangeStart,
      rangeEnd: config.rangeEnd,
      utcOffsetMinutes: config.utcOffsetMinutes,
    });
    this.marketFilter =
      options.marketFilter ??
      (config.marketFilter ? new MarketFilter(config.marketFilter, config.utcOffsetMinutes) : null);
  }

  async run(): Promise<BacktestResult> {
    const { config } = this;
    log.info(
      {
        symbols: config.symbols.length,
        startDate: config.startDate,
        endDate: config.endDate,
        initialCapital: config.initialCapital,
      },
      'Starting backtest',
    );

    const days = eachWeekday(config.startDate, config.endDate);
    for (const date of days) {
      await this.runDay(date);
    }

    const result = this.buildResult(days.length);
    log.info(
      {
        tradingDays: result.tradingDays,
        trades: result.trades.length,
        finalEquity: formatCurrency(result.finalEquity),
        totalReturn: formatPercent(result.totalReturn),
      },
      'Backtest complete',
    );
    return result;
  }

  private async runDay(date: string): Promise<void> {
    this.lastPrices.clear();
    const barsBySymbol = await this.loadDay(date);

    const condition = this.marketFilter
      ? await this.marketCondition(this.marketFilter, date, barsBySymbol)
      : ALLOW_ALL;

    for (const symbol of this.config.symbols) {
      const bars = barsBySymbol.get(symbol);
      if (!bars || bars.length === 0) {
        log.debug({ symbol, date }, 'No data');
        continue;
      }
      try {
        await this.processSymbol(symbol, date, bars, condition);
      } catch (err) {
        log.warn({ symbol, date, err }, 'Symbol processing failed');
      }
    }

    this.closeAllPositions(date);

    const equity = this.portfolio.cash;
    this.equityCurve.push({ date, equity });
    log.debug({ date, equity: round(equity) }, 'Daily equity');
  }

  private async loadDay(date: string): Promise<Map<string, Bar[]>> {
    const barsBySymbol = new Map<string, Bar[]>();
    for (const symbol of this.config.symbols) {
      const bars = await this.loadBars(symbol, date);
      if (bars) barsBySymbol.set(symbol, bars);
    }
    return barsBySymbol;
  }

  private async loadBars(symbol: string, date: string): Promise<Bar[] | null> {
    const { sessionOpen, forceExitTime, interval, utcOffsetMinutes } = this.config;
    try {
      return await this.source.getIntradayBars(
        symbol,
        sessionTimestamp(date, sessionOpen, utcOffsetMinutes),
        sessionTimestamp(date, forceExitTime, utcOffsetMinutes),
        interval,
      );
    } catch (err) {
      log.warn({ symbol, date, err }, 'Failed to load bars');
      return null;
    }
  }

  /** Measures the filter universe, loading any symbol this engine does not trade. */
  private async marketCondition(
    filter: MarketFilter,
    date: string,
    loaded: Map<string, Bar[]>,
  ): Promise<MarketCondition> {
    const known = filter.getCondition(date);
    if (known) return known;

    const universe = filter.universe.length > 0 ? filter.universe : this.config.symbols;
    const barsBySymbol = new Map<string, Bar[]>();
    for (const symbol of universe) {
      const bars = loaded.get(symbol) ?? (await this.loadBars(symbol, date));
      if (bars) barsBySymbol.set(symbol, bars);
    }
    return filter.evaluate(date, barsBySymbol);
  }

  private async processSymbol(
    symbol: string,
    date: string,
    bars: Bar[],
    condition: Pick<MarketCondition, 'allowLong' | 'allowShort'>,
  ): Promise<void> {
    if (this.config.limitCheck) {
      const limit = await this.source.checkLimitUpDown(symbol, date);
      if (limit.isLimitUp || limit.isLimitDown) {
        log.warn(
          { symbol, date, limitUp: limit.isLimitUp, limitDown: limit.isLimitDown },
          'Price limit hit, skipping entry',
        );
        return;
      }
    }

    let range: OpeningRange;
    try {
      range = this.detector.calculateRange(bars);
    } catch (err) {
      if (err instanceof InsufficientRangeDataError) {
        log.debug({ symbol, date, bars: err.bars }, 'Opening range unavailable');
        return;
      }
      throw err;
    }

    const { entryStart, entryEnd, utcOffsetMinutes } = this.config;
    for (const bar of barsInWindow(bars, entryStart, entryEnd, utcOffsetMinutes, true)) {
      if (this.portfolio.getPosition(symbol)) break;

      const side = this.detector.detectBreakout(bar, range);
      if (side === null) continue;
      const allowed = side === 'long' ? condition.allowLong : condition.allowShort;
      if (!allowed) continue;

      const entryPrice = this.detector.getEntryPrice(bar);
      const quantity = this.portfolio.positionSize(
        entryPrice,
        this.portfolio.openPositionCount + 1,
      );
      if (quantity <= 0) continue;

      this.portfolio.addPosition(
        new Position({
          symbol,
          side,
          entryPrice,
          quantity,
          entryTime: bar.timestamp,
          profitTarget: this.config.profitTarget,
          stopLoss: this.config.stopLoss,
        }),
      );
      log.info(
        { symbol, side, price: entryPrice, quantity, time: bar.timestamp, range },
        'Entry',
      );
    }

    this.monitorPosition(symbol, bars);
    this.lastPrices.set(symbol, bars[bars.length - 1].close);
  }

  /** Exits on bar close: profit target, then stop loss, then force-exit time. */
  private monitorPosition(symbol: string, bars: Bar[]): void {
    const position = this.portfolio.getPosition(symbol);
    if (!position) return;

    const entryMs = new Date(position.entryTime).getTime();
    const forceExit = parseClockTime(this.config.forceExitTime);

    for (const bar of bars) {
      if (new Date(bar.timestamp).getTime() <= entryMs) continue;
      const price = bar.close;
      if (!Number.isFinite(price)) continue;

      let reason: ExitReason | null = null;
      if (position.shouldExitProfit(price)) reason = 'profit';
      else if (position.shouldExitLoss(price)) reason = 'loss';
      else if (localMinutesOfDay(bar.timestamp, this.config.utcOffsetMinutes) >= forceExit) {
        reason = 'force';
      }

      if (reason) {
        this.closePosition(position, price, bar.timestamp, reason);
        return;
      }
    }
  }

  private closeAllPositions(date: string): void {
    const open = [...this.portfolio.openPositions];
    if (open.length === 0) return;

    log.info({ date, positions: open.length }, 'Closing remaining positions at day end');
    const exitTime = sessionTimestamp(
      date,
      this.config.forceExitTime,
      this.config.utcOffsetMinutes,
    );
    for (const position of open) {
      const price = this.lastPrices.get(position.symbol) ?? position.entryPrice;
      this.closePosition(position, price, exitTime, 'day_end');
    }
  }

  private closePosition(position: Position, price: number, time: string, reason: ExitReason): void {
    const commission = this.costs.roundTrip(position.entryPrice, price, position.quantity);
    const grossPnl = this.portfolio.closePosition(position, price, time, reason, commission);
    const pnl = grossPnl - commission;
    const cost = position.cost;

    this.trades.push({
      symbol: position.symbol,
      side: position.side,
      entryTime: position.entryTime,
      entryPrice: position.entryPrice,
      exitTime: time,
      exitPrice: price,
      quantity: position.quantity,
      grossPnl,
      commission,
      pnl,
      returnPct: cost > 0 ? pnl / cost : 0,
      exitReason: reason,
    });

    log.info(
      { symbol: position.symbol, side: position.side, price, pnl: round(pnl), reason },
      'Exit',
    );
  }

  private buildResult(tradingDays: number): BacktestResult {
    const { initialCapital } = this.config;
    const totalPnl = this.trades.reduce((sum, t) => sum + t.pnl, 0);

    return {
      config: this.config,
      initialCapital,
      finalEquity: this.portfolio.cash,
      totalPnl,
      totalReturn: computeTotalReturn(this.trades, initialCapital),
      tradingDays,
      trades: this.trades,
      equityCurve: this.equityCurve,
      metrics: summarizePerformance(this.trades, this.equityCurve, initialCapital),
    };
  }
}
