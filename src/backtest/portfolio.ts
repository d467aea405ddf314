import { createLogger } from '../utils/logger.js';
import { InsufficientCashError } from './errors.js';
import type { Position } from './position.js';
import type { ExitReason } from './types.js';

const log = createLogger('portfolio');

/** Cash ledger with equal-weight sizing across concurrent positions. */
export class Portfolio {
  readonly initialCapital: number;
  private _cash: number;
  private open: Position[] = [];
  private closed: Position[] = [];

  constructor(initialCapital: number) {
    if (!(initialCapital > 0)) {
      throw new RangeError(`Initial capital must be positive, got ${initialCapital}`);
    }
    this.initialCapital = initialCapital;
    this._cash = initialCapital;
  }

  get cash(): number {
    return this._cash;
  }

  get openPositions(): readonly Position[] {
    return this.open;
  }

  get closedPositions(): readonly Position[] {
    return this.closed;
  }

  get openPositionCount(): number {
    return this.open.length;
  }

  /** Whole shares affordable when cash is split across `numPositions`. */
  positionSize(price: number, numPositions: number): number {
    if (price <= 0 || numPositions <= 0) return 0;
    return Math.floor(this._cash / numPositions / price);
  }

  hasSufficientCash(amount: number): boolean {
    return this._cash >= amount;
  }

  addPosition(position: Position): void {
    const required = position.cost;
    if (!this.hasSufficientCash(required)) {
      throw new InsufficientCashError(required, this._cash);
    }
    this.open.push(position);
    this._cash -= required;
    log.debug(
      { symbol: position.symbol, side: position.side, quantity: position.quantity, cash: this._cash },
      'Position opened',
    );
  }

  /**
   * Closes the position and credits its cost plus gross P&L, less the
   * commission charged for the round trip. Returns the gross P&L.
   */
  closePosition(
    position: Position,
    price: number,
    time: string,
    reason: ExitReason,
    commission = 0,
  ): number {
    const pnl = position.close(price, time, reason);
    this._cash += position.cost + pnl - commission;
    this.open = this.open.filter((p) => p !== position);
    this.closed.push(position);
    return pnl;
  }

  getPosition(symbol: string): Position | undefined {
    return this.open.find((p) => p.symbol === symbol);
  }

  /** Cash plus open positions marked to `prices`; unpriced positions count at cost. */
  totalValue(prices: Map<string, number> = new Map()): number {
    let total = this._cash;
    for (const position of this.open) {
      const price = prices.get(position.symbol);
      total += position.cost + (price === undefined ? 0 : position.unrealizedPnl(price));
    }
    return total;
  }

  unrealizedPnl(prices: Map<string, number>): number {
    let total = 0;
    for (const position of this.open) {
      const price = prices.get(position.symbol);
      if (price !== undefined) total += position.unrealizedPnl(price);
    }
    return total;
  }

  realizedPnl(): number {
    return this.closed.reduce((sum, p) => sum + (p.realizedPnl ?? 0), 0);
  }

  totalPnl(prices?: Map<string, number>): number {
    return this.realizedPnl() + (prices ? this.unrealizedPnl(prices) : 0);
  }

  winRate(): number {
    if (this.closed.length === 0) return 0;
    const wins = this.closed.filter((p) => (p.realizedPnl ?? 0) > 0).length;
    return wins / this.closed.length;
  }
}
