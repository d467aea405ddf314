import { InvalidPositionError, PositionStateError } from './errors.js';
import type { ExitReason, Side } from './types.js';

export interface PositionInit {
  symbol: string;
  side: Side;
  entryPrice: number;
  quantity: number;
  entryTime: string;
  profitTarget?: number | null;
  stopLoss?: number | null;
}

export class Position {
  readonly symbol: string;
  readonly side: Side;
  readonly entryPrice: number;
  readonly quantity: number;
  readonly entryTime: string;
  readonly profitTarget: number | null;
  readonly stopLoss: number | null;

  exitPrice: number | null = null;
  exitTime: string | null = null;
  exitReason: ExitReason | null = null;
  realizedPnl: number | null = null;

  constructor(init: PositionInit) {
    if (init.side !== 'long' && init.side !== 'short') {
      throw new InvalidPositionError(`Invalid side "${String(init.side)}", expected long or short`);
    }
    if (!(init.quantity > 0)) {
      throw new InvalidPositionError('Quantity must be positive');
    }
    if (!(init.entryPrice > 0)) {
      throw new InvalidPositionError('Entry price must be positive');
    }

    this.symbol = init.symbol;
    this.side = init.side;
    this.entryPrice = init.entryPrice;
    this.quantity = init.quantity;
    this.entryTime = init.entryTime;
    this.profitTarget = init.profitTarget ?? null;
    this.stopLoss = init.stopLoss ?? null;
  }

  get isOpen(): boolean {
    return this.exitPrice === null;
  }

  get cost(): number {
    return this.entryPrice * this.quantity;
  }

  unrealizedPnl(price: number): number {
    return this.side === 'long'
      ? (price - this.entryPrice) * this.quantity
      : (this.entryPrice - price) * this.quantity;
  }

  shouldExitProfit(price: number): boolean {
    if (this.profitTarget === null) return false;
    return this.side === 'long'
      ? price >= this.entryPrice * (1 + this.profitTarget)
      : price <= this.entryPrice * (1 - this.profitTarget);
  }

  shouldExitLoss(price: number): boolean {
    if (this.stopLoss === null) return false;
    return this.side === 'long'
      ? price <= this.entryPrice * (1 - this.stopLoss)
      : price >= this.entryPrice * (1 + this.stopLoss);
  }

  /** Marks the position closed and returns the gross realized P&L. */
  close(price: number, time: string, reason: ExitReason): number {
    if (!this.isOpen) {
      throw new PositionStateError(`Position ${this.symbol} is already closed`);
    }
    const pnl = this.unrealizedPnl(price);
    this.exitPrice = price;
    this.exitTime = time;
    this.exitReason = reason;
    this.realizedPnl = pnl;
    return pnl;
  }

  /** Holding time in minutes, or null while open. */
  durationMinutes(): number | null {
    if (this.exitTime === null) return null;
    return (new Date(this.exitTime).getTime() - new Date(this.entryTime).getTime()) / 60_000;
  }
}
