import type { Side } from './types.js';

/** One-way commission as a fraction of traded value. */
export class CostCalculator {
  readonly commissionRate: number;

  constructor(commissionRate: number) {
    if (!(commissionRate >= 0 && commissionRate <= 1)) {
      throw new RangeError(`Commission rate must be between 0 and 1, got ${commissionRate}`);
    }
    this.commissionRate = commissionRate;
  }

  commission(price: number, quantity: number): number {
    return price * quantity * this.commissionRate;
  }

  roundTrip(entryPrice: number, exitPrice: number, quantity: number): number {
    return this.commission(entryPrice, quantity) + this.commission(exitPrice, quantity);
  }

  netProfit(entryPrice: number, exitPrice: number, quantity: number, side: Side): number {
    const gross =
      side === 'long' ? (exitPrice - entryPrice) * quantity : (entryPrice - exitPrice) * quantity;
    return gross - this.roundTrip(entryPrice, exitPrice, quantity);
  }
}
