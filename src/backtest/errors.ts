export class BacktestError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'BacktestError';
    this.code = code;
  }
}

export class InsufficientRangeDataError extends BacktestError {
  readonly bars: number;

  constructor(bars: number) {
    super(`Not enough bars to form the opening range (got ${bars}, need 2)`, 'INSUFFICIENT_RANGE');
    this.name = 'InsufficientRangeDataError';
    this.bars = bars;
  }
}

export class InsufficientCashError extends BacktestError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(
      `Insufficient cash: required ${required.toFixed(0)}, available ${available.toFixed(0)}`,
      'INSUFFICIENT_CASH',
    );
    this.name = 'InsufficientCashError';
    this.required = required;
    this.available = available;
  }
}

export class PositionStateError extends BacktestError {
  constructor(message: string) {
    super(message, 'POSITION_STATE');
    this.name = 'PositionStateError';
  }
}

export class InvalidPositionError extends BacktestError {
  constructor(message: string) {
    super(message, 'INVALID_POSITION');
    this.name = 'InvalidPositionError';
  }
}
