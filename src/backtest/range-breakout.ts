import type { Bar } from '../data/types.js';
import { localMinutesOfDay, parseClockTime } from '../utils/market-hours.js';
import { InsufficientRangeDataError } from './errors.js';
import type { OpeningRange, Side } from './types.js';

export interface RangeWindow {
  rangeStart: string;
  rangeEnd: string;
  utcOffsetMinutes: number;
}

/** Bars whose local time lies in [from, to] (or [from, to) when `endExclusive`). */
export function barsInWindow(
  bars: Bar[],
  from: string,
  to: string,
  utcOffsetMinutes: number,
  endExclusive = false,
): Bar[] {
  const start = parseClockTime(from);
  const end = parseClockTime(to);
  return bars.filter((bar) => {
    const minute = localMinutesOfDay(bar.timestamp, utcOffsetMinutes);
    return minute >= start && (endExclusive ? minute < end : minute <= end);
  });
}

export class RangeBreakoutDetector {
  private window: RangeWindow;

  constructor(window: RangeWindow) {
    parseClockTime(window.rangeStart);
    parseClockTime(window.rangeEnd);
    this.window = window;
  }

  calculateRange(bars: Bar[]): OpeningRange {
    const inRange = barsInWindow(
      bars,
      this.window.rangeStart,
      this.window.rangeEnd,
      this.window.utcOffsetMinutes,
    );
    if (inRange.length < 2) {
      throw new InsufficientRangeDataError(inRange.length);
    }

    return {
      high: Math.max(...inRange.map((b) => b.high)),
      low: Math.min(...inRange.map((b) => b.low)),
      bars: inRange.length,
    };
  }

  detectBreakout(bar: Bar, range: OpeningRange): Side | null {
    if (!Number.isFinite(bar.high) || !Number.isFinite(bar.low)) return null;
    if (bar.high > range.high) return 'long';
    if (bar.low < range.low) return 'short';
    return null;
  }

  /** Market order filled at the close of the breakout bar. */
  getEntryPrice(bar: Bar): number {
    return bar.close;
  }
}
