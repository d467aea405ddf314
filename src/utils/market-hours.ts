/**
 * Exchange-local clock helpers. Strategy times are configured as local "HH:MM"
 * strings while bar timestamps are UTC ISO strings; the exchange is described
 * by a fixed UTC offset in minutes (Tokyo = 540).
 */

const MS_PER_MINUTE = 60_000;
const MINUTES_PER_DAY = 24 * 60;
const CLOCK_REGEX = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export function timeInMinutes(hours: number, minutes: number): number {
  return hours * 60 + minutes;
}

export function parseClockTime(clock: string): number {
  const match = CLOCK_REGEX.exec(clock);
  if (!match) {
    throw new Error(`Invalid clock time "${clock}", expected HH:MM`);
  }
  return timeInMinutes(Number(match[1]), Number(match[2]));
}

export function formatClockTime(minutes: number): string {
  const normalized = ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const h = Math.floor(normalized / 60);
  const m = normalized % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

export function addMinutesToClock(clock: string, minutes: number): string {
  return formatClockTime(parseClockTime(clock) + minutes);
}

/** Minutes since local midnight for a UTC timestamp. */
export function localMinutesOfDay(timestamp: string, utcOffsetMinutes: number): number {
  const localMs = new Date(timestamp).getTime() + utcOffsetMinutes * MS_PER_MINUTE;
  const minutes = Math.floor(localMs / MS_PER_MINUTE);
  return ((minutes % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

/** Local calendar date (YYYY-MM-DD) of a UTC timestamp. */
export function localDateOf(timestamp: string, utcOffsetMinutes: number): string {
  const localMs = new Date(timestamp).getTime() + utcOffsetMinutes * MS_PER_MINUTE;
  return new Date(localMs).toISOString().split('T')[0];
}

/** UTC ISO timestamp for a local date and clock time. */
export function sessionTimestamp(date: string, clock: string, utcOffsetMinutes: number): string {
  if (!DATE_REGEX.test(date)) {
    throw new Error(`Invalid date "${date}", expected YYYY-MM-DD`);
  }
  const [year, month, day] = date.split('-').map(Number);
  const utcMs =
    Date.UTC(year, month - 1, day) +
    (parseClockTime(clock) - utcOffsetMinutes) * MS_PER_MINUTE;
  return new Date(utcMs).toISOString();
}

export function isWeekend(date: string): boolean {
  const day = new Date(`${date}T00:00:00Z`).getUTCDay();
  return day === 0 || day === 6;
}

/** Every calendar date from start to end inclusive. */
export function eachDate(startDate: string, endDate: string): string[] {
  const dates: string[] = [];
  const cursor = new Date(`${startDate}T00:00:00Z`);
  const end = new Date(`${endDate}T00:00:00Z`);
  while (cursor.getTime() <= end.getTime()) {
    dates.push(cursor.toISOString().split('T')[0]);
    cursor.setUTCDate(cursor.getUTCDate() + 1);
  }
  return dates;
}

export function eachWeekday(startDate: string, endDate: string): string[] {
  return eachDate(startDate, endDate).filter((d) => !isWeekend(d));
}

export function shiftDate(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().split('T')[0];
}
