/** A calendar date without time or zone, formatted `YYYY-MM-DD`. */
export type CalendarDate = string;

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

function toUtcMillis(value: CalendarDate): number {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    throw new Error(`Invalid date: ${value}`);
  }
  return Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
}

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    return false;
  }
  const parsed = new Date(toUtcMillis(value));
  return (
    parsed.getUTCFullYear() === Number(match[1]) &&
    parsed.getUTCMonth() + 1 === Number(match[2]) &&
    parsed.getUTCDate() === Number(match[3])
  );
}

/** The local calendar date of an instant. */
export function toCalendarDate(date: Date): CalendarDate {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function today(clock: Clock = systemClock): CalendarDate {
  return toCalendarDate(clock.now());
}

/** Number of calendar days in the inclusive range. */
export function inclusiveDays(from: CalendarDate, to: CalendarDate): number {
  return Math.round((toUtcMillis(to) - toUtcMillis(from)) / MS_PER_DAY) + 1;
}

export function yearOf(date: CalendarDate): number {
  return Number(date.slice(0, 4));
}

/** Hours between two instants, rounded to two decimals. */
export function hoursBetween(start: Date, end: Date): number {
  const hours = (end.getTime() - start.getTime()) / (60 * 60 * 1000);
  return Math.round(hours * 100) / 100;
}
