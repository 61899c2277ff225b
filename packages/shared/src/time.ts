import { addDays, eachDayOfInterval, format, getISODay, parseISO } from 'date-fns';

/**
 * Calendar days are `YYYY-MM-DD` strings and clock times are `HH:MM` strings.
 * Both sort correctly as plain strings, which the store and aggregation rely on.
 */
export const ISO_DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const CLOCK_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const WEEKDAY_CODES = {
  MON: 1,
  TUE: 2,
  WED: 3,
  THU: 4,
  FRI: 5,
  SAT: 6,
  SUN: 7,
} as const;

type WeekdayCode = keyof typeof WEEKDAY_CODES;

function isWeekdayCode(token: string): token is WeekdayCode {
  return Object.prototype.hasOwnProperty.call(WEEKDAY_CODES, token);
}

export function toIsoDay(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function addIsoDays(day: string, amount: number): string {
  return toIsoDay(addDays(parseISO(day), amount));
}

/**
 * Every calendar day from `start` to `end`, inclusive. Empty when `end` precedes `start`.
 */
export function eachIsoDay(start: string, end: string): string[] {
  if (end < start) return [];
  return eachDayOfInterval({ start: parseISO(start), end: parseISO(end) }).map(toIsoDay);
}

/**
 * ISO weekday of a calendar day: 1 = Monday … 7 = Sunday.
 */
export function isoWeekday(day: string): number {
  return getISODay(parseISO(day));
}

/**
 * Minutes since midnight for an `HH:MM` clock time.
 */
export function clockTimeToMinutes(time: string): number {
  const [hh, mm] = time.split(':');
  return parseInt(hh ?? '0', 10) * 60 + parseInt(mm ?? '0', 10);
}

export function hoursToMinutes(hours: number): number {
  return Math.round(hours * 60);
}

export function minutesToHours(minutes: number): number {
  return Math.round((minutes / 60) * 100) / 100;
}

/**
 * Parses a weekly pattern such as `MON,TUE,WED` into ISO weekday numbers.
 * Returns null when any token is not a weekday code.
 */
export function parseWorkingDays(pattern: string): number[] | null {
  const days = new Set<number>();
  for (const raw of pattern.split(',')) {
    const token = raw.trim().toUpperCase();
    if (!token) continue;
    if (!isWeekdayCode(token)) return null;
    days.add(WEEKDAY_CODES[token]);
  }
  return [...days].sort((a, b) => a - b);
}
