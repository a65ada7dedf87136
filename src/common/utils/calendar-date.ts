import { differenceInCalendarDays, isValid, parseISO } from 'date-fns';

export const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Calendar dates travel as `YYYY-MM-DD` strings and compare as whole days.
 */
export function isCalendarDate(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    CALENDAR_DATE_PATTERN.test(value) &&
    isValid(parseISO(value))
  );
}

function parseCalendarDate(value: string): Date {
  if (!isCalendarDate(value)) {
    throw new RangeError(`Invalid calendar date: ${value}`);
  }
  return parseISO(value);
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseCalendarDate(to), parseCalendarDate(from));
}

export function compareCalendarDates(a: string, b: string): number {
  return daysBetween(b, a);
}
