/**
 * Date utilities for trailing windows over YYYY-MM-DD strings.
 *
 * Calculations run on UTC calendar dates so a window does not shift with the
 * host's timezone.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/** Days counted per month when sizing a trailing window. */
export const DAYS_PER_WINDOW_MONTH = 30;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Format a Date object as "YYYY-MM-DD" (UTC).
 */
export function formatDate(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year.toString().padStart(4, '0')}-${month}-${day}`;
}

/**
 * Parse a "YYYY-MM-DD" string into a UTC Date.
 *
 * @throws Error if the string is malformed or names a day that does not exist
 */
export function parseDate(value: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new Error(`Invalid date format. Expected YYYY-MM-DD, got: ${value}`);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (formatDate(date) !== value) {
    throw new Error(`Invalid calendar date: ${value}`);
  }
  return date;
}

/**
 * Today's date as "YYYY-MM-DD" (UTC).
 */
export function today(): string {
  return formatDate(new Date());
}

/**
 * Shift a date by a whole number of days.
 */
export function addDays(date: string, days: number): string {
  return formatDate(new Date(parseDate(date).getTime() + days * DAY_MS));
}

/**
 * Inclusive [start, end] range for a trailing window of N months ending on
 * `asOf`. A month counts as 30 days.
 *
 * @example
 * getTrailingWindow(3, '2024-04-30') // ['2024-01-31', '2024-04-30']
 */
export function getTrailingWindow(windowMonths: number, asOf: string = today()): [string, string] {
  if (!Number.isInteger(windowMonths) || windowMonths < 1) {
    throw new Error(`Window must be a positive whole number of months, got ${windowMonths}`);
  }
  return [addDays(asOf, -windowMonths * DAYS_PER_WINDOW_MONTH), asOf];
}

/**
 * Whether a "YYYY-MM-DD" date lies within an inclusive range.
 */
export function isWithinRange(date: string, [start, end]: [string, string]): boolean {
  return date >= start && date <= end;
}
