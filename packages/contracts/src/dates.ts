/**
 * @fileoverview ISO calendar-date helpers.
 *
 * All arithmetic is done in UTC so results never depend on the host timezone.
 *
 * @module @quotebook/contracts/dates
 */

import type { IsoDate } from './market.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Check that a value is a `YYYY-MM-DD` string naming a real calendar day.
 *
 * @example
 * ```typescript
 * isIsoDate('2024-02-29'); // true (leap day)
 * isIsoDate('2023-02-29'); // false
 * ```
 */
export function isIsoDate(value: unknown): value is IsoDate {
  if (typeof value !== 'string') return false;

  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;

  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    date.getUTCFullYear() === Number(y) &&
    date.getUTCMonth() === Number(m) - 1 &&
    date.getUTCDate() === Number(d)
  );
}

/**
 * Parse an ISO date into a UTC-midnight Date.
 */
export function parseIsoDate(value: IsoDate): Date {
  if (!isIsoDate(value)) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  return new Date(`${value}T00:00:00.000Z`);
}

/**
 * Format a UTC-midnight Date as an ISO date.
 */
export function formatIsoDate(date: Date): IsoDate {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Shift an ISO date by a whole number of days.
 *
 * @example
 * ```typescript
 * addDays('2023-01-01', -1); // '2022-12-31'
 * ```
 */
export function addDays(value: IsoDate, days: number): IsoDate {
  return formatIsoDate(new Date(parseIsoDate(value).getTime() + days * MS_PER_DAY));
}

/**
 * Day of week for an ISO date, 0 = Sunday.
 */
export function dayOfWeek(value: IsoDate): number {
  return parseIsoDate(value).getUTCDay();
}

/**
 * Convert a value read from a store's date column into an ISO date.
 *
 * - strings are cut to their first ten characters (`'2024-03-15 00:00:00'`)
 * - Date objects use their local calendar fields, which is how the pg driver
 *   materializes a `DATE` column
 *
 * Returns null for anything else.
 */
export function toIsoDate(value: unknown): IsoDate | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    const year = value.getFullYear();
    const month = String(value.getMonth() + 1).padStart(2, '0');
    const day = String(value.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }

  if (typeof value === 'string') {
    const head = value.slice(0, 10);
    return isIsoDate(head) ? head : null;
  }

  return null;
}
