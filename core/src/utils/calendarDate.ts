/**
 * Plain calendar dates (no time, no zone) for birth and death records.
 */

import type { CalendarDate } from '@family-graph/shared';
import { FamilyGraphError } from '../lib/errors.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const pad = (n: number, width: number): string => String(n).padStart(width, '0');

// setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
const toUtc = (date: CalendarDate): number => {
  const utc = new Date(0);
  utc.setUTCFullYear(date.year, date.month - 1, date.day);
  return utc.getTime();
};

/**
 * Build a CalendarDate, rejecting days that do not exist (e.g. 30 February).
 */
export function calendarDate(year: number, month: number, day: number): CalendarDate {
  const date = { year, month, day };
  if (![year, month, day].every(Number.isInteger) || month < 1 || month > 12 || day < 1) {
    throw new FamilyGraphError('INVALID_DATE', `Invalid calendar date: ${year}-${month}-${day}`);
  }
  // overflowing days roll into the next month
  const roundTrip = new Date(toUtc(date));
  if (roundTrip.getUTCMonth() + 1 !== month || roundTrip.getUTCDate() !== day) {
    throw new FamilyGraphError('INVALID_DATE', `Invalid calendar date: ${year}-${month}-${day}`);
  }
  return date;
}

/**
 * Parse an ISO YYYY-MM-DD string.
 */
export function parseCalendarDate(value: string): CalendarDate {
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    throw new FamilyGraphError('INVALID_DATE', `Expected a YYYY-MM-DD date, got "${value}"`);
  }
  return calendarDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

export const formatCalendarDate = (date: CalendarDate): string =>
  `${pad(date.year, 4)}-${pad(date.month, 2)}-${pad(date.day, 2)}`;

export const compareCalendarDates = (a: CalendarDate, b: CalendarDate): number =>
  toUtc(a) - toUtc(b);

// Whole days from `from` to `to`; negative when `to` is earlier
export const daysBetween = (from: CalendarDate, to: CalendarDate): number =>
  Math.round((toUtc(to) - toUtc(from)) / MS_PER_DAY);
