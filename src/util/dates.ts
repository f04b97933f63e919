/**
 * Date utilities for observation timestamps and recency windows
 */

import { differenceInMilliseconds, isAfter, isValid, parseISO, subDays } from 'date-fns';

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * Parse various date formats into a Date object
 */
export function parseDate(dateStr: string | null | undefined): Date | null {
  if (!dateStr || typeof dateStr !== 'string') {
    return null;
  }

  // Try ISO format first
  const isoDate = parseISO(dateStr);
  if (isValid(isoDate)) {
    return isoDate;
  }

  // US formats used by county and state reports
  const usMatch = dateStr.trim().match(/^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/);
  if (usMatch) {
    const [, month, day, year] = usMatch;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    if (isValid(date) && date.getUTCDate() === Number(day)) {
      return date;
    }
  }

  return null;
}

/**
 * Parse a timestamp that must be valid, e.g. a record's observed_at
 */
export function requireDate(value: string, label: string): Date {
  const date = parseDate(value);
  if (!date) {
    throw new RangeError(`Invalid ${label}: ${value}`);
  }
  return date;
}

/**
 * Check if a date falls within the N days before `now` (strictly after the cutoff)
 */
export function isWithinDays(date: Date, days: number, now: Date = new Date()): boolean {
  return isAfter(date, subDays(now, days));
}

/**
 * Age of a date in (fractional) days relative to a reference, never negative
 */
export function ageInDays(date: Date, reference: Date): number {
  return Math.max(0, differenceInMilliseconds(reference, date) / MS_PER_DAY);
}

/**
 * Later of two ISO timestamps; null counts as "never"
 */
export function latestTimestamp(current: string | null, candidate: string): string {
  if (current === null) {
    return candidate;
  }
  const currentDate = parseDate(current);
  const candidateDate = parseDate(candidate);
  if (!currentDate) return candidate;
  if (!candidateDate) return current;
  return isAfter(candidateDate, currentDate) ? candidate : current;
}

/**
 * Compare two ISO timestamps chronologically (negative when a is earlier)
 */
export function compareTimestamps(a: string, b: string): number {
  const dateA = parseDate(a);
  const dateB = parseDate(b);
  if (!dateA || !dateB) {
    return a.localeCompare(b);
  }
  return dateA.getTime() - dateB.getTime();
}
