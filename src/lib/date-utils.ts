/**
 * Date Utilities
 *
 * Centralized date handling for GDD runs.
 * All dates in the system are calendar dates stored as "YYYY-MM-DD" strings and
 * interpreted as local midnight. NASA POWER uses compact "YYYYMMDD" keys; the
 * conversions between the two live here.
 *
 * IMPORTANT: Always use parseLocalDate() instead of new Date() when parsing stored dates.
 * new Date("2025-12-14") is UTC midnight, which is Dec 13 west of Greenwich.
 */

import { parseISO, parse, format, addDays, differenceInCalendarDays, isValid } from 'date-fns';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const POWER_DATE_PATTERN = /^\d{8}$/;

/** Last date that still formats as YYYY-MM-DD and so still sorts as a string */
export const LATEST_ISO_DATE = '9999-12-31';

// =============================================================================
// DATE PARSING
// =============================================================================

/**
 * Parse a date string as a local date (midnight in local timezone).
 *
 * @param dateStr - Date string in ISO format
 * @returns Date object representing local midnight
 */
export function parseLocalDate(dateStr: string): Date {
  if (!dateStr) {
    throw new Error('parseLocalDate: dateStr is required');
  }
  return parseISO(dateStr);
}

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form.
 * Rejects "2025-02-30" and anything with a time component.
 */
export function isIsoDate(dateStr: string): boolean {
  if (!ISO_DATE_PATTERN.test(dateStr)) return false;
  const date = parseISO(dateStr);
  return isValid(date) && formatDateOnly(date) === dateStr;
}

// =============================================================================
// DATE FORMATTING
// =============================================================================

/**
 * Format a date as an ISO date string (YYYY-MM-DD) for storage.
 */
export function formatDateOnly(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Convert "YYYY-MM-DD" to the compact "YYYYMMDD" form NASA POWER expects.
 */
export function toPowerDate(dateStr: string): string {
  return format(parseLocalDate(dateStr), 'yyyyMMdd');
}

/**
 * Convert a NASA POWER "YYYYMMDD" key back to "YYYY-MM-DD".
 *
 * @returns ISO date string, or null if the key is not a real date
 */
export function fromPowerDate(key: string): string | null {
  if (!POWER_DATE_PATTERN.test(key)) return null;
  const date = parse(key, 'yyyyMMdd', new Date());
  if (!isValid(date)) return null;
  return formatDateOnly(date);
}

// =============================================================================
// DATE ARITHMETIC
// =============================================================================

/**
 * Add days to an ISO date string.
 *
 * @param dateStr - Starting date (YYYY-MM-DD)
 * @param days - Number of days to add (can be negative)
 * @returns New date (YYYY-MM-DD)
 */
export function addDaysToIsoDate(dateStr: string, days: number): string {
  return formatDateOnly(addDays(parseLocalDate(dateStr), days));
}

/**
 * Whole calendar days from start to end (negative if end is earlier).
 */
export function daysBetween(start: string, end: string): number {
  return differenceInCalendarDays(parseLocalDate(end), parseLocalDate(start));
}
