/**
 * Calendar Date Utilities
 *
 * All statistics are grouped by the process-local calendar date, formatted
 * as YYYY-MM-DD.
 */

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Format a Date object to YYYY-MM-DD string (local time).
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Parse a YYYY-MM-DD string to a local Date at midnight.
 * Returns null if the string is invalid.
 */
export function parseDate(dateStr: string): Date | null {
  if (!DATE_PATTERN.test(dateStr)) {
    return null;
  }

  const [year, month, day] = dateStr.split("-").map(Number);
  const date = new Date(year, month - 1, day);

  // Validate the date is real (e.g., not Feb 30)
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Get today's date in YYYY-MM-DD format.
 */
export function getToday(now: Date = new Date()): string {
  return formatDate(now);
}

/**
 * Add days to a date string and return the result in YYYY-MM-DD format.
 */
export function addDays(dateStr: string, days: number): string {
  const date = parseDate(dateStr);
  if (!date) {
    throw new Error(`Invalid date: ${dateStr}`);
  }

  date.setDate(date.getDate() + days);
  return formatDate(date);
}

/**
 * Whole calendar days from `from` to `to` (positive when `to` is later).
 * Computed on UTC day numbers so daylight-saving shifts never skew the count.
 * Returns null if either date is unparseable.
 */
export function dayDifference(from: string, to: string): number | null {
  const a = parseDate(from);
  const b = parseDate(to);
  if (!a || !b) {
    return null;
  }

  const dayA = Date.UTC(a.getFullYear(), a.getMonth(), a.getDate());
  const dayB = Date.UTC(b.getFullYear(), b.getMonth(), b.getDate());
  return Math.round((dayB - dayA) / MS_PER_DAY);
}

/**
 * The `count` calendar dates ending with `today`, oldest first.
 */
export function lastNDays(today: string, count: number): string[] {
  const dates: string[] = [];
  for (let offset = count - 1; offset >= 0; offset--) {
    dates.push(addDays(today, -offset));
  }
  return dates;
}
