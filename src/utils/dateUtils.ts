/**
 * Date helpers for the YYYY-MM-DD boundary format and the IMAP search format
 */

const IMAP_MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/**
 * Check if a date string is in valid YYYY-MM-DD format
 */
export function isValidDateFormat(dateStr: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(dateStr);
}

/**
 * Parse a YYYY-MM-DD string as a UTC calendar date.
 * Returns null for malformed strings and for impossible dates such as 2025-02-30.
 */
export function parseCalendarDate(dateStr: string): Date | null {
  if (!isValidDateFormat(dateStr)) return null;

  const [year, month, day] = dateStr.split('-').map(part => parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day));

  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function addDays(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setUTCDate(shifted.getUTCDate() + days);
  return shifted;
}

/**
 * Format a UTC calendar date the way IMAP SEARCH expects it (DD-Mon-YYYY)
 */
export function formatImapDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${day}-${IMAP_MONTHS[date.getUTCMonth()]}-${date.getUTCFullYear()}`;
}
