import { isValid, parseISO } from 'date-fns';

/**
 * Converts a Date object into an ISO String representation (truncates milliseconds)
 *
 * @param date - The date to convert
 * @returns An ISO string representation of the date, with milliseconds truncated
 */
export function toISODateTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}/g, '');
}

/**
 * Parses an ISO 8601 timestamp
 *
 * @param value - the value to parse
 * @returns the date, or null if the value is not a valid ISO 8601 string
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value !== 'string' || !value) return null;
  const date = parseISO(value);
  return isValid(date) ? date : null;
}
