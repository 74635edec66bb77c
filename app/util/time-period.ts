import { formatInTimeZone, zonedTimeToUtc } from 'date-fns-tz';
import { RequestValidationError } from './errors';

export type PeriodType = 'all' | 'year' | 'month' | 'day';

/** Start day stored for the summary of the whole product */
export const ALL_START_DAY = '1900-01-01';

export interface TimeRange {
  begin: Date;
  end: Date;
}

export interface PeriodSpec {
  year?: number;
  month?: number;
  day?: number;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Checks that a period names each component above its finest one
 * @param spec - the period
 * @throws RequestValidationError - if a month or day is given without the components above it
 */
export function validatePeriod({ year, month, day }: PeriodSpec): void {
  if ((month !== undefined && year === undefined) || (day !== undefined && month === undefined)) {
    throw new RequestValidationError('A day requires a month, and a month requires a year');
  }
}

/**
 * Returns the granularity of a period
 * @param spec - the period
 */
export function periodTypeOf(spec: PeriodSpec): PeriodType {
  if (spec.day) return 'day';
  if (spec.month) return 'month';
  if (spec.year) return 'year';
  return 'all';
}

/**
 * Returns the first day of a period as `YYYY-MM-DD`
 * @param spec - the period
 */
export function startDayOf(spec: PeriodSpec): string {
  if (!spec.year) return ALL_START_DAY;
  return `${pad(spec.year, 4)}-${pad(spec.month ?? 1)}-${pad(spec.day ?? 1)}`;
}

/**
 * Returns the period starting on the given day
 * @param periodType - the granularity of the period
 * @param startDay - the first day of the period, as `YYYY-MM-DD`
 */
export function periodOfStartDay(periodType: PeriodType, startDay: string): PeriodSpec {
  if (periodType === 'all') return {};
  const [year, month, day] = startDay.split('-').map((part) => parseInt(part, 10));
  if (periodType === 'year') return { year };
  if (periodType === 'month') return { year, month };
  return { year, month, day };
}

/**
 * Returns the number of days in a month
 * @param year - the year
 * @param month - the month (1-12)
 */
export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Adds a number of days to a `YYYY-MM-DD` calendar day
 * @param key - the day
 * @param days - the number of days to add
 */
export function addDaysToKey(key: string, days: number): string {
  const [year, month, day] = key.split('-').map((part) => parseInt(part, 10));
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

/**
 * Returns the instant a calendar day starts in the given time zone
 * @param key - the day, as `YYYY-MM-DD`
 * @param timezone - IANA time zone name
 */
export function startOfDayInZone(key: string, timezone: string): Date {
  return zonedTimeToUtc(`${key}T00:00:00`, timezone);
}

/**
 * Returns the calendar day (`YYYY-MM-DD`) of an instant in the given time zone
 * @param date - the instant
 * @param timezone - IANA time zone name
 */
export function dayKey(date: Date, timezone: string): string {
  return formatInTimeZone(date, timezone, 'yyyy-MM-dd');
}

/**
 * Returns the first day (`YYYY-MM-01`) of the month containing an instant in the given
 * time zone
 * @param date - the instant
 * @param timezone - IANA time zone name
 */
export function monthKey(date: Date, timezone: string): string {
  return `${formatInTimeZone(date, timezone, 'yyyy-MM')}-01`;
}

/**
 * Returns the instants a period begins and ends (exclusive) in the given time zone
 * @param spec - the period; the whole of time is not a range
 * @param timezone - IANA time zone name
 */
export function periodRange(spec: PeriodSpec, timezone: string): TimeRange | null {
  const { year, month, day } = spec;
  if (!year) return null;
  let endDay: string;
  if (day && month) {
    endDay = addDaysToKey(startDayOf(spec), 1);
  } else if (month) {
    endDay = month === 12 ? `${pad(year + 1, 4)}-01-01` : `${pad(year, 4)}-${pad(month + 1)}-01`;
  } else {
    endDay = `${pad(year + 1, 4)}-01-01`;
  }
  return {
    begin: startOfDayInZone(startDayOf(spec), timezone),
    end: startOfDayInZone(endDay, timezone),
  };
}

/**
 * Lists every calendar day that overlaps a range in the given time zone
 * @param range - the range (end exclusive)
 * @param timezone - IANA time zone name
 */
export function daysInRange(range: TimeRange, timezone: string): string[] {
  const days: string[] = [];
  const last = dayKey(new Date(range.end.getTime() - 1), timezone);
  for (let key = dayKey(range.begin, timezone); key <= last; key = addDaysToKey(key, 1)) {
    days.push(key);
  }
  return days;
}

/**
 * Parses one component of a period from a URL path
 * @param name - the component name, for error messages
 * @param value - the raw value
 * @param min - the smallest allowed value
 * @param max - the largest allowed value
 */
function parsePeriodPart(name: string, value: string, min: number, max: number): number {
  if (!/^\d+$/.test(value)) {
    throw new RequestValidationError(`Invalid ${name}: ${value}`);
  }
  const result = parseInt(value, 10);
  if (result < min || result > max) {
    throw new RequestValidationError(`Invalid ${name}: ${value}`);
  }
  return result;
}

/**
 * Parses and validates the year / month / day of a period as given in a URL path
 *
 * @param year - the year, if any
 * @param month - the month, if any
 * @param day - the day, if any
 * @returns the period
 * @throws RequestValidationError - if a component is invalid, or a month or day is given
 *   without the components above it
 */
export function parsePeriod(year?: string, month?: string, day?: string): PeriodSpec {
  if ((month && !year) || (day && !month)) {
    throw new RequestValidationError('A day requires a month, and a month requires a year');
  }
  const spec: PeriodSpec = {};
  if (year) spec.year = parsePeriodPart('year', year, 1, 9999);
  if (spec.year && month) spec.month = parsePeriodPart('month', month, 1, 12);
  if (spec.year && spec.month && day) {
    spec.day = parsePeriodPart('day', day, 1, daysInMonth(spec.year, spec.month));
  }
  return spec;
}

/**
 * Formats a period for display, e.g. `2017`, `2017-10`, `2017-10-02` or `all`
 * @param spec - the period
 */
export function describePeriod(spec: PeriodSpec): string {
  const { year, month, day } = spec;
  if (!year) return 'all';
  if (!month) return pad(year, 4);
  if (!day) return `${pad(year, 4)}-${pad(month)}`;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}
