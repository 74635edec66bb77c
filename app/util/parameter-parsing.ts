import { RequestValidationError } from './errors';
import { parseTimestamp } from './date';
import { BoundingBox } from './footprint';

export interface DatetimeInterval {
  begin?: Date;
  end?: Date;
}

/**
 * Returns the parameter parsed as an array of comma-separated values if
 * it was a string, or its string members if it is already an array
 * @param value - The parameter value to parse (either an array or a string)
 */
export function parseMultiValueParameter(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === 'string').flatMap(parseMultiValueParameter);
  }
  if (typeof value !== 'string') return [];
  return value.split(',').map((v) => v.trim()).filter((v) => v.length > 0);
}

/**
 * Parses a bounding box given as `west,south,east,north` or as an array of four numbers.
 * A west edge greater than the east edge is a box crossing the antimeridian.
 *
 * @param value - the parameter value
 * @returns the box, or undefined when the parameter is not set
 * @throws RequestValidationError - if the value is not a valid box
 */
export function parseBbox(value: unknown): BoundingBox | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  let parts: unknown[];
  if (Array.isArray(value)) {
    parts = value;
  } else if (typeof value === 'string') {
    parts = value.replace(/^\[|\]$/g, '').split(',').map((v) => v.trim());
  } else {
    parts = [];
  }
  const numbers = parts.map((part) => (typeof part === 'number' || (typeof part === 'string' && part !== '') ? +part : NaN));
  if (numbers.length !== 4 || numbers.some((n) => !Number.isFinite(n))) {
    throw new RequestValidationError(`Invalid bbox: ${String(value)}. Expected four numbers: west,south,east,north`);
  }
  const [west, south, east, north] = numbers;
  if (south > north || south < -90 || north > 90 || west < -180 || west > 180 || east < -180 || east > 180) {
    throw new RequestValidationError(`Invalid bbox: ${String(value)}. Coordinates are out of range`);
  }
  return [west, south, east, north];
}

/**
 * Parses a datetime parameter: a single instant, or an interval `start/end` where either
 * end may be open (`..` or empty)
 *
 * @param value - the parameter value
 * @returns the interval (an instant is an interval with equal ends), or undefined when the
 *   parameter is not set
 * @throws RequestValidationError - if the value is not a valid instant or interval
 */
export function parseDatetime(value: unknown): DatetimeInterval | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value !== 'string') {
    throw new RequestValidationError(`Invalid datetime: ${String(value)}`);
  }
  const parts = value.split('/');
  if (parts.length > 2) {
    throw new RequestValidationError(`Invalid datetime: ${value}`);
  }
  const [begin, end] = parts.map((part): Date | undefined => {
    if (part === '' || part === '..') return undefined;
    const parsed = parseTimestamp(part);
    if (!parsed) {
      throw new RequestValidationError(`Invalid datetime: ${value}`);
    }
    return parsed;
  });
  if (parts.length === 1) {
    if (!begin) throw new RequestValidationError(`Invalid datetime: ${value}`);
    return { begin, end: begin };
  }
  if (begin && end && begin > end) {
    throw new RequestValidationError(`Invalid datetime: ${value}. The start is after the end`);
  }
  return { begin, end };
}
