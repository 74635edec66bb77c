// Import has to happen after the knexfile, so disable that rule
// eslint-disable-next-line import/order
import knexfile from '../../db/knexfile';
import { knex, Knex } from 'knex';
import { attachPaginate } from 'knex-paginate';
import env from './env';
import logger from './log';

/**
 * Batch size -- to avoid overly large SQL statements.
 */
export const batchSize = env.nodeEnv === 'development' ? 100 : 1000;

export type Transaction = Knex.Transaction | Knex;

const database = knex(knexfile);

// attachPaginate will fail when code is reloaded by mocha -w
try {
  attachPaginate();
} catch (e) {
  if (e instanceof Error && e.message.startsWith('Can\'t extend QueryBuilder with existing method (\'paginate\')')) {
    logger.warn(e.message);
  } else {
    throw e;
  }
}

/**
 * Returns true if the given connection talks to Postgres (as opposed to SQLite)
 * @param tx - the transaction or connection to check
 */
export function isPostgres(tx: Transaction = database): boolean {
  return tx.client.config.client === 'pg';
}

/**
 * Converts a timestamp column value to a Date. SQLite stores bound dates as epoch
 * milliseconds, Postgres returns Date objects.
 * @param value - the column value
 * @returns the Date, or null when the value is null
 */
export function toDate(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'number') return new Date(value);
  if (typeof value === 'string') {
    return /^\d+$/.test(value) ? new Date(parseInt(value, 10)) : new Date(value);
  }
  return null;
}

/**
 * Converts a numeric column value (Postgres returns bigint and numeric columns as strings)
 * @param value - the column value
 * @returns the number, or null when the value is null
 */
export function toNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const result = typeof value === 'number' ? value : Number(value);
  return Number.isNaN(result) ? null : result;
}

/**
 * Parses a JSON column. Postgres json/jsonb columns arrive already parsed.
 * @param value - the column value
 * @returns the parsed value, or null when the value is null
 */
export function parseJson(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? JSON.parse(value) : value;
}

export default database;
