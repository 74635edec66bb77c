import _ from 'lodash';
import { Knex } from 'knex';
import env from '../app/util/env';

/**
 * True if the value is a plain row object (as opposed to a driver result or a scalar)
 * @param value - a value returned by the database driver
 */
function isRow(value: unknown): value is Record<string, unknown> {
  return _.isPlainObject(value);
}

/**
 * Camel-cases the keys of result rows so that `dataset_type_ref` reads as `datasetTypeRef`
 * @param result - the raw query result
 * @returns the result with camel-cased row keys
 */
export function camelCaseRows(result: unknown): unknown {
  if (Array.isArray(result)) {
    return result.map((row) => (isRow(row) ? _.mapKeys(row, (_v, key) => _.camelCase(key)) : row));
  }
  if (isRow(result)) {
    return _.mapKeys(result, (_v, key) => _.camelCase(key));
  }
  return result;
}

/**
 * Snake-cases identifiers so code can refer to columns in camel case
 * @param value - the identifier
 * @param origImpl - the dialect's quoting implementation
 */
export function snakeCaseIdentifier(value: string, origImpl: (value: string) => string): string {
  return origImpl(value === '*' ? value : _.snakeCase(value));
}

/**
 * Connection settings for the catalog database: the URL of the active index driver when
 * set, otherwise the individual POSTGRES_* settings
 */
function postgresConnection(): string | Knex.PgConnectionConfig {
  return env.catalogDbUrl || {
    host: env.postgresHostname,
    port: env.postgresPort,
    user: env.postgresUser,
    password: String(env.postgresPassword),
    database: env.postgresDb,
  };
}

const common = {
  wrapIdentifier: snakeCaseIdentifier,
  postProcessResponse: camelCaseRows,
};

const config: Knex.Config = env.databaseType === 'sqlite'
  ? {
    ...common,
    client: 'better-sqlite3',
    connection: { filename: env.sqliteFilename },
    useNullAsDefault: true,
    // SQLite only supports one writer at a time; with an in-memory database every
    // connection would otherwise see its own empty database
    pool: { min: 1, max: 1 },
  }
  : {
    ...common,
    client: 'pg',
    connection: postgresConnection(),
    pool: { min: 0, max: 10 },
  };

export default config;
