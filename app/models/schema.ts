import { Knex } from 'knex';
import db, { isPostgres, Transaction } from '../util/db';
import logger from '../util/log';

export const EXPLORER_SCHEMA = 'cubedash';
export const CATALOG_SCHEMA = 'agdc';

export type ExplorerTableName = 'product' | 'dataset_spatial' | 'time_overview' | 'region' | 'spatial_quality_stats';
export type CatalogTableName = 'dataset_type' | 'dataset' | 'dataset_source' | 'dataset_location';

type TableDefinition = (table: Knex.CreateTableBuilder) => void;

/**
 * Name of a table within a schema. Postgres keeps the tables in their own schema
 * (`cubedash.product`), SQLite has no schemas so the schema becomes a prefix
 * (`cubedash_product`).
 *
 * @param schema - the schema the table belongs to
 * @param table - the table name
 * @param tx - the connection the name will be used with
 */
function qualifiedName(schema: string, table: string, tx: Transaction): string {
  return isPostgres(tx) ? `${schema}.${table}` : `${schema}_${table}`;
}

/**
 * Returns the name to use in queries for one of the explorer's own tables
 * @param table - the table
 * @param tx - the connection the name will be used with
 */
export function explorerTable(table: ExplorerTableName, tx: Transaction = db): string {
  return qualifiedName(EXPLORER_SCHEMA, table, tx);
}

/**
 * Returns the name to use in queries for one of the dataset catalog tables
 * @param table - the table
 * @param tx - the connection the name will be used with
 */
export function catalogTable(table: CatalogTableName, tx: Transaction = db): string {
  return qualifiedName(CATALOG_SCHEMA, table, tx);
}

const explorerTables: [ExplorerTableName, TableDefinition][] = [
  ['product', (table): void => {
    // same id as the catalog's dataset_type row
    table.integer('id').primary();
    table.string('name', 255).notNullable().unique();
    table.integer('dataset_count').notNullable().defaultTo(0);
    table.timestamp('time_earliest', { useTz: true });
    table.timestamp('time_latest', { useTz: true });
    table.timestamp('last_refresh', { useTz: true });
    table.timestamp('last_successful_summary', { useTz: true });
    table.text('source_product_refs');
    table.text('derived_product_refs');
    table.text('fixed_metadata');
    table.timestamp('created_at', { useTz: true }).notNullable();
    table.timestamp('updated_at', { useTz: true }).notNullable();
  }],
  ['dataset_spatial', (table): void => {
    table.uuid('id').primary();
    table.integer('dataset_type_ref').notNullable();
    table.timestamp('center_time', { useTz: true }).notNullable();
    table.timestamp('creation_time', { useTz: true });
    table.string('region_code', 255);
    table.bigInteger('size_bytes');
    table.string('crs', 64);
    table.text('footprint');
    table.double('bbox_west');
    table.double('bbox_south');
    table.double('bbox_east');
    table.double('bbox_north');
    table.index(['dataset_type_ref', 'center_time']);
    table.index(['dataset_type_ref', 'region_code']);
  }],
  ['time_overview', (table): void => {
    table.integer('product_ref').notNullable();
    table.string('period_type', 16).notNullable();
    table.string('start_day', 10).notNullable();
    table.integer('dataset_count').notNullable();
    table.text('timeline_dataset_counts');
    table.string('timeline_period', 16);
    table.text('region_dataset_counts');
    table.timestamp('time_earliest', { useTz: true });
    table.timestamp('time_latest', { useTz: true });
    table.integer('footprint_count').notNullable().defaultTo(0);
    table.text('footprint_geometry');
    table.text('crses');
    table.bigInteger('size_bytes');
    table.timestamp('newest_dataset_creation_time', { useTz: true });
    table.timestamp('product_refresh_time', { useTz: true });
    table.timestamp('generation_time', { useTz: true });
    table.unique(['product_ref', 'start_day', 'period_type']);
  }],
  ['region', (table): void => {
    table.integer('dataset_type_ref').notNullable();
    table.string('region_code', 255).notNullable();
    table.text('footprint');
    table.integer('count').notNullable();
    table.timestamp('generation_time', { useTz: true });
    table.primary(['dataset_type_ref', 'region_code']);
  }],
  ['spatial_quality_stats', (table): void => {
    table.integer('dataset_type_ref').primary();
    table.integer('count').notNullable();
    table.integer('missing_footprint').notNullable();
    table.bigInteger('footprint_size');
    table.double('footprint_stddev');
    table.integer('missing_srid').notNullable();
    table.integer('has_file_size').notNullable();
    table.integer('has_region').notNullable();
  }],
];

// Only created by us for development and test databases; a real catalog is created by
// the data cube's own tooling.
const catalogTables: [CatalogTableName, TableDefinition][] = [
  ['dataset_type', (table): void => {
    table.increments('id');
    table.string('name', 255).notNullable().unique();
    table.text('metadata').notNullable();
    table.timestamp('added', { useTz: true }).notNullable();
  }],
  ['dataset', (table): void => {
    table.uuid('id').primary();
    table.integer('dataset_type_ref').notNullable();
    table.text('metadata').notNullable();
    table.timestamp('archived', { useTz: true });
    table.timestamp('added', { useTz: true }).notNullable();
    table.timestamp('updated', { useTz: true });
    table.index(['dataset_type_ref']);
  }],
  ['dataset_source', (table): void => {
    table.uuid('dataset_ref').notNullable();
    table.string('classifier', 255).notNullable();
    table.uuid('source_dataset_ref').notNullable();
    table.primary(['dataset_ref', 'classifier']);
    table.index(['source_dataset_ref']);
  }],
  ['dataset_location', (table): void => {
    table.increments('id');
    table.uuid('dataset_ref').notNullable();
    table.string('uri_scheme', 64).notNullable();
    table.text('uri_body').notNullable();
    table.timestamp('added', { useTz: true }).notNullable();
    table.timestamp('archived', { useTz: true });
    table.index(['dataset_ref']);
  }],
];

/**
 * Returns a schema builder scoped to the given schema, with the table name to use in it
 * @param tx - the connection to build on
 * @param schema - the schema containing the table
 * @param table - the table name
 */
function tableBuilder(tx: Transaction, schema: string, table: string): [Knex.SchemaBuilder, string] {
  return isPostgres(tx)
    ? [tx.schema.withSchema(schema), table]
    : [tx.schema, `${schema}_${table}`];
}

/**
 * Creates any of the given tables that do not exist yet
 * @param tx - the connection to use
 * @param schema - the schema to create the tables in
 * @param tables - the table definitions
 */
async function createMissingTables(
  tx: Transaction,
  schema: string,
  tables: [string, TableDefinition][],
): Promise<void> {
  if (isPostgres(tx)) {
    await tx.schema.createSchemaIfNotExists(schema);
  }
  for (const [name, define] of tables) {
    const [existing, tableName] = tableBuilder(tx, schema, name);
    if (!await existing.hasTable(tableName)) {
      logger.info(`Creating table ${qualifiedName(schema, name, tx)}`);
      const [builder] = tableBuilder(tx, schema, name);
      await builder.createTable(tableName, define);
    }
  }
}

/**
 * Creates the summary tables. Safe to call on an already initialised database.
 * @param tx - the connection to use
 */
export async function initSchema(tx: Transaction = db): Promise<void> {
  await createMissingTables(tx, EXPLORER_SCHEMA, explorerTables);
}

/**
 * Returns true if every summary table exists
 * @param tx - the connection to use
 */
export async function isSchemaInitialised(tx: Transaction = db): Promise<boolean> {
  for (const [name] of explorerTables) {
    const [builder, tableName] = tableBuilder(tx, EXPLORER_SCHEMA, name);
    if (!await builder.hasTable(tableName)) {
      return false;
    }
  }
  return true;
}

/**
 * Drops all summary tables (the catalog is untouched)
 * @param tx - the connection to use
 */
export async function dropSchema(tx: Transaction = db): Promise<void> {
  if (isPostgres(tx)) {
    await tx.schema.dropSchemaIfExists(EXPLORER_SCHEMA, true);
    return;
  }
  for (const [name] of explorerTables) {
    const [builder, tableName] = tableBuilder(tx, EXPLORER_SCHEMA, name);
    await builder.dropTableIfExists(tableName);
  }
}

/**
 * Creates an empty dataset catalog, for development and test databases
 * @param tx - the connection to use
 */
export async function initCatalogSchema(tx: Transaction = db): Promise<void> {
  await createMissingTables(tx, CATALOG_SCHEMA, catalogTables);
}

/**
 * Names of all summary tables as used in queries
 * @param tx - the connection the names will be used with
 */
export function allExplorerTables(tx: Transaction = db): string[] {
  return explorerTables.map(([name]) => explorerTable(name, tx));
}

/**
 * Names of all catalog tables as used in queries
 * @param tx - the connection the names will be used with
 */
export function allCatalogTables(tx: Transaction = db): string[] {
  return catalogTables.map(([name]) => catalogTable(name, tx));
}
