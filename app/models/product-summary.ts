import { Transaction, parseJson, toDate, toNumber } from '../util/db';
import { isRecord } from '../util/object';
import { toISODateTime } from '../util/date';
import { CatalogProduct } from './catalog';
import Record, { RecordFields } from './record';
import { explorerTable, ExplorerTableName } from './schema';

export type FixedMetadata = { [field: string]: string | number | boolean };

/**
 * Parses a stored list of product names
 * @param value - the column value
 */
function parseNames(value: unknown): string[] {
  const parsed = parseJson(value);
  return Array.isArray(parsed) ? parsed.filter((name): name is string => typeof name === 'string') : [];
}

/**
 * Parses stored fixed metadata. Null means "not yet known", `{}` means no field is fixed.
 * @param value - the column value
 */
function parseFixedMetadata(value: unknown): FixedMetadata | null {
  const parsed = parseJson(value);
  if (!isRecord(parsed)) return null;
  const result: FixedMetadata = {};
  for (const [key, fieldValue] of Object.entries(parsed)) {
    if (typeof fieldValue === 'string' || typeof fieldValue === 'number' || typeof fieldValue === 'boolean') {
      result[key] = fieldValue;
    }
  }
  return result;
}

/**
 * The explorer's record of a product: overall counts and the bookkeeping of its refreshes
 */
export default class ProductSummary extends Record {
  static table: ExplorerTableName = 'product';

  name: string;

  datasetCount: number;

  timeEarliest: Date | null;

  timeLatest: Date | null;

  // when the last refresh started; datasets added or updated after it are not yet summarised
  lastRefresh: Date | null;

  lastSuccessfulSummary: Date | null;

  sourceProductRefs: string[];

  derivedProductRefs: string[];

  fixedMetadata: FixedMetadata | null;

  constructor(fields: RecordFields) {
    super(fields);
    this.name = String(fields.name);
    this.datasetCount = toNumber(fields.datasetCount) ?? 0;
    this.timeEarliest = toDate(fields.timeEarliest);
    this.timeLatest = toDate(fields.timeLatest);
    this.lastRefresh = toDate(fields.lastRefresh);
    this.lastSuccessfulSummary = toDate(fields.lastSuccessfulSummary);
    this.sourceProductRefs = parseNames(fields.sourceProductRefs);
    this.derivedProductRefs = parseNames(fields.derivedProductRefs);
    this.fixedMetadata = parseFixedMetadata(fields.fixedMetadata);
  }

  /**
   * The column values to save
   */
  toRow(): RecordFields {
    return {
      id: this.id,
      name: this.name,
      datasetCount: this.datasetCount,
      timeEarliest: this.timeEarliest,
      timeLatest: this.timeLatest,
      lastRefresh: this.lastRefresh,
      lastSuccessfulSummary: this.lastSuccessfulSummary,
      sourceProductRefs: JSON.stringify(this.sourceProductRefs),
      derivedProductRefs: JSON.stringify(this.derivedProductRefs),
      fixedMetadata: this.fixedMetadata ? JSON.stringify(this.fixedMetadata) : null,
    };
  }

  /**
   * Validates the record
   *
   * @returns a list of validation errors, or null if the record is valid
   */
  validate(): string[] | null {
    const errors: string[] = [];
    if (!this.name) errors.push('Product name is required');
    if (this.datasetCount < 0) errors.push('Dataset count must not be negative');
    return errors.length ? errors : null;
  }

  /**
   * Moves the last successful summary time forward. Earlier times are ignored.
   * @param time - the time the summary finished
   */
  markSummarised(time: Date): void {
    if (!this.lastSuccessfulSummary || time > this.lastSuccessfulSummary) {
      this.lastSuccessfulSummary = time;
    }
  }

  /**
   * Returns the JSON representation used by the API
   */
  serialize(): { [key: string]: unknown } {
    return {
      name: this.name,
      dataset_count: this.datasetCount,
      time_earliest: this.timeEarliest ? toISODateTime(this.timeEarliest) : null,
      time_latest: this.timeLatest ? toISODateTime(this.timeLatest) : null,
      last_refresh: this.lastRefresh ? toISODateTime(this.lastRefresh) : null,
      last_successful_summary: this.lastSuccessfulSummary ? toISODateTime(this.lastSuccessfulSummary) : null,
      source_products: this.sourceProductRefs,
      derived_products: this.derivedProductRefs,
      fixed_metadata: this.fixedMetadata,
    };
  }
}

/**
 * Returns the record of the product with the given name
 * @param tx - the transaction to use
 * @param name - the product name
 * @returns the record, or null if the product has not been refreshed
 */
export async function getProductSummary(tx: Transaction, name: string): Promise<ProductSummary | null> {
  const row: RecordFields | undefined = await tx(explorerTable('product', tx)).where({ name }).first();
  return row ? new ProductSummary(row) : null;
}

/**
 * Returns the records of every refreshed product, ordered by name
 * @param tx - the transaction to use
 */
export async function getAllProductSummaries(tx: Transaction): Promise<ProductSummary[]> {
  const rows: RecordFields[] = await tx(explorerTable('product', tx)).orderBy('name');
  return rows.map((row) => new ProductSummary(row));
}

/**
 * Returns the record of a product, creating it when missing. Existing rows are selected
 * rather than upserted so that refreshes do not use up any id sequence. The record shares
 * its id with the catalog product.
 *
 * @param tx - the transaction to use
 * @param product - the catalog product
 * @returns the record
 */
export async function upsertProductRecord(tx: Transaction, product: CatalogProduct): Promise<ProductSummary> {
  const existing = await getProductSummary(tx, product.name);
  if (existing) return existing;
  const summary = new ProductSummary({ id: product.id, name: product.name });
  await summary.save(tx);
  return summary;
}
