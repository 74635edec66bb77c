import { subDays } from 'date-fns';
import { Knex } from 'knex';
import { EmptyDbError } from '../util/errors';
import { Transaction, parseJson, toDate, toNumber } from '../util/db';
import { extractDatasetFields } from '../util/dataset-fields';
import { asRecord } from '../util/object';
import { dayKey, monthKey } from '../util/time-period';
import { catalogTable } from './schema';

//
// Read access to the dataset catalog (the data cube's own index), plus the writers used to
// build development and test catalogs.
//

export type DatasetDocument = { [key: string]: unknown };

export interface CatalogProduct {
  id: number;
  name: string;
  definition: DatasetDocument;
  added: Date | null;
}

export interface CatalogDataset {
  id: string;
  productId: number;
  metadata: DatasetDocument;
  archived: Date | null;
  added: Date;
  updated: Date | null;
}

export interface DatasetWithLocations extends CatalogDataset {
  productName: string;
  uris: string[];
}

export interface LinkedDataset {
  id: string;
  productName: string;
  classifier: string;
}

export interface LinkedDatasets {
  datasets: LinkedDataset[];
  // number of linked datasets beyond the returned ones
  remaining: number;
}

export interface Arrival {
  day: string;
  productName: string;
  count: number;
  sampleIds: string[];
}

export type LinkDirection = 'source' | 'derived';

interface ProductRow {
  id: number;
  name: string;
  metadata: unknown;
  added: unknown;
}

interface DatasetRow {
  id: string;
  datasetTypeRef: number;
  metadata: unknown;
  archived: unknown;
  added: unknown;
  updated: unknown;
}

const ARRIVAL_SAMPLE_SIZE = 3;

/**
 * Converts a catalog row to a product
 * @param row - the `dataset_type` row
 */
function rowToProduct(row: ProductRow): CatalogProduct {
  return {
    id: row.id,
    name: row.name,
    definition: asRecord(parseJson(row.metadata)),
    added: toDate(row.added),
  };
}

/**
 * Converts a catalog row to a dataset
 * @param row - the `dataset` row
 */
function rowToDataset(row: DatasetRow): CatalogDataset {
  return {
    id: row.id,
    productId: row.datasetTypeRef,
    metadata: asRecord(parseJson(row.metadata)),
    archived: toDate(row.archived),
    added: toDate(row.added) ?? new Date(0),
    updated: toDate(row.updated),
  };
}

/**
 * Returns every product in the catalog, ordered by name
 * @param tx - the transaction to use
 */
export async function getCatalogProducts(tx: Transaction): Promise<CatalogProduct[]> {
  const rows: ProductRow[] = await tx(catalogTable('dataset_type', tx))
    .select('id', 'name', 'metadata', 'added')
    .orderBy('name');
  return rows.map(rowToProduct);
}

/**
 * Returns the catalog product with the given name
 * @param tx - the transaction to use
 * @param name - the product name
 * @returns the product, or null if the catalog has no such product
 */
export async function getCatalogProduct(tx: Transaction, name: string): Promise<CatalogProduct | null> {
  const row: ProductRow | undefined = await tx(catalogTable('dataset_type', tx))
    .select('id', 'name', 'metadata', 'added')
    .where({ name })
    .first();
  return row ? rowToProduct(row) : null;
}

/**
 * Returns a dataset with the name of its product and its active location URIs
 * @param tx - the transaction to use
 * @param id - the dataset id (a uuid)
 * @returns the dataset, or null if the catalog has no such dataset
 */
export async function getDataset(tx: Transaction, id: string): Promise<DatasetWithLocations | null> {
  const row: (DatasetRow & { productName: string }) | undefined = await tx(`${catalogTable('dataset', tx)} as d`)
    .join(`${catalogTable('dataset_type', tx)} as t`, 't.id', 'd.datasetTypeRef')
    .select('d.*', 't.name as productName')
    .where('d.id', id)
    .first();
  if (!row) return null;
  const uris = await getLocations(tx, [id]);
  return { ...rowToDataset(row), productName: row.productName, uris: uris.get(id) ?? [] };
}

/**
 * Returns several datasets with their product names and location URIs
 * @param tx - the transaction to use
 * @param ids - the dataset ids
 * @returns a map of dataset id to dataset; ids the catalog does not have are left out
 */
export async function getDatasets(tx: Transaction, ids: string[]): Promise<Map<string, DatasetWithLocations>> {
  const result = new Map<string, DatasetWithLocations>();
  if (ids.length === 0) return result;
  const rows: (DatasetRow & { productName: string })[] = await tx(`${catalogTable('dataset', tx)} as d`)
    .join(`${catalogTable('dataset_type', tx)} as t`, 't.id', 'd.datasetTypeRef')
    .select('d.*', 't.name as productName')
    .whereIn('d.id', ids);
  const uris = await getLocations(tx, ids);
  for (const row of rows) {
    result.set(row.id, { ...rowToDataset(row), productName: row.productName, uris: uris.get(row.id) ?? [] });
  }
  return result;
}

/**
 * Returns the active location URIs of datasets, oldest first
 * @param tx - the transaction to use
 * @param ids - the dataset ids
 * @returns a map of dataset id to URIs
 */
export async function getLocations(tx: Transaction, ids: string[]): Promise<Map<string, string[]>> {
  const result = new Map<string, string[]>();
  if (ids.length === 0) return result;
  const rows: { datasetRef: string; uriScheme: string; uriBody: string }[] = await tx(catalogTable('dataset_location', tx))
    .select('datasetRef', 'uriScheme', 'uriBody')
    .whereIn('datasetRef', ids)
    .whereNull('archived')
    .orderBy(['added', 'id']);
  for (const row of rows) {
    const uris = result.get(row.datasetRef) ?? [];
    uris.push(`${row.uriScheme}:${row.uriBody}`);
    result.set(row.datasetRef, uris);
  }
  return result;
}

/**
 * Returns one page of a product's active datasets, ordered by id
 *
 * @param tx - the transaction to use
 * @param productId - the catalog product id
 * @param options - `changedAfter`: only datasets added or updated after this time;
 *   `afterId`: only datasets with a larger id (for paging); `limit`: page size
 */
export async function getActiveDatasets(
  tx: Transaction,
  productId: number,
  options: { changedAfter?: Date | null; afterId?: string; limit: number },
): Promise<CatalogDataset[]> {
  const query = tx(catalogTable('dataset', tx))
    .where({ datasetTypeRef: productId })
    .whereNull('archived')
    .orderBy('id')
    .limit(options.limit);
  const { changedAfter, afterId } = options;
  if (changedAfter) {
    query.where((changed) => changed.where('added', '>', changedAfter).orWhere('updated', '>', changedAfter));
  }
  if (afterId) query.where('id', '>', afterId);
  const rows: DatasetRow[] = await query;
  return rows.map(rowToDataset);
}

/**
 * Returns the ids of a product's datasets archived after the given time
 * @param tx - the transaction to use
 * @param productId - the catalog product id
 * @param after - the time
 */
export async function getArchivedDatasetIds(tx: Transaction, productId: number, after: Date): Promise<string[]> {
  const rows: { id: string }[] = await tx(catalogTable('dataset', tx))
    .select('id')
    .where({ datasetTypeRef: productId })
    .where('archived', '>', after);
  return rows.map((row) => row.id);
}

/**
 * Returns the months (`YYYY-MM-01` in the grouping time zone) of a product's datasets
 * that were added, updated or archived after the given time
 *
 * @param tx - the transaction to use
 * @param productId - the catalog product id
 * @param since - the time
 * @param timezone - IANA time zone used for grouping
 */
export async function changedDatasetMonths(
  tx: Transaction,
  productId: number,
  since: Date,
  timezone: string,
): Promise<Set<string>> {
  const rows: { metadata: unknown }[] = await tx(catalogTable('dataset', tx))
    .select('metadata')
    .where({ datasetTypeRef: productId })
    .where((changed) => changed
      .where('added', '>', since)
      .orWhere('updated', '>', since)
      .orWhere('archived', '>', since));
  const months = new Set<string>();
  for (const row of rows) {
    const { centerTime } = extractDatasetFields(parseJson(row.metadata));
    if (centerTime) months.add(monthKey(centerTime, timezone));
  }
  return months;
}

/**
 * Returns the datasets linked to a dataset: its sources, or the datasets derived from it.
 * Fetches one more than the limit to know whether there are more, and only then counts
 * them.
 *
 * @param tx - the transaction to use
 * @param id - the dataset id
 * @param direction - 'source' for the dataset's sources, 'derived' for its derivatives
 * @param limit - the maximum number of datasets to return
 */
async function getLinkedDatasets(
  tx: Transaction,
  id: string,
  direction: LinkDirection,
  limit?: number,
): Promise<LinkedDatasets> {
  const [fromColumn, toColumn] = direction === 'source'
    ? ['s.datasetRef', 's.sourceDatasetRef']
    : ['s.sourceDatasetRef', 's.datasetRef'];
  const linked = (): Knex.QueryBuilder => tx(`${catalogTable('dataset_source', tx)} as s`)
    .join(`${catalogTable('dataset', tx)} as d`, 'd.id', toColumn)
    .where(fromColumn, id)
    .whereNull('d.archived');

  const query = linked()
    .join(`${catalogTable('dataset_type', tx)} as t`, 't.id', 'd.datasetTypeRef')
    .select('d.id', 't.name as productName', 's.classifier')
    .orderBy(['t.name', 's.classifier', 'd.id']);
  if (limit !== undefined) query.limit(limit + 1);
  const rows: LinkedDataset[] = await query;

  if (limit === undefined || rows.length <= limit) {
    return { datasets: rows, remaining: 0 };
  }
  const countRow: { count: unknown } | undefined = await linked().count('* as count').first();
  const total = toNumber(countRow?.count) ?? rows.length;
  return { datasets: rows.slice(0, limit), remaining: total - limit };
}

/**
 * Returns the source datasets of a dataset
 * @param tx - the transaction to use
 * @param id - the dataset id
 * @param limit - the maximum number of datasets to return
 */
export async function getDatasetSources(tx: Transaction, id: string, limit?: number): Promise<LinkedDatasets> {
  return getLinkedDatasets(tx, id, 'source', limit);
}

/**
 * Returns the datasets derived from a dataset
 * @param tx - the transaction to use
 * @param id - the dataset id
 * @param limit - the maximum number of datasets to return
 */
export async function getDatasetsDerived(tx: Transaction, id: string, limit?: number): Promise<LinkedDatasets> {
  return getLinkedDatasets(tx, id, 'derived', limit);
}

/**
 * Returns the names of products linked to a product through its active datasets
 *
 * @param tx - the transaction to use
 * @param productId - the catalog product id
 * @param direction - 'source' for products this product is derived from, 'derived' for
 *   products derived from this product
 * @returns the product names, sorted
 */
export async function linkedProducts(
  tx: Transaction,
  productId: number,
  direction: LinkDirection,
): Promise<string[]> {
  const [ownColumn, otherColumn] = direction === 'source'
    ? ['s.datasetRef', 's.sourceDatasetRef']
    : ['s.sourceDatasetRef', 's.datasetRef'];
  const rows: { name: string }[] = await tx(`${catalogTable('dataset_source', tx)} as s`)
    .join(`${catalogTable('dataset', tx)} as own`, 'own.id', ownColumn)
    .join(`${catalogTable('dataset', tx)} as other`, 'other.id', otherColumn)
    .join(`${catalogTable('dataset_type', tx)} as t`, 't.id', 'other.datasetTypeRef')
    .distinct('t.name')
    .where('own.datasetTypeRef', productId)
    .whereNull('own.archived')
    .whereNull('other.archived')
    .orderBy('t.name');
  return rows.map((row) => row.name);
}

/**
 * Returns the most recent arrivals: active datasets added within `periodDays` of the
 * newest one, counted per arrival day (in the grouping time zone) and product
 *
 * @param tx - the transaction to use
 * @param periodDays - the number of days to look back from the newest arrival
 * @param timezone - IANA time zone used for grouping
 * @returns the arrivals, newest day first, then by product name
 * @throws EmptyDbError - if the catalog has no active datasets
 */
export async function latestArrivals(tx: Transaction, periodDays: number, timezone: string): Promise<Arrival[]> {
  const newestRow: { newest: unknown } | undefined = await tx(catalogTable('dataset', tx))
    .whereNull('archived')
    .max('added as newest')
    .first<{ newest: unknown } | undefined>();
  const newest = toDate(newestRow?.newest);
  if (!newest) {
    throw new EmptyDbError();
  }
  const rows: { id: string; added: unknown; productName: string }[] = await tx(`${catalogTable('dataset', tx)} as d`)
    .join(`${catalogTable('dataset_type', tx)} as t`, 't.id', 'd.datasetTypeRef')
    .select('d.id', 'd.added', 't.name as productName')
    .whereNull('d.archived')
    .where('d.added', '>=', subDays(newest, periodDays))
    .orderBy([{ column: 'd.added', order: 'desc' }, { column: 'd.id' }]);

  const arrivals = new Map<string, Arrival>();
  for (const row of rows) {
    const added = toDate(row.added);
    if (!added) continue;
    const day = dayKey(added, timezone);
    const key = `${day}/${row.productName}`;
    const arrival = arrivals.get(key) ?? { day, productName: row.productName, count: 0, sampleIds: [] };
    arrival.count += 1;
    if (arrival.sampleIds.length < ARRIVAL_SAMPLE_SIZE) arrival.sampleIds.push(row.id);
    arrivals.set(key, arrival);
  }
  return [...arrivals.values()].sort((a, b) => b.day.localeCompare(a.day) || a.productName.localeCompare(b.productName));
}

/**
 * Adds a product to the catalog
 * @param tx - the transaction to use
 * @param name - the product name
 * @param definition - the product definition document
 * @returns the new product id
 */
export async function addProduct(tx: Transaction, name: string, definition: DatasetDocument = {}): Promise<number> {
  await tx(catalogTable('dataset_type', tx)).insert({
    name,
    metadata: JSON.stringify({ name, ...definition }),
    added: new Date(),
  });
  const product = await getCatalogProduct(tx, name);
  if (!product) throw new Error(`Unable to add product ${name}`);
  return product.id;
}

/**
 * Adds a dataset to the catalog
 * @param tx - the transaction to use
 * @param dataset - the dataset; `added` defaults to now
 */
export async function addDataset(
  tx: Transaction,
  dataset: { id: string; productId: number; metadata: DatasetDocument; added?: Date; updated?: Date; archived?: Date },
): Promise<void> {
  await tx(catalogTable('dataset', tx)).insert({
    id: dataset.id,
    datasetTypeRef: dataset.productId,
    metadata: JSON.stringify({ id: dataset.id, ...dataset.metadata }),
    added: dataset.added ?? new Date(),
    updated: dataset.updated ?? null,
    archived: dataset.archived ?? null,
  });
}

/**
 * Replaces the document of a dataset
 * @param tx - the transaction to use
 * @param id - the dataset id
 * @param metadata - the new EO3 document
 * @param updated - the update time recorded on the dataset; null leaves none
 */
export async function updateDataset(
  tx: Transaction,
  id: string,
  metadata: DatasetDocument,
  updated: Date | null = new Date(),
): Promise<void> {
  await tx(catalogTable('dataset', tx))
    .where({ id })
    .update({ metadata: JSON.stringify({ id, ...metadata }), updated });
}

/**
 * Archives a dataset
 * @param tx - the transaction to use
 * @param id - the dataset id
 * @param when - the archival time, defaults to now
 */
export async function archiveDataset(tx: Transaction, id: string, when: Date = new Date()): Promise<void> {
  await tx(catalogTable('dataset', tx)).where({ id }).update({ archived: when });
}

/**
 * Adds a location to a dataset
 * @param tx - the transaction to use
 * @param datasetId - the dataset id
 * @param uri - the location, e.g. `s3://bucket/path/odc-metadata.yaml`
 */
export async function addLocation(tx: Transaction, datasetId: string, uri: string): Promise<void> {
  const separator = uri.indexOf(':');
  if (separator < 1) throw new Error(`Not a URI: ${uri}`);
  await tx(catalogTable('dataset_location', tx)).insert({
    datasetRef: datasetId,
    uriScheme: uri.slice(0, separator),
    uriBody: uri.slice(separator + 1),
    added: new Date(),
  });
}

/**
 * Records that a dataset was derived from another
 * @param tx - the transaction to use
 * @param datasetId - the derived dataset
 * @param classifier - the role of the source, e.g. `level1`
 * @param sourceId - the source dataset
 */
export async function addSource(tx: Transaction, datasetId: string, classifier: string, sourceId: string): Promise<void> {
  await tx(catalogTable('dataset_source', tx)).insert({
    datasetRef: datasetId,
    classifier,
    sourceDatasetRef: sourceId,
  });
}
