import _ from 'lodash';
import { Knex } from 'knex';
import { batchSize, Transaction, toDate, toNumber } from '../util/db';
import { extractDatasetFields, Footprint } from '../util/dataset-fields';
import { BoundingBox, footprintBbox, parseFootprint, splitAntimeridian } from '../util/footprint';
import { monthKey, TimeRange } from '../util/time-period';
import { CatalogDataset } from './catalog';
import { catalogTable, explorerTable } from './schema';

/**
 * The summarised fields of one active dataset, as stored in `dataset_spatial`
 */
export interface DatasetExtent {
  id: string;
  productId: number;
  centerTime: Date;
  creationTime: Date | null;
  regionCode: string | null;
  sizeBytes: number | null;
  crs: string | null;
  footprint: Footprint | null;
}

export interface ExtentQuery {
  productIds?: number[];
  ids?: string[];
  bbox?: BoundingBox;
  begin?: Date;
  end?: Date;
}

export interface ExtentRow {
  id: string;
  datasetTypeRef: number;
  centerTime: unknown;
  creationTime: unknown;
  regionCode: string | null;
  sizeBytes: unknown;
  crs: string | null;
  footprint: unknown;
}

const EXTENT_COLUMNS = [
  'id', 'datasetTypeRef', 'centerTime', 'creationTime', 'regionCode', 'sizeBytes', 'crs', 'footprint',
];

/**
 * Converts a stored row to an extent
 * @param row - the `dataset_spatial` row
 */
export function rowToExtent(row: ExtentRow): DatasetExtent {
  return {
    id: row.id,
    productId: row.datasetTypeRef,
    centerTime: toDate(row.centerTime) ?? new Date(0),
    creationTime: toDate(row.creationTime),
    regionCode: row.regionCode,
    sizeBytes: toNumber(row.sizeBytes),
    crs: row.crs,
    footprint: parseFootprint(row.footprint),
  };
}

/**
 * Returns the extent of a catalog dataset
 * @param dataset - the dataset
 * @returns the extent, or null when the dataset has no usable time
 */
export function datasetToExtent(dataset: CatalogDataset): DatasetExtent | null {
  const fields = extractDatasetFields(dataset.metadata);
  if (!fields.centerTime) return null;
  return {
    id: dataset.id,
    productId: dataset.productId,
    ...fields,
    centerTime: fields.centerTime,
  };
}

/**
 * Converts an extent to its row, including the bounding box of its footprint
 * @param extent - the extent
 */
function extentToRow(extent: DatasetExtent): { [column: string]: unknown } {
  const bbox = extent.footprint ? footprintBbox(extent.footprint) : null;
  return {
    id: extent.id,
    datasetTypeRef: extent.productId,
    centerTime: extent.centerTime,
    creationTime: extent.creationTime,
    regionCode: extent.regionCode,
    sizeBytes: extent.sizeBytes,
    crs: extent.crs,
    footprint: extent.footprint ? JSON.stringify(extent.footprint) : null,
    bboxWest: bbox?.[0] ?? null,
    bboxSouth: bbox?.[1] ?? null,
    bboxEast: bbox?.[2] ?? null,
    bboxNorth: bbox?.[3] ?? null,
  };
}

/**
 * Inserts or replaces dataset extents, in batches
 * @param tx - the transaction to use
 * @param extents - the extents
 * @returns the number of extents written
 */
export async function upsertExtents(tx: Transaction, extents: DatasetExtent[]): Promise<number> {
  for (const chunk of _.chunk(extents, batchSize)) {
    await tx(explorerTable('dataset_spatial', tx))
      .insert(chunk.map(extentToRow))
      .onConflict('id')
      .merge();
  }
  return extents.length;
}

/**
 * Returns the stored center times of the given datasets
 * @param tx - the transaction to use
 * @param ids - the dataset ids
 */
export async function extentCenterTimes(tx: Transaction, ids: string[]): Promise<Date[]> {
  const centerTimes: Date[] = [];
  for (const chunk of _.chunk(ids, batchSize)) {
    const rows: { centerTime: unknown }[] = await tx(explorerTable('dataset_spatial', tx))
      .select('centerTime')
      .whereIn('id', chunk);
    centerTimes.push(...rows.map((row) => toDate(row.centerTime) ?? new Date(0)));
  }
  return centerTimes;
}

/**
 * Deletes the extents of the given datasets
 * @param tx - the transaction to use
 * @param ids - the dataset ids
 * @returns the center times of the deleted extents
 */
export async function deleteExtents(tx: Transaction, ids: string[]): Promise<Date[]> {
  const centerTimes = await extentCenterTimes(tx, ids);
  for (const chunk of _.chunk(ids, batchSize)) {
    await tx(explorerTable('dataset_spatial', tx)).whereIn('id', chunk).delete();
  }
  return centerTimes;
}

/**
 * Deletes the extents of a product that no longer match an active catalog dataset
 * @param tx - the transaction to use
 * @param productId - the product id
 * @returns the center times of the deleted extents
 */
export async function deleteInactiveExtents(tx: Transaction, productId: number): Promise<Date[]> {
  const activeIds = tx(catalogTable('dataset', tx))
    .select('id')
    .where({ datasetTypeRef: productId })
    .whereNull('archived');
  const rows: { id: string }[] = await tx(explorerTable('dataset_spatial', tx))
    .select('id')
    .where({ datasetTypeRef: productId })
    .whereNotIn('id', activeIds);
  return deleteExtents(tx, rows.map((row) => row.id));
}

/**
 * Returns the extents of a product, optionally within a time range (end exclusive)
 * @param tx - the transaction to use
 * @param productId - the product id
 * @param range - the time range
 */
export async function getExtents(tx: Transaction, productId: number, range?: TimeRange | null): Promise<DatasetExtent[]> {
  const query = tx(explorerTable('dataset_spatial', tx))
    .select(EXTENT_COLUMNS)
    .where({ datasetTypeRef: productId })
    .orderBy(['centerTime', 'id']);
  if (range) {
    query.where('centerTime', '>=', range.begin).where('centerTime', '<', range.end);
  }
  const rows: ExtentRow[] = await query;
  return rows.map(rowToExtent);
}

/**
 * Returns the extent of one dataset
 * @param tx - the transaction to use
 * @param id - the dataset id
 */
export async function getExtent(tx: Transaction, id: string): Promise<DatasetExtent | null> {
  const row: ExtentRow | undefined = await tx(explorerTable('dataset_spatial', tx))
    .select(EXTENT_COLUMNS)
    .where({ id })
    .first();
  return row ? rowToExtent(row) : null;
}

/**
 * Returns the months (`YYYY-MM-01` in the grouping time zone) containing any of a
 * product's extents
 * @param tx - the transaction to use
 * @param productId - the product id
 * @param timezone - IANA time zone used for grouping
 */
export async function extentMonths(tx: Transaction, productId: number, timezone: string): Promise<Set<string>> {
  const rows: { centerTime: unknown }[] = await tx(explorerTable('dataset_spatial', tx))
    .select('centerTime')
    .where({ datasetTypeRef: productId });
  const months = new Set<string>();
  for (const row of rows) {
    const centerTime = toDate(row.centerTime);
    if (centerTime) months.add(monthKey(centerTime, timezone));
  }
  return months;
}

/**
 * Returns the count and time range of a product's extents
 * @param tx - the transaction to use
 * @param productId - the product id
 */
export async function extentOverview(
  tx: Transaction,
  productId: number,
): Promise<{ count: number; earliest: Date | null; latest: Date | null }> {
  const row: { count: unknown; earliest: unknown; latest: unknown } | undefined = await tx(
    explorerTable('dataset_spatial', tx),
  )
    .where({ datasetTypeRef: productId })
    .count('* as count')
    .min('centerTime as earliest')
    .max('centerTime as latest')
    .first<{ count: unknown; earliest: unknown; latest: unknown } | undefined>();
  return {
    count: toNumber(row?.count) ?? 0,
    earliest: toDate(row?.earliest),
    latest: toDate(row?.latest),
  };
}

/**
 * Returns the newest catalog `added` time of the datasets that have an extent
 * @param tx - the transaction to use
 * @param productId - the product id
 */
export async function newestExtentAddedTime(tx: Transaction, productId: number): Promise<Date | null> {
  const row: { newest: unknown } | undefined = await tx(`${explorerTable('dataset_spatial', tx)} as s`)
    .join(`${catalogTable('dataset', tx)} as d`, 'd.id', 's.id')
    .where('s.datasetTypeRef', productId)
    .max('d.added as newest')
    .first<{ newest: unknown } | undefined>();
  return toDate(row?.newest);
}

/**
 * Applies a search to a query on `dataset_spatial` aliased `s`
 * @param query - the query
 * @param search - the search
 */
function applyExtentQuery(query: Knex.QueryBuilder, search: ExtentQuery): Knex.QueryBuilder {
  const { productIds, ids, bbox, begin, end } = search;
  if (productIds) query.whereIn('s.datasetTypeRef', productIds);
  if (ids) query.whereIn('s.id', ids);
  if (begin) query.where('s.centerTime', '>=', begin);
  if (end) query.where('s.centerTime', '<=', end);
  if (bbox) {
    // envelope intersection; a box crossing the antimeridian is searched as two boxes
    query.where((boxes) => {
      for (const [west, south, east, north] of splitAntimeridian(bbox)) {
        boxes.orWhere((box) => box
          .where('s.bboxWest', '<=', east)
          .where('s.bboxEast', '>=', west)
          .where('s.bboxSouth', '<=', north)
          .where('s.bboxNorth', '>=', south));
      }
    });
  }
  return query;
}

/**
 * Builds a search over the extents of summarised products, ordered newest first
 * @param tx - the transaction to use
 * @param search - the search
 * @returns the query, selecting the extent columns and the product name
 */
export function searchExtents(tx: Transaction, search: ExtentQuery): Knex.QueryBuilder {
  const query = tx(`${explorerTable('dataset_spatial', tx)} as s`)
    .join(`${explorerTable('product', tx)} as p`, 'p.id', 's.datasetTypeRef')
    .select(EXTENT_COLUMNS.map((column) => `s.${column}`))
    .select('p.name as productName')
    .orderBy([{ column: 's.centerTime', order: 'desc' }, { column: 's.id' }]);
  return applyExtentQuery(query, search);
}

/**
 * Returns the extents of a product in a region, newest first
 * @param tx - the transaction to use
 * @param productId - the product id
 * @param regionCode - the region code
 * @param range - optional time range (end exclusive)
 * @param limit - the maximum number of extents
 * @param offset - the number of extents to skip
 */
export async function extentsInRegion(
  tx: Transaction,
  productId: number,
  regionCode: string,
  range: TimeRange | null,
  limit: number,
  offset = 0,
): Promise<DatasetExtent[]> {
  const query = tx(explorerTable('dataset_spatial', tx))
    .select(EXTENT_COLUMNS)
    .where({ datasetTypeRef: productId, regionCode })
    .orderBy([{ column: 'centerTime', order: 'desc' }, { column: 'id' }])
    .limit(limit)
    .offset(offset);
  if (range) {
    query.where('centerTime', '>=', range.begin).where('centerTime', '<', range.end);
  }
  const rows: ExtentRow[] = await query;
  return rows.map(rowToExtent);
}

/**
 * Returns the ids of products with extents in a region
 * @param tx - the transaction to use
 * @param regionCode - the region code
 * @param range - optional time range (end exclusive)
 */
export async function productIdsInRegion(
  tx: Transaction,
  regionCode: string,
  range: TimeRange | null,
): Promise<number[]> {
  const query = tx(explorerTable('dataset_spatial', tx))
    .distinct('datasetTypeRef')
    .where({ regionCode })
    .orderBy('datasetTypeRef');
  if (range) {
    query.where('centerTime', '>=', range.begin).where('centerTime', '<', range.end);
  }
  const rows: { datasetTypeRef: number }[] = await query;
  return rows.map((row) => row.datasetTypeRef);
}
