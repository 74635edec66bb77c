import { Transaction, parseJson, toDate, toNumber } from '../util/db';
import { parseFootprint } from '../util/footprint';
import { isRecord } from '../util/object';
import { PeriodType } from '../util/time-period';
import { explorerTable } from './schema';
import TimePeriodOverview, { TimelinePeriod } from './time-period-overview';

/**
 * A `time_overview` row as returned by knex (camel-cased keys)
 */
interface TimeOverviewRow {
  productRef: number;
  periodType: PeriodType;
  startDay: string;
  datasetCount: unknown;
  timelineDatasetCounts: unknown;
  timelinePeriod: TimelinePeriod | null;
  regionDatasetCounts: unknown;
  timeEarliest: unknown;
  timeLatest: unknown;
  footprintCount: unknown;
  footprintGeometry: unknown;
  crses: unknown;
  sizeBytes: unknown;
  newestDatasetCreationTime: unknown;
  productRefreshTime: unknown;
  generationTime: unknown;
}

/**
 * Parses a stored timeline (`{ "2017-10-01": 3, ... }`)
 * @param value - the column value
 */
function parseTimeline(value: unknown): Map<string, number> {
  const parsed = parseJson(value);
  const result = new Map<string, number>();
  if (isRecord(parsed)) {
    for (const [key, count] of Object.entries(parsed)) {
      result.set(key, toNumber(count) ?? 0);
    }
  }
  return result;
}

/**
 * Parses stored region counts (`[["55_-13", 2], [null, 1]]`); a null region is kept
 * @param value - the column value
 */
function parseRegionCounts(value: unknown): Map<string | null, number> {
  const parsed = parseJson(value);
  const result = new Map<string | null, number>();
  if (Array.isArray(parsed)) {
    for (const entry of parsed) {
      if (Array.isArray(entry) && entry.length === 2) {
        const [region, count] = entry;
        result.set(typeof region === 'string' ? region : null, toNumber(count) ?? 0);
      }
    }
  }
  return result;
}

/**
 * Parses a stored list of CRS names
 * @param value - the column value
 */
function parseCrses(value: unknown): Set<string> {
  const parsed = parseJson(value);
  return new Set(Array.isArray(parsed) ? parsed.filter((crs): crs is string => typeof crs === 'string') : []);
}

/**
 * Converts a stored row to a summary
 * @param row - the row
 * @param productName - the name of the product the row belongs to
 */
function rowToOverview(row: TimeOverviewRow, productName: string): TimePeriodOverview {
  const begin = toDate(row.timeEarliest);
  const end = toDate(row.timeLatest);
  return new TimePeriodOverview({
    productName,
    periodType: row.periodType,
    startDay: row.startDay,
    datasetCount: toNumber(row.datasetCount) ?? 0,
    timelineDatasetCounts: parseTimeline(row.timelineDatasetCounts),
    timelinePeriod: row.timelinePeriod ?? 'day',
    regionDatasetCounts: parseRegionCounts(row.regionDatasetCounts),
    timeRange: begin && end ? { begin, end } : null,
    footprintGeometry: parseFootprint(row.footprintGeometry),
    footprintCount: toNumber(row.footprintCount) ?? 0,
    crses: parseCrses(row.crses),
    sizeBytes: toNumber(row.sizeBytes) ?? 0,
    newestDatasetCreationTime: toDate(row.newestDatasetCreationTime),
    productRefreshTime: toDate(row.productRefreshTime),
    summaryGenTime: toDate(row.generationTime),
  });
}

/**
 * Stores (inserts or replaces) the summary of a period
 *
 * @param tx - the transaction to use
 * @param productId - the id of the product's `product` row
 * @param overview - the summary to store; its generation time is set if missing
 */
export async function putSummary(tx: Transaction, productId: number, overview: TimePeriodOverview): Promise<void> {
  const generationTime = overview.summaryGenTime ?? new Date();
  overview.summaryGenTime = generationTime;
  await tx(explorerTable('time_overview', tx))
    .insert({
      productRef: productId,
      periodType: overview.periodType,
      startDay: overview.startDay,
      datasetCount: overview.datasetCount,
      timelineDatasetCounts: JSON.stringify(Object.fromEntries(overview.sortedTimeline())),
      timelinePeriod: overview.timelinePeriod,
      regionDatasetCounts: JSON.stringify([...overview.regionDatasetCounts.entries()]),
      timeEarliest: overview.timeRange?.begin ?? null,
      timeLatest: overview.timeRange?.end ?? null,
      footprintCount: overview.footprintCount,
      footprintGeometry: overview.footprintGeometry ? JSON.stringify(overview.footprintGeometry) : null,
      crses: JSON.stringify([...overview.crses].sort()),
      sizeBytes: overview.sizeBytes,
      newestDatasetCreationTime: overview.newestDatasetCreationTime,
      productRefreshTime: overview.productRefreshTime,
      generationTime,
    })
    .onConflict(['productRef', 'startDay', 'periodType'])
    .merge();
}

/**
 * Returns the stored summary of one period
 *
 * @param tx - the transaction to use
 * @param productId - the id of the product's `product` row
 * @param productName - the product name
 * @param periodType - the granularity of the period
 * @param startDay - the first day of the period
 * @returns the summary, or null if the period has not been summarised
 */
export async function getSummary(
  tx: Transaction,
  productId: number,
  productName: string,
  periodType: PeriodType,
  startDay: string,
): Promise<TimePeriodOverview | null> {
  const row: TimeOverviewRow | undefined = await tx(explorerTable('time_overview', tx))
    .where({ productRef: productId, periodType, startDay })
    .first();
  return row ? rowToOverview(row, productName) : null;
}

/**
 * Returns the stored summaries of a product at one granularity, ordered by start day
 *
 * @param tx - the transaction to use
 * @param productId - the id of the product's `product` row
 * @param productName - the product name
 * @param periodType - the granularity
 * @param from - only include periods starting on or after this day
 * @param to - only include periods starting before this day
 */
export async function getSummaries(
  tx: Transaction,
  productId: number,
  productName: string,
  periodType: PeriodType,
  from?: string,
  to?: string,
): Promise<TimePeriodOverview[]> {
  const query = tx(explorerTable('time_overview', tx))
    .where({ productRef: productId, periodType })
    .orderBy('startDay');
  if (from) query.where('startDay', '>=', from);
  if (to) query.where('startDay', '<', to);
  const rows: TimeOverviewRow[] = await query;
  return rows.map((row) => rowToOverview(row, productName));
}

/**
 * Returns the start days of every month of a product that has a stored summary
 * @param tx - the transaction to use
 * @param productId - the id of the product's `product` row
 */
export async function summarisedMonths(tx: Transaction, productId: number): Promise<string[]> {
  const rows: { startDay: string }[] = await tx(explorerTable('time_overview', tx))
    .select('startDay')
    .where({ productRef: productId, periodType: 'month' })
    .orderBy('startDay');
  return rows.map((row) => row.startDay);
}

/**
 * Returns the years of a product whose summary is missing or older than the summary of
 * one of their months
 *
 * @param tx - the transaction to use
 * @param productId - the id of the product's `product` row
 * @returns the years, ascending
 */
export async function outdatedYears(tx: Transaction, productId: number): Promise<number[]> {
  const rows: { periodType: PeriodType; startDay: string; generationTime: unknown }[] = await tx(
    explorerTable('time_overview', tx),
  )
    .select('periodType', 'startDay', 'generationTime')
    .where({ productRef: productId })
    .whereIn('periodType', ['year', 'month']);

  const yearGenerated = new Map<number, number>();
  for (const row of rows.filter((r) => r.periodType === 'year')) {
    yearGenerated.set(parseInt(row.startDay.slice(0, 4), 10), toDate(row.generationTime)?.getTime() ?? 0);
  }
  const outdated = new Set<number>();
  for (const row of rows.filter((r) => r.periodType === 'month')) {
    const year = parseInt(row.startDay.slice(0, 4), 10);
    const generated = yearGenerated.get(year);
    if (generated === undefined || (toDate(row.generationTime)?.getTime() ?? 0) > generated) {
      outdated.add(year);
    }
  }
  return [...outdated].sort((a, b) => a - b);
}

/**
 * Returns the dataset count of every summarised month of every product, keyed
 * `<product>/<year>/<month>`
 * @param tx - the transaction to use
 */
export async function datasetCountsPerMonth(tx: Transaction): Promise<Map<string, number>> {
  const rows: { name: string; startDay: string; datasetCount: unknown }[] = await tx(
    `${explorerTable('time_overview', tx)} as o`,
  )
    .join(`${explorerTable('product', tx)} as p`, 'p.id', 'o.productRef')
    .select('p.name', 'o.startDay', 'o.datasetCount')
    .where('o.periodType', 'month')
    .orderBy(['p.name', 'o.startDay']);
  const result = new Map<string, number>();
  for (const row of rows) {
    const [year, month] = row.startDay.split('-');
    result.set(`${row.name}/${parseInt(year, 10)}/${parseInt(month, 10)}`, toNumber(row.datasetCount) ?? 0);
  }
  return result;
}

/**
 * Returns the ids of products that have a summary of all time
 * @param tx - the transaction to use
 */
export async function productIdsWithAllSummary(tx: Transaction): Promise<Set<number>> {
  const rows: { productRef: number }[] = await tx(explorerTable('time_overview', tx))
    .select('productRef')
    .where({ periodType: 'all' });
  return new Set(rows.map((row) => row.productRef));
}
