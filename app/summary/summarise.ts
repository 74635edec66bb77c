import { DatasetExtent } from '../models/dataset-spatial';
import TimePeriodOverview from '../models/time-period-overview';
import { Footprint } from '../util/dataset-fields';
import { isValidFootprint, unionFootprints } from '../util/footprint';
import { dayKey, daysInRange, PeriodType, TimeRange } from '../util/time-period';

export interface SummaryContext {
  productName: string;
  periodType: PeriodType;
  startDay: string;
  timezone: string;
  productRefreshTime?: Date | null;
}

/**
 * Summarises the datasets of one period of a product.
 *
 * The timeline has an entry for every day of the period (in the grouping time zone), zero
 * when no dataset falls on it. Only valid footprints are counted and unioned; missing
 * sizes count as zero.
 *
 * @param extents - the extents of the datasets within the period
 * @param range - the period's own time range
 * @param context - which product and period is being summarised
 * @returns the summary
 */
export function calculateSummary(
  extents: DatasetExtent[],
  range: TimeRange,
  context: SummaryContext,
): TimePeriodOverview {
  const { productName, periodType, startDay, timezone } = context;
  const overview = TimePeriodOverview.empty(productName, periodType, startDay, range, daysInRange(range, timezone));
  overview.productRefreshTime = context.productRefreshTime ?? null;

  const footprints: Footprint[] = [];
  for (const extent of extents) {
    overview.datasetCount += 1;
    const day = dayKey(extent.centerTime, timezone);
    overview.timelineDatasetCounts.set(day, (overview.timelineDatasetCounts.get(day) ?? 0) + 1);
    overview.regionDatasetCounts.set(extent.regionCode, (overview.regionDatasetCounts.get(extent.regionCode) ?? 0) + 1);
    if (extent.crs) overview.crses.add(extent.crs);
    overview.sizeBytes += extent.sizeBytes ?? 0;
    if (extent.creationTime
      && (!overview.newestDatasetCreationTime || extent.creationTime > overview.newestDatasetCreationTime)) {
      overview.newestDatasetCreationTime = extent.creationTime;
    }
    if (extent.footprint && isValidFootprint(extent.footprint)) {
      footprints.push(extent.footprint);
    }
  }
  overview.footprintCount = footprints.length;
  overview.footprintGeometry = unionFootprints(footprints);
  return overview;
}

/**
 * Returns the properties whose value is the same in every one of the given dataset
 * documents. Only scalar values are compared.
 *
 * @param documents - the `properties` sections of the dataset documents
 * @returns the shared properties; empty when there are no documents
 */
export function fixedProperties(
  documents: { [field: string]: unknown }[],
): { [field: string]: string | number | boolean } {
  if (documents.length === 0) return {};
  const result: { [field: string]: string | number | boolean } = {};
  for (const [field, value] of Object.entries(documents[0])) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[field] = value;
    }
  }
  for (const properties of documents.slice(1)) {
    for (const [field, value] of Object.entries(result)) {
      if (properties[field] !== value) delete result[field];
    }
  }
  return result;
}
