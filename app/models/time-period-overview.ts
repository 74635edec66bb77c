import { Footprint } from '../util/dataset-fields';
import { unionFootprints } from '../util/footprint';
import { PeriodType, TimeRange } from '../util/time-period';
import { mapToObject } from '../util/object';
import { toISODateTime } from '../util/date';

export type TimelinePeriod = 'day' | 'month';

/** Combined timelines stay per day while they cover at most this many days */
export const MAX_DAY_TIMELINE_DAYS = 366;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface TimePeriodOverviewFields {
  productName: string;
  periodType: PeriodType;
  startDay: string;
  datasetCount?: number;
  timelineDatasetCounts?: Map<string, number>;
  timelinePeriod?: TimelinePeriod;
  regionDatasetCounts?: Map<string | null, number>;
  timeRange?: TimeRange | null;
  footprintGeometry?: Footprint | null;
  footprintCount?: number;
  newestDatasetCreationTime?: Date | null;
  crses?: Set<string>;
  sizeBytes?: number;
  productRefreshTime?: Date | null;
  summaryGenTime?: Date | null;
}

/**
 * Regroups a per-day timeline by month (keys `YYYY-MM-01`)
 * @param timeline - the per-day timeline
 */
export function groupTimelineByMonth(timeline: Map<string, number>): Map<string, number> {
  const result = new Map<string, number>();
  for (const [day, count] of timeline) {
    const month = `${day.slice(0, 7)}-01`;
    result.set(month, (result.get(month) ?? 0) + count);
  }
  return result;
}

/**
 * Adds the counts of one map into another
 * @param target - the map to add to
 * @param source - the counts to add
 */
function addCounts<K>(target: Map<K, number>, source: Map<K, number>): void {
  for (const [key, count] of source) {
    target.set(key, (target.get(key) ?? 0) + count);
  }
}

/**
 * Aggregated statistics of a product's datasets within a time period
 */
export default class TimePeriodOverview {
  productName: string;

  periodType: PeriodType;

  startDay: string;

  datasetCount: number;

  timelineDatasetCounts: Map<string, number>;

  timelinePeriod: TimelinePeriod;

  regionDatasetCounts: Map<string | null, number>;

  timeRange: TimeRange | null;

  footprintGeometry: Footprint | null;

  footprintCount: number;

  newestDatasetCreationTime: Date | null;

  crses: Set<string>;

  sizeBytes: number;

  productRefreshTime: Date | null;

  summaryGenTime: Date | null;

  constructor(fields: TimePeriodOverviewFields) {
    this.productName = fields.productName;
    this.periodType = fields.periodType;
    this.startDay = fields.startDay;
    this.datasetCount = fields.datasetCount ?? 0;
    this.timelineDatasetCounts = fields.timelineDatasetCounts ?? new Map();
    this.timelinePeriod = fields.timelinePeriod ?? 'day';
    this.regionDatasetCounts = fields.regionDatasetCounts ?? new Map();
    this.timeRange = fields.timeRange ?? null;
    this.footprintGeometry = fields.footprintGeometry ?? null;
    this.footprintCount = fields.footprintCount ?? 0;
    this.newestDatasetCreationTime = fields.newestDatasetCreationTime ?? null;
    this.crses = fields.crses ?? new Set();
    this.sizeBytes = fields.sizeBytes ?? 0;
    this.productRefreshTime = fields.productRefreshTime ?? null;
    this.summaryGenTime = fields.summaryGenTime ?? null;
  }

  /**
   * The footprint in EPSG:4326. Footprints are always stored in that CRS.
   */
  get footprintWgs84(): Footprint | null {
    return this.footprintGeometry;
  }

  /**
   * Combines the summaries of several periods into the summary of a larger one.
   *
   * The timeline stays per day while the combined range covers at most
   * `MAX_DAY_TIMELINE_DAYS`, otherwise it is regrouped by month. Only periods containing
   * datasets contribute to the time range.
   *
   * @param periods - the summaries to combine
   * @param productName - the product of the combined summary
   * @param periodType - the granularity of the combined summary
   * @param startDay - the first day of the combined summary
   * @returns the combined summary
   */
  static addPeriods(
    periods: TimePeriodOverview[],
    productName: string,
    periodType: PeriodType,
    startDay: string,
  ): TimePeriodOverview {
    const result = new TimePeriodOverview({ productName, periodType, startDay });
    const footprints: Footprint[] = [];
    let timelineByMonth = false;

    for (const period of periods) {
      result.datasetCount += period.datasetCount;
      result.footprintCount += period.footprintCount;
      result.sizeBytes += period.sizeBytes;
      addCounts(result.regionDatasetCounts, period.regionDatasetCounts);
      period.crses.forEach((crs) => result.crses.add(crs));
      if (period.footprintGeometry) footprints.push(period.footprintGeometry);
      if (period.timelinePeriod === 'month') timelineByMonth = true;

      const newest = period.newestDatasetCreationTime;
      if (newest && (!result.newestDatasetCreationTime || newest > result.newestDatasetCreationTime)) {
        result.newestDatasetCreationTime = newest;
      }
      const refreshed = period.productRefreshTime;
      if (refreshed && (!result.productRefreshTime || refreshed > result.productRefreshTime)) {
        result.productRefreshTime = refreshed;
      }
      if (period.datasetCount > 0 && period.timeRange) {
        const { begin, end } = period.timeRange;
        result.timeRange = result.timeRange
          ? {
            begin: begin < result.timeRange.begin ? begin : result.timeRange.begin,
            end: end > result.timeRange.end ? end : result.timeRange.end,
          }
          : { begin, end };
      }
    }

    const timeline = new Map<string, number>();
    for (const period of periods) {
      addCounts(timeline, period.timelineDatasetCounts);
    }
    const range = result.timeRange;
    if (range && (range.end.getTime() - range.begin.getTime()) / DAY_MS > MAX_DAY_TIMELINE_DAYS) {
      timelineByMonth = true;
    }
    result.timelinePeriod = timelineByMonth ? 'month' : 'day';
    // month keys are already `YYYY-MM-01`, so regrouping a mixed timeline is safe
    result.timelineDatasetCounts = timelineByMonth ? groupTimelineByMonth(timeline) : timeline;
    result.footprintGeometry = unionFootprints(footprints);
    return result;
  }

  /**
   * Returns a summary with no datasets
   * @param productName - the product
   * @param periodType - the granularity of the period
   * @param startDay - the first day of the period
   * @param timeRange - the range of the period
   * @param timeline - timeline keys to include with zero counts
   */
  static empty(
    productName: string,
    periodType: PeriodType,
    startDay: string,
    timeRange: TimeRange | null = null,
    timeline: string[] = [],
  ): TimePeriodOverview {
    return new TimePeriodOverview({
      productName,
      periodType,
      startDay,
      timeRange,
      timelineDatasetCounts: new Map(timeline.map((day) => [day, 0])),
    });
  }

  /**
   * The timeline sorted by day (or month), for display
   */
  sortedTimeline(): [string, number][] {
    return [...this.timelineDatasetCounts.entries()].sort(([a], [b]) => a.localeCompare(b));
  }

  /**
   * Returns the JSON representation used by the API
   */
  serialize(): Record<string, unknown> {
    return {
      product: this.productName,
      period_type: this.periodType,
      start_day: this.startDay,
      dataset_count: this.datasetCount,
      timeline_period: this.timelinePeriod,
      timeline_dataset_counts: Object.fromEntries(this.sortedTimeline()),
      region_dataset_counts: mapToObject(this.regionDatasetCounts),
      time_range: this.timeRange
        ? { begin: toISODateTime(this.timeRange.begin), end: toISODateTime(this.timeRange.end) }
        : null,
      footprint_count: this.footprintCount,
      footprint_geometry: this.footprintGeometry,
      crses: [...this.crses].sort(),
      size_bytes: this.sizeBytes,
      newest_dataset_creation_time: this.newestDatasetCreationTime
        ? toISODateTime(this.newestDatasetCreationTime)
        : null,
      product_refresh_time: this.productRefreshTime ? toISODateTime(this.productRefreshTime) : null,
      summary_gen_time: this.summaryGenTime ? toISODateTime(this.summaryGenTime) : null,
    };
  }
}
