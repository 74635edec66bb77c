import { Logger } from 'winston';
import db, { batchSize, Transaction } from '../util/db';
import env from '../util/env';
import defaultLogger from '../util/log';
import { asRecord } from '../util/object';
import {
  ALL_START_DAY, monthKey, periodOfStartDay, periodRange, startDayOf,
} from '../util/time-period';
import {
  changedDatasetMonths, getActiveDatasets, getArchivedDatasetIds, getCatalogProduct, getCatalogProducts,
  linkedProducts,
} from '../models/catalog';
import {
  DatasetExtent, datasetToExtent, deleteExtents, deleteInactiveExtents, extentCenterTimes, extentMonths, extentOverview,
  getExtents, newestExtentAddedTime, upsertExtents,
} from '../models/dataset-spatial';
import ProductSummary, { upsertProductRecord } from '../models/product-summary';
import { upsertProductRegions } from '../models/region';
import { refreshSpatialQualityStats } from '../models/spatial-quality-stats';
import {
  getSummaries, getSummary, outdatedYears, putSummary, summarisedMonths,
} from '../models/time-overview';
import TimePeriodOverview from '../models/time-period-overview';
import { calculateSummary, fixedProperties } from './summarise';

export enum GenerateResult {
  CREATED = 'created',
  UPDATED = 'updated',
  NO_CHANGES = 'no_changes',
  SKIPPED = 'skipped',
  ERROR = 'error',
}

export interface RefreshOptions {
  // regenerate every month, not only the changed ones
  force?: boolean;
  // restart the incremental scan from the newest dataset already indexed
  resetIncrementalPosition?: boolean;
  // rescan every active dataset of the catalog
  recreateDatasetExtents?: boolean;
}

export interface SummaryGeneratorConfig {
  db?: Transaction;
  logger?: Logger;
  timezone?: string;
}

// number of datasets compared when looking for fixed metadata
const FIXED_METADATA_SAMPLE_SIZE = 1000;

/**
 * Builds and maintains the summaries of the products of the dataset catalog
 */
export default class SummaryGenerator {
  db: Transaction;

  logger: Logger;

  timezone: string;

  constructor(config: SummaryGeneratorConfig = {}) {
    this.db = config.db ?? db;
    this.logger = (config.logger ?? defaultLogger).child({ component: 'summary-generator' });
    this.timezone = config.timezone ?? env.cubedashDefaultTimezone;
  }

  /**
   * Refreshes the summaries of one product. Failures are logged and reported as
   * `GenerateResult.ERROR` rather than thrown.
   *
   * @param productName - the name of the catalog product
   * @param options - how much to regenerate
   * @returns what happened to the product's summaries
   */
  async refreshProduct(productName: string, options: RefreshOptions = {}): Promise<GenerateResult> {
    const startTime = Date.now();
    try {
      const result = await this._refreshProduct(productName, options);
      this.logger.info(`Refreshed ${productName}: ${result}`, { durationMs: Date.now() - startTime });
      return result;
    } catch (e) {
      this.logger.error(`Failed to refresh product ${productName}`);
      this.logger.error(e);
      return GenerateResult.ERROR;
    }
  }

  /**
   * Refreshes every product of the catalog, in name order
   * @param options - how much to regenerate
   * @returns the result of each product, keyed by product name
   */
  async refreshAll(options: RefreshOptions = {}): Promise<Map<string, GenerateResult>> {
    const results = new Map<string, GenerateResult>();
    for (const product of await getCatalogProducts(this.db)) {
      results.set(product.name, await this.refreshProduct(product.name, options));
    }
    return results;
  }

  /**
   * Rebuilds the spatial quality statistics of all products
   * @returns the number of products with statistics
   */
  async refreshStats(): Promise<number> {
    const count = await refreshSpatialQualityStats(this.db);
    this.logger.info(`Refreshed spatial quality statistics of ${count} products`);
    return count;
  }

  private async _refreshProduct(productName: string, options: RefreshOptions): Promise<GenerateResult> {
    const catalogProduct = await getCatalogProduct(this.db, productName);
    if (!catalogProduct) {
      this.logger.warn(`Product ${productName} is not in the catalog, skipping`);
      return GenerateResult.SKIPPED;
    }

    // anything added after this point is left for the next refresh
    const refreshTime = new Date();
    const product = await this.db.transaction((tx) => upsertProductRecord(tx, catalogProduct));
    const productId = catalogProduct.id;
    const hadSummary = await getSummary(this.db, productId, productName, 'all', ALL_START_DAY) !== null;

    if (options.resetIncrementalPosition) {
      product.lastRefresh = await newestExtentAddedTime(this.db, productId);
      this.logger.info(`Reset incremental position of ${productName} to ${product.lastRefresh?.toISOString()}`);
    }

    const { lastRefresh } = product;
    const fullScan = !lastRefresh || options.force || options.recreateDatasetExtents;
    const changedTimes: Date[] = [];
    if (fullScan) {
      changedTimes.push(...await deleteInactiveExtents(this.db, productId));
      changedTimes.push(...await this.scanDatasets(productId, null));
    } else {
      const archived = await getArchivedDatasetIds(this.db, productId, lastRefresh);
      changedTimes.push(...await deleteExtents(this.db, archived));
      changedTimes.push(...await this.scanDatasets(productId, lastRefresh));
    }
    this.logger.debug(`${changedTimes.length} dataset extents of ${productName} changed`);

    if (changedTimes.length === 0 && hadSummary && !options.force) {
      product.lastRefresh = refreshTime;
      await product.save(this.db);
      return GenerateResult.NO_CHANGES;
    }

    const months = new Set(changedTimes.map((time) => monthKey(time, this.timezone)));
    if (fullScan) {
      for (const month of await extentMonths(this.db, productId, this.timezone)) months.add(month);
      for (const month of await summarisedMonths(this.db, productId)) months.add(month);
    } else {
      for (const month of await changedDatasetMonths(this.db, productId, lastRefresh, this.timezone)) {
        months.add(month);
      }
    }
    await this.regenerateMonths(productId, productName, [...months].sort(), refreshTime);
    await this.regenerateYears(productId, productName, refreshTime, months.size > 0 || !hadSummary);

    const regionCount = await upsertProductRegions(this.db, productId);
    this.logger.debug(`${productName} has ${regionCount} regions`);

    await this.updateProductRecord(productId, product, refreshTime);
    return hadSummary ? GenerateResult.UPDATED : GenerateResult.CREATED;
  }

  /**
   * Stores the extents of a product's active datasets, page by page. Datasets that no
   * longer have a usable time lose their extent.
   * @param productId - the product id
   * @param changedAfter - only datasets added or updated after this time; all when null
   * @returns the center times of the written and deleted extents, old and new
   */
  private async scanDatasets(productId: number, changedAfter: Date | null): Promise<Date[]> {
    const centerTimes: Date[] = [];
    let afterId: string | undefined;
    let done = false;
    while (!done) {
      const datasets = await getActiveDatasets(this.db, productId, { changedAfter, afterId, limit: batchSize });
      const extents: DatasetExtent[] = [];
      const timeless: string[] = [];
      for (const dataset of datasets) {
        const extent = datasetToExtent(dataset);
        if (extent) {
          extents.push(extent);
        } else {
          timeless.push(dataset.id);
        }
      }
      // an updated dataset may have moved out of the month it was summarised in
      centerTimes.push(...await extentCenterTimes(this.db, extents.map((extent) => extent.id)));
      centerTimes.push(...await deleteExtents(this.db, timeless));
      await upsertExtents(this.db, extents);
      centerTimes.push(...extents.map((extent) => extent.centerTime));
      if (datasets.length < batchSize) {
        done = true;
      } else {
        afterId = datasets[datasets.length - 1].id;
      }
    }
    return centerTimes;
  }

  /**
   * Recalculates and stores the summaries of the given months
   * @param productId - the product id
   * @param productName - the product name
   * @param months - the start days of the months
   * @param refreshTime - when the refresh started
   */
  private async regenerateMonths(
    productId: number,
    productName: string,
    months: string[],
    refreshTime: Date,
  ): Promise<void> {
    for (const startDay of months) {
      const range = periodRange(periodOfStartDay('month', startDay), this.timezone);
      if (!range) continue;
      const extents = await getExtents(this.db, productId, range);
      const overview = calculateSummary(extents, range, {
        productName,
        periodType: 'month',
        startDay,
        timezone: this.timezone,
        productRefreshTime: refreshTime,
      });
      await putSummary(this.db, productId, overview);
    }
    this.logger.debug(`Regenerated ${months.length} months of ${productName}`);
  }

  /**
   * Rebuilds the outdated year summaries from their months, then the summary of all time
   * from the years
   * @param productId - the product id
   * @param productName - the product name
   * @param refreshTime - when the refresh started
   * @param rebuildAll - rebuild the summary of all time even when no year changed
   */
  private async regenerateYears(
    productId: number,
    productName: string,
    refreshTime: Date,
    rebuildAll: boolean,
  ): Promise<void> {
    const years = await outdatedYears(this.db, productId);
    for (const year of years) {
      const startDay = startDayOf({ year });
      const monthSummaries = await getSummaries(
        this.db, productId, productName, 'month', startDay, startDayOf({ year: year + 1 }),
      );
      const overview = TimePeriodOverview.addPeriods(monthSummaries, productName, 'year', startDay);
      overview.productRefreshTime = refreshTime;
      await putSummary(this.db, productId, overview);
    }
    if (years.length === 0 && !rebuildAll) return;

    const yearSummaries = await getSummaries(this.db, productId, productName, 'year');
    const all = TimePeriodOverview.addPeriods(yearSummaries, productName, 'all', ALL_START_DAY);
    all.productRefreshTime = refreshTime;
    await putSummary(this.db, productId, all);
  }

  /**
   * Updates the product row once its summaries are stored
   * @param productId - the product id
   * @param product - the product record
   * @param refreshTime - when the refresh started
   */
  private async updateProductRecord(
    productId: number,
    product: ProductSummary,
    refreshTime: Date,
  ): Promise<void> {
    const overview = await extentOverview(this.db, productId);
    product.datasetCount = overview.count;
    product.timeEarliest = overview.earliest;
    product.timeLatest = overview.latest;
    product.fixedMetadata = overview.count > 0 ? await this.findFixedMetadata(productId) : {};
    product.sourceProductRefs = await linkedProducts(this.db, productId, 'source');
    product.derivedProductRefs = await linkedProducts(this.db, productId, 'derived');
    product.lastRefresh = refreshTime;
    product.markSummarised(new Date());
    await product.save(this.db);
  }

  /**
   * Returns the dataset properties that have the same value in a sample of the product's
   * active datasets
   * @param productId - the product id
   */
  private async findFixedMetadata(productId: number): Promise<{ [field: string]: string | number | boolean }> {
    const sample = await getActiveDatasets(this.db, productId, { limit: FIXED_METADATA_SAMPLE_SIZE });
    return fixedProperties(sample.map((dataset) => asRecord(dataset.metadata.properties)));
  }
}
