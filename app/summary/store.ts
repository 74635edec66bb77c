import { Feature, FeatureCollection } from 'geojson';
import { Logger } from 'winston';
import { MemoryCache } from '../util/cache/memory-cache';
import db, { Transaction } from '../util/db';
import { Footprint } from '../util/dataset-fields';
import env from '../util/env';
import { BoundingBox } from '../util/footprint';
import defaultLogger from '../util/log';
import { Pagination, toPagination } from '../util/pagination';
import {
  describePeriod, periodRange, PeriodSpec, periodTypeOf, startDayOf, validatePeriod,
} from '../util/time-period';
import {
  Arrival, DatasetDocument, DatasetWithLocations, getCatalogProduct, getCatalogProducts, getDataset, getDatasets,
  getDatasetSources, getDatasetsDerived, latestArrivals, LinkedDatasets,
} from '../models/catalog';
import {
  DatasetExtent, ExtentRow, extentsInRegion, getExtent, getExtents, productIdsInRegion, rowToExtent, searchExtents,
} from '../models/dataset-spatial';
import ProductSummary, { getAllProductSummaries } from '../models/product-summary';
import {
  getProductRegions, NULL_REGION_CODE, regionInfoFor, RegionSummary,
} from '../models/region';
import { getSpatialQualityStats, SpatialQualityStats } from '../models/spatial-quality-stats';
import { datasetCountsPerMonth, getSummary, productIdsWithAllSummary } from '../models/time-overview';
import TimePeriodOverview from '../models/time-period-overview';
import { calculateSummary } from './summarise';

export interface ItemSearch {
  productNames?: string[];
  ids?: string[];
  bbox?: BoundingBox;
  begin?: Date;
  end?: Date;
  limit: number;
  page: number;
}

/**
 * A dataset found by a search: its extent plus its catalog record, which is null when the
 * dataset has left the catalog since it was indexed
 */
export interface ItemSource {
  extent: DatasetExtent;
  productName: string;
  dataset: DatasetWithLocations | null;
}

export interface ItemPage {
  items: ItemSource[];
  pagination: Pagination;
}

export interface DatasetDetails {
  dataset: DatasetWithLocations;
  extent: DatasetExtent | null;
  sources: LinkedDatasets;
  derived: LinkedDatasets;
}

export interface FootprintProperties {
  dataset_count: number;
  product_name: string;
  // year, month and day of the period; null where not given
  time_spec: [number | null, number | null, number | null];
}

export interface RegionProperties {
  region_code: string;
  label: string;
  count: number;
}

export interface RegionsProperties {
  region_type: string;
  region_unit_label: string;
  min_count: number;
  max_count: number;
}

export type RegionsGeojson = FeatureCollection<Footprint, RegionProperties> & { properties: RegionsProperties };

export interface SummaryStoreConfig {
  db?: Transaction;
  logger?: Logger;
  timezone?: string;
  cacheTtlSeconds?: number;
  cacheMaxEntries?: number;
}

interface OverviewQuery {
  product: ProductSummary;
  spec: PeriodSpec;
}

// lru-cache does not store null, so looked-up values are boxed
type Boxed<T> = { value: T };

/**
 * Read access to the stored summaries, memoised in memory. Every read of a product goes
 * through its `product` row, so products that were never refreshed are unknown here.
 */
export default class SummaryStore {
  db: Transaction;

  logger: Logger;

  timezone: string;

  private products: MemoryCache<Boxed<ProductSummary[]>>;

  private completeProductIds: MemoryCache<Boxed<Set<number>>>;

  private overviews: MemoryCache<Boxed<TimePeriodOverview | null>, OverviewQuery>;

  private regions: MemoryCache<Boxed<RegionSummary[]>, number>;

  private datasetCounts: MemoryCache<Boxed<Map<string, number>>>;

  constructor(config: SummaryStoreConfig = {}) {
    this.db = config.db ?? db;
    this.logger = (config.logger ?? defaultLogger).child({ component: 'summary-store' });
    this.timezone = config.timezone ?? env.cubedashDefaultTimezone;
    const ttlSeconds = config.cacheTtlSeconds ?? env.cubedashCacheTtlSeconds;
    const options = {
      ttl: ttlSeconds * 1000,
      maxEntries: config.cacheMaxEntries ?? env.cubedashCacheMaxEntries,
      disabled: ttlSeconds <= 0,
    };
    this.products = new MemoryCache(async () => ({ value: await getAllProductSummaries(this.db) }), options);
    this.completeProductIds = new MemoryCache(
      async () => ({ value: await productIdsWithAllSummary(this.db) }),
      options,
    );
    this.overviews = new MemoryCache(
      async (_key, query: OverviewQuery) => ({ value: await this.loadOverview(query) }),
      options,
    );
    this.regions = new MemoryCache(
      async (_key, productId: number) => ({ value: await getProductRegions(this.db, productId) }),
      options,
    );
    this.datasetCounts = new MemoryCache(async () => ({ value: await datasetCountsPerMonth(this.db) }), options);
  }

  /**
   * Forgets every memoised value, so that the next reads see the latest refresh
   */
  invalidate(): void {
    this.products.clear();
    this.completeProductIds.clear();
    this.overviews.clear();
    this.regions.clear();
    this.datasetCounts.clear();
    this.logger.debug('Cleared cached summaries');
  }

  /**
   * Returns the summary of a period of a product. Day summaries are not stored; they are
   * calculated from the dataset extents of the day.
   *
   * @param productName - the product name
   * @param spec - the period; empty for the whole of time
   * @returns the summary, or null if the product or the period has no summary
   * @throws RequestValidationError - if a day is given without a month, or a month without a year
   */
  async get(productName: string, spec: PeriodSpec = {}): Promise<TimePeriodOverview | null> {
    validatePeriod(spec);
    const product = await this.getProductSummary(productName);
    if (!product) return null;
    const key = `${productName}/${describePeriod(spec)}`;
    const { value } = await this.overviews.fetch(key, { product, spec });
    return value;
  }

  /**
   * Returns the record of a product
   * @param productName - the product name
   * @returns the record, or null if the product has never been refreshed
   */
  async getProductSummary(productName: string): Promise<ProductSummary | null> {
    return (await this.allProducts()).find((product) => product.name === productName) ?? null;
  }

  /**
   * Returns the definition document of a product from the catalog
   * @param productName - the product name
   * @returns the definition, or null if the catalog has no such product
   */
  async getProductDefinition(productName: string): Promise<DatasetDocument | null> {
    const product = await getCatalogProduct(this.db, productName);
    return product ? product.definition : null;
  }

  /**
   * Returns the names of every product in the catalog, summarised or not, ordered by name
   */
  async catalogProductNames(): Promise<string[]> {
    return (await getCatalogProducts(this.db)).map((product) => product.name);
  }

  /**
   * Returns the records of every refreshed product, ordered by name
   */
  async allProducts(): Promise<ProductSummary[]> {
    const { value } = await this.products.fetch('products', undefined);
    return value;
  }

  /**
   * Returns the products that have a summary of all time, ordered by name
   */
  async listCompleteProducts(): Promise<ProductSummary[]> {
    const { value: complete } = await this.completeProductIds.fetch('complete', undefined);
    return (await this.allProducts()).filter((product) => product.id !== undefined && complete.has(product.id));
  }

  /**
   * Returns the dataset count of every summarised month of every product, keyed
   * `<product>/<year>/<month>`
   */
  async getAllDatasetCounts(): Promise<Map<string, number>> {
    const { value } = await this.datasetCounts.fetch('dataset-counts', undefined);
    return value;
  }

  /**
   * Returns the footprint of a period of a product as a GeoJSON feature
   * @param productName - the product name
   * @param spec - the period
   * @returns the feature, or null when the period has no footprint
   */
  async getFootprintGeojson(
    productName: string,
    spec: PeriodSpec = {},
  ): Promise<Feature<Footprint, FootprintProperties> | null> {
    const overview = await this.get(productName, spec);
    const footprint = overview?.footprintWgs84;
    if (!overview || !footprint) return null;
    return {
      type: 'Feature',
      geometry: footprint,
      properties: {
        dataset_count: overview.footprintCount,
        product_name: productName,
        time_spec: [spec.year ?? null, spec.month ?? null, spec.day ?? null],
      },
    };
  }

  /**
   * Returns the regions of a product that have datasets in the period, with their counts
   * @param productName - the product name
   * @param spec - the period
   * @returns the regions, or null when the product has no regions or no dataset with one
   */
  async getRegionsGeojson(productName: string, spec: PeriodSpec = {}): Promise<RegionsGeojson | null> {
    const product = await this.getProductSummary(productName);
    if (!product?.id) return null;
    const { value: regions } = await this.regions.fetch(String(product.id), product.id);
    if (regions.length === 0) return null;
    const overview = await this.get(productName, spec);
    const counts = overview?.regionDatasetCounts ?? new Map<string | null, number>();
    if ([...counts.keys()].every((code) => code === null || code === NULL_REGION_CODE)) return null;

    const info = regionInfoFor(
      regions.map((region) => region.regionCode).filter((code) => code !== NULL_REGION_CODE),
    );
    const features: Feature<Footprint, RegionProperties>[] = [];
    for (const region of regions) {
      const count = counts.get(region.regionCode) ?? 0;
      if (region.regionCode === NULL_REGION_CODE || count === 0 || !region.footprint) continue;
      features.push({
        type: 'Feature',
        geometry: region.footprint,
        properties: { region_code: region.regionCode, label: info.label(region.regionCode), count },
      });
    }
    const featureCounts = features.map((f) => f.properties.count);
    return {
      type: 'FeatureCollection',
      properties: {
        region_type: info.name,
        region_unit_label: info.unitLabel,
        min_count: featureCounts.length ? Math.min(...featureCounts) : 0,
        max_count: featureCounts.length ? Math.max(...featureCounts) : 0,
      },
      features,
    };
  }

  /**
   * Searches the indexed datasets, newest first
   * @param search - the filters and the page to return
   * @returns one page of matching datasets and the pagination
   */
  async searchItems(search: ItemSearch): Promise<ItemPage> {
    let productIds: number[] | undefined;
    if (search.productNames) {
      const names = new Set(search.productNames);
      productIds = (await this.allProducts())
        .filter((product) => names.has(product.name))
        .flatMap((product) => (product.id === undefined ? [] : [product.id]));
    }
    const { ids, bbox, begin, end } = search;
    const result = await searchExtents(this.db, { productIds, ids, bbox, begin, end })
      .paginate({ perPage: search.limit, currentPage: search.page, isLengthAware: true });
    const rows: (ExtentRow & { productName: string })[] = result.data;
    const datasets = await getDatasets(this.db, rows.map((row) => row.id));
    return {
      items: rows.map((row) => ({
        extent: rowToExtent(row),
        productName: row.productName,
        dataset: datasets.get(row.id) ?? null,
      })),
      pagination: toPagination(result.pagination),
    };
  }

  /**
   * Returns a dataset with its extent and the datasets it is linked to
   * @param id - the dataset id
   * @param linkLimit - the maximum number of sources and of derived datasets to return
   * @returns the dataset, or null if the catalog has no such dataset
   */
  async getDatasetDetails(id: string, linkLimit: number): Promise<DatasetDetails | null> {
    const dataset = await getDataset(this.db, id);
    if (!dataset) return null;
    return {
      dataset,
      extent: await getExtent(this.db, id),
      sources: await getDatasetSources(this.db, id, linkLimit),
      derived: await getDatasetsDerived(this.db, id, linkLimit),
    };
  }

  /**
   * Returns the indexed datasets of a product in a region, newest first
   * @param productName - the product name
   * @param regionCode - the region code
   * @param spec - the period
   * @param limit - the maximum number of datasets
   * @param offset - the number of datasets to skip
   * @returns the extents, or null if the product is unknown
   */
  async datasetsByRegion(
    productName: string,
    regionCode: string,
    spec: PeriodSpec,
    limit: number,
    offset = 0,
  ): Promise<DatasetExtent[] | null> {
    const product = await this.getProductSummary(productName);
    if (!product?.id) return null;
    return extentsInRegion(this.db, product.id, regionCode, periodRange(spec, this.timezone), limit, offset);
  }

  /**
   * Returns the names of the products that have datasets in a region, ordered by name
   * @param regionCode - the region code
   * @param spec - the period
   * @param limit - the maximum number of products
   * @param offset - the number of products to skip
   */
  async productsByRegion(regionCode: string, spec: PeriodSpec, limit: number, offset = 0): Promise<string[]> {
    const ids = new Set(await productIdsInRegion(this.db, regionCode, periodRange(spec, this.timezone)));
    return (await this.allProducts())
      .filter((product) => product.id !== undefined && ids.has(product.id))
      .map((product) => product.name)
      .slice(offset, offset + limit);
  }

  /**
   * Returns the datasets that arrived most recently, per day and product
   * @param periodDays - the number of days to look back from the newest arrival
   */
  async getArrivals(periodDays: number): Promise<Arrival[]> {
    return latestArrivals(this.db, periodDays, this.timezone);
  }

  /**
   * Returns the spatial quality statistics of every product
   */
  async getProductAudit(): Promise<SpatialQualityStats[]> {
    return getSpatialQualityStats(this.db);
  }

  private async loadOverview({ product, spec }: OverviewQuery): Promise<TimePeriodOverview | null> {
    const productId = product.id;
    if (productId === undefined) return null;
    const periodType = periodTypeOf(spec);
    if (periodType !== 'day') {
      return getSummary(this.db, productId, product.name, periodType, startDayOf(spec));
    }
    const range = periodRange(spec, this.timezone);
    if (!range) return null;
    const extents = await getExtents(this.db, productId, range);
    return calculateSummary(extents, range, {
      productName: product.name,
      periodType,
      startDay: startDayOf(spec),
      timezone: this.timezone,
      productRefreshTime: product.lastRefresh,
    });
  }
}

export const summaryStore = new SummaryStore();
