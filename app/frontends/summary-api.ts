import { NextFunction, Request, Response } from 'express';
import { validate as isUUID } from 'uuid';
import { DatasetExtent } from '../models/dataset-spatial';
import { Arrival, LinkedDatasets } from '../models/catalog';
import { summaryStore } from '../summary/store';
import { toISODateTime } from '../util/date';
import env from '../util/env';
import { EmptyDbError, NotFoundError, RequestValidationError } from '../util/errors';
import { mapToObject } from '../util/object';
import { getPagingParams, parseIntegerParam } from '../util/pagination';
import { describePeriod, parsePeriod, PeriodSpec } from '../util/time-period';

const DATASET_LINK_LIMIT = 20;

// Arrivals never look back further than a year
const MAX_ARRIVAL_PERIOD_DAYS = 366;

/**
 * Reads the period from the `year`, `month` and `day` path parameters
 * @param req - The request sent by the client
 */
function periodOf(req: Request): PeriodSpec {
  const { year, month, day } = req.params;
  return parsePeriod(year, month, day);
}

/**
 * Returns the JSON representation of a dataset extent
 * @param extent - the extent
 */
function serializeExtent(extent: DatasetExtent): { [key: string]: unknown } {
  return {
    id: extent.id,
    center_time: toISODateTime(extent.centerTime),
    creation_time: extent.creationTime ? toISODateTime(extent.creationTime) : null,
    region_code: extent.regionCode,
    size_bytes: extent.sizeBytes,
    crs: extent.crs,
    footprint: extent.footprint,
  };
}

/**
 * Returns the JSON representation of a dataset's links
 * @param linked - the linked datasets
 */
function serializeLinks(linked: LinkedDatasets): { [key: string]: unknown }[] {
  return linked.datasets.map((dataset) => ({
    id: dataset.id,
    product: dataset.productName,
    classifier: dataset.classifier,
  }));
}

/**
 * Express.js handler returning the summary of a product for a period
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getSummary(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const spec = periodOf(req);
    const { product } = req.params;
    const overview = await summaryStore.get(product, spec);
    if (!overview) {
      throw new NotFoundError(`No summary of ${product} for ${describePeriod(spec)}`);
    }
    res.json(overview.serialize());
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the footprint of a product for a period as GeoJSON
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getFootprint(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const spec = periodOf(req);
    const { product } = req.params;
    const feature = await summaryStore.getFootprintGeojson(product, spec);
    if (!feature) {
      throw new NotFoundError(`No footprint of ${product} for ${describePeriod(spec)}`);
    }
    res.type('application/geo+json').json(feature);
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the regions of a product for a period as GeoJSON
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getRegions(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const spec = periodOf(req);
    const { product } = req.params;
    const regions = await summaryStore.getRegionsGeojson(product, spec);
    if (!regions) {
      throw new NotFoundError(`No regions of ${product} for ${describePeriod(spec)}`);
    }
    res.type('application/geo+json').json(regions);
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning a page of the datasets of a product in one region
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getRegionDatasets(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { product, regionCode } = req.params;
    const { page, limit } = getPagingParams(req.query);
    const extents = await summaryStore.datasetsByRegion(product, regionCode, {}, limit, (page - 1) * limit);
    if (!extents) {
      throw new NotFoundError(`Unknown product: ${product}`);
    }
    res.json({
      product,
      region_code: regionCode,
      page,
      limit,
      datasets: extents.map(serializeExtent),
    });
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the products that have datasets in one region
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getRegionProducts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { regionCode } = req.params;
    const { page, limit } = getPagingParams(req.query);
    const products = await summaryStore.productsByRegion(regionCode, {}, limit, (page - 1) * limit);
    res.json({ region_code: regionCode, products });
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning one dataset with its extent, sources and derived datasets
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getDataset(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { id } = req.params;
    if (!isUUID(id)) {
      throw new RequestValidationError(`Invalid dataset id: ${id}`);
    }
    const details = await summaryStore.getDatasetDetails(id, DATASET_LINK_LIMIT);
    if (!details) {
      throw new NotFoundError(`Unknown dataset: ${id}`);
    }
    const { dataset, extent, sources, derived } = details;
    res.json({
      id: dataset.id,
      product: dataset.productName,
      added: toISODateTime(dataset.added),
      archived: dataset.archived ? toISODateTime(dataset.archived) : null,
      locations: dataset.uris,
      metadata: dataset.metadata,
      extent: extent ? serializeExtent(extent) : null,
      sources: serializeLinks(sources),
      remaining_sources: sources.remaining,
      derived: serializeLinks(derived),
      remaining_derived: derived.remaining,
    });
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the most recent arrivals per day and product
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getArrivals(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const periodDays = parseIntegerParam(
      req.query, 'period', env.cubedashDefaultArrivalPeriodDays, 1, MAX_ARRIVAL_PERIOD_DAYS,
    );
    let arrivals: Arrival[];
    try {
      arrivals = await summaryStore.getArrivals(periodDays);
    } catch (e) {
      if (!(e instanceof EmptyDbError)) throw e;
      arrivals = [];
    }
    res.json(arrivals.map((arrival) => ({
      day: arrival.day,
      product: arrival.productName,
      count: arrival.count,
      sample_ids: arrival.sampleIds,
    })));
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the spatial quality statistics of every product
 *
 * @param _req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getProductAudit(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const stats = await summaryStore.getProductAudit();
    res.json(stats.map((row) => ({
      product: row.productName,
      count: row.count,
      missing_footprint: row.missingFootprint,
      footprint_size: row.footprintSize,
      footprint_stddev: row.footprintStddev,
      missing_srid: row.missingSrid,
      has_file_size: row.hasFileSize,
      has_region: row.hasRegion,
    })));
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the dataset count of every summarised month of every product
 *
 * @param _req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getDatasetCounts(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    res.json(mapToObject(await summaryStore.getAllDatasetCounts()));
  } catch (e) {
    next(e);
  }
}
