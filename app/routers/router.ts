import path from 'path';
import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { getHealth } from '../frontends/health';
import { getApiProducts, getProductsPage, getProductsText } from '../frontends/products';
import * as summaryApi from '../frontends/summary-api';
import * as stac from '../frontends/stac';
import cors from '../middleware/cors';
import { NotFoundError } from '../util/errors';
import env from '../util/env';

export interface RouterConfig {
  cors?: boolean; // Send CORS headers on the /api and /stac routes
}

type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

/**
 * Given an Express.js handler function, returns another Express.js handler that wraps the
 * input function with logging information and ensures the logger accessed by the input
 * function describes the handler that produced it.
 *
 * @param fn - The handler to wrap with logging
 * @returns The handler wrapped with logging information
 */
function logged(fn: AsyncHandler): RequestHandler {
  const scope = `handler.${fn.name}`;
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { logger } = req.context;
    const child = logger.child({ component: scope });
    req.context.logger = child;
    const startTime = new Date().getTime();
    try {
      child.debug('Invoking handler');
      await fn(req, res, next);
    } finally {
      const msTaken = new Date().getTime() - startTime;
      child.debug('Completed handler', { durationMs: msTaken });
      if (req.context.logger === child) {
        req.context.logger = logger;
      }
    }
  };
}

const period = ':year?/:month?/:day?';

/**
 * Creates and returns an express.Router instance that has the handlers necessary to
 * respond to page, API and STAC requests
 *
 * @param config - the router configuration
 * @returns A router which can respond to explorer requests
 */
export default function router({ cors: corsEnabled = env.cubedashCors }: RouterConfig = {}): express.Router {
  const result = express.Router();

  // JSON schemas under /schemas
  result.use('/schemas', express.static(path.join(__dirname, '..', 'schemas')));
  result.use('/schemas', (_req, _res, next) => next(new NotFoundError()));

  result.use(['/api', '/stac'], cors(corsEnabled));

  result.get('/', (_req, res) => res.redirect('/products'));
  result.get('/health', logged(getHealth));
  result.get('/products', logged(getProductsPage));
  result.get('/products.txt', logged(getProductsText));

  result.get('/api/products', logged(getApiProducts));
  result.get(`/api/summary/:product/${period}`, logged(summaryApi.getSummary));
  result.get(`/api/footprint/:product/${period}`, logged(summaryApi.getFootprint));
  result.get(`/api/regions/:product/${period}`, logged(summaryApi.getRegions));
  result.get('/api/region/:product/:regionCode', logged(summaryApi.getRegionDatasets));
  result.get('/api/region-products/:regionCode', logged(summaryApi.getRegionProducts));
  result.get('/api/dataset/:id', logged(summaryApi.getDataset));
  result.get('/api/arrivals', logged(summaryApi.getArrivals));
  result.get('/api/product-audit', logged(summaryApi.getProductAudit));
  result.get('/api/dataset-counts', logged(summaryApi.getDatasetCounts));

  result.get('/stac', logged(stac.getStacRoot));
  result.get('/stac/conformance', logged(stac.getConformance));
  result.get('/stac/collections', logged(stac.getCollections));
  result.get('/stac/collections/:collection', logged(stac.getCollection));
  result.get('/stac/collections/:collection/items', logged(stac.getCollectionItems));
  result.get('/stac/collections/:collection/items/:id', logged(stac.getItem));
  result.get('/stac/search', logged(stac.searchItems));
  result.post('/stac/search', logged(stac.searchItems));

  result.get('/*', () => { throw new NotFoundError('The requested page was not found.'); });
  result.post('/*', () => { throw new NotFoundError('The requested POST page was not found.'); });
  return result;
}
