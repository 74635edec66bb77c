import { NextFunction, Request, Response } from 'express';
import ProductSummary from '../models/product-summary';
import { summaryStore } from '../summary/store';
import { toISODateTime } from '../util/date';
import env from '../util/env';
import { ServerError } from '../util/errors';

interface ProductListing {
  summarised: ProductSummary[];
  unsummarised: string[];
}

/**
 * Lists the catalog products, split by whether they have been summarised
 * @throws ServerError - if the catalog has products but none is summarised
 */
async function listProducts(): Promise<ProductListing> {
  const names = await summaryStore.catalogProductNames();
  const summarised = await summaryStore.listCompleteProducts();
  if (names.length > 0 && summarised.length === 0) {
    throw new ServerError('No products are summarised. Run `cubedash-gen --all` to generate some.');
  }
  const done = new Set(summarised.map((product) => product.name));
  return { summarised, unsummarised: names.filter((name) => !done.has(name)) };
}

const formatTime = (time: Date | null): string => (time ? toISODateTime(time) : '');

/**
 * Express.js handler rendering the list of products. Also serves as the liveness check.
 *
 * @param _req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getProductsPage(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { summarised, unsummarised } = await listProducts();
    res.render('products', {
      title: env.stacEndpointTitle,
      products: summarised.map((product) => ({
        name: product.name,
        datasetCount: product.datasetCount,
        timeEarliest: formatTime(product.timeEarliest),
        timeLatest: formatTime(product.timeLatest),
        lastRefresh: formatTime(product.lastRefresh),
      })),
      unsummarised,
    });
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler listing the summarised product names, one per line
 *
 * @param _req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getProductsText(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { summarised } = await listProducts();
    res.type('text/plain').send(summarised.map((product) => `${product.name}\n`).join(''));
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the summarised products and their overall figures as JSON
 *
 * @param _req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getApiProducts(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { summarised } = await listProducts();
    res.json(summarised.map((product) => product.serialize()));
  } catch (e) {
    next(e);
  }
}
