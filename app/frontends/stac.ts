import { NextFunction, Request, Response } from 'express';
import { summaryStore, ItemSearch } from '../summary/store';
import { NotFoundError } from '../util/errors';
import { validateSearchBody } from '../util/json-schema';
import { getPagingLinks, getPagingParams, setPagingHeaders } from '../util/pagination';
import { parseBbox, parseDatetime, parseMultiValueParameter } from '../util/parameter-parsing';
import {
  CONFORMANCE_CLASSES, createCollection, createItem, createItemCollection, createRootCatalog,
} from '../util/stac';
import { getRequestRoot } from '../util/url';
import { Link } from '../util/links';

const GEOJSON = 'application/geo+json';

/**
 * Parses the filters and paging of an item search from query or body parameters
 *
 * @param params - the query parameters of a GET, or the body of a POST
 * @returns the search
 * @throws RequestValidationError - if a parameter is invalid
 */
export function parseItemSearch(params: { [key: string]: unknown }): ItemSearch {
  const { page, limit } = getPagingParams(params);
  const collections = parseMultiValueParameter(params.collections);
  const ids = parseMultiValueParameter(params.ids);
  const datetime = parseDatetime(params.datetime);
  return {
    productNames: collections.length > 0 ? collections : undefined,
    ids: ids.length > 0 ? ids : undefined,
    bbox: parseBbox(params.bbox),
    begin: datetime?.begin,
    end: datetime?.end,
    page,
    limit,
  };
}

/**
 * Runs a search and sends the page of items as a STAC item collection
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param search - the search to run
 */
async function sendItemCollection(req: Request, res: Response, search: ItemSearch): Promise<void> {
  const { items, pagination } = await summaryStore.searchItems(search);
  const urlRoot = getRequestRoot(req);
  const links: Link[] = [
    ...getPagingLinks(req, pagination, ['self', 'prev', 'next']),
    { href: `${urlRoot}/stac`, rel: 'root', type: 'application/json' },
  ];
  setPagingHeaders(res, pagination);
  res.type(GEOJSON).json(createItemCollection(items.map((item) => createItem(item, urlRoot)), pagination, links));
}

/**
 * Looks up a summarised product by its collection id
 * @param name - the collection id
 * @throws NotFoundError - if no product of that name has been summarised
 */
async function requireCollection(name: string): Promise<void> {
  if (!await summaryStore.getProductSummary(name)) {
    throw new NotFoundError(`Unknown collection: ${name}`);
  }
}

/**
 * Express.js handler returning the root STAC catalog
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getStacRoot(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const products = await summaryStore.listCompleteProducts();
    res.json(createRootCatalog(products, getRequestRoot(req)));
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning the conformance classes
 *
 * @param _req - The request sent by the client
 * @param res - The response to send to the client
 */
export function getConformance(_req: Request, res: Response): void {
  res.json({ conformsTo: CONFORMANCE_CLASSES });
}

/**
 * Express.js handler returning every summarised product as a STAC collection
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getCollections(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const urlRoot = getRequestRoot(req);
    const collections = [];
    for (const product of await summaryStore.listCompleteProducts()) {
      const definition = await summaryStore.getProductDefinition(product.name) ?? {};
      collections.push(createCollection(product, definition, await summaryStore.get(product.name), urlRoot));
    }
    res.json({
      collections,
      links: [
        { href: `${urlRoot}/stac/collections`, rel: 'self', type: 'application/json' },
        { href: `${urlRoot}/stac`, rel: 'root', type: 'application/json' },
        { href: `${urlRoot}/stac`, rel: 'parent', type: 'application/json' },
      ],
    });
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning one product as a STAC collection
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getCollection(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { collection } = req.params;
    const product = await summaryStore.getProductSummary(collection);
    if (!product) {
      throw new NotFoundError(`Unknown collection: ${collection}`);
    }
    const definition = await summaryStore.getProductDefinition(collection) ?? {};
    const overview = await summaryStore.get(collection);
    res.json(createCollection(product, definition, overview, getRequestRoot(req)));
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning a page of the items of one collection
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getCollectionItems(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { collection } = req.params;
    await requireCollection(collection);
    const search = parseItemSearch({ ...req.query, collections: collection });
    await sendItemCollection(req, res, search);
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler returning one item
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function getItem(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { collection, id } = req.params;
    await requireCollection(collection);
    const { items } = await summaryStore.searchItems({ productNames: [collection], ids: [id], limit: 1, page: 1 });
    if (items.length === 0) {
      throw new NotFoundError(`No item ${id} in collection ${collection}`);
    }
    res.type(GEOJSON).json(createItem(items[0], getRequestRoot(req)));
  } catch (e) {
    next(e);
  }
}

/**
 * Express.js handler searching the items of every collection, from query parameters (GET)
 * or a JSON body (POST)
 *
 * @param req - The request sent by the client
 * @param res - The response to send to the client
 * @param next - The next function in the call chain
 */
export async function searchItems(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    let params: { [key: string]: unknown } = req.query;
    if (req.method === 'POST') {
      validateSearchBody(req.body);
      params = req.body;
    }
    await sendItemCollection(req, res, parseItemSearch(params));
  } catch (e) {
    next(e);
  }
}
