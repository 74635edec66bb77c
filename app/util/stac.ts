import { pick } from 'lodash';
import ProductSummary from '../models/product-summary';
import TimePeriodOverview from '../models/time-period-overview';
import { DatasetDocument } from '../models/catalog';
import { ItemSource } from '../summary/store';
import { Footprint } from './dataset-fields';
import { toISODateTime } from './date';
import env from './env';
import { footprintBbox } from './footprint';
import { Link } from './links';
import { asRecord, asString } from './object';
import { Pagination } from './pagination';
import { resolve } from './url';

export const STAC_VERSION = '1.0.0';

export const CONFORMANCE_CLASSES = [
  'https://api.stacspec.org/v1.0.0/core',
  'https://api.stacspec.org/v1.0.0/collections',
  'https://api.stacspec.org/v1.0.0/item-search',
  'https://api.stacspec.org/v1.0.0/ogcapi-features',
  'http://www.opengis.net/spec/ogcapi-features-1/1.0/conf/core',
  'http://www.opengis.net/spec/ogcapi-features-1/1.0/conf/oas30',
  'http://www.opengis.net/spec/ogcapi-features-1/1.0/conf/geojson',
];

const PROJECTION_EXTENSION = 'https://stac-extensions.github.io/projection/v1.1.0/schema.json';

export interface StacAsset {
  href: string;
  title?: string;
  type?: string;
  roles: string[];
}

export interface StacItemCollection {
  type: 'FeatureCollection';
  numberMatched: number;
  numberReturned: number;
  features: StacItem[];
  links: Link[];
}

/**
 * Guesses the media type of an asset from its path
 * @param href - the asset location
 */
function mediaTypeOf(href: string): string | undefined {
  const path = href.split('?')[0].toLowerCase();
  if (path.endsWith('.tif') || path.endsWith('.tiff')) return 'image/tiff; application=geotiff';
  if (path.endsWith('.nc')) return 'application/x-netcdf';
  if (path.endsWith('.jpg') || path.endsWith('.jpeg')) return 'image/jpeg';
  if (path.endsWith('.png')) return 'image/png';
  if (path.endsWith('.json')) return 'application/json';
  if (path.endsWith('.yaml') || path.endsWith('.yml')) return 'text/yaml';
  if (path.endsWith('.xml')) return 'application/xml';
  return undefined;
}

/**
 * A STAC item for one indexed dataset
 */
export class StacItem {
  id: string;

  stac_version: string;

  stac_extensions: string[];

  type: 'Feature';

  collection: string;

  bbox?: number[];

  geometry: Footprint | null;

  properties: { [name: string]: unknown };

  assets: { [key: string]: StacAsset };

  links: Link[];

  /**
   * @param id - the dataset id
   * @param collection - the name of the product the dataset belongs to
   */
  constructor(id: string, collection: string) {
    this.id = id;
    this.stac_version = STAC_VERSION;
    this.stac_extensions = [];
    this.type = 'Feature';
    this.collection = collection;
    this.geometry = null;
    this.properties = {};
    this.assets = {};
    this.links = [];
  }

  /**
   * Sets the geometry of the item and the bounding box derived from it
   * @param footprint - the footprint in WGS84, if known
   */
  setFootprint(footprint: Footprint | null): void {
    this.geometry = footprint;
    this.bbox = footprint ? footprintBbox(footprint) : undefined;
  }

  /**
   * Sets a property of the item
   * @param name - Name of the property
   * @param value - Value of the property; undefined and null values are left out
   */
  setProperty(name: string, value: unknown): void {
    if (value !== undefined && value !== null) {
      this.properties[name] = value;
    }
  }

  /**
   * Adds an asset to the item
   * @param key - the asset key
   * @param href - the asset URL
   * @param roles - the asset roles
   */
  addAsset(key: string, href: string, roles: string[]): void {
    const type = mediaTypeOf(href);
    this.assets[key] = type ? { href, type, roles } : { href, roles };
  }

  /**
   * Adds a link to the item
   * @param href - Link URL
   * @param rel - Relation type
   * @param type - Media type of the target
   */
  addLink(href: string, rel: string, type = 'application/json'): void {
    this.links.push({ href, rel, type });
  }

  /**
   * Placeholder method to support custom stringification
   *
   * @returns - STAC item JSON
   */
  toJSON(): object {
    const paths = ['id', 'stac_version', 'stac_extensions', 'type', 'collection', 'bbox', 'geometry', 'properties',
      'assets', 'links'];
    return pick(this, paths);
  }
}

/**
 * Adds the files named in a section of a dataset document (`measurements` or
 * `accessories`) as assets, resolving relative paths against the dataset's location
 *
 * @param item - the item
 * @param section - the document section
 * @param baseUri - the dataset location, if any
 * @param roles - returns the roles of an entry from its name
 */
function addDocumentAssets(
  item: StacItem,
  section: unknown,
  baseUri: string | undefined,
  roles: (name: string) => string[],
): void {
  for (const [name, entry] of Object.entries(asRecord(section))) {
    const path = asString(asRecord(entry).path);
    if (!path) continue;
    item.addAsset(name, baseUri ? resolve(baseUri, path) : path, roles(name));
  }
}

/**
 * Builds the STAC item of a dataset
 *
 * @param source - the dataset's extent and catalog record
 * @param urlRoot - the root URL of the service
 * @returns the item
 */
export function createItem(source: ItemSource, urlRoot: string): StacItem {
  const { extent, productName, dataset } = source;
  const item = new StacItem(extent.id, productName);
  item.setFootprint(extent.footprint);

  const properties = asRecord(dataset?.metadata.properties);
  for (const [name, value] of Object.entries(properties)) {
    item.setProperty(name, value);
  }
  item.setProperty('datetime', toISODateTime(extent.centerTime));
  item.setProperty('created', extent.creationTime ? toISODateTime(extent.creationTime) : undefined);
  item.setProperty('odc:product', productName);
  item.setProperty('odc:region_code', extent.regionCode);
  const epsg = extent.crs?.match(/^EPSG:(\d+)$/);
  if (epsg) {
    item.stac_extensions.push(PROJECTION_EXTENSION);
    item.setProperty('proj:epsg', parseInt(epsg[1], 10));
  }

  const baseUri = dataset?.uris[0];
  addDocumentAssets(item, dataset?.metadata.measurements, baseUri, () => ['data']);
  addDocumentAssets(
    item,
    dataset?.metadata.accessories,
    baseUri,
    (name) => (name.startsWith('thumbnail') ? ['thumbnail'] : ['metadata']),
  );

  const collectionUrl = `${urlRoot}/stac/collections/${encodeURIComponent(productName)}`;
  item.addLink(`${collectionUrl}/items/${extent.id}`, 'self', 'application/geo+json');
  item.addLink(collectionUrl, 'collection');
  item.addLink(collectionUrl, 'parent');
  item.addLink(`${urlRoot}/stac`, 'root');
  if (baseUri) item.addLink(baseUri, 'canonical', mediaTypeOf(baseUri) ?? 'text/yaml');
  return item;
}

/**
 * Builds a STAC item collection from a page of search results
 *
 * @param items - the items of the page
 * @param pagination - the pagination of the search
 * @param links - the paging links
 * @returns the item collection
 */
export function createItemCollection(items: StacItem[], pagination: Pagination, links: Link[]): StacItemCollection {
  return {
    type: 'FeatureCollection',
    numberMatched: pagination.total,
    numberReturned: items.length,
    features: items,
    links,
  };
}

/**
 * Builds the STAC collection of a product
 *
 * @param product - the product record
 * @param definition - the product definition from the catalog
 * @param overview - the summary of all time of the product, if it has one
 * @param urlRoot - the root URL of the service
 * @returns the collection JSON
 */
export function createCollection(
  product: ProductSummary,
  definition: DatasetDocument,
  overview: TimePeriodOverview | null,
  urlRoot: string,
): { [key: string]: unknown } {
  const footprint = overview?.footprintWgs84;
  const summaries: { [field: string]: unknown[] } = {};
  for (const [field, value] of Object.entries(product.fixedMetadata ?? {})) {
    summaries[field] = [value];
  }
  const collectionUrl = `${urlRoot}/stac/collections/${encodeURIComponent(product.name)}`;
  const links: Link[] = [
    { href: collectionUrl, rel: 'self', type: 'application/json' },
    { href: `${urlRoot}/stac`, rel: 'root', type: 'application/json' },
    { href: `${urlRoot}/stac`, rel: 'parent', type: 'application/json' },
    { href: `${collectionUrl}/items`, rel: 'items', type: 'application/geo+json' },
  ];
  for (const name of product.sourceProductRefs) {
    links.push({ href: `${urlRoot}/stac/collections/${encodeURIComponent(name)}`, rel: 'derived_from', title: name });
  }
  return {
    stac_version: STAC_VERSION,
    stac_extensions: [],
    type: 'Collection',
    id: product.name,
    title: asString(definition.title) ?? product.name,
    description: asString(definition.description) ?? product.name,
    license: asString(definition.license) ?? env.stacDefaultLicense,
    extent: {
      spatial: { bbox: [footprint ? footprintBbox(footprint) : [-180, -90, 180, 90]] },
      temporal: {
        interval: [[
          product.timeEarliest ? toISODateTime(product.timeEarliest) : null,
          product.timeLatest ? toISODateTime(product.timeLatest) : null,
        ]],
      },
    },
    summaries,
    links,
  };
}

/**
 * Builds the root STAC catalog of the service
 *
 * @param products - the summarised products, each of which is a child collection
 * @param urlRoot - the root URL of the service
 * @returns the catalog JSON
 */
export function createRootCatalog(products: ProductSummary[], urlRoot: string): { [key: string]: unknown } {
  const stacUrl = `${urlRoot}/stac`;
  const links: Link[] = [
    { href: stacUrl, rel: 'self', type: 'application/json' },
    { href: stacUrl, rel: 'root', type: 'application/json' },
    { href: `${stacUrl}/conformance`, rel: 'conformance', type: 'application/json' },
    { href: `${stacUrl}/collections`, rel: 'data', type: 'application/json' },
    { href: `${stacUrl}/search`, rel: 'search', type: 'application/geo+json', method: 'GET' },
    { href: `${stacUrl}/search`, rel: 'search', type: 'application/geo+json', method: 'POST' },
  ];
  for (const product of products) {
    links.push({
      href: `${stacUrl}/collections/${encodeURIComponent(product.name)}`,
      rel: 'child',
      type: 'application/json',
      title: product.name,
    });
  }
  return {
    stac_version: STAC_VERSION,
    type: 'Catalog',
    id: env.stacEndpointId,
    title: env.stacEndpointTitle,
    description: env.stacEndpointDescription || env.stacEndpointTitle,
    conformsTo: CONFORMANCE_CLASSES,
    links,
  };
}
