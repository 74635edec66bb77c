import { Polygon } from 'geojson';
import { v4 as uuid } from 'uuid';
import db, { Transaction } from '../../app/util/db';
import {
  addDataset, addLocation, addProduct, addSource, DatasetDocument, updateDataset,
} from '../../app/models/catalog';
import { BoundingBox } from '../../app/util/footprint';

export interface DatasetFixture {
  id?: string;
  // ISO 8601 acquisition time
  datetime: string;
  regionCode?: string;
  // `[W,S,E,N]` in WGS84
  box?: BoundingBox;
  crs?: string;
  sizeBytes?: number;
  created?: string;
  properties?: { [name: string]: unknown };
  measurements?: { [name: string]: string };
  location?: string;
  added?: Date;
  updated?: Date;
  archived?: Date;
}

/**
 * Returns the polygon of a box
 * @param box - the box in `[W,S,E,N]` format
 */
export function boxPolygon([west, south, east, north]: BoundingBox): Polygon {
  return {
    type: 'Polygon',
    coordinates: [[[west, south], [east, south], [east, north], [west, north], [west, south]]],
  };
}

/**
 * Builds an EO3 dataset document
 * @param fixture - the fields of the dataset
 */
export function buildDatasetDocument(fixture: DatasetFixture): DatasetDocument {
  const properties: { [name: string]: unknown } = { datetime: fixture.datetime, ...fixture.properties };
  if (fixture.regionCode !== undefined) properties['odc:region_code'] = fixture.regionCode;
  if (fixture.sizeBytes !== undefined) properties['odc:file_size'] = fixture.sizeBytes;
  if (fixture.created !== undefined) properties['odc:processing_datetime'] = fixture.created;

  const document: DatasetDocument = {
    $schema: 'https://schemas.opendatacube.org/dataset',
    crs: fixture.crs ?? 'epsg:4326',
    properties,
  };
  if (fixture.box) document.geometry = boxPolygon(fixture.box);
  if (fixture.measurements) {
    document.measurements = Object.fromEntries(
      Object.entries(fixture.measurements).map(([name, path]) => [name, { path }]),
    );
  }
  return document;
}

/**
 * Adds a product to the test catalog
 * @param name - the product name
 * @param definition - extra fields of the product definition
 * @param tx - the transaction to use
 * @returns the product id
 */
export async function addFixtureProduct(
  name: string,
  definition: DatasetDocument = {},
  tx: Transaction = db,
): Promise<number> {
  return addProduct(tx, name, { metadata_type: 'eo3', ...definition });
}

/**
 * Adds a dataset, and its location when given, to the test catalog
 * @param productId - the product of the dataset
 * @param fixture - the fields of the dataset
 * @param tx - the transaction to use
 * @returns the dataset id
 */
export async function addFixtureDataset(
  productId: number,
  fixture: DatasetFixture,
  tx: Transaction = db,
): Promise<string> {
  const id = fixture.id ?? uuid();
  await addDataset(tx, {
    id,
    productId,
    metadata: buildDatasetDocument(fixture),
    added: fixture.added,
    updated: fixture.updated,
    archived: fixture.archived,
  });
  if (fixture.location) await addLocation(tx, id, fixture.location);
  return id;
}

/**
 * Replaces the document of a test dataset
 * @param id - the dataset id
 * @param document - the new document
 * @param updated - the update time recorded on the dataset; null leaves none
 */
export async function updateFixtureDataset(
  id: string,
  document: DatasetDocument,
  updated: Date | null = new Date(),
): Promise<void> {
  await updateDataset(db, id, document, updated);
}

/**
 * Records that one test dataset was derived from another
 * @param datasetId - the derived dataset
 * @param classifier - the role of the source
 * @param sourceId - the source dataset
 */
export async function linkFixtureDatasets(datasetId: string, classifier: string, sourceId: string): Promise<void> {
  await addSource(db, datasetId, classifier, sourceId);
}
