import * as turf from '@turf/turf';
import { MultiPolygon, Polygon } from 'geojson';
import { parseTimestamp } from './date';
import { asNumber, asRecord, asString } from './object';

export type Footprint = Polygon | MultiPolygon;

/**
 * The fields of a dataset document that the summaries are built from
 */
export interface DatasetFields {
  centerTime: Date | null;
  creationTime: Date | null;
  regionCode: string | null;
  sizeBytes: number | null;
  crs: string | null;
  footprint: Footprint | null;
}

const WGS84_CRSES = ['EPSG:4326', 'OGC:CRS84', 'WGS84'];

/**
 * True if the value looks like a GeoJSON polygon or multipolygon
 * @param value - the value to check
 */
export function isFootprint(value: unknown): value is Footprint {
  const geometry = asRecord(value);
  return (geometry.type === 'Polygon' || geometry.type === 'MultiPolygon')
    && Array.isArray(geometry.coordinates)
    && geometry.coordinates.length > 0;
}

/**
 * Normalises a CRS name, e.g. `epsg:32753` to `EPSG:32753`
 * @param crs - the CRS as written in the document
 */
export function normaliseCrs(crs: string | undefined): string | null {
  if (!crs) return null;
  const trimmed = crs.trim();
  return /^[a-z]+:/i.test(trimmed) ? trimmed.toUpperCase() : trimmed;
}

/**
 * Returns the middle instant of a dataset, from its `datetime` property or the middle of
 * its start / end datetimes
 * @param properties - the dataset properties
 */
function centerTimeOf(properties: Record<string, unknown>): Date | null {
  const datetime = parseTimestamp(properties.datetime);
  if (datetime) return datetime;
  const start = parseTimestamp(properties['dtr:start_datetime']);
  const end = parseTimestamp(properties['dtr:end_datetime']);
  if (start && end) {
    return new Date(start.getTime() + (end.getTime() - start.getTime()) / 2);
  }
  return start || end;
}

/**
 * Returns the WGS84 bounding polygon from the `extent` section of a document
 * @param doc - the dataset document
 */
function extentFootprint(doc: Record<string, unknown>): Footprint | null {
  const extent = asRecord(doc.extent);
  const lat = asRecord(extent.lat);
  const lon = asRecord(extent.lon);
  const south = asNumber(lat.begin);
  const north = asNumber(lat.end);
  const west = asNumber(lon.begin);
  const east = asNumber(lon.end);
  if (south === undefined || north === undefined || west === undefined || east === undefined) {
    return null;
  }
  return turf.bboxPolygon([west, south, east, north]).geometry;
}

/**
 * Extracts the summarised fields from an EO3 dataset document.
 *
 * Footprints are only taken from the document geometry when it is already in WGS84;
 * otherwise the lat/lon extent box is used, when present.
 *
 * @param document - the dataset document, as stored in the catalog
 * @returns the extracted fields
 */
export function extractDatasetFields(document: unknown): DatasetFields {
  const doc = asRecord(document);
  const properties = asRecord(doc.properties);
  const crs = normaliseCrs(asString(doc.crs));

  let footprint: Footprint | null = null;
  if (crs && WGS84_CRSES.includes(crs) && isFootprint(doc.geometry)) {
    footprint = doc.geometry;
  } else {
    footprint = extentFootprint(doc);
  }

  return {
    centerTime: centerTimeOf(properties),
    creationTime: parseTimestamp(properties['odc:processing_datetime'])
      || parseTimestamp(properties.created),
    regionCode: asString(properties['odc:region_code']) ?? null,
    sizeBytes: asNumber(properties['odc:file_size']) ?? null,
    crs,
    footprint,
  };
}
