import * as turf from '@turf/turf';
import { Feature, FeatureCollection, MultiPolygon, Polygon } from 'geojson';
import { Footprint, isFootprint } from './dataset-fields';
import logger from './log';

export type BoundingBox = [number, number, number, number];

/** Footprints of regions are simplified to this tolerance, in degrees */
export const REGION_SIMPLIFY_TOLERANCE = 0.0001;

/**
 * Determine whether or not a box crosses the antimeridian
 *
 * @param box - a box in `[W,S,E,N]` format
 * @returns true if the box crosses the antimeridian, false otherwise
 */
export function crossesAntimeridian(box: BoundingBox): boolean {
  // true if W > E
  return box[0] > box[2];
}

/**
 * Splits a box that crosses the antimeridian into the boxes either side of it
 *
 * @param box - a box in `[W,S,E,N]` format
 * @returns one box, or two when the box crosses the antimeridian
 */
export function splitAntimeridian(box: BoundingBox): BoundingBox[] {
  if (!crossesAntimeridian(box)) return [box];
  const [west, south, east, north] = box;
  return [[west, south, 180, north], [-180, south, east, north]];
}

/**
 * Returns the `[W,S,E,N]` bounding box of a footprint
 * @param footprint - the footprint
 */
export function footprintBbox(footprint: Footprint): BoundingBox {
  const [west, south, east, north] = turf.bbox(footprint);
  return [west, south, east, north];
}

/**
 * True if the footprint is a valid polygon (closed rings, no self intersection)
 * @param footprint - the footprint to check
 */
export function isValidFootprint(footprint: Footprint): boolean {
  try {
    return turf.booleanValid(footprint);
  } catch (e) {
    logger.debug(`Unable to check footprint validity: ${e}`);
    return false;
  }
}

/**
 * Unions a set of footprints. Invalid footprints are skipped.
 *
 * @param footprints - the footprints to union
 * @returns the union, or null when there are no valid footprints
 */
export function unionFootprints(footprints: Footprint[]): Footprint | null {
  const valid = footprints.filter(isValidFootprint);
  if (valid.length === 0) return null;
  if (valid.length === 1) return valid[0];
  const collection: FeatureCollection<Polygon | MultiPolygon> = turf.featureCollection(
    valid.map((footprint): Feature<Polygon | MultiPolygon> => turf.feature(footprint)),
  );
  const union = turf.union(collection);
  return union ? union.geometry : null;
}

/**
 * Simplifies a footprint, keeping its topology
 * @param footprint - the footprint
 * @param tolerance - the simplification tolerance, in degrees
 */
export function simplifyFootprint(footprint: Footprint, tolerance = REGION_SIMPLIFY_TOLERANCE): Footprint {
  return turf.simplify(footprint, { tolerance, highQuality: true });
}

/**
 * Parses a stored footprint
 * @param value - GeoJSON text (or an already parsed geometry)
 * @returns the footprint, or null when the value is empty or not a polygon
 */
export function parseFootprint(value: unknown): Footprint | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  return isFootprint(parsed) ? parsed : null;
}
