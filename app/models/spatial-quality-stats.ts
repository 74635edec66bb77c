import { Transaction, toNumber } from '../util/db';
import { explorerTable } from './schema';

/**
 * How complete the spatial information of a product's datasets is
 */
export interface SpatialQualityStats {
  productName: string;
  count: number;
  missingFootprint: number;
  footprintSize: number;
  footprintStddev: number;
  missingSrid: number;
  hasFileSize: number;
  hasRegion: number;
}

interface StatsRow {
  datasetTypeRef: number;
  count: unknown;
  missingFootprint: unknown;
  footprintSize: unknown;
  footprintSquares: unknown;
  missingSrid: unknown;
  hasFileSize: unknown;
  hasRegion: unknown;
}

/**
 * Rebuilds `spatial_quality_stats` from the extents of every product
 * @param tx - the transaction to use
 * @returns the number of products
 */
export async function refreshSpatialQualityStats(tx: Transaction): Promise<number> {
  const rows: StatsRow[] = await tx(explorerTable('dataset_spatial', tx))
    .select('datasetTypeRef')
    .count('* as count')
    .select(tx.raw('sum(case when footprint is null then 1 else 0 end) as missing_footprint'))
    .select(tx.raw('sum(coalesce(length(footprint), 0)) as footprint_size'))
    .select(tx.raw('sum(1.0 * coalesce(length(footprint), 0) * coalesce(length(footprint), 0)) as footprint_squares'))
    .select(tx.raw('sum(case when crs is null then 1 else 0 end) as missing_srid'))
    .select(tx.raw('sum(case when size_bytes is null then 0 else 1 end) as has_file_size'))
    .select(tx.raw('sum(case when region_code is null then 0 else 1 end) as has_region'))
    .groupBy('datasetTypeRef');

  await tx(explorerTable('spatial_quality_stats', tx)).delete();
  for (const row of rows) {
    const count = toNumber(row.count) ?? 0;
    const footprintSize = toNumber(row.footprintSize) ?? 0;
    const mean = count ? footprintSize / count : 0;
    const variance = count ? (toNumber(row.footprintSquares) ?? 0) / count - mean * mean : 0;
    await tx(explorerTable('spatial_quality_stats', tx)).insert({
      datasetTypeRef: row.datasetTypeRef,
      count,
      missingFootprint: toNumber(row.missingFootprint) ?? 0,
      footprintSize,
      footprintStddev: Math.sqrt(Math.max(variance, 0)),
      missingSrid: toNumber(row.missingSrid) ?? 0,
      hasFileSize: toNumber(row.hasFileSize) ?? 0,
      hasRegion: toNumber(row.hasRegion) ?? 0,
    });
  }
  return rows.length;
}

/**
 * Returns the spatial quality of every product, ordered by product name
 * @param tx - the transaction to use
 */
export async function getSpatialQualityStats(tx: Transaction): Promise<SpatialQualityStats[]> {
  const rows: (Omit<StatsRow, 'footprintSquares'> & { productName: string; footprintStddev: unknown })[] = await tx(
    `${explorerTable('spatial_quality_stats', tx)} as q`,
  )
    .join(`${explorerTable('product', tx)} as p`, 'p.id', 'q.datasetTypeRef')
    .select('q.*', 'p.name as productName')
    .orderBy('p.name');
  return rows.map((row) => ({
    productName: row.productName,
    count: toNumber(row.count) ?? 0,
    missingFootprint: toNumber(row.missingFootprint) ?? 0,
    footprintSize: toNumber(row.footprintSize) ?? 0,
    footprintStddev: toNumber(row.footprintStddev) ?? 0,
    missingSrid: toNumber(row.missingSrid) ?? 0,
    hasFileSize: toNumber(row.hasFileSize) ?? 0,
    hasRegion: toNumber(row.hasRegion) ?? 0,
  }));
}
