import { batchSize, Transaction, toDate, toNumber } from '../util/db';
import { Footprint } from '../util/dataset-fields';
import { parseFootprint, simplifyFootprint, unionFootprints } from '../util/footprint';
import { explorerTable } from './schema';

/** Region code stored for datasets that have none */
export const NULL_REGION_CODE = '';

export interface RegionSummary {
  regionCode: string;
  count: number;
  footprint: Footprint | null;
  generationTime: Date | null;
}

/**
 * How the regions of a product are named and labelled, from the shape of their codes
 */
export interface RegionInfo {
  name: string;
  unitLabel: string;
  label: (regionCode: string) => string;
}

interface RegionKind {
  name: string;
  unitLabel: string;
  pattern: RegExp;
  format: (match: RegExpExecArray) => string;
}

const REGION_KINDS: RegionKind[] = [
  // Landsat WRS2 path and row, e.g. `090084`
  {
    name: 'wrs2_path_row',
    unitLabel: 'scenes',
    pattern: /^(\d{3})(\d{3})$/,
    format: ([, path, row]) => `Path ${parseInt(path, 10)}, Row ${parseInt(row, 10)}`,
  },
  // tiles of a regular grid, e.g. `x90_y-13` or `90_-13`
  {
    name: 'grid_tile',
    unitLabel: 'tiles',
    pattern: /^x?(-?\d+)_y?(-?\d+)$/,
    format: ([, x, y]) => `Tile ${parseInt(x, 10)}, ${parseInt(y, 10)}`,
  },
  // Sentinel-2 MGRS tiles, e.g. `55HBU`
  {
    name: 'mgrs_tile',
    unitLabel: 'tiles',
    pattern: /^\d{1,2}[C-X][A-Z]{2}$/,
    format: ([code]) => code,
  },
];

/**
 * Returns how to present a product's regions: the first kind that every region code
 * matches, or plain region codes
 * @param regionCodes - the codes of the product's regions, without the null region
 */
export function regionInfoFor(regionCodes: string[]): RegionInfo {
  const kind = regionCodes.length > 0
    ? REGION_KINDS.find(({ pattern }) => regionCodes.every((code) => pattern.test(code)))
    : undefined;
  if (!kind) return { name: 'region_code', unitLabel: 'regions', label: (regionCode) => regionCode };
  return {
    name: kind.name,
    unitLabel: kind.unitLabel,
    label: (regionCode): string => {
      const match = kind.pattern.exec(regionCode);
      return match ? kind.format(match) : regionCode;
    },
  };
}

/**
 * Unions the footprints of a product's extents in one region, page by page
 * @param tx - the transaction to use
 * @param productId - the product id
 * @param regionCode - the region code, `NULL_REGION_CODE` for extents without one
 */
async function regionFootprint(tx: Transaction, productId: number, regionCode: string): Promise<Footprint | null> {
  let union: Footprint | null = null;
  let afterId = '';
  for (;;) {
    const rows: { id: string; footprint: unknown }[] = await tx(explorerTable('dataset_spatial', tx))
      .select('id', 'footprint')
      .where({ datasetTypeRef: productId })
      .where((region) => {
        region.where({ regionCode });
        if (regionCode === NULL_REGION_CODE) region.orWhereNull('regionCode');
      })
      .whereNotNull('footprint')
      .where('id', '>', afterId)
      .orderBy('id')
      .limit(batchSize);
    const footprints = rows.flatMap((row) => {
      const footprint = parseFootprint(row.footprint);
      return footprint ? [footprint] : [];
    });
    union = unionFootprints(union ? [union, ...footprints] : footprints);
    if (rows.length < batchSize) return union;
    afterId = rows[rows.length - 1].id;
  }
}

/**
 * Rebuilds the regions of a product from its stored extents: one row per region code
 * with the dataset count and the simplified union of their footprints. Regions that no
 * longer have datasets are deleted.
 *
 * @param tx - the transaction to use
 * @param productId - the product id
 * @returns the number of regions
 */
export async function upsertProductRegions(tx: Transaction, productId: number): Promise<number> {
  const rows: { regionCode: string | null; count: unknown }[] = await tx(explorerTable('dataset_spatial', tx))
    .select('regionCode')
    .count('* as count')
    .where({ datasetTypeRef: productId })
    .groupBy('regionCode');
  const counts = new Map<string, number>();
  for (const row of rows) {
    const code = row.regionCode ?? NULL_REGION_CODE;
    counts.set(code, (counts.get(code) ?? 0) + (toNumber(row.count) ?? 0));
  }

  const generationTime = new Date();
  for (const [regionCode, count] of counts) {
    const union = await regionFootprint(tx, productId, regionCode);
    await tx(explorerTable('region', tx))
      .insert({
        datasetTypeRef: productId,
        regionCode,
        footprint: union ? JSON.stringify(simplifyFootprint(union)) : null,
        count,
        generationTime,
      })
      .onConflict(['datasetTypeRef', 'regionCode'])
      .merge();
  }

  await tx(explorerTable('region', tx))
    .where({ datasetTypeRef: productId })
    .whereNotIn('regionCode', [...counts.keys()])
    .delete();
  return counts.size;
}

/**
 * Returns the regions of a product, ordered by region code
 * @param tx - the transaction to use
 * @param productId - the product id
 */
export async function getProductRegions(tx: Transaction, productId: number): Promise<RegionSummary[]> {
  const rows: { regionCode: string; count: unknown; footprint: unknown; generationTime: unknown }[] = await tx(
    explorerTable('region', tx),
  )
    .select('regionCode', 'count', 'footprint', 'generationTime')
    .where({ datasetTypeRef: productId })
    .orderBy('regionCode');
  return rows.map((row) => ({
    regionCode: row.regionCode,
    count: toNumber(row.count) ?? 0,
    footprint: parseFootprint(row.footprint),
    generationTime: toDate(row.generationTime),
  }));
}
