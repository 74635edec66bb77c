import { describe, it, before } from 'mocha';
import { expect } from 'chai';
import db from '../../app/util/db';
import { DatasetExtent, deleteExtents, upsertExtents } from '../../app/models/dataset-spatial';
import {
  getProductRegions, NULL_REGION_CODE, regionInfoFor, upsertProductRegions,
} from '../../app/models/region';
import { addFixtureProduct, boxPolygon } from '../helpers/catalog';
import { hookEmptyDatabase } from '../helpers/db';

/**
 * Builds the extent of a dataset in a one-degree box
 */
function extent(id: string, productId: number, regionCode: string | null, west: number): DatasetExtent {
  return {
    id,
    productId,
    centerTime: new Date('2017-10-05T01:00:00Z'),
    creationTime: null,
    regionCode,
    sizeBytes: null,
    crs: 'epsg:4326',
    footprint: boxPolygon([west, -14, west + 1, -13]),
  };
}

describe('models/region', function () {
  describe('regionInfoFor', function () {
    it('labels Landsat path and row codes as scenes', function () {
      const info = regionInfoFor(['090084', '091084']);
      expect(info.name).to.equal('wrs2_path_row');
      expect(info.unitLabel).to.equal('scenes');
      expect(info.label('090084')).to.equal('Path 90, Row 84');
    });

    it('labels grid codes as tiles', function () {
      const info = regionInfoFor(['x12_y-40', 'x13_y-40']);
      expect(info.name).to.equal('grid_tile');
      expect(info.unitLabel).to.equal('tiles');
      expect(info.label('x12_y-40')).to.equal('Tile 12, -40');
    });

    it('keeps MGRS tile codes as their labels', function () {
      const info = regionInfoFor(['55HBU', '56JKT']);
      expect(info.name).to.equal('mgrs_tile');
      expect(info.label('55HBU')).to.equal('55HBU');
    });

    it('falls back to plain region codes when the codes are of mixed shapes', function () {
      const info = regionInfoFor(['090084', 'darwin']);
      expect(info.name).to.equal('region_code');
      expect(info.unitLabel).to.equal('regions');
      expect(info.label('darwin')).to.equal('darwin');
    });

    it('falls back to plain region codes when there are none', function () {
      expect(regionInfoFor([]).name).to.equal('region_code');
    });
  });

  describe('upsertProductRegions', function () {
    hookEmptyDatabase();
    let productId: number;

    before(async function () {
      productId = await addFixtureProduct('ls8_nbar');
      await upsertExtents(db, [
        extent('a', productId, '090084', 130),
        extent('b', productId, '090084', 131),
        extent('c', productId, '091084', 140),
        extent('d', productId, null, 150),
      ]);
    });

    it('counts the datasets of each region, with datasets lacking a code under the null region', async function () {
      expect(await upsertProductRegions(db, productId)).to.equal(3);
      const regions = await getProductRegions(db, productId);
      expect(regions.map(({ regionCode, count }) => [regionCode, count])).to.eql([
        [NULL_REGION_CODE, 1], ['090084', 2], ['091084', 1],
      ]);
    });

    it('unions the footprints of the datasets in a region', async function () {
      const regions = await getProductRegions(db, productId);
      const region = regions.find(({ regionCode }) => regionCode === '090084');
      expect(region?.footprint?.type).to.equal('Polygon');
    });

    it('deletes the regions that no longer have datasets', async function () {
      await deleteExtents(db, ['c']);
      expect(await upsertProductRegions(db, productId)).to.equal(2);
      const regions = await getProductRegions(db, productId);
      expect(regions.map(({ regionCode }) => regionCode)).to.eql([NULL_REGION_CODE, '090084']);
    });
  });
});
