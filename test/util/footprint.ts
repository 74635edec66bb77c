import { describe, it } from 'mocha';
import { expect } from 'chai';
import { Polygon } from 'geojson';
import {
  crossesAntimeridian, footprintBbox, isValidFootprint, parseFootprint, splitAntimeridian, unionFootprints,
} from '../../app/util/footprint';
import { boxPolygon } from '../helpers/catalog';

const unclosed: Polygon = { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1]]] };

describe('util/footprint', function () {
  describe('crossesAntimeridian', function () {
    it('is true when the west edge is east of the east edge', function () {
      expect(crossesAntimeridian([170, -10, -170, 10])).to.equal(true);
    });

    it('is false for an ordinary box', function () {
      expect(crossesAntimeridian([-10, -10, 10, 10])).to.equal(false);
    });
  });

  describe('splitAntimeridian', function () {
    it('splits a box crossing the antimeridian into two', function () {
      expect(splitAntimeridian([170, -10, -170, 10])).to.eql([[170, -10, 180, 10], [-180, -10, -170, 10]]);
    });

    it('leaves other boxes alone', function () {
      expect(splitAntimeridian([1, 2, 3, 4])).to.eql([[1, 2, 3, 4]]);
    });
  });

  describe('footprintBbox', function () {
    it('returns the bounding box of a polygon', function () {
      expect(footprintBbox(boxPolygon([1, 2, 3, 4]))).to.eql([1, 2, 3, 4]);
    });
  });

  describe('isValidFootprint', function () {
    it('accepts a closed polygon', function () {
      expect(isValidFootprint(boxPolygon([0, 0, 1, 1]))).to.equal(true);
    });

    it('rejects a polygon whose ring is not closed', function () {
      expect(isValidFootprint(unclosed)).to.equal(false);
    });
  });

  describe('unionFootprints', function () {
    it('returns null when there is nothing to union', function () {
      expect(unionFootprints([])).to.be.null;
    });

    it('returns a single footprint as it is', function () {
      const footprint = boxPolygon([0, 0, 1, 1]);
      expect(unionFootprints([footprint])).to.equal(footprint);
    });

    it('merges overlapping footprints into one polygon', function () {
      const union = unionFootprints([boxPolygon([0, 0, 2, 2]), boxPolygon([1, 1, 3, 3])]);
      expect(union?.type).to.equal('Polygon');
      expect(union ? footprintBbox(union) : null).to.eql([0, 0, 3, 3]);
    });

    it('keeps disjoint footprints apart in a multipolygon', function () {
      const union = unionFootprints([boxPolygon([0, 0, 1, 1]), boxPolygon([5, 5, 6, 6])]);
      expect(union?.type).to.equal('MultiPolygon');
      expect(union ? footprintBbox(union) : null).to.eql([0, 0, 6, 6]);
    });

    it('skips invalid footprints', function () {
      const footprint = boxPolygon([0, 0, 1, 1]);
      expect(unionFootprints([footprint, unclosed])).to.equal(footprint);
    });
  });

  describe('parseFootprint', function () {
    it('parses stored GeoJSON', function () {
      expect(parseFootprint(JSON.stringify(boxPolygon([0, 0, 1, 1])))).to.eql(boxPolygon([0, 0, 1, 1]));
    });

    it('returns null for an empty value', function () {
      expect(parseFootprint('')).to.be.null;
      expect(parseFootprint(null)).to.be.null;
    });

    it('returns null for geometries that are not polygons', function () {
      expect(parseFootprint('{"type":"Point","coordinates":[1,2]}')).to.be.null;
    });
  });
});
