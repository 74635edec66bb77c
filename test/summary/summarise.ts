import { describe, it } from 'mocha';
import { expect } from 'chai';
import { Polygon } from 'geojson';
import { DatasetExtent } from '../../app/models/dataset-spatial';
import { calculateSummary, fixedProperties } from '../../app/summary/summarise';
import { periodRange } from '../../app/util/time-period';
import { boxPolygon } from '../helpers/catalog';

const footprint = boxPolygon([130, -13, 131, -12]);
const unclosed: Polygon = { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1]]] };

const extents: DatasetExtent[] = [
  {
    id: 'a',
    productId: 1,
    centerTime: new Date('2017-10-01T01:00:00Z'),
    creationTime: new Date('2017-10-05T00:00:00Z'),
    regionCode: '90_-13',
    sizeBytes: 100,
    crs: 'epsg:4326',
    footprint,
  },
  {
    id: 'b',
    productId: 1,
    centerTime: new Date('2017-10-15T20:00:00Z'),
    creationTime: null,
    regionCode: '90_-13',
    sizeBytes: null,
    crs: 'epsg:32652',
    footprint: null,
  },
  {
    id: 'c',
    productId: 1,
    centerTime: new Date('2017-10-31T10:00:00Z'),
    creationTime: new Date('2017-10-02T00:00:00Z'),
    regionCode: null,
    sizeBytes: 50,
    crs: null,
    footprint: unclosed,
  },
];

function summarise(timezone: string): ReturnType<typeof calculateSummary> {
  const range = periodRange({ year: 2017, month: 10 }, timezone);
  if (!range) throw new Error('No range for October 2017');
  return calculateSummary(extents, range, {
    productName: 'ls8_nbar',
    periodType: 'month',
    startDay: '2017-10-01',
    timezone,
  });
}

describe('summary/summarise', function () {
  describe('calculateSummary', function () {
    describe('in UTC', function () {
      const summary = summarise('UTC');

      it('counts the datasets', function () {
        expect(summary.datasetCount).to.equal(3);
      });

      it('has a timeline entry for every day of the period', function () {
        const timeline = summary.sortedTimeline();
        expect(timeline.length).to.equal(31);
        expect(timeline.filter(([, count]) => count > 0)).to.eql([
          ['2017-10-01', 1], ['2017-10-15', 1], ['2017-10-31', 1],
        ]);
      });

      it('counts datasets per region, including those without one', function () {
        expect([...summary.regionDatasetCounts.entries()]).to.eql([['90_-13', 2], [null, 1]]);
      });

      it('treats missing sizes as zero', function () {
        expect(summary.sizeBytes).to.equal(150);
      });

      it('collects the CRSes', function () {
        expect([...summary.crses].sort()).to.eql(['epsg:32652', 'epsg:4326']);
      });

      it('keeps the newest creation time', function () {
        expect(summary.newestDatasetCreationTime).to.eql(new Date('2017-10-05T00:00:00Z'));
      });

      it('only unions valid footprints', function () {
        expect(summary.footprintCount).to.equal(1);
        expect(summary.footprintGeometry).to.equal(footprint);
      });

      it('uses the period as its time range', function () {
        expect(summary.timeRange).to.eql({
          begin: new Date('2017-10-01T00:00:00Z'),
          end: new Date('2017-11-01T00:00:00Z'),
        });
      });
    });

    describe('in a time zone ahead of UTC', function () {
      const summary = summarise('Australia/Darwin');

      it('groups datasets by their local day', function () {
        expect(summary.sortedTimeline().filter(([, count]) => count > 0)).to.eql([
          ['2017-10-01', 1], ['2017-10-16', 1], ['2017-10-31', 1],
        ]);
      });

      it('starts the period at local midnight', function () {
        expect(summary.timeRange?.begin).to.eql(new Date('2017-09-30T14:30:00Z'));
        expect(summary.sortedTimeline()[0]).to.eql(['2017-10-01', 1]);
        expect(summary.sortedTimeline().length).to.equal(31);
      });
    });

    it('returns an empty summary when there are no datasets', function () {
      const range = { begin: new Date('2017-10-01T00:00:00Z'), end: new Date('2017-10-02T00:00:00Z') };
      const summary = calculateSummary([], range, {
        productName: 'ls8_nbar', periodType: 'day', startDay: '2017-10-01', timezone: 'UTC',
      });
      expect(summary.datasetCount).to.equal(0);
      expect(summary.sortedTimeline()).to.eql([['2017-10-01', 0]]);
      expect(summary.footprintGeometry).to.be.null;
    });
  });

  describe('fixedProperties', function () {
    it('returns the scalar properties every document shares', function () {
      expect(fixedProperties([
        { platform: 'landsat-8', 'eo:cloud_cover': 10, 'odc:complete': true, extra: { a: 1 } },
        { platform: 'landsat-8', 'eo:cloud_cover': 20, 'odc:complete': true },
      ])).to.eql({ platform: 'landsat-8', 'odc:complete': true });
    });

    it('drops properties missing from any document', function () {
      expect(fixedProperties([{ platform: 'landsat-8' }, {}])).to.eql({});
    });

    it('returns nothing when there are no documents', function () {
      expect(fixedProperties([])).to.eql({});
    });
  });
});
