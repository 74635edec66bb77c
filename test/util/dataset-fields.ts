import { describe, it } from 'mocha';
import { expect } from 'chai';
import { extractDatasetFields, isFootprint, normaliseCrs } from '../../app/util/dataset-fields';
import { boxPolygon, buildDatasetDocument } from '../helpers/catalog';

describe('util/dataset-fields', function () {
  describe('extractDatasetFields', function () {
    describe('for a WGS84 EO3 document with every field', function () {
      const fields = extractDatasetFields(buildDatasetDocument({
        datetime: '2020-01-02T03:04:05Z',
        regionCode: '55_-13',
        sizeBytes: 1024,
        created: '2020-02-01T00:00:00Z',
        box: [130, -13, 131, -12],
      }));

      it('takes the center time from the datetime property', function () {
        expect(fields.centerTime).to.eql(new Date('2020-01-02T03:04:05Z'));
      });

      it('takes the creation time from the processing datetime', function () {
        expect(fields.creationTime).to.eql(new Date('2020-02-01T00:00:00Z'));
      });

      it('takes the region code and file size from the properties', function () {
        expect(fields.regionCode).to.equal('55_-13');
        expect(fields.sizeBytes).to.equal(1024);
      });

      it('normalises the CRS', function () {
        expect(fields.crs).to.equal('EPSG:4326');
      });

      it('uses the document geometry as the footprint', function () {
        expect(fields.footprint).to.eql(boxPolygon([130, -13, 131, -12]));
      });
    });

    describe('for a document in a projected CRS', function () {
      it('uses the lat/lon extent as the footprint', function () {
        const document = {
          ...buildDatasetDocument({ datetime: '2020-01-02T00:00:00Z', crs: 'epsg:32653', box: [500000, 8500000, 600000, 8600000] }),
          extent: { lat: { begin: -13, end: -12 }, lon: { begin: 130, end: 131 } },
        };
        const fields = extractDatasetFields(document);
        expect(fields.crs).to.equal('EPSG:32653');
        expect(fields.footprint).to.eql(boxPolygon([130, -13, 131, -12]));
      });

      it('has no footprint without an extent', function () {
        const document = buildDatasetDocument({ datetime: '2020-01-02T00:00:00Z', crs: 'epsg:32653', box: [0, 0, 1, 1] });
        expect(extractDatasetFields(document).footprint).to.be.null;
      });
    });

    it('uses the middle of the start and end datetimes when there is no datetime', function () {
      const fields = extractDatasetFields({
        properties: {
          'dtr:start_datetime': '2020-01-01T00:00:00Z',
          'dtr:end_datetime': '2020-01-01T10:00:00Z',
        },
      });
      expect(fields.centerTime).to.eql(new Date('2020-01-01T05:00:00Z'));
    });

    it('falls back to the created property for the creation time', function () {
      const fields = extractDatasetFields({ properties: { datetime: '2020-01-01T00:00:00Z', created: '2020-03-01T00:00:00Z' } });
      expect(fields.creationTime).to.eql(new Date('2020-03-01T00:00:00Z'));
    });

    it('returns nulls for a document without any known field', function () {
      expect(extractDatasetFields({})).to.eql({
        centerTime: null,
        creationTime: null,
        regionCode: null,
        sizeBytes: null,
        crs: null,
        footprint: null,
      });
    });

    it('ignores a datetime that is not a timestamp', function () {
      expect(extractDatasetFields({ properties: { datetime: 'yesterday' } }).centerTime).to.be.null;
    });
  });

  describe('normaliseCrs', function () {
    it('upper-cases authority codes', function () {
      expect(normaliseCrs('epsg:32753')).to.equal('EPSG:32753');
    });

    it('trims other names', function () {
      expect(normaliseCrs(' WGS84 ')).to.equal('WGS84');
    });

    it('returns null without a CRS', function () {
      expect(normaliseCrs(undefined)).to.be.null;
    });
  });

  describe('isFootprint', function () {
    it('accepts polygons', function () {
      expect(isFootprint(boxPolygon([0, 0, 1, 1]))).to.equal(true);
    });

    it('rejects points', function () {
      expect(isFootprint({ type: 'Point', coordinates: [0, 0] })).to.equal(false);
    });
  });
});
