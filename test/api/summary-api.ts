import { describe, it } from 'mocha';
import { expect } from 'chai';
import request from 'supertest';
import { boxPolygon } from '../helpers/catalog';
import { hookEmptyDatabase } from '../helpers/db';
import hookServersStartStop from '../helpers/servers';
import hookSummarisedCatalog, {
  DATASET_A, DATASET_B, DATASET_C, DATASET_L,
} from '../helpers/summaries';

describe('Summary API', function () {
  const frontend = hookServersStartStop();

  describe('with a summarised catalog', function () {
    hookSummarisedCatalog();

    describe('GET /api/summary', function () {
      it('returns the summary of all time', async function () {
        const res = await request(frontend()).get('/api/summary/ls8_nbar');
        expect(res.status).to.equal(200);
        expect(res.body.period_type).to.equal('all');
        expect(res.body.dataset_count).to.equal(3);
        expect(res.body.size_bytes).to.equal(600);
        expect(res.body.region_dataset_counts).to.eql({ '90_-13': 2, '91_-14': 1 });
        expect(res.body.time_range).to.eql({ begin: '2017-10-01T00:00:00Z', end: '2018-02-01T00:00:00Z' });
      });

      it('returns the summary of a month', async function () {
        const res = await request(frontend()).get('/api/summary/ls8_nbar/2017/10');
        expect(res.body.dataset_count).to.equal(2);
        expect(Object.keys(res.body.timeline_dataset_counts).length).to.equal(31);
        expect(res.body.timeline_dataset_counts['2017-10-15']).to.equal(1);
      });

      it('calculates the summary of a day', async function () {
        const res = await request(frontend()).get('/api/summary/ls8_nbar/2017/10/15');
        expect(res.body.period_type).to.equal('day');
        expect(res.body.dataset_count).to.equal(1);
      });

      it('returns a not found error for a period without a summary', async function () {
        const res = await request(frontend()).get('/api/summary/ls8_nbar/2016');
        expect(res.status).to.equal(404);
        expect(res.body).to.eql({ code: 'explorer.NotFoundError', description: 'Error: No summary of ls8_nbar for 2016' });
      });

      it('rejects an invalid month', async function () {
        const res = await request(frontend()).get('/api/summary/ls8_nbar/2017/13');
        expect(res.status).to.equal(400);
        expect(res.body).to.eql({ code: 'explorer.RequestValidationError', description: 'Error: Invalid month: 13' });
      });
    });

    describe('GET /api/footprint', function () {
      it('returns the footprint of a period as GeoJSON', async function () {
        const res = await request(frontend()).get('/api/footprint/ls8_nbar/2018');
        expect(res.status).to.equal(200);
        expect(res.type).to.equal('application/geo+json');
        expect(res.body).to.eql({
          type: 'Feature',
          geometry: boxPolygon([131, -14, 132, -13]),
          properties: { dataset_count: 1, product_name: 'ls8_nbar', time_spec: [2018, null, null] },
        });
      });

      it('returns a not found error for an unknown product', async function () {
        const res = await request(frontend()).get('/api/footprint/ls9_nbar');
        expect(res.status).to.equal(404);
        expect(res.body.description).to.equal('Error: No footprint of ls9_nbar for all');
      });
    });

    describe('GET /api/regions', function () {
      it('returns the regions of a product with their counts', async function () {
        const res = await request(frontend()).get('/api/regions/ls8_nbar');
        expect(res.status).to.equal(200);
        expect(res.body.properties.min_count).to.equal(1);
        expect(res.body.properties.max_count).to.equal(2);
        expect(res.body.features.map((f: { properties: { region_code: string } }) => f.properties.region_code))
          .to.eql(['90_-13', '91_-14']);
      });
    });

    describe('GET /api/region', function () {
      it('returns the datasets of a product in a region, newest first', async function () {
        const res = await request(frontend()).get('/api/region/ls8_nbar/90_-13');
        expect(res.status).to.equal(200);
        expect(res.body.page).to.equal(1);
        expect(res.body.limit).to.equal(20);
        expect(res.body.datasets.map((d: { id: string }) => d.id)).to.eql([DATASET_B, DATASET_A]);
        expect(res.body.datasets[1].center_time).to.equal('2017-10-01T01:00:00Z');
      });

      it('pages through the datasets', async function () {
        const res = await request(frontend()).get('/api/region/ls8_nbar/90_-13?limit=1&page=2');
        expect(res.body.datasets.map((d: { id: string }) => d.id)).to.eql([DATASET_A]);
      });

      it('returns a not found error for an unknown product', async function () {
        const res = await request(frontend()).get('/api/region/ls9_nbar/90_-13');
        expect(res.status).to.equal(404);
        expect(res.body.description).to.equal('Error: Unknown product: ls9_nbar');
      });
    });

    describe('GET /api/region-products', function () {
      it('returns the products with datasets in a region', async function () {
        const res = await request(frontend()).get('/api/region-products/90_-13');
        expect(res.body).to.eql({ region_code: '90_-13', products: ['ls8_level1', 'ls8_nbar'] });
      });
    });

    describe('GET /api/dataset', function () {
      it('returns a dataset with its locations and sources', async function () {
        const res = await request(frontend()).get(`/api/dataset/${DATASET_A}`);
        expect(res.status).to.equal(200);
        expect(res.body.product).to.equal('ls8_nbar');
        expect(res.body.added).to.equal('2021-06-02T10:00:00Z');
        expect(res.body.archived).to.be.null;
        expect(res.body.locations).to.eql(['s3://test-bucket/ls8/a/odc-metadata.yaml']);
        expect(res.body.extent.region_code).to.equal('90_-13');
        expect(res.body.sources).to.eql([{ id: DATASET_L, product: 'ls8_level1', classifier: 'level1' }]);
        expect(res.body.remaining_sources).to.equal(0);
        expect(res.body.derived).to.eql([]);
      });

      it('rejects an id that is not a UUID', async function () {
        const res = await request(frontend()).get('/api/dataset/not-a-uuid');
        expect(res.status).to.equal(400);
        expect(res.body.description).to.equal('Error: Invalid dataset id: not-a-uuid');
      });

      it('returns a not found error for an unknown dataset', async function () {
        const res = await request(frontend()).get('/api/dataset/00000000-0000-4000-8000-0000000000ff');
        expect(res.status).to.equal(404);
      });
    });

    describe('GET /api/arrivals', function () {
      it('returns the latest arrivals per day and product', async function () {
        const res = await request(frontend()).get('/api/arrivals');
        expect(res.body).to.eql([
          { day: '2021-06-02', product: 'ls8_nbar', count: 2, sample_ids: [DATASET_B, DATASET_A] },
          { day: '2021-06-01', product: 'ls8_nbar', count: 1, sample_ids: [DATASET_C] },
        ]);
      });

      it('looks further back when asked', async function () {
        const res = await request(frontend()).get('/api/arrivals?period=40');
        expect(res.body[2]).to.eql({ day: '2021-05-01', product: 'ls8_level1', count: 1, sample_ids: [DATASET_L] });
      });

      it('rejects a period out of range', async function () {
        const res = await request(frontend()).get('/api/arrivals?period=0');
        expect(res.status).to.equal(400);
        expect(res.body.description).to.equal(
          'Error: Parameter "period" is invalid. Must be an integer greater than or equal to 1 and less than or equal to 366.',
        );
      });
    });

    describe('GET /api/dataset-counts', function () {
      it('returns the dataset count of every summarised month', async function () {
        const res = await request(frontend()).get('/api/dataset-counts');
        expect(res.body).to.eql({ 'ls8_level1/2017/10': 1, 'ls8_nbar/2017/10': 2, 'ls8_nbar/2018/1': 1 });
      });
    });

    describe('GET /api/product-audit', function () {
      it('returns no statistics before they are refreshed', async function () {
        const res = await request(frontend()).get('/api/product-audit');
        expect(res.status).to.equal(200);
        expect(res.body).to.eql([]);
      });
    });
  });

  describe('with an empty catalog', function () {
    hookEmptyDatabase();

    it('returns no arrivals', async function () {
      const res = await request(frontend()).get('/api/arrivals');
      expect(res.status).to.equal(200);
      expect(res.body).to.eql([]);
    });
  });
});
