import { setTimeout as sleep } from 'timers/promises';
import { describe, it, before } from 'mocha';
import { expect } from 'chai';
import db from '../../app/util/db';
import { archiveDataset } from '../../app/models/catalog';
import { getProductSummary } from '../../app/models/product-summary';
import { catalogTable } from '../../app/models/schema';
import { getSpatialQualityStats } from '../../app/models/spatial-quality-stats';
import { getSummary, summarisedMonths } from '../../app/models/time-overview';
import SummaryGenerator, { GenerateResult } from '../../app/summary/generate';
import {
  addFixtureDataset, addFixtureProduct, buildDatasetDocument, updateFixtureDataset,
} from '../helpers/catalog';
import { hookEmptyDatabase } from '../helpers/db';
import hookSummarisedCatalog, { DATASET_A, DATASET_B } from '../helpers/summaries';
import { createLoggerForTest } from '../helpers/log';

const past = new Date('2021-06-01T00:00:00Z');

describe('summary/generate', function () {
  describe('SummaryGenerator#refreshProduct', function () {
    describe('when a product is refreshed repeatedly', function () {
      hookEmptyDatabase();
      const generator = new SummaryGenerator({ logger: createLoggerForTest().testLogger });
      let productId: number;

      before(async function () {
        productId = await addFixtureProduct('ls8_nbar');
        const properties = { 'eo:platform': 'landsat-8' };
        await addFixtureDataset(productId, {
          datetime: '2017-10-01T01:00:00Z', regionCode: '90_-13', box: [130, -13, 131, -12], sizeBytes: 100, properties, added: past,
        });
        await addFixtureDataset(productId, {
          id: DATASET_B, datetime: '2017-10-15T01:00:00Z', regionCode: '90_-13', box: [130, -13, 131, -12], sizeBytes: 200, properties, added: past,
        });
      });

      it('creates the summaries on the first refresh', async function () {
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.CREATED);
      });

      it('summarises the month, the year and all of time', async function () {
        const month = await getSummary(db, productId, 'ls8_nbar', 'month', '2017-10-01');
        const year = await getSummary(db, productId, 'ls8_nbar', 'year', '2017-01-01');
        const all = await getSummary(db, productId, 'ls8_nbar', 'all', '1900-01-01');
        expect(month?.datasetCount).to.equal(2);
        expect(year?.datasetCount).to.equal(2);
        expect(all?.datasetCount).to.equal(2);
        expect(all?.sizeBytes).to.equal(300);
      });

      it('records the product overview', async function () {
        const product = await getProductSummary(db, 'ls8_nbar');
        expect(product?.datasetCount).to.equal(2);
        expect(product?.timeEarliest).to.eql(new Date('2017-10-01T01:00:00Z'));
        expect(product?.timeLatest).to.eql(new Date('2017-10-15T01:00:00Z'));
        expect(product?.fixedMetadata).to.eql({ 'eo:platform': 'landsat-8', 'odc:region_code': '90_-13' });
        expect(product?.lastRefresh).to.be.an.instanceOf(Date);
        expect(product?.lastSuccessfulSummary).to.be.an.instanceOf(Date);
      });

      it('reports no changes when nothing was added since the last refresh', async function () {
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.NO_CHANGES);
      });

      it('picks up datasets added since the last refresh', async function () {
        await sleep(5);
        await addFixtureDataset(productId, {
          datetime: '2018-01-03T01:00:00Z', regionCode: '91_-14', box: [131, -14, 132, -13], sizeBytes: 300,
        });
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.UPDATED);
        const year = await getSummary(db, productId, 'ls8_nbar', 'year', '2018-01-01');
        const all = await getSummary(db, productId, 'ls8_nbar', 'all', '1900-01-01');
        expect(year?.datasetCount).to.equal(1);
        expect(all?.datasetCount).to.equal(3);
        expect(await summarisedMonths(db, productId)).to.eql(['2017-10-01', '2018-01-01']);
      });

      it('drops datasets archived since the last refresh', async function () {
        await sleep(5);
        await archiveDataset(db, DATASET_B);
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.UPDATED);
        const month = await getSummary(db, productId, 'ls8_nbar', 'month', '2017-10-01');
        const all = await getSummary(db, productId, 'ls8_nbar', 'all', '1900-01-01');
        expect(month?.datasetCount).to.equal(1);
        expect(all?.datasetCount).to.equal(2);
        expect((await getProductSummary(db, 'ls8_nbar'))?.datasetCount).to.equal(2);
      });

      it('regenerates every month when forced', async function () {
        expect(await generator.refreshProduct('ls8_nbar', { force: true })).to.equal(GenerateResult.UPDATED);
        const all = await getSummary(db, productId, 'ls8_nbar', 'all', '1900-01-01');
        expect(all?.datasetCount).to.equal(2);
      });

      it('rescans every dataset when recreating the extents', async function () {
        expect(await generator.refreshProduct('ls8_nbar', { recreateDatasetExtents: true }))
          .to.equal(GenerateResult.UPDATED);
      });

      it('reports no changes after resetting the incremental position', async function () {
        expect(await generator.refreshProduct('ls8_nbar', { resetIncrementalPosition: true }))
          .to.equal(GenerateResult.NO_CHANGES);
      });

      it('skips products that are not in the catalog', async function () {
        expect(await generator.refreshProduct('ls9_nbar')).to.equal(GenerateResult.SKIPPED);
      });
    });

    describe('when a product has no datasets', function () {
      hookEmptyDatabase();
      const generator = new SummaryGenerator({ logger: createLoggerForTest().testLogger });

      it('creates an empty summary', async function () {
        const productId = await addFixtureProduct('empty');
        expect(await generator.refreshProduct('empty')).to.equal(GenerateResult.CREATED);
        const all = await getSummary(db, productId, 'empty', 'all', '1900-01-01');
        expect(all?.datasetCount).to.equal(0);
        expect(all?.timeRange).to.be.null;
        expect((await getProductSummary(db, 'empty'))?.fixedMetadata).to.eql({});
      });
    });

    describe('when the documents of indexed datasets change', function () {
      hookEmptyDatabase();
      const generator = new SummaryGenerator({ logger: createLoggerForTest().testLogger });
      let productId: number;

      const monthCount = async (startDay: string): Promise<number | undefined> => (
        await getSummary(db, productId, 'ls8_nbar', 'month', startDay))?.datasetCount;
      const allCount = async (): Promise<number | undefined> => (
        await getSummary(db, productId, 'ls8_nbar', 'all', '1900-01-01'))?.datasetCount;

      before(async function () {
        productId = await addFixtureProduct('ls8_nbar');
        await addFixtureDataset(productId, { id: DATASET_A, datetime: '2017-10-05T01:00:00Z', added: past });
        await addFixtureDataset(productId, { id: DATASET_B, datetime: '2017-12-05T01:00:00Z', added: past });
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.CREATED);
      });

      it('moves an updated dataset to its new month on an incremental refresh', async function () {
        await sleep(5);
        await updateFixtureDataset(DATASET_A, buildDatasetDocument({ datetime: '2017-11-05T01:00:00Z' }));
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.UPDATED);
        expect(await monthCount('2017-10-01')).to.equal(0);
        expect(await monthCount('2017-11-01')).to.equal(1);
        expect(await monthCount('2017-12-01')).to.equal(1);
        expect((await getSummary(db, productId, 'ls8_nbar', 'year', '2017-01-01'))?.datasetCount).to.equal(2);
        expect(await allCount()).to.equal(2);
      });

      it('moves a dataset rewritten without an update time when recreating the extents', async function () {
        await sleep(5);
        await updateFixtureDataset(DATASET_A, buildDatasetDocument({ datetime: '2017-10-05T01:00:00Z' }), null);
        expect(await generator.refreshProduct('ls8_nbar', { recreateDatasetExtents: true }))
          .to.equal(GenerateResult.UPDATED);
        expect(await monthCount('2017-10-01')).to.equal(1);
        expect(await monthCount('2017-11-01')).to.equal(0);
        expect(await allCount()).to.equal(2);
      });

      it('drops the extent of a dataset that no longer has a time', async function () {
        await sleep(5);
        await updateFixtureDataset(DATASET_B, { crs: 'epsg:4326', properties: {} });
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.UPDATED);
        expect(await monthCount('2017-12-01')).to.equal(0);
        expect(await allCount()).to.equal(1);
        expect((await getProductSummary(db, 'ls8_nbar'))?.datasetCount).to.equal(1);
      });
    });

    describe('when grouping by a time zone ahead of UTC', function () {
      hookEmptyDatabase();
      const generator = new SummaryGenerator({ logger: createLoggerForTest().testLogger, timezone: 'Australia/Darwin' });

      it('summarises datasets in their local month', async function () {
        const productId = await addFixtureProduct('ls8_nbar');
        await addFixtureDataset(productId, { datetime: '2017-10-31T16:00:00Z', added: past });
        expect(await generator.refreshProduct('ls8_nbar')).to.equal(GenerateResult.CREATED);
        expect(await summarisedMonths(db, productId)).to.eql(['2017-11-01']);
      });
    });
  });

  describe('SummaryGenerator#refreshAll', function () {
    hookEmptyDatabase();
    const generator = new SummaryGenerator({ logger: createLoggerForTest().testLogger });

    it('refreshes the other products when one of them fails', async function () {
      const brokenId = await addFixtureProduct('broken');
      const goodId = await addFixtureProduct('good');
      await db(catalogTable('dataset')).insert({
        id: '00000000-0000-4000-8000-00000000000f',
        datasetTypeRef: brokenId,
        metadata: 'not json',
        added: past,
      });
      await addFixtureDataset(goodId, { datetime: '2017-10-01T01:00:00Z', added: past });
      const results = await generator.refreshAll();
      expect([...results.entries()]).to.eql([['broken', GenerateResult.ERROR], ['good', GenerateResult.CREATED]]);
    });
  });

  describe('SummaryGenerator#refreshStats', function () {
    hookSummarisedCatalog();
    const generator = new SummaryGenerator({ logger: createLoggerForTest().testLogger });

    it('rebuilds the spatial quality statistics of every summarised product', async function () {
      expect(await generator.refreshStats()).to.equal(2);
      const stats = await getSpatialQualityStats(db);
      expect(stats.map(({ productName, count, missingFootprint, missingSrid, hasFileSize, hasRegion }) => ({
        productName, count, missingFootprint, missingSrid, hasFileSize, hasRegion,
      }))).to.eql([
        { productName: 'ls8_level1', count: 1, missingFootprint: 0, missingSrid: 0, hasFileSize: 0, hasRegion: 1 },
        { productName: 'ls8_nbar', count: 3, missingFootprint: 0, missingSrid: 0, hasFileSize: 3, hasRegion: 3 },
      ]);
    });
  });
});
