import { describe, it } from 'mocha';
import { expect } from 'chai';
import env, { ExplorerEnv, getValidationErrors } from '../../app/util/env';

describe('util/env', function () {
  describe('loading', function () {
    it('takes values from the process environment over the defaults', function () {
      expect(env.databaseType).to.equal('sqlite');
      expect(env.cubedashDefaultTimezone).to.equal('UTC');
    });

    it('converts numeric values to numbers', function () {
      expect(env.cubedashCacheTtlSeconds).to.equal(0);
      expect(env.cubedashHardApiLimit).to.equal(4000);
    });

    it('converts boolean values to booleans', function () {
      expect(env.cubedashCors).to.equal(true);
      expect(env.textLogger).to.equal(false);
    });

    it('uses the defaults for values that are not set', function () {
      expect(env.stacEndpointId).to.equal('odc-explorer');
      expect(env.cubedashDefaultArrivalPeriodDays).to.equal(14);
    });
  });

  describe('validation', function () {
    it('accepts the test environment', function () {
      expect(getValidationErrors(new ExplorerEnv())).to.eql([]);
    });

    it('rejects an unknown time zone', function () {
      const testEnv = new ExplorerEnv();
      testEnv.cubedashDefaultTimezone = 'Mars/Olympus_Mons';
      expect(getValidationErrors(testEnv).map((e) => e.property)).to.eql(['cubedashDefaultTimezone']);
    });

    it('rejects a negative cache TTL', function () {
      const testEnv = new ExplorerEnv();
      testEnv.cubedashCacheTtlSeconds = -1;
      expect(getValidationErrors(testEnv).map((e) => e.property)).to.eql(['cubedashCacheTtlSeconds']);
    });

    it('rejects an unknown log level', function () {
      const testEnv = new ExplorerEnv();
      testEnv.logLevel = 'loud';
      expect(getValidationErrors(testEnv).map((e) => e.property)).to.eql(['logLevel']);
    });

    it('throws on validate() when a value is invalid', function () {
      const testEnv = new ExplorerEnv();
      testEnv.databaseType = 'oracle';
      expect(() => testEnv.validate()).to.throw('BAD ENVIRONMENT');
    });
  });

  describe('catalogDbUrl', function () {
    it('is undefined when no URL is configured', function () {
      expect(new ExplorerEnv().catalogDbUrl).to.be.undefined;
    });

    it('uses the default URL when the default driver is not the postgis driver', function () {
      const testEnv = new ExplorerEnv();
      testEnv.odcDefaultDbUrl = 'postgres://localhost/datacube';
      testEnv.odcPostgisDbUrl = 'postgres://localhost/postgis';
      expect(testEnv.catalogDbUrl).to.equal('postgres://localhost/datacube');
    });

    it('uses the postgis URL when the default driver is the postgis driver', function () {
      const testEnv = new ExplorerEnv();
      testEnv.odcDefaultIndexDriver = 'postgis';
      testEnv.odcPostgisDbUrl = 'postgres://localhost/postgis';
      expect(testEnv.catalogDbUrl).to.equal('postgres://localhost/postgis');
    });
  });
});
