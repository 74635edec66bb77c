import { describe, it } from 'mocha';
import { expect } from 'chai';
import { RequestValidationError } from '../../app/util/errors';
import { parseBbox, parseDatetime, parseMultiValueParameter } from '../../app/util/parameter-parsing';

describe('util/parameter-parsing', function () {
  describe('#parseMultiValueParameter', function () {
    it('returns an array unchanged when it receives an array', function () {
      expect(parseMultiValueParameter(['ls8_nbar', 'ls7_nbar'])).to.eql(['ls8_nbar', 'ls7_nbar']);
    });

    it('returns an array of values when provided a comma-separated string', function () {
      expect(parseMultiValueParameter('ls8_nbar,ls7_nbar')).to.eql(['ls8_nbar', 'ls7_nbar']);
    });

    it('ignores leading and trailing whitespace between comma-separated values', function () {
      expect(parseMultiValueParameter(' ls8_nbar ,   ls7_nbar  ')).to.eql(['ls8_nbar', 'ls7_nbar']);
    });

    it('splits comma-separated strings inside an array', function () {
      expect(parseMultiValueParameter(['a,b', 'c'])).to.eql(['a', 'b', 'c']);
    });

    it('returns an empty array when the parameter is missing', function () {
      expect(parseMultiValueParameter(undefined)).to.eql([]);
    });
  });

  describe('#parseBbox', function () {
    it('parses a comma-separated box', function () {
      expect(parseBbox('1,2,3,4')).to.eql([1, 2, 3, 4]);
    });

    it('parses a bracketed box', function () {
      expect(parseBbox('[1,2,3,4]')).to.eql([1, 2, 3, 4]);
    });

    it('parses an array of numbers', function () {
      expect(parseBbox([1, 2, 3, 4])).to.eql([1, 2, 3, 4]);
    });

    it('accepts a box crossing the antimeridian', function () {
      expect(parseBbox('170,-10,-170,10')).to.eql([170, -10, -170, 10]);
    });

    it('returns undefined when the parameter is missing', function () {
      expect(parseBbox(undefined)).to.be.undefined;
    });

    it('rejects a box without four numbers', function () {
      expect(() => parseBbox('1,2,3')).to.throw(
        RequestValidationError, 'Invalid bbox: 1,2,3. Expected four numbers: west,south,east,north',
      );
    });

    it('rejects a box whose south edge is north of its north edge', function () {
      expect(() => parseBbox('0,10,1,5')).to.throw(RequestValidationError, 'Invalid bbox: 0,10,1,5. Coordinates are out of range');
    });
  });

  describe('#parseDatetime', function () {
    const jan1 = new Date('2020-01-01T00:00:00Z');
    const feb1 = new Date('2020-02-01T00:00:00Z');

    it('parses an instant as an interval with equal ends', function () {
      expect(parseDatetime('2020-01-01T00:00:00Z')).to.eql({ begin: jan1, end: jan1 });
    });

    it('parses a closed interval', function () {
      expect(parseDatetime('2020-01-01T00:00:00Z/2020-02-01T00:00:00Z')).to.eql({ begin: jan1, end: feb1 });
    });

    it('parses intervals open at either end', function () {
      expect(parseDatetime('2020-01-01T00:00:00Z/..')).to.eql({ begin: jan1, end: undefined });
      expect(parseDatetime('/2020-02-01T00:00:00Z')).to.eql({ begin: undefined, end: feb1 });
    });

    it('returns undefined when the parameter is missing', function () {
      expect(parseDatetime('')).to.be.undefined;
    });

    it('rejects values that are not timestamps', function () {
      expect(() => parseDatetime('yesterday')).to.throw(RequestValidationError, 'Invalid datetime: yesterday');
    });

    it('rejects an interval that is open at both ends', function () {
      expect(() => parseDatetime('..')).to.throw(RequestValidationError, 'Invalid datetime: ..');
    });

    it('rejects an interval whose start is after its end', function () {
      expect(() => parseDatetime('2020-02-01T00:00:00Z/2020-01-01T00:00:00Z')).to.throw(
        RequestValidationError, 'The start is after the end',
      );
    });
  });
});
