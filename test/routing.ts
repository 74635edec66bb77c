import { describe, it } from 'mocha';
import { expect } from 'chai';
import request from 'supertest';
import hookServersStartStop from './helpers/servers';
import { hookEmptyDatabase } from './helpers/db';

describe('Routing', function () {
  describe('with CORS enabled', function () {
    const frontend = hookServersStartStop({ cors: true });
    hookEmptyDatabase();

    it('allows any origin to read API responses', async function () {
      const res = await request(frontend()).get('/api/arrivals');
      expect(res.headers['access-control-allow-origin']).to.equal('*');
    });

    it('allows any origin to read STAC responses', async function () {
      const res = await request(frontend()).get('/stac/conformance');
      expect(res.headers['access-control-allow-origin']).to.equal('*');
      expect(res.headers['access-control-allow-headers']).to.equal('Content-Type');
    });

    it('does not send CORS headers on pages', async function () {
      const res = await request(frontend()).get('/products.txt');
      expect(res.headers['access-control-allow-origin']).to.be.undefined;
    });
  });

  describe('with CORS disabled', function () {
    const frontend = hookServersStartStop({ cors: false });

    it('does not send CORS headers', async function () {
      const res = await request(frontend()).get('/stac/conformance');
      expect(res.headers['access-control-allow-origin']).to.be.undefined;
    });
  });

  describe('request ids', function () {
    const frontend = hookServersStartStop();

    it('returns the request id sent by the client', async function () {
      const res = await request(frontend()).get('/stac/conformance').set('X-Request-Id', 'request-1');
      expect(res.headers['x-request-id']).to.equal('request-1');
    });

    it('generates a request id otherwise', async function () {
      const res = await request(frontend()).get('/stac/conformance');
      expect(res.headers['x-request-id']).to.match(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    });
  });

  describe('JSON schemas', function () {
    const frontend = hookServersStartStop();

    it('serves the bundled schemas', async function () {
      const res = await request(frontend()).get('/schemas/stac/item.json');
      expect(res.status).to.equal(200);
      expect(res.body.$id).to.equal('https://schemas.stacspec.org/v1.0.0/item-spec/json-schema/item.json');
    });

    it('returns a JSON not found error for unknown schemas', async function () {
      const res = await request(frontend()).get('/schemas/missing.json');
      expect(res.status).to.equal(404);
      expect(res.body).to.eql({
        code: 'explorer.NotFoundError',
        description: 'Error: The requested resource could not be found',
      });
    });
  });

  describe('unknown routes', function () {
    const frontend = hookServersStartStop();

    it('returns an HTML not found page', async function () {
      const res = await request(frontend()).get('/no/such/page');
      expect(res.status).to.equal(404);
      expect(res.type).to.equal('text/html');
      expect(res.text).to.include('<p class="error-message">The requested page was not found.</p>');
    });

    it('returns a JSON not found error under /api', async function () {
      const res = await request(frontend()).get('/api/no-such-thing');
      expect(res.status).to.equal(404);
      expect(res.body).to.eql({ code: 'explorer.NotFoundError', description: 'Error: The requested page was not found.' });
    });

    it('returns a not found error for unknown POST routes', async function () {
      const res = await request(frontend()).post('/stac/collections');
      expect(res.status).to.equal(404);
      expect(res.body.description).to.equal('Error: The requested POST page was not found.');
    });
  });
});
