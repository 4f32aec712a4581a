import assert from 'node:assert/strict';
import http from 'node:http';
import { after, before, beforeEach, test } from 'node:test';

import { OpenAqClient, formatBoundingBox } from '../client';
import { UpstreamRequestError } from '../errors';

interface RecordedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  apiKey: string | undefined;
}

type Responder = (res: http.ServerResponse) => void;

const recordedRequests: RecordedRequest[] = [];
let respond: Responder = (res) => {
  res.statusCode = 500;
  res.end();
};
let baseUrl = '';
let server: http.Server;

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

before(async () => {
  server = http.createServer((req, res) => {
    const url = new URL(req.url ?? '/', 'http://127.0.0.1');
    const apiKey = req.headers['x-api-key'];
    recordedRequests.push({
      method: req.method ?? '',
      path: url.pathname,
      query: url.searchParams,
      apiKey: typeof apiKey === 'string' ? apiKey : undefined
    });
    respond(res);
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server did not bind to a TCP port');
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

after(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  recordedRequests.length = 0;
});

test('formatBoundingBox joins coordinates with commas', () => {
  assert.equal(formatBoundingBox([77.1, 28.4, 77.35, 28.88]), '77.1,28.4,77.35,28.88');
});

test('listLocations sends bbox, limit and api key', async () => {
  respond = (res) =>
    sendJson(res, 200, {
      meta: { found: 2 },
      results: [
        { id: 8118, name: 'New Delhi', country: { id: 9, name: 'India' }, provider: { name: 'AirNow' } },
        { id: 'x-2', name: null, country: null }
      ]
    });

  const client = new OpenAqClient({ apiKey: 'test-key', baseUrl });
  const locations = await client.listLocations({ bbox: [77.1, 28.4, 77.35, 28.88] });

  assert.equal(recordedRequests.length, 1);
  const [request] = recordedRequests;
  assert.equal(request?.method, 'GET');
  assert.equal(request?.path, '/v3/locations');
  assert.equal(request?.query.get('bbox'), '77.1,28.4,77.35,28.88');
  assert.equal(request?.query.get('limit'), '1000');
  assert.equal(request?.apiKey, 'test-key');

  assert.equal(locations.length, 2);
  assert.equal(locations[0]?.id, 8118);
  assert.equal(locations[0]?.provider?.name, 'AirNow');
  assert.equal(locations[1]?.id, 'x-2');
});

test('listLocations honours a custom limit', async () => {
  respond = (res) => sendJson(res, 200, { results: [] });

  const client = new OpenAqClient({ apiKey: 'test-key', baseUrl });
  const locations = await client.listLocations({ bbox: [0, 0, 1, 1], limit: 25 });

  assert.deepEqual(locations, []);
  assert.equal(recordedRequests[0]?.query.get('limit'), '25');
});

test('listLocations treats a missing results array as empty', async () => {
  respond = (res) => sendJson(res, 200, { meta: { found: 0 } });

  const client = new OpenAqClient({ apiKey: 'test-key', baseUrl });
  assert.deepEqual(await client.listLocations({ bbox: [0, 0, 1, 1] }), []);
});

test('listLocations raises UpstreamRequestError on a non-success status', async () => {
  respond = (res) => sendJson(res, 401, { detail: 'Invalid credentials' });

  const client = new OpenAqClient({ apiKey: 'wrong-key', baseUrl });
  await assert.rejects(client.listLocations({ bbox: [0, 0, 1, 1] }), (error: unknown) => {
    assert.ok(error instanceof UpstreamRequestError);
    assert.equal(error.status, 401);
    assert.equal(error.method, 'GET');
    assert.equal(error.responseBody, '{"detail":"Invalid credentials"}');
    assert.match(error.message, /failed with status 401$/);
    return true;
  });
});

test('listLocations rejects a malformed body', async () => {
  respond = (res) => sendJson(res, 200, { results: [{ name: 'no id' }] });

  const client = new OpenAqClient({ apiKey: 'test-key', baseUrl });
  await assert.rejects(client.listLocations({ bbox: [0, 0, 1, 1] }), (error: unknown) => {
    assert.ok(error instanceof UpstreamRequestError);
    assert.equal(error.status, 200);
    assert.match(error.message, /^OpenAQ locations response has an unexpected shape: results\.0\.id/);
    return true;
  });
});

test('listLocations gives up when the response does not arrive in time', async () => {
  respond = () => undefined;

  const client = new OpenAqClient({ apiKey: 'test-key', baseUrl, fetchTimeoutMs: 50 });
  await assert.rejects(client.listLocations({ bbox: [0, 0, 1, 1] }), (error: unknown) => {
    assert.ok(error instanceof UpstreamRequestError);
    assert.equal(error.status, 0);
    assert.equal(error.method, 'GET');
    assert.match(error.message, /^Request to GET http:\/\/127\.0\.0\.1:\d+\/v3\/locations\?bbox=.* timed out after 50ms$/);
    return true;
  });
});

test('a generous timeout leaves a quick response untouched', async () => {
  respond = (res) => sendJson(res, 200, { results: [{ id: 1, name: 'Fast' }] });

  const client = new OpenAqClient({ apiKey: 'test-key', baseUrl, fetchTimeoutMs: 5000 });
  const locations = await client.listLocations({ bbox: [0, 0, 1, 1] });
  assert.equal(locations[0]?.name, 'Fast');
});
