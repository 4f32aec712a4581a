import assert from 'node:assert/strict';
import { gzipSync } from 'node:zlib';
import { test } from 'node:test';
import { silentLogger } from '@airwise/shared';
import { UpstreamRequestError, type ListLocationsInput, type OpenAqLocation } from '@airwise/openaq-client';

import type { CityConfig } from '../src/config/cities';
import { parseEndDate } from '../src/config/settings';
import { runIngestStage, type IngestStageDeps } from '../src/stages/ingestStage';
import { MemoryObjectStore } from '../src/storage/memoryObjectStore';

const delhi: CityConfig = { city: 'Delhi', bbox: [77.1, 28.4, 77.35, 28.88] };
const nowhere: CityConfig = { city: 'Nowhere', bbox: [0, 0, 0.1, 0.1] };
const empty: CityConfig = { city: 'Empty', bbox: [10, 10, 10.1, 10.1] };
const broken: CityConfig = { city: 'Broken', bbox: [20, 20, 20.1, 20.1] };

const upstreamFailure = new UpstreamRequestError({
  method: 'GET',
  url: 'http://127.0.0.1/v3/locations',
  status: 503
});

const locationsByWest = new Map<number, OpenAqLocation[]>([
  [77.1, [{ id: 8118, name: 'ITO', country: { name: 'India' }, provider: { name: 'CPCB' } }]],
  [0, []],
  [10, [{ id: 7000, name: 'Quiet', country: null, provider: null }]]
]);

const openaq = {
  listLocations: async (input: ListLocationsInput): Promise<OpenAqLocation[]> => {
    const locations = locationsByWest.get(input.bbox[0]);
    if (!locations) {
      throw upstreamFailure;
    }
    return locations;
  }
};

function archiveStore(): MemoryObjectStore {
  const store = new MemoryObjectStore();
  const prefix = 'records/csv.gz/locationid=8118/year=2023/month=12/';
  store.seed(
    'archive',
    `${prefix}location-8118-20231230.csv.gz`,
    gzipSync('location_id,datetime,value\n8118,2023-12-30T10:00:00+05:30,40\n')
  );
  store.seed(
    'archive',
    `${prefix}location-8118-20231231.csv.gz`,
    gzipSync(
      'location_id,datetime,value\n8118,2023-12-31T10:00:00+05:30,42\n8118,2023-12-31T10:00:00+05:30,42\n'
    )
  );
  return store;
}

function deps(overrides: Partial<IngestStageDeps> = {}): IngestStageDeps & {
  archiveStore: MemoryObjectStore;
  targetStore: MemoryObjectStore;
} {
  return {
    config: {
      sourceBucket: 'archive',
      targetBucket: 'target',
      outputPrefix: 'extracts',
      windowDays: 1,
      endDate: parseEndDate('31/12/2023 23:59:59 +0530'),
      locationsLimit: 1000
    },
    cities: [delhi, nowhere, empty, broken],
    openaq,
    logger: silentLogger,
    ...overrides,
    archiveStore: archiveStore(),
    targetStore: new MemoryObjectStore()
  };
}

test('writes one enriched extract per city with data and isolates failures', async () => {
  const stageDeps = deps();
  const result = await runIngestStage(stageDeps);

  assert.deepEqual(result.written, [
    {
      city: 'Delhi',
      key: 'extracts/Delhi_data.csv',
      locations: 1,
      rowsDownloaded: 3,
      rowsWritten: 2,
      duplicatesRemoved: 1,
      incompleteRemoved: 0,
      failedLocations: []
    }
  ]);
  assert.deepEqual(result.skipped, [
    { city: 'Nowhere', reason: 'no_locations' },
    { city: 'Empty', reason: 'no_data' }
  ]);
  assert.deepEqual(result.failed, [{ city: 'Broken', error: upstreamFailure }]);

  const stored = stageDeps.targetStore.peek('target', 'extracts/Delhi_data.csv');
  assert.equal(stored?.contentType, 'text/csv');
  assert.equal(
    stored?.body.toString('utf8'),
    [
      'location_id,datetime,value,location_name,provider,location',
      '8118,2023-12-30T10:00:00+05:30,40,ITO,CPCB,Unknown',
      '8118,2023-12-31T10:00:00+05:30,42,ITO,CPCB,Unknown',
      ''
    ].join('\n')
  );
  assert.equal(stageDeps.targetStore.peek('target', 'extracts/Empty_data.csv'), undefined);
});

test('cities without locations never reach the archive', async () => {
  const stageDeps = deps({ cities: [nowhere] });
  const result = await runIngestStage(stageDeps);

  assert.deepEqual(result.skipped, [{ city: 'Nowhere', reason: 'no_locations' }]);
  assert.equal(stageDeps.archiveStore.listCalls.length, 0);
});

test('missing archive days are listed once per day for a city with no files', async () => {
  const stageDeps = deps({ cities: [empty] });
  await runIngestStage(stageDeps);

  assert.deepEqual(
    stageDeps.archiveStore.listCalls.map((call) => call.prefix),
    [
      'records/csv.gz/locationid=7000/year=2023/month=12/',
      'records/csv.gz/locationid=7000/year=2023/month=12/'
    ]
  );
});

test('fail-fast aborts on the first failing city', async () => {
  const stageDeps = deps({
    cities: [broken, delhi],
    failFast: true
  });

  await assert.rejects(runIngestStage(stageDeps), (error: unknown) => error === upstreamFailure);
  assert.equal(stageDeps.targetStore.peek('target', 'extracts/Delhi_data.csv'), undefined);
});
