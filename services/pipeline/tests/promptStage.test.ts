import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { after, before, test } from 'node:test';
import { silentLogger } from '@airwise/shared';

import type { CityConfig } from '../src/config/cities';
import { parseEndDate, type PromptSettings } from '../src/config/settings';
import { FORECAST_TABLE_HEADER } from '../src/prompts/templates';
import {
  FINE_TUNING_PROMPTS_FILE,
  ZERO_SHOT_PROMPTS_FILE,
  resolveLocationNames,
  runPromptStage,
  writePromptFiles,
  type PromptStageDeps
} from '../src/stages/promptStage';
import { MemoryObjectStore } from '../src/storage/memoryObjectStore';

let workDir = '';

before(async () => {
  workDir = await mkdtemp(path.join(tmpdir(), 'airwise-prompts-'));
});

after(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const promptSettings: PromptSettings = {
  parameter: 'value',
  historyDays: 2,
  forecastDays: 1,
  maxPerLocation: null,
  locationScope: 'city',
  outputDir: 'data'
};

function deps(store: MemoryObjectStore, cities: string[], scope: PromptSettings['locationScope'] = 'city'): PromptStageDeps {
  return {
    config: {
      targetBucket: 'target',
      outputPrefix: 'extracts',
      endDate: parseEndDate('31/12/2023 23:59:59 +0530'),
      prompt: { ...promptSettings, locationScope: scope }
    },
    cities: cities.map((city): CityConfig => ({ city, bbox: [0, 0, 1, 1] })),
    store,
    logger: silentLogger
  };
}

test('resolveLocationNames follows the scope', () => {
  const table = {
    columns: ['location_name'],
    rows: [{ location_name: 'ITO' }, { location_name: null }, { location_name: 'Anand Vihar' }, { location_name: 'ITO' }]
  };
  assert.deepEqual(resolveLocationNames(table, 'Delhi', 'city'), ['Delhi']);
  assert.deepEqual(resolveLocationNames(table, 'Delhi', 'station'), ['ITO', 'Anand Vihar']);
});

test('generates prompts per city and skips unusable extracts', async () => {
  const store = new MemoryObjectStore();
  store.seed(
    'target',
    'extracts/Delhi_data.csv',
    [
      'datetime,location_name,value',
      '2023-12-29T10:00:00+05:30,Delhi,10',
      '2023-12-30T10:00:00+05:30,Delhi,20',
      '2023-12-31T10:00:00+05:30,Delhi,30',
      ''
    ].join('\n')
  );
  store.seed('target', 'extracts/Accra_data.csv', 'datetime,location_name\n2023-12-31T10:00:00Z,Accra\n');

  const result = await runPromptStage(deps(store, ['Delhi', 'Lisbon', 'Accra']));

  assert.equal(result.zeroShot.length, 1);
  assert.ok(result.zeroShot[0]?.Prompt.includes('for each day from 2024-01-01 to 2024-01-01.'));
  assert.deepEqual(
    result.fineTuning.map((record) => record.Completion),
    [`${FORECAST_TABLE_HEADER}\n| 2023-12-31 | 30.00 |`]
  );
  assert.deepEqual(
    result.skipped.map(({ city, reason }) => ({ city, reason })),
    [
      { city: 'Lisbon', reason: 'unreadable_dataset' },
      { city: 'Accra', reason: 'missing_columns' }
    ]
  );
});

test('station scope emits prompts for each station in file order', async () => {
  const store = new MemoryObjectStore();
  store.seed(
    'target',
    'extracts/Delhi_data.csv',
    [
      'datetime,location_name,value',
      '2023-12-30T10:00:00+05:30,ITO,20',
      '2023-12-30T10:00:00+05:30,Anand Vihar,25',
      '2023-12-31T10:00:00+05:30,ITO,30',
      ''
    ].join('\n')
  );

  const result = await runPromptStage(deps(store, ['Delhi'], 'station'));

  assert.deepEqual(
    result.zeroShot.map((record) => record.Prompt.split('\n')[0]),
    [
      'You are an advanced forecasting system tasked with predicting daily air quality for ITO.',
      'You are an advanced forecasting system tasked with predicting daily air quality for Anand Vihar.'
    ]
  );
  assert.equal(result.fineTuning.length, 0);
});

test('writePromptFiles writes both documents as indented JSON', async () => {
  const outputDir = path.join(workDir, 'nested', 'data');
  const zeroShot = [{ Prompt: 'zero', Completion: FORECAST_TABLE_HEADER }];
  const fineTuning = [
    { Prompt: 'first', Completion: 'a' },
    { Prompt: 'second', Completion: 'b' }
  ];

  const paths = await writePromptFiles(outputDir, { zeroShot, fineTuning }, silentLogger);

  assert.equal(paths.zeroShot, path.join(outputDir, ZERO_SHOT_PROMPTS_FILE));
  assert.equal(paths.fineTuning, path.join(outputDir, FINE_TUNING_PROMPTS_FILE));
  assert.equal(await readFile(paths.zeroShot, 'utf8'), JSON.stringify(zeroShot, null, 2));
  assert.deepEqual(JSON.parse(await readFile(paths.fineTuning, 'utf8')), fineTuning);
});
