import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@airwise/shared';
import type { CityConfig } from '../config/cities';
import type { LocationScope, PipelineConfig } from '../config/settings';
import { DatasetSchemaError } from '../errors';
import { generateLocationPrompts, type PromptRecord } from '../prompts/generator';
import { assertPromptColumns } from '../prompts/series';
import { cityDatasetKey, readDatasetCsv } from '../storage/datasets';
import type { ObjectStore } from '../storage/objectStore';
import { getCell, type Table } from '../table/table';

export const ZERO_SHOT_PROMPTS_FILE = 'air_quality_forecast_zeroshot_prompts.json';
export const FINE_TUNING_PROMPTS_FILE = 'air_quality_forecast_ft_prompts.json';

export interface PromptStageDeps {
  config: Pick<PipelineConfig, 'targetBucket' | 'outputPrefix' | 'endDate' | 'prompt'>;
  cities: CityConfig[];
  store: ObjectStore;
  logger: Logger;
}

export type PromptSkipReason = 'unreadable_dataset' | 'missing_columns';

export interface PromptStageResult {
  zeroShot: PromptRecord[];
  fineTuning: PromptRecord[];
  skipped: Array<{ city: string; reason: PromptSkipReason; error: Error }>;
}

export interface PromptFilePaths {
  zeroShot: string;
  fineTuning: string;
}

/** `city` scope prompts on the city name itself; `station` on every distinct station in file order. */
export function resolveLocationNames(table: Table, city: string, scope: LocationScope): string[] {
  if (scope === 'city') {
    return [city];
  }
  const names: string[] = [];
  for (const row of table.rows) {
    const name = getCell(row, 'location_name');
    if (name !== null && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

export async function runPromptStage(deps: PromptStageDeps): Promise<PromptStageResult> {
  const { config, logger } = deps;
  const settings = config.prompt;
  const result: PromptStageResult = { zeroShot: [], fineTuning: [], skipped: [] };

  for (const { city } of deps.cities) {
    const key = cityDatasetKey(config.outputPrefix, city);
    const dataset = await readDatasetCsv(deps.store, config.targetBucket, key);
    if (!dataset.ok) {
      logger.error({ city, key, code: dataset.error.code, err: dataset.error }, 'Error loading city dataset');
      result.skipped.push({ city, reason: 'unreadable_dataset', error: dataset.error });
      continue;
    }

    try {
      assertPromptColumns(dataset.value, settings.parameter);
    } catch (error) {
      if (!(error instanceof DatasetSchemaError)) {
        throw error;
      }
      logger.error({ city, key, missingColumns: error.missingColumns }, 'City dataset lacks prompt columns');
      result.skipped.push({ city, reason: 'missing_columns', error });
      continue;
    }

    const locationNames = resolveLocationNames(dataset.value, city, settings.locationScope);
    let zeroShotCount = 0;
    let fineTuningCount = 0;
    for (const locationName of locationNames) {
      const prompts = generateLocationPrompts(dataset.value, {
        locationName,
        parameter: settings.parameter,
        historyDays: settings.historyDays,
        forecastDays: settings.forecastDays,
        maxPerLocation: settings.maxPerLocation,
        fallbackEndDate: config.endDate.localDate
      });
      result.zeroShot.push(...prompts.zeroShot);
      result.fineTuning.push(...prompts.fineTuning);
      zeroShotCount += prompts.zeroShot.length;
      fineTuningCount += prompts.fineTuning.length;
    }

    logger.info(
      { city, key, locations: locationNames.length, zeroShot: zeroShotCount, fineTuning: fineTuningCount },
      'Generated prompts for city'
    );
  }

  return result;
}

export async function writePromptFiles(
  outputDir: string,
  result: Pick<PromptStageResult, 'zeroShot' | 'fineTuning'>,
  logger: Logger
): Promise<PromptFilePaths> {
  await mkdir(outputDir, { recursive: true });
  const paths: PromptFilePaths = {
    zeroShot: path.join(outputDir, ZERO_SHOT_PROMPTS_FILE),
    fineTuning: path.join(outputDir, FINE_TUNING_PROMPTS_FILE)
  };
  await writeFile(paths.zeroShot, JSON.stringify(result.zeroShot, null, 2), 'utf8');
  logger.info({ path: paths.zeroShot, records: result.zeroShot.length }, 'Data saved');
  await writeFile(paths.fineTuning, JSON.stringify(result.fineTuning, null, 2), 'utf8');
  logger.info({ path: paths.fineTuning, records: result.fineTuning.length }, 'Data saved');
  return paths;
}
