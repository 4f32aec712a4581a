import type { Logger } from '@airwise/shared';
import type { OpenAqClient } from '@airwise/openaq-client';
import type { CityConfig } from '../config/cities';
import type { PipelineConfig } from '../config/settings';
import { enumerateDays } from '../dates';
import { describeError } from '../errors';
import { downloadArchive } from '../ingest/archive';
import { fetchLocationMetadata } from '../ingest/metadata';
import { enrichDataset } from '../ingest/transform';
import { cityDatasetKey, writeDatasetCsv } from '../storage/datasets';
import type { ObjectStore } from '../storage/objectStore';

export interface IngestStageDeps {
  config: Pick<
    PipelineConfig,
    'sourceBucket' | 'targetBucket' | 'outputPrefix' | 'windowDays' | 'endDate' | 'locationsLimit'
  >;
  cities: CityConfig[];
  openaq: Pick<OpenAqClient, 'listLocations'>;
  archiveStore: ObjectStore;
  targetStore: ObjectStore;
  logger: Logger;
  /** Abort on the first city failure instead of recording it and moving on. */
  failFast?: boolean;
}

export interface CityWriteSummary {
  city: string;
  key: string;
  locations: number;
  rowsDownloaded: number;
  rowsWritten: number;
  duplicatesRemoved: number;
  incompleteRemoved: number;
  failedLocations: string[];
}

export type CitySkipReason = 'no_locations' | 'no_data';

export type CityOutcome =
  | { status: 'written'; summary: CityWriteSummary }
  | { status: 'skipped'; city: string; reason: CitySkipReason }
  | { status: 'failed'; city: string; error: Error };

export interface IngestStageResult {
  written: CityWriteSummary[];
  skipped: Array<{ city: string; reason: CitySkipReason }>;
  failed: Array<{ city: string; error: Error }>;
}

export async function ingestCity(deps: IngestStageDeps, { city, bbox }: CityConfig): Promise<CityOutcome> {
  const { config, logger } = deps;

  logger.info({ city }, 'Fetching location metadata');
  const metadata = await fetchLocationMetadata(deps.openaq, city, bbox, {
    limit: config.locationsLimit,
    logger
  });

  const locationIds = Array.from(metadata.keys());
  if (locationIds.length === 0) {
    logger.info({ city }, 'No locations found; skipping data download');
    return { status: 'skipped', city, reason: 'no_locations' };
  }

  logger.info({ city, locations: locationIds.length }, 'Downloading archive data');
  const download = await downloadArchive(
    deps.archiveStore,
    {
      bucket: config.sourceBucket,
      locationIds,
      days: enumerateDays(config.endDate.localDate, config.windowDays)
    },
    logger.child({ city })
  );
  if (!download.ok) {
    return { status: 'failed', city, error: download.error };
  }

  const { table, failedLocations } = download.value;
  if (table.rows.length === 0) {
    logger.info({ city }, 'No data available within the requested date range');
    return { status: 'skipped', city, reason: 'no_data' };
  }

  const enriched = enrichDataset(table, metadata);
  const key = cityDatasetKey(config.outputPrefix, city);
  const written = await writeDatasetCsv(deps.targetStore, config.targetBucket, key, enriched.table);
  if (!written.ok) {
    return { status: 'failed', city, error: written.error };
  }

  logger.info({ city, bucket: config.targetBucket, key, rows: enriched.table.rows.length }, 'Saved city dataset');
  return {
    status: 'written',
    summary: {
      city,
      key,
      locations: locationIds.length,
      rowsDownloaded: table.rows.length,
      rowsWritten: enriched.table.rows.length,
      duplicatesRemoved: enriched.duplicatesRemoved,
      incompleteRemoved: enriched.incompleteRemoved,
      failedLocations
    }
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}

/** Cities run one after another in configuration order. */
export async function runIngestStage(deps: IngestStageDeps): Promise<IngestStageResult> {
  const result: IngestStageResult = { written: [], skipped: [], failed: [] };

  for (const city of deps.cities) {
    let outcome: CityOutcome;
    try {
      outcome = await ingestCity(deps, city);
    } catch (error) {
      outcome = { status: 'failed', city: city.city, error: toError(error) };
    }

    switch (outcome.status) {
      case 'written':
        result.written.push(outcome.summary);
        break;
      case 'skipped':
        result.skipped.push({ city: outcome.city, reason: outcome.reason });
        break;
      case 'failed':
        deps.logger.error({ city: outcome.city, err: outcome.error }, 'City ingestion failed');
        if (deps.failFast) {
          throw outcome.error;
        }
        result.failed.push({ city: outcome.city, error: outcome.error });
        break;
    }
  }

  deps.logger.info(
    { written: result.written.length, skipped: result.skipped.length, failed: result.failed.length },
    'Processing completed for all cities'
  );
  return result;
}
