import { Command } from 'commander';
import { OpenAqClient } from '@airwise/openaq-client';
import { requireApiKey } from '../config/settings';
import { resolveStorageCredentials } from '../config/credentials';
import { S3ObjectStore, createArchiveS3Client, createTargetS3Client } from '../storage/objectStore';
import { runIngestStage, type IngestStageResult } from '../stages/ingestStage';
import { reportCommandFailure } from './report';
import { loadCommandRuntime } from './runtime';

type IngestCommandOptions = {
  failFast?: boolean;
};

export async function runIngestCommand(opts: IngestCommandOptions): Promise<IngestStageResult> {
  const { config, cities, logger } = await loadCommandRuntime('ingest');
  const credentials = await resolveStorageCredentials();

  const result = await runIngestStage({
    config,
    cities,
    openaq: new OpenAqClient({
      apiKey: requireApiKey(config),
      baseUrl: config.apiBaseUrl,
      fetchTimeoutMs: config.apiTimeoutMs
    }),
    archiveStore: new S3ObjectStore(createArchiveS3Client()),
    targetStore: new S3ObjectStore(createTargetS3Client(config.region, credentials)),
    logger,
    failFast: opts.failFast ?? false
  });

  for (const { city, reason } of result.skipped) {
    logger.info({ city, reason }, 'City skipped');
  }
  if (result.failed.length > 0) {
    process.exitCode = 1;
  }
  return result;
}

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Download archive measurements per city and store enriched CSV extracts')
    .option('--fail-fast', 'Abort on the first city that fails instead of continuing')
    .action(async (opts: IngestCommandOptions) => {
      try {
        await runIngestCommand(opts);
      } catch (err) {
        reportCommandFailure(err);
      }
    });
}
