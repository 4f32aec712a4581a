import { Command } from 'commander';
import { resolveStorageCredentials } from '../config/credentials';
import { S3ObjectStore, createTargetS3Client } from '../storage/objectStore';
import { runPromptStage, writePromptFiles, type PromptFilePaths } from '../stages/promptStage';
import { reportCommandFailure } from './report';
import { loadCommandRuntime } from './runtime';

export async function runPromptsCommand(): Promise<PromptFilePaths> {
  const { config, cities, logger } = await loadCommandRuntime('prompts');
  const credentials = await resolveStorageCredentials();

  const result = await runPromptStage({
    config,
    cities,
    store: new S3ObjectStore(createTargetS3Client(config.region, credentials)),
    logger
  });
  return writePromptFiles(config.prompt.outputDir, result, logger);
}

export function registerPromptsCommand(program: Command): void {
  program
    .command('prompts')
    .description('Render zero-shot and fine-tuning forecast prompts from stored city extracts')
    .action(async () => {
      try {
        await runPromptsCommand();
      } catch (err) {
        reportCommandFailure(err);
      }
    });
}
