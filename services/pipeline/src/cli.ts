#!/usr/bin/env node

import { Command } from 'commander';
import { registerIngestCommand } from './commands/ingest';
import { registerPromptsCommand } from './commands/prompts';
import { reportCommandFailure } from './commands/report';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('airwise')
    .description('Air-quality archive ingestion and forecast prompt generation')
    .version('0.1.0');

  registerIngestCommand(program);
  registerPromptsCommand(program);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    reportCommandFailure(err);
  }
}

if (require.main === module) {
  void main();
}
