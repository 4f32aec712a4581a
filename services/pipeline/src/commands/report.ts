import { createLogger, type Logger } from '@airwise/shared';

/** Logs a failed command and marks the process as failed without exiting it. */
export function reportCommandFailure(error: unknown, logger: Logger = createLogger({ name: 'cli' })): void {
  logger.error({ err: error }, 'Command failed');
  process.exitCode = 1;
}
