import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export type CreateLoggerOptions = {
  level?: string;
  name?: string;
};

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = pino(createLoggerOptions(options.level ?? 'info'));
  return options.name ? logger.child({ component: options.name }) : logger;
}

export const silentLogger: Logger = pino({ level: 'silent' });
