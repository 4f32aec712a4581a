import { z } from 'zod';
import { enumVar, integerVar, loadEnvConfig, stringVar, type EnvSource } from '@airwise/shared';
import { DEFAULT_LOCATIONS_LIMIT, DEFAULT_OPENAQ_BASE_URL } from '@airwise/openaq-client';
import { ConfigurationError } from '../errors';

export const DEFAULT_END_DATE = '31/12/2023 23:59:59 +0530';
export const DEFAULT_API_TIMEOUT_MS = 30_000;

const END_DATE_PATTERN = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;

export type LocationScope = 'city' | 'station';

export interface EndDate {
  /** The configured text, as given. */
  raw: string;
  /** Calendar date in the configured offset, `YYYY-MM-DD`. */
  localDate: string;
}

export interface PromptSettings {
  parameter: string;
  historyDays: number;
  forecastDays: number;
  maxPerLocation: number | null;
  locationScope: LocationScope;
  outputDir: string;
}

export interface PipelineConfig {
  sourceBucket: string;
  targetBucket: string;
  outputPrefix: string;
  apiKey: string | null;
  configPath: string;
  windowDays: number;
  endDate: EndDate;
  region: string;
  apiBaseUrl: string;
  locationsLimit: number;
  apiTimeoutMs: number;
  logLevel: string;
  prompt: PromptSettings;
}

const pipelineEnvSchema = z
  .object({
    OPENAQ_DATA_SOURCE: stringVar({ defaultValue: 'openaq-data-archive' }),
    TARGET_BUCKET_NAME: stringVar({ required: true }),
    OUTPUT_FILE_KEY_PREFIX: stringVar({ required: true }),
    API_KEY: stringVar(),
    CITIES_CONFIG_FILE: stringVar({ defaultValue: 'cities_config.json' }),
    NUMBER_OF_DAYS: integerVar({ defaultValue: 30, min: 0 }),
    END_DATE: stringVar({ defaultValue: DEFAULT_END_DATE, pattern: END_DATE_PATTERN }),
    AWS_REGION: stringVar(),
    AWS_DEFAULT_REGION: stringVar(),
    OPENAQ_API_BASE_URL: stringVar({ defaultValue: DEFAULT_OPENAQ_BASE_URL }),
    OPENAQ_LOCATIONS_LIMIT: integerVar({ defaultValue: DEFAULT_LOCATIONS_LIMIT, min: 1 }),
    OPENAQ_TIMEOUT_MS: integerVar({ defaultValue: DEFAULT_API_TIMEOUT_MS, min: 1 }),
    PROMPT_PARAMETER: stringVar({ defaultValue: 'value' }),
    PROMPT_HISTORY_DAYS: integerVar({ defaultValue: 10, min: 1 }),
    PROMPT_FORECAST_DAYS: integerVar({ defaultValue: 2, min: 1 }),
    PROMPT_MAX_PER_LOCATION: integerVar({ min: 1 }),
    PROMPT_LOCATION_SCOPE: enumVar<LocationScope>(['city', 'station'] as const, { defaultValue: 'city' }),
    PROMPT_OUTPUT_DIR: stringVar({ defaultValue: 'data' }),
    LOG_LEVEL: stringVar({ defaultValue: 'info', lowercase: true })
  })
  .passthrough();

type PipelineEnv = z.infer<typeof pipelineEnvSchema>;

/**
 * Parses `DD/MM/YYYY HH:MM:SS ±HHMM`. The local calendar date is kept as written so the
 * day window follows the configured offset rather than UTC.
 */
export function parseEndDate(raw: string): EndDate {
  const match = END_DATE_PATTERN.exec(raw.trim());
  if (!match) {
    throw new ConfigurationError(`END_DATE must use the format DD/MM/YYYY HH:MM:SS +HHMM, got '${raw}'`);
  }
  const [, day, month, year, hours, minutes, seconds] = match;
  const localDate = `${year}-${month}-${day}`;

  const check = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (check.toISOString().slice(0, 10) !== localDate) {
    throw new ConfigurationError(`END_DATE '${raw}' is not a valid calendar date`);
  }
  if (Number(hours) > 23 || Number(minutes) > 59 || Number(seconds) > 59) {
    throw new ConfigurationError(`END_DATE '${raw}' is not a valid time of day`);
  }

  return { raw, localDate };
}

function normalizePrefix(prefix: string): string {
  const trimmed = prefix.replace(/\/+$/, '');
  return trimmed.length > 0 ? trimmed : prefix;
}

function toPipelineConfig(env: PipelineEnv): PipelineConfig {
  return {
    sourceBucket: env.OPENAQ_DATA_SOURCE ?? 'openaq-data-archive',
    targetBucket: env.TARGET_BUCKET_NAME ?? '',
    outputPrefix: normalizePrefix(env.OUTPUT_FILE_KEY_PREFIX ?? ''),
    apiKey: env.API_KEY ?? null,
    configPath: env.CITIES_CONFIG_FILE ?? 'cities_config.json',
    windowDays: env.NUMBER_OF_DAYS ?? 30,
    endDate: parseEndDate(env.END_DATE ?? DEFAULT_END_DATE),
    region: env.AWS_REGION ?? env.AWS_DEFAULT_REGION ?? 'us-east-1',
    apiBaseUrl: env.OPENAQ_API_BASE_URL ?? DEFAULT_OPENAQ_BASE_URL,
    locationsLimit: env.OPENAQ_LOCATIONS_LIMIT ?? DEFAULT_LOCATIONS_LIMIT,
    apiTimeoutMs: env.OPENAQ_TIMEOUT_MS ?? DEFAULT_API_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL ?? 'info',
    prompt: {
      parameter: env.PROMPT_PARAMETER ?? 'value',
      historyDays: env.PROMPT_HISTORY_DAYS ?? 10,
      forecastDays: env.PROMPT_FORECAST_DAYS ?? 2,
      maxPerLocation: env.PROMPT_MAX_PER_LOCATION ?? null,
      locationScope: env.PROMPT_LOCATION_SCOPE,
      outputDir: env.PROMPT_OUTPUT_DIR ?? 'data'
    }
  };
}

export function loadPipelineConfig(env: EnvSource = process.env): PipelineConfig {
  return toPipelineConfig(loadEnvConfig(pipelineEnvSchema, { env, context: 'airwise:pipeline' }));
}

export function requireApiKey(config: PipelineConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError('API_KEY is required to fetch location metadata');
  }
  return config.apiKey;
}
