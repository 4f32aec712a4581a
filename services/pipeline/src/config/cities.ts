import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { BoundingBox } from '@airwise/openaq-client';
import { ConfigurationError, describeError } from '../errors';

export interface CityConfig {
  city: string;
  bbox: BoundingBox;
}

const coordinate = z.number().finite();

const cityConfigSchema = z.record(z.tuple([coordinate, coordinate, coordinate, coordinate]));

/**
 * Validates a `{ "<city>": [west, south, east, north] }` mapping. Entries keep the
 * order they have in the document.
 */
export function parseCityConfig(payload: unknown, source = '<inline>'): CityConfig[] {
  const parsed = cityConfigSchema.safeParse(payload);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`City configuration ${source} is malformed: ${details}`, { path: source });
  }
  return Object.entries(parsed.data).map(([city, bbox]) => ({ city, bbox }));
}

export async function loadCityConfig(configPath: string): Promise<CityConfig[]> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`City configuration file ${configPath} could not be read: ${describeError(error)}`, {
      path: configPath,
      cause: error
    });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`City configuration file ${configPath} contains invalid JSON: ${describeError(error)}`, {
      path: configPath,
      cause: error
    });
  }

  return parseCityConfig(payload, configPath);
}
