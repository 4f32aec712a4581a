import { createLogger, type EnvSource, type Logger } from '@airwise/shared';
import { loadCityConfig, type CityConfig } from '../config/cities';
import { loadPipelineConfig, type PipelineConfig } from '../config/settings';

export interface CommandRuntime {
  config: PipelineConfig;
  cities: CityConfig[];
  logger: Logger;
}

export async function loadCommandRuntime(name: string, env: EnvSource = process.env): Promise<CommandRuntime> {
  const config = loadPipelineConfig(env);
  const logger = createLogger({ level: config.logLevel, name });
  const cities = await loadCityConfig(config.configPath);
  logger.info({ cities: cities.map((entry) => entry.city) }, 'Loaded cities');
  return { config, cities, logger };
}
