import { ValidationError } from './errors.js';
import { envSchema } from '../schemas/config.schema.js';
import type { Algorithm } from '../engine/allocation/types.js';
import type { LogLevel } from './logger.js';

export interface HourSplitConfig {
  resolution: number;
  percentages: number[];
  algorithm: Algorithm;
  logLevel: LogLevel;
}

let cachedConfig: HourSplitConfig | undefined;

/**
 * Read defaults from the environment.
 * Throws ValidationError naming every variable that failed to parse.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HourSplitConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse({
    HOUR_SPLIT_RESOLUTION: env.HOUR_SPLIT_RESOLUTION,
    HOUR_SPLIT_PERCENT: env.HOUR_SPLIT_PERCENT,
    HOUR_SPLIT_ALGORITHM: env.HOUR_SPLIT_ALGORITHM,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!parsed.success) {
    const invalid = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new ValidationError(
      `Invalid environment configuration: ${invalid.join(', ')}`,
      { invalid }
    );
  }

  const config: HourSplitConfig = {
    resolution: parsed.data.HOUR_SPLIT_RESOLUTION,
    percentages: parsed.data.HOUR_SPLIT_PERCENT,
    algorithm: parsed.data.HOUR_SPLIT_ALGORITHM,
    logLevel: parsed.data.LOG_LEVEL,
  };

  cachedConfig = config;
  return config;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetConfigCache(): void {
  cachedConfig = undefined;
}
