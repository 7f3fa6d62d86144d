import type { JobConfig } from '../jobs/JobConfig.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Settings the run actually uses, after merging
 * job defaults < environment < explicit overrides
 */
export interface PipelineSettings {
  concurrencyLimit: number;
  maxRetries: number;
  requestDelayMs: number;
  backoffUnitMs: number;
}

export type PipelineOverrides = Partial<PipelineSettings>;

const DEFAULT_BACKOFF_UNIT_MS = 1000;

const SETTING_KEYS: ReadonlyArray<keyof PipelineSettings> = [
  'concurrencyLimit',
  'maxRetries',
  'requestDelayMs',
  'backoffUnitMs',
];

/**
 * Environment variable per setting
 */
const ENV_KEYS: Record<keyof PipelineSettings, string> = {
  concurrencyLimit: 'CLASSIFY_CONCURRENCY',
  maxRetries: 'CLASSIFY_MAX_RETRIES',
  requestDelayMs: 'CLASSIFY_REQUEST_DELAY_MS',
  backoffUnitMs: 'CLASSIFY_BACKOFF_UNIT_MS',
};

/**
 * Settings that must be at least 1; the rest may be 0
 */
const POSITIVE_KEYS = new Set<keyof PipelineSettings>(['concurrencyLimit', 'maxRetries']);

/**
 * Parse an integer setting given as text (env var or CLI flag)
 */
export function parseIntegerSetting(name: string, raw: string, minimum: number): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(value) || value < minimum) {
    throw new ConfigError(`${name} must be an integer >= ${minimum}, got '${raw}'`);
  }
  return value;
}

/**
 * Pipeline Configuration
 *
 * Resolves concurrency, retry and pacing settings for a job run.
 */
export class PipelineConfig {
  static resolve(
    job: Pick<JobConfig, 'concurrencyLimit' | 'maxRetries' | 'requestDelayMs'>,
    overrides: PipelineOverrides = {},
    env: NodeJS.ProcessEnv = process.env
  ): PipelineSettings {
    const settings: PipelineSettings = {
      concurrencyLimit: job.concurrencyLimit,
      maxRetries: job.maxRetries,
      requestDelayMs: job.requestDelayMs,
      backoffUnitMs: DEFAULT_BACKOFF_UNIT_MS,
    };

    for (const key of SETTING_KEYS) {
      const minimum = POSITIVE_KEYS.has(key) ? 1 : 0;
      const envValue = env[ENV_KEYS[key]];
      if (envValue !== undefined && envValue !== '') {
        settings[key] = parseIntegerSetting(ENV_KEYS[key], envValue, minimum);
      }

      const override = overrides[key];
      if (override !== undefined) {
        if (!Number.isInteger(override) || override < minimum) {
          throw new ConfigError(`${key} must be an integer >= ${minimum}, got ${override}`);
        }
        settings[key] = override;
      }
    }

    return settings;
  }
}
