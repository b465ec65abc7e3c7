/**
 * Process configuration.
 *
 * Everything comes from environment variables so the CLI and tests can run
 * without config files:
 *
 * - OPENCAGE_API_KEY       geocoding credential (only needed for --place)
 * - POWER_API_URL          NASA POWER daily point endpoint
 * - POWER_MAX_ATTEMPTS     attempts per block (default 3)
 * - POWER_TIMEOUT_MS       per-attempt timeout (default 30000)
 * - POWER_RETRY_DELAY_MS   delay before first retry, doubled each retry (default 1000)
 * - GDD_LOG_DIR            directory for gdd.jsonl (default data/logs)
 */

import { ConfigurationError } from './errors';
import {
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_TIMEOUT_MS,
  POWER_DAILY_POINT_URL,
} from './power-client';
import { DEFAULT_LOG_DIR } from './server-logger';

export interface AppConfig {
  openCageApiKey: string | undefined;
  powerApiUrl: string;
  powerMaxAttempts: number;
  powerTimeoutMs: number;
  powerRetryDelayMs: number;
  logDir: string;
}

type Env = Record<string, string | undefined>;

function readNonEmpty(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, name: string, fallback: number, min: number): number {
  const raw = readNonEmpty(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Where run logs go. Never throws, so error paths can log to the same place.
 */
export function resolveLogDir(env: Env = process.env): string {
  return readNonEmpty(env, 'GDD_LOG_DIR') ?? DEFAULT_LOG_DIR;
}

/**
 * Read configuration from the environment.
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  return {
    openCageApiKey: readNonEmpty(env, 'OPENCAGE_API_KEY'),
    powerApiUrl: readNonEmpty(env, 'POWER_API_URL') ?? POWER_DAILY_POINT_URL,
    powerMaxAttempts: readInteger(env, 'POWER_MAX_ATTEMPTS', DEFAULT_MAX_ATTEMPTS, 1),
    powerTimeoutMs: readInteger(env, 'POWER_TIMEOUT_MS', DEFAULT_TIMEOUT_MS, 1),
    powerRetryDelayMs: readInteger(env, 'POWER_RETRY_DELAY_MS', DEFAULT_RETRY_DELAY_MS, 0),
    logDir: resolveLogDir(env),
  };
}

/**
 * The OpenCage key, or a ConfigurationError if it is not set.
 */
export function requireOpenCageKey(config: AppConfig): string {
  if (!config.openCageApiKey) {
    throw new ConfigurationError('OPENCAGE_API_KEY not set. Configure it in the environment.');
  }
  return config.openCageApiKey;
}

/**
 * Parse a comma-separated list of GDD targets ("100, 300,500").
 * Duplicates are dropped and the result is sorted ascending.
 */
export function parseTargets(input: string): number[] {
  const parts = input
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);

  if (parts.length === 0) {
    throw new ConfigurationError('Enter at least one GDD target');
  }

  const targets = new Set<number>();
  for (const part of parts) {
    const value = Number(part);
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigurationError(`Targets must be positive numbers separated by commas, got "${part}"`);
    }
    targets.add(value);
  }

  return [...targets].sort((a, b) => a - b);
}
