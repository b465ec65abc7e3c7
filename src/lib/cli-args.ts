/**
 * Command line parsing for scripts/run-gdd-simulation.ts.
 *
 * Accepts `--flag value` and `--flag=value`. Anything unexpected is a
 * ConfigurationError so nothing is fetched on a typo.
 */

import { parseTargets } from './config';
import { ConfigurationError } from './errors';
import { DEFAULT_BASE_TEMPERATURE } from './gdd';
import { DEFAULT_BLOCK_SIZE_DAYS, DEFAULT_MAX_HORIZON_DAYS, DEFAULT_TARGETS } from './gdd-simulation';

export type LocationInput = { kind: 'place'; name: string } | { kind: 'coordinates'; latitude: number; longitude: number };

export interface CliOptions {
  location: LocationInput;
  startDate: string;
  baseTemperature: number;
  targets: number[];
  maxHorizonDays: number;
  blockSizeDays: number;
  csvPath?: string;
  /** Only print the final report */
  quiet: boolean;
  /** Log every attempt, not just retries */
  verbose: boolean;
}

export const DEFAULT_START_DATE = '2025-01-01';

export const USAGE = `Usage: tsx scripts/run-gdd-simulation.ts (--place NAME | --lat N --lon N) [options]

Options:
  --place NAME        Place to geocode (needs OPENCAGE_API_KEY)
  --lat N --lon N     Coordinates, skips geocoding
  --start YYYY-MM-DD  Start date (default ${DEFAULT_START_DATE})
  --tbase N           Base temperature in °C (default ${DEFAULT_BASE_TEMPERATURE})
  --targets LIST      Comma-separated GDD targets (default ${DEFAULT_TARGETS.join(',')})
  --max-days N        Horizon in days (default ${DEFAULT_MAX_HORIZON_DAYS})
  --block-days N      Days per NASA POWER request (default ${DEFAULT_BLOCK_SIZE_DAYS})
  --csv PATH          Write the full history as CSV
  --quiet             Only print the final report
  --verbose           Log every request attempt
  --help              Show this message`;

const VALUE_FLAGS = new Set(['place', 'lat', 'lon', 'start', 'tbase', 'targets', 'max-days', 'block-days', 'csv']);
const BOOLEAN_FLAGS = new Set(['quiet', 'verbose', 'help']);

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigurationError(`--${flag} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Split argv into flag values. Returns null when --help was given.
 */
function collectFlags(argv: readonly string[]): Map<string, string> | null {
  const values = new Map<string, string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument "${arg}"`);
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (BOOLEAN_FLAGS.has(name)) {
      if (name === 'help') return null;
      values.set(name, 'true');
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new ConfigurationError(`Unknown option --${name}`);
    }

    if (eq !== -1) {
      values.set(name, arg.slice(eq + 1));
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new ConfigurationError(`--${name} needs a value`);
      }
      values.set(name, next);
      i++;
    }
  }

  return values;
}

/**
 * Parse CLI arguments (without node and script path).
 *
 * @returns Options, or null if help was requested
 */
export function parseCliArgs(argv: readonly string[]): CliOptions | null {
  const flags = collectFlags(argv);
  if (flags === null) return null;

  const place = flags.get('place');
  const lat = flags.get('lat');
  const lon = flags.get('lon');

  let location: LocationInput;
  if (lat !== undefined || lon !== undefined) {
    if (lat === undefined || lon === undefined) {
      throw new ConfigurationError('--lat and --lon must be given together');
    }
    if (place !== undefined) {
      throw new ConfigurationError('Use either --place or --lat/--lon, not both');
    }
    location = { kind: 'coordinates', latitude: parseNumber('lat', lat), longitude: parseNumber('lon', lon) };
  } else {
    if (place === undefined || place.trim() === '') {
      throw new ConfigurationError('Please enter a place name (--place) or coordinates (--lat/--lon).');
    }
    location = { kind: 'place', name: place.trim() };
  }

  const tbase = flags.get('tbase');
  const targets = flags.get('targets');
  const maxDays = flags.get('max-days');
  const blockDays = flags.get('block-days');

  return {
    location,
    startDate: flags.get('start') ?? DEFAULT_START_DATE,
    baseTemperature: tbase !== undefined ? parseNumber('tbase', tbase) : DEFAULT_BASE_TEMPERATURE,
    targets: targets !== undefined ? parseTargets(targets) : [...DEFAULT_TARGETS],
    maxHorizonDays: maxDays !== undefined ? parseNumber('max-days', maxDays) : DEFAULT_MAX_HORIZON_DAYS,
    blockSizeDays: blockDays !== undefined ? parseNumber('block-days', blockDays) : DEFAULT_BLOCK_SIZE_DAYS,
    csvPath: flags.get('csv'),
    quiet: flags.has('quiet'),
    verbose: flags.has('verbose'),
  };
}
