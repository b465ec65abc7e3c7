/**
 * GDD Simulation Engine
 *
 * Walks forward from a start date one block at a time, pulling daily
 * temperatures from a RemoteDataClient and accumulating GDD until the highest
 * stage threshold is reached or the horizon runs out.
 *
 * Architecture:
 * - `validateSimulationConfig()` rejects bad input before any request is made
 * - `runGddSimulation()` is the block loop; it owns the record list and the
 *   stage map for the duration of one run
 * - a remote failure ends the run with a partial result, never a throw
 *
 * Stop conditions, checked once per block:
 * 1. cumulative GDD >= highest threshold  → targets_reached
 * 2. next block starts after horizon end   → horizon_exhausted
 * 3. signal aborted                        → cancelled
 * 4. fetch failed after retries            → fetch_failed
 */

import type { DailyObservation, GddRecord } from './gdd';
import { DEFAULT_BASE_TEMPERATURE, toGddRecord } from './gdd';
import { addDaysToIsoDate, daysBetween, isIsoDate, LATEST_ISO_DATE } from './date-utils';
import { ConfigurationError, isRunTerminatingError, type RunTerminatingError } from './errors';
import type { RemoteDataClient } from './power-client';
import { noopProgress, type ProgressSink } from './progress';
import { createStageMap, highestThreshold, markCrossings, type StageMap } from './stage-map';

// =============================================================================
// TYPES
// =============================================================================

export interface SimulationConfig {
  readonly latitude: number;
  readonly longitude: number;
  /** First day to accumulate (YYYY-MM-DD) */
  readonly startDate: string;
  /** Base temperature in °C */
  readonly baseTemperature: number;
  /** Cumulative GDD thresholds, distinct, any order */
  readonly targets: readonly number[];
  /** Horizon end is startDate + maxHorizonDays (inclusive) */
  readonly maxHorizonDays: number;
  /** Days requested per remote call */
  readonly blockSizeDays: number;
}

export type StopReason = 'targets_reached' | 'horizon_exhausted' | 'fetch_failed' | 'cancelled';

interface SimulationSnapshot {
  /** One record per processed day, ascending */
  records: readonly GddRecord[];
  /** First date each threshold was reached, or null */
  stageDates: StageMap;
  /** Cumulative GDD at the last processed day */
  totalGdd: number;
}

export type SimulationResult = SimulationSnapshot &
  (
    | { completed: true; stopReason: 'targets_reached' | 'horizon_exhausted' }
    | { completed: false; stopReason: 'fetch_failed'; error: RunTerminatingError }
    | { completed: false; stopReason: 'cancelled' }
  );

export interface SimulationDeps {
  client: RemoteDataClient;
  onProgress?: ProgressSink;
  /** Checked between blocks; an aborted signal ends the run before the next fetch */
  signal?: AbortSignal;
}

// =============================================================================
// CONSTANTS
// =============================================================================

/** Default stage thresholds (GDD) */
export const DEFAULT_TARGETS: readonly number[] = [100, 300, 500, 1000];

/** Give up after three seasons */
export const DEFAULT_MAX_HORIZON_DAYS = 365 * 3;

export const DEFAULT_BLOCK_SIZE_DAYS = 30;

// =============================================================================
// CONFIG
// =============================================================================

/**
 * Fill in defaults for everything but location and start date.
 */
export function createSimulationConfig(
  input: Pick<SimulationConfig, 'latitude' | 'longitude' | 'startDate'> & Partial<SimulationConfig>
): SimulationConfig {
  return {
    baseTemperature: DEFAULT_BASE_TEMPERATURE,
    targets: DEFAULT_TARGETS,
    maxHorizonDays: DEFAULT_MAX_HORIZON_DAYS,
    blockSizeDays: DEFAULT_BLOCK_SIZE_DAYS,
    ...input,
  };
}

export type RunSettings = Omit<SimulationConfig, 'latitude' | 'longitude'>;

/**
 * Check everything except the location. Lets callers reject bad input before
 * they spend a geocoding request on the place name.
 */
export function validateRunSettings(settings: RunSettings): void {
  const { startDate, baseTemperature, targets, maxHorizonDays, blockSizeDays } = settings;

  if (!isIsoDate(startDate)) {
    throw new ConfigurationError(`startDate must be a YYYY-MM-DD date, got "${startDate}"`);
  }
  if (!Number.isFinite(baseTemperature)) {
    throw new ConfigurationError('baseTemperature must be a number');
  }
  if (targets.length === 0) {
    throw new ConfigurationError('At least one GDD target is required');
  }
  for (const t of targets) {
    if (!Number.isFinite(t) || t <= 0) {
      throw new ConfigurationError(`GDD targets must be positive numbers, got ${t}`);
    }
  }
  if (new Set(targets).size !== targets.length) {
    throw new ConfigurationError('GDD targets must be distinct');
  }
  if (!Number.isInteger(blockSizeDays) || blockSizeDays < 1) {
    throw new ConfigurationError(`blockSizeDays must be a positive integer, got ${blockSizeDays}`);
  }
  if (!Number.isInteger(maxHorizonDays) || maxHorizonDays < 0) {
    throw new ConfigurationError(`maxHorizonDays must be a non-negative integer, got ${maxHorizonDays}`);
  }
  if (maxHorizonDays > daysBetween(startDate, LATEST_ISO_DATE)) {
    throw new ConfigurationError(`maxHorizonDays of ${maxHorizonDays} from ${startDate} runs past ${LATEST_ISO_DATE}`);
  }
}

/**
 * Throw ConfigurationError if the config cannot describe a run.
 */
export function validateSimulationConfig(config: SimulationConfig): void {
  const { latitude, longitude } = config;

  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new ConfigurationError(`latitude must be -90 to 90, got ${latitude}`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new ConfigurationError(`longitude must be -180 to 180, got ${longitude}`);
  }
  validateRunSettings(config);
}

// =============================================================================
// ENGINE
// =============================================================================

/**
 * Run one GDD accumulation.
 *
 * Throws ConfigurationError for invalid config. Remote failures are returned
 * as `{ completed: false, stopReason: 'fetch_failed', error }` together with
 * everything accumulated before the failure.
 */
export async function runGddSimulation(
  config: SimulationConfig,
  deps: SimulationDeps
): Promise<SimulationResult> {
  validateSimulationConfig(config);

  const { client, signal } = deps;
  const onProgress = deps.onProgress ?? noopProgress;

  const horizonEnd = addDaysToIsoDate(config.startDate, config.maxHorizonDays);
  const records: GddRecord[] = [];
  let stageDates = createStageMap(config.targets);
  const highest = highestThreshold(stageDates);
  let cumulative = 0;
  // null once a block has ended on the horizon
  let nextStart: string | null = config.startDate;

  const snapshot = (): SimulationSnapshot => ({ records, stageDates, totalGdd: cumulative });

  if (config.startDate >= horizonEnd) {
    return { ...snapshot(), completed: true, stopReason: 'horizon_exhausted' };
  }

  for (;;) {
    if (cumulative >= highest) {
      return { ...snapshot(), completed: true, stopReason: 'targets_reached' };
    }
    if (nextStart === null) {
      return { ...snapshot(), completed: true, stopReason: 'horizon_exhausted' };
    }
    if (signal?.aborted) {
      return { ...snapshot(), completed: false, stopReason: 'cancelled' };
    }

    const blockStart = nextStart;
    const blockEnd = addDaysToIsoDate(
      blockStart,
      Math.min(config.blockSizeDays - 1, daysBetween(blockStart, horizonEnd))
    );
    onProgress({
      kind: 'block',
      rangeStart: blockStart,
      rangeEnd: blockEnd,
      message: `Fetching NASA POWER data: ${blockStart} to ${blockEnd}`,
    });

    let block: DailyObservation[];
    try {
      block = await client.fetchBlock(config.latitude, config.longitude, blockStart, blockEnd);
    } catch (e) {
      if (!isRunTerminatingError(e)) throw e;
      onProgress({
        kind: 'fetch_failed',
        rangeStart: blockStart,
        rangeEnd: blockEnd,
        error: e.message,
        message: `Stopped: could not get data for ${blockStart} to ${blockEnd} (${e.message})`,
      });
      return { ...snapshot(), completed: false, stopReason: 'fetch_failed', error: e };
    }

    for (const observation of block) {
      // Keep dates strictly ascending even if the source misbehaves
      if (observation.date < blockStart || observation.date > blockEnd) continue;
      const last = records.at(-1);
      if (last && observation.date <= last.date) continue;

      const record = toGddRecord(observation, config.baseTemperature, cumulative);
      records.push(record);
      cumulative = record.gddCum;
      stageDates = markCrossings(stageDates, cumulative, record.date);

      if (cumulative >= highest) break;
    }

    nextStart = blockEnd === horizonEnd ? null : addDaysToIsoDate(blockEnd, 1);
  }
}
