/**
 * Growing Degree Days (GDD) Calculations
 *
 * GDD is a measure of heat accumulation used to predict plant development.
 * Plants respond to accumulated heat rather than calendar time, so summing
 * daily GDD from a start date tells you when a crop should reach each stage.
 *
 * Uses the simple averaging method:
 *   GDD = max((tmax + tmin) / 2 - tbase, 0)
 *
 * Days whose mean is below base contribute nothing; there is no "heat debt"
 * carried into the next day, and no ceiling on a single hot day.
 *
 * All temperatures are °C (NASA POWER T2M_MAX / T2M_MIN).
 */

// =============================================================================
// TYPES
// =============================================================================

/** One day of temperature extremes from the climate service */
export interface DailyObservation {
  /** Date in YYYY-MM-DD format */
  readonly date: string;
  /** Maximum 2m air temperature in °C */
  readonly tmax: number;
  /** Minimum 2m air temperature in °C */
  readonly tmin: number;
}

/** One processed day of a simulation run */
export interface GddRecord extends DailyObservation {
  /** Heat units contributed by this day (always >= 0) */
  readonly gddDay: number;
  /** Running total including this day */
  readonly gddCum: number;
}

// =============================================================================
// CONSTANTS
// =============================================================================

/** Default base temperature (°C), suitable for most warm-season crops */
export const DEFAULT_BASE_TEMPERATURE = 10;

// =============================================================================
// CORE CALCULATIONS
// =============================================================================

/**
 * Calculate GDD for a single day.
 *
 * @param tmax - Maximum temperature (°C)
 * @param tmin - Minimum temperature (°C)
 * @param tbase - Base temperature (°C)
 * @returns GDD for that day (always >= 0)
 */
export function dailyGdd(tmax: number, tmin: number, tbase: number): number {
  const tmean = (tmax + tmin) / 2;
  return Math.max(tmean - tbase, 0);
}

/**
 * Extend a record sequence by one observation.
 * The new record's cumulative total builds on the previous one.
 */
export function toGddRecord(
  observation: DailyObservation,
  tbase: number,
  previousCum: number
): GddRecord {
  const gddDay = dailyGdd(observation.tmax, observation.tmin, tbase);
  return {
    date: observation.date,
    tmax: observation.tmax,
    tmin: observation.tmin,
    gddDay,
    gddCum: previousCum + gddDay,
  };
}
