/**
 * NASA POWER daily point client.
 *
 * Fetches one bounded block of daily T2M_MAX / T2M_MIN for a coordinate.
 * Server errors (5xx) and network failures are retried with exponential
 * backoff; anything else fails straight away. Only the final outcome leaves
 * this module: an ordered list of observations, a RemoteServiceError, or a
 * DataError.
 */

import type { DailyObservation } from './gdd';
import { fromPowerDate, toPowerDate } from './date-utils';
import { DataError, RemoteServiceError } from './errors';
import { isRecord } from './guards';
import { noopProgress, type ProgressSink } from './progress';
import { withRetry, type AttemptOutcome } from './retry';

// =============================================================================
// TYPES
// =============================================================================

/** Source of daily temperature extremes, one bounded date range per call */
export interface RemoteDataClient {
  /**
   * @param rangeStart - First day (YYYY-MM-DD, inclusive)
   * @param rangeEnd - Last day (YYYY-MM-DD, inclusive)
   * @returns Observations in ascending date order; may be sparse or empty
   */
  fetchBlock(
    latitude: number,
    longitude: number,
    rangeStart: string,
    rangeEnd: string
  ): Promise<DailyObservation[]>;
}

/** The subset of fetch() this client relies on */
export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface PowerClientOptions {
  baseUrl?: string;
  /** Total attempts per block, including the first */
  maxAttempts?: number;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Delay before the first retry; doubles each retry */
  retryDelayMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: ProgressSink;
}

// =============================================================================
// CONSTANTS
// =============================================================================

export const POWER_DAILY_POINT_URL = 'https://power.larc.nasa.gov/api/temporal/daily/point';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

/** NASA POWER marks missing values with this unless the header says otherwise */
const DEFAULT_FILL_VALUE = -999;

// =============================================================================
// REQUEST / RESPONSE
// =============================================================================

/**
 * Build the request URL for one block.
 */
export function buildPowerUrl(
  baseUrl: string,
  latitude: number,
  longitude: number,
  rangeStart: string,
  rangeEnd: string
): string {
  const url = new URL(baseUrl);
  url.searchParams.set('start', toPowerDate(rangeStart));
  url.searchParams.set('end', toPowerDate(rangeEnd));
  url.searchParams.set('latitude', latitude.toString());
  url.searchParams.set('longitude', longitude.toString());
  url.searchParams.set('community', 'AG');
  url.searchParams.set('parameters', 'T2M_MAX,T2M_MIN');
  url.searchParams.set('format', 'JSON');
  return url.toString();
}

function readValue(series: Record<string, unknown>, key: string, fillValue: number): number | null {
  const value = series[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value === fillValue) {
    return null;
  }
  return value;
}

/**
 * Turn a NASA POWER JSON body into observations within [rangeStart, rangeEnd].
 *
 * NASA POWER returns:
 * {
 *   header: { fill_value: -999, ... },
 *   properties: {
 *     parameter: {
 *       T2M_MAX: { "20250101": 31.2, "20250102": 30.8, ... },
 *       T2M_MIN: { "20250101": 22.4, "20250102": 23.0, ... }
 *     }
 *   }
 * }
 *
 * Dates missing from either series, or holding the fill value, are dropped.
 */
export function parsePowerResponse(body: unknown, rangeStart: string, rangeEnd: string): DailyObservation[] {
  const properties = isRecord(body) ? body.properties : undefined;
  const parameter = isRecord(properties) ? properties.parameter : undefined;
  const tmaxSeries = isRecord(parameter) ? parameter.T2M_MAX : undefined;
  const tminSeries = isRecord(parameter) ? parameter.T2M_MIN : undefined;

  if (!isRecord(tmaxSeries) || !isRecord(tminSeries)) {
    throw new DataError('Invalid response format from NASA POWER: missing properties.parameter.T2M_MAX/T2M_MIN');
  }

  const header = isRecord(body) ? body.header : undefined;
  const headerFill = isRecord(header) ? header.fill_value : undefined;
  const fillValue = typeof headerFill === 'number' ? headerFill : DEFAULT_FILL_VALUE;

  const observations: DailyObservation[] = [];
  for (const key of Object.keys(tmaxSeries).sort()) {
    const date = fromPowerDate(key);
    if (date === null || date < rangeStart || date > rangeEnd) continue;

    const tmax = readValue(tmaxSeries, key, fillValue);
    const tmin = readValue(tminSeries, key, fillValue);
    if (tmax === null || tmin === null) continue;

    observations.push({ date, tmax, tmin });
  }

  return observations;
}

async function attemptRequest(
  fetchImpl: FetchLike,
  url: string,
  timeoutMs: number
): Promise<AttemptOutcome<string>> {
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (e) {
    return { ok: false, transient: true, error: e };
  }

  if (!response.ok) {
    // Release the connection; the error body is never read
    await response.body?.cancel();
  }
  if (response.status >= 500) {
    return {
      ok: false,
      transient: true,
      status: response.status,
      error: new Error(`NASA POWER server error: ${response.status} ${response.statusText}`),
    };
  }
  if (!response.ok) {
    return {
      ok: false,
      transient: false,
      status: response.status,
      error: new Error(`NASA POWER API error: ${response.status} ${response.statusText}`),
    };
  }

  try {
    return { ok: true, value: await response.text() };
  } catch (e) {
    // Body stream cut off mid-read
    return { ok: false, transient: true, status: response.status, error: e };
  }
}

function describeFailure(error: unknown, status?: number): string {
  if (error instanceof Error) return error.message;
  return status !== undefined ? `HTTP ${status}` : String(error);
}

// =============================================================================
// CLIENT
// =============================================================================

/**
 * Create a NASA POWER client.
 */
export function createPowerClient(options: PowerClientOptions = {}): RemoteDataClient {
  const baseUrl = options.baseUrl ?? POWER_DAILY_POINT_URL;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((url, init) => fetch(url, init));
  const onProgress = options.onProgress ?? noopProgress;

  return {
    async fetchBlock(latitude, longitude, rangeStart, rangeEnd) {
      const url = buildPowerUrl(baseUrl, latitude, longitude, rangeStart, rangeEnd);

      const result = await withRetry(() => attemptRequest(fetchImpl, url, timeoutMs), {
        maxAttempts,
        baseDelayMs: retryDelayMs,
        sleep: options.sleep,
        onAttempt: (attempt) =>
          onProgress({
            kind: 'attempt',
            attempt,
            maxAttempts,
            message: `Requesting ${rangeStart} to ${rangeEnd} (attempt ${attempt}/${maxAttempts})`,
          }),
        onRetry: (attempt, outcome, delayMs) =>
          onProgress({
            kind: 'retry',
            attempt,
            maxAttempts,
            status: outcome.status,
            delayMs,
            message:
              outcome.status !== undefined
                ? `NASA POWER server error (${outcome.status}), retry ${attempt}/${maxAttempts}...`
                : `Network error, retry ${attempt}/${maxAttempts}...`,
          }),
      });

      if (!result.ok) {
        const { error, status, transient } = result.last;
        const reason = describeFailure(error, status);
        const message = transient
          ? `NASA POWER request failed after ${result.attempts} attempt(s): ${reason}`
          : `NASA POWER request rejected: ${reason}`;
        throw new RemoteServiceError(message, { status, attempts: result.attempts, cause: error });
      }

      let body: unknown;
      try {
        body = JSON.parse(result.value);
      } catch (e) {
        throw new DataError('NASA POWER returned a body that is not JSON', e);
      }

      return parsePowerResponse(body, rangeStart, rangeEnd);
    },
  };
}
