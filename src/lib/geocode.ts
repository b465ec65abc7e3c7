/**
 * Place-name lookup using the OpenCage forward geocoding API.
 *
 * Requires an API key (OPENCAGE_API_KEY). A missing key or blank place name is
 * a ConfigurationError and no request is sent.
 */

import { ConfigurationError, GeocodeError } from './errors';
import { isRecord } from './guards';
import type { FetchLike } from './power-client';

/** Result from geocoding search */
export interface GeocodedLocation {
  latitude: number;
  longitude: number;
  /** Formatted address, or the query when the service gives none */
  label: string;
}

export const OPENCAGE_GEOCODE_URL = 'https://api.opencagedata.com/geocode/v1/json';

const GEOCODE_TIMEOUT_MS = 30_000;

interface BestMatch {
  lat: number;
  lng: number;
  formatted?: string;
}

function parseBestMatch(data: unknown): BestMatch | null {
  const results = isRecord(data) ? data.results : undefined;
  if (!Array.isArray(results) || results.length === 0) return null;

  const best: unknown = results[0];
  if (!isRecord(best)) return null;
  const geometry = best.geometry;
  if (!isRecord(geometry) || typeof geometry.lat !== 'number' || typeof geometry.lng !== 'number') {
    return null;
  }

  return {
    lat: geometry.lat,
    lng: geometry.lng,
    formatted: typeof best.formatted === 'string' ? best.formatted : undefined,
  };
}

/**
 * Resolve a place name to coordinates.
 *
 * OpenCage returns:
 * {
 *   results: [
 *     { formatted: "Chennai, Tamil Nadu, India", geometry: { lat: 13.08, lng: 80.27 }, ... }
 *   ]
 * }
 */
export async function geocodePlace(
  placeName: string,
  options: { apiKey: string | undefined; baseUrl?: string; fetchImpl?: FetchLike }
): Promise<GeocodedLocation> {
  const query = placeName.trim();
  if (!options.apiKey) {
    throw new ConfigurationError('OPENCAGE_API_KEY not set. Configure it in the environment.');
  }
  if (!query) {
    throw new ConfigurationError('Please enter a place name.');
  }

  const url = new URL(options.baseUrl ?? OPENCAGE_GEOCODE_URL);
  url.searchParams.set('q', query);
  url.searchParams.set('key', options.apiKey);
  url.searchParams.set('limit', '1');
  url.searchParams.set('no_annotations', '1');

  const fetchImpl: FetchLike = options.fetchImpl ?? ((u, init) => fetch(u, init));
  const response = await fetchImpl(url.toString(), { signal: AbortSignal.timeout(GEOCODE_TIMEOUT_MS) });

  if (!response.ok) {
    throw new GeocodeError(`Geocoding API error: ${response.status} ${response.statusText}`, response.status);
  }

  const data: unknown = await response.json();
  const best = parseBestMatch(data);

  if (!best) {
    throw new GeocodeError(`Place not found: ${query}`);
  }

  return {
    latitude: best.lat,
    longitude: best.lng,
    label: best.formatted ?? query,
  };
}
