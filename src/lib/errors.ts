/**
 * Error types for the GDD tracker.
 *
 * ConfigurationError is raised before any network activity. RemoteServiceError
 * and DataError end a simulation run early; the engine returns them alongside
 * whatever it accumulated instead of throwing.
 */

/** Missing credential, bad user input, or an invalid environment value */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Remote climate service failed after retries, or refused the request outright */
export class RemoteServiceError extends Error {
  constructor(
    message: string,
    public readonly details: {
      /** Last HTTP status observed, if the server responded at all */
      status?: number;
      /** Number of attempts made before giving up */
      attempts: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = 'RemoteServiceError';
  }

  get status(): number | undefined {
    return this.details.status;
  }
}

/** Response parsed but did not have the expected structure */
export class DataError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DataError';
  }
}

/** Geocoding service failed or found no match */
export class GeocodeError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'GeocodeError';
  }
}

/** Errors that terminate a simulation run with a partial result */
export type RunTerminatingError = RemoteServiceError | DataError;

export function isRunTerminatingError(e: unknown): e is RunTerminatingError {
  return e instanceof RemoteServiceError || e instanceof DataError;
}
