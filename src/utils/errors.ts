export type GeocodeErrorCode =
  | 'INVALID_QUERY'
  | 'TRANSPORT'
  | 'DECODE'
  | 'CANCELLED'
  | 'TIMEOUT'
  | 'NOT_FOUND'
  | 'INVALID_USAGE';

/**
 * Base class for every failure the distance pipeline reports.
 * `code` lets callers branch without instanceof chains.
 */
export abstract class GeocodeError extends Error {
  abstract readonly code: GeocodeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidQueryError extends GeocodeError {
  readonly code = 'INVALID_QUERY';

  constructor() {
    super('Geocode query must be a non-empty string');
  }
}

/**
 * The provider could not be reached, or answered with a non-2xx status.
 */
export class TransportError extends GeocodeError {
  readonly code = 'TRANSPORT';
  readonly query: string;
  readonly errorCode?: string;
  readonly httpStatus?: number;

  constructor(
    query: string,
    message: string,
    details: { errorCode?: string; httpStatus?: number; cause?: unknown } = {}
  ) {
    super(`Geocoding request for "${query}" failed: ${message}`, { cause: details.cause });
    this.query = query;
    this.errorCode = details.errorCode;
    this.httpStatus = details.httpStatus;
  }
}

/**
 * The provider answered, but the body is not the geocode envelope we expect.
 */
export class DecodeError extends GeocodeError {
  readonly code = 'DECODE';
  readonly query: string;

  constructor(query: string, message: string, cause?: unknown) {
    super(`Could not decode geocoding response for "${query}": ${message}`, { cause });
    this.query = query;
  }
}

export class LookupCancelledError extends GeocodeError {
  readonly code = 'CANCELLED';

  constructor(message = 'Geocode lookup was cancelled', cause?: unknown) {
    super(message, { cause });
  }
}

export class GeocodeTimeoutError extends GeocodeError {
  readonly code = 'TIMEOUT';
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Geocode lookups did not complete within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class LocationNotFoundError extends GeocodeError {
  readonly code = 'NOT_FOUND';
  readonly queries: string[];

  constructor(queries: string[]) {
    super(`No location found for ${queries.map(q => `"${q}"`).join(' and ')}`);
    this.queries = queries;
  }
}

export class InvalidUsageError extends GeocodeError {
  readonly code = 'INVALID_USAGE';
}

export const isGeocodeError = (error: unknown): error is GeocodeError =>
  error instanceof GeocodeError;

/**
 * Normalizes anything thrown into an Error so it can be logged with a stack.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
