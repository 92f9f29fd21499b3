/**
 * Quake Query Error Types
 *
 * Every fallible operation in the library returns these as values inside a
 * Result. Each class carries a literal `code` so callers can switch on it
 * without instanceof chains.
 */

/**
 * Discriminant codes for the error taxonomy
 */
export type QuakeQueryErrorCode =
  | 'INVALID_TIME'
  | 'TIME_RANGE'
  | 'MAGNITUDE_RANGE'
  | 'UNKNOWN_COUNTRY'
  | 'LIMIT_RANGE'
  | 'TRANSPORT'
  | 'TIMEOUT'
  | 'DECODE'
  | 'BOUNDARY_DATA';

/**
 * Base class for all library errors
 */
export abstract class QuakeQueryError extends Error {
  abstract readonly code: QuakeQueryErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Local date/time components do not form a real calendar instant
 */
export class InvalidTimeError extends QuakeQueryError {
  readonly code = 'INVALID_TIME' as const;
  public override readonly name = 'InvalidTimeError';

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

/**
 * Start time falls after end time
 */
export class TimeRangeError extends QuakeQueryError {
  readonly code = 'TIME_RANGE' as const;
  public override readonly name = 'TimeRangeError';

  constructor(
    public readonly startTime: number,
    public readonly endTime: number
  ) {
    super(
      `Start time ${new Date(startTime).toISOString()} is after end time ${new Date(endTime).toISOString()}`
    );
  }
}

/**
 * Magnitude bounds outside 0..10 or reversed
 */
export class MagnitudeRangeError extends QuakeQueryError {
  readonly code = 'MAGNITUDE_RANGE' as const;
  public override readonly name = 'MagnitudeRangeError';

  constructor(
    message: string,
    public readonly minMagnitude?: number,
    public readonly maxMagnitude?: number
  ) {
    super(message);
  }
}

/**
 * Country code has no entry in the boundary dataset
 */
export class UnknownCountryError extends QuakeQueryError {
  readonly code = 'UNKNOWN_COUNTRY' as const;
  public override readonly name = 'UnknownCountryError';

  constructor(public readonly countryCode: string) {
    super(`Unknown country code: ${countryCode}`);
  }
}

/**
 * Result limit outside the feed's accepted page size
 */
export class LimitRangeError extends QuakeQueryError {
  readonly code = 'LIMIT_RANGE' as const;
  public override readonly name = 'LimitRangeError';

  constructor(public readonly limit: number, max: number) {
    super(`Limit must be an integer between 1 and ${max}, got ${limit}`);
  }
}

/**
 * Request failed at the HTTP layer (network failure or non-2xx status)
 */
export class TransportError extends QuakeQueryError {
  readonly code = 'TRANSPORT' as const;
  public override readonly name = 'TransportError';

  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Request exceeded its timeout and was aborted
 */
export class TimeoutError extends QuakeQueryError {
  readonly code = 'TIMEOUT' as const;
  public override readonly name = 'TimeoutError';

  constructor(public readonly url: string, public readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
  }
}

/**
 * Response body is not the expected GeoJSON feed shape
 */
export class DecodeError extends QuakeQueryError {
  readonly code = 'DECODE' as const;
  public override readonly name = 'DecodeError';
  readonly responseText: string;

  constructor(message: string, responseText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.responseText = responseText.slice(0, 500);
  }
}

/**
 * Boundary dataset could not be read or failed schema validation
 */
export class BoundaryDataError extends QuakeQueryError {
  readonly code = 'BOUNDARY_DATA' as const;
  public override readonly name = 'BoundaryDataError';

  constructor(message: string, public readonly source: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Errors detected locally before any network activity
 */
export type ValidationError =
  | InvalidTimeError
  | TimeRangeError
  | MagnitudeRangeError
  | UnknownCountryError
  | LimitRangeError;

/**
 * Everything a fetch can fail with
 */
export type QueryError = ValidationError | TransportError | TimeoutError | DecodeError;

/**
 * Type guard for library errors
 */
export function isQuakeQueryError(error: unknown): error is QuakeQueryError {
  return error instanceof QuakeQueryError;
}
