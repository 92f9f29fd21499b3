/**
 * Query Builder
 *
 * Immutable accumulator of filter criteria. Every `with…` call returns a new
 * builder; the receiver is never touched, so a partially configured builder
 * can be shared and branched safely. Setting a slot twice keeps the last value.
 *
 * Nothing is validated until a terminal operation runs:
 * - build(): validate and return the frozen QueryDescriptor
 * - fetch(): validate, then hand the descriptor to the bound executor
 *
 * @example
 * ```typescript
 * const result = await client
 *   .query()
 *   .withCountryCode('TR')
 *   .withStartTime({ year: 2024, month: 1, day: 1, hour: 0, minute: 0 })
 *   .withEndTime({ year: 2024, month: 12, day: 31, hour: 23, minute: 59 })
 *   .withMinMagnitude(4.0)
 *   .withOrderBy('time')
 *   .fetch();
 *
 * if (result.success) {
 *   console.log(`Total earthquakes: ${result.data.count}`);
 * }
 * ```
 */

import type { AlertLevel, LocalDateTime, OrderBy, QueryDescriptor, UtcInstant } from './types/query.js';
import type { BoundaryLookup } from './types/boundary.js';
import type { ResultSet } from './types/earthquake.js';
import type { QueryError, ValidationError } from './types/errors.js';
import { InvalidTimeError } from './types/errors.js';
import { err, ok, type Result } from './types/result.js';
import { normalizeLocalTime } from './time-normalizer.js';
import { validateQuery, type QueryDraft } from './parameter-validator.js';

/**
 * Per-call options for fetch()
 */
export interface QueryFetchOptions {
  /** Override the executor's default timeout */
  readonly timeoutMs?: number;
  /** External cancellation */
  readonly signal?: AbortSignal;
}

/**
 * Anything that can run a validated descriptor
 */
export interface QueryExecutor {
  execute(query: QueryDescriptor, options?: QueryFetchOptions): Promise<Result<ResultSet, QueryError>>;
}

/**
 * Time input: wall-clock components, or an instant already in UTC
 */
export type TimeInput = LocalDateTime | UtcInstant;

export class QueryBuilder {
  private constructor(
    private readonly draft: QueryDraft,
    private readonly boundaries: BoundaryLookup,
    private readonly executor: QueryExecutor | null
  ) {}

  /**
   * Start an empty query.
   *
   * @param boundaries - Country lookup used at validation time
   * @param executor - Enables fetch(); build() works without one
   */
  static create(boundaries: BoundaryLookup, executor?: QueryExecutor): QueryBuilder {
    return new QueryBuilder({}, boundaries, executor ?? null);
  }

  /**
   * Set the lower time bound
   *
   * @param offsetMinutes - Minutes east of UTC for component input; system zone when omitted
   */
  withStartTime(time: TimeInput, offsetMinutes?: number): QueryBuilder {
    return this.with({ startTime: resolveTime(time, offsetMinutes) });
  }

  /**
   * Set the upper time bound
   */
  withEndTime(time: TimeInput, offsetMinutes?: number): QueryBuilder {
    return this.with({ endTime: resolveTime(time, offsetMinutes) });
  }

  withMinMagnitude(minMagnitude: number): QueryBuilder {
    return this.with({ minMagnitude });
  }

  withMaxMagnitude(maxMagnitude: number): QueryBuilder {
    return this.with({ maxMagnitude });
  }

  withMagnitudeRange(minMagnitude: number, maxMagnitude: number): QueryBuilder {
    return this.with({ minMagnitude, maxMagnitude });
  }

  withAlertLevel(alertLevel: AlertLevel): QueryBuilder {
    return this.with({ alertLevel });
  }

  withOrderBy(orderBy: OrderBy): QueryBuilder {
    return this.with({ orderBy });
  }

  /**
   * Restrict results to epicenters inside a country (ISO-3166 alpha-2)
   */
  withCountryCode(countryCode: string): QueryBuilder {
    return this.with({ countryCode });
  }

  withLimit(limit: number): QueryBuilder {
    return this.with({ limit });
  }

  /**
   * Validate and produce the immutable descriptor
   */
  build(): Result<QueryDescriptor, ValidationError> {
    return validateQuery(this.draft, this.boundaries);
  }

  /**
   * Validate, then execute. A validation failure is returned without any
   * call reaching the executor.
   */
  async fetch(options?: QueryFetchOptions): Promise<Result<ResultSet, QueryError>> {
    if (!this.executor) {
      throw new Error('QueryBuilder has no executor; create it through EarthquakeClient.query()');
    }

    const built = this.build();
    if (!built.success) {
      return built;
    }

    return this.executor.execute(built.data, options);
  }

  private with(patch: Partial<QueryDraft>): QueryBuilder {
    return new QueryBuilder({ ...this.draft, ...patch }, this.boundaries, this.executor);
  }
}

function resolveTime(time: TimeInput, offsetMinutes?: number): Result<UtcInstant, InvalidTimeError> {
  if (typeof time !== 'number') {
    return normalizeLocalTime(time, offsetMinutes);
  }
  if (!Number.isFinite(time)) {
    return err(new InvalidTimeError(`Instant must be a finite epoch millisecond value, got ${time}`));
  }
  return ok(time);
}
