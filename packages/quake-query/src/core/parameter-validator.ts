/**
 * Parameter Validator
 *
 * Checks an in-progress query and freezes it into a QueryDescriptor.
 * Runs before any network activity; short-circuits on the first failure in
 * this order:
 *
 *   0. deferred time-normalization failures
 *   1. start <= end
 *   2. 0 <= min <= max <= 10
 *   3. country code known to the boundary index
 *   4. limit within the feed's page size
 *
 * Pure: the draft is never mutated, and repeated calls agree.
 */

import type { AlertLevel, OrderBy, QueryDescriptor, UtcInstant } from './types/query.js';
import { MAX_LIMIT, MAX_MAGNITUDE, MIN_MAGNITUDE } from './types/query.js';
import type { BoundaryLookup } from './types/boundary.js';
import { normalizeCountryCode } from './types/boundary.js';
import {
  InvalidTimeError,
  LimitRangeError,
  MagnitudeRangeError,
  TimeRangeError,
  UnknownCountryError,
  type ValidationError,
} from './types/errors.js';
import { err, ok, type Result } from './types/result.js';

/**
 * Query slots before validation.
 *
 * Time slots keep the normalizer's Result so a bad date surfaces at the
 * terminal operation rather than at the setter.
 */
export interface QueryDraft {
  readonly startTime?: Result<UtcInstant, InvalidTimeError>;
  readonly endTime?: Result<UtcInstant, InvalidTimeError>;
  readonly minMagnitude?: number;
  readonly maxMagnitude?: number;
  readonly alertLevel?: AlertLevel;
  readonly orderBy?: OrderBy;
  readonly countryCode?: string;
  readonly limit?: number;
}

/**
 * Validate a draft against the boundary dataset
 */
export function validateQuery(
  draft: QueryDraft,
  boundaries: BoundaryLookup
): Result<QueryDescriptor, ValidationError> {
  const startSlot = draft.startTime;
  if (startSlot !== undefined && !startSlot.success) {
    return startSlot;
  }
  const endSlot = draft.endTime;
  if (endSlot !== undefined && !endSlot.success) {
    return endSlot;
  }

  const startTime = startSlot?.success ? startSlot.data : undefined;
  const endTime = endSlot?.success ? endSlot.data : undefined;

  const timeCheck = checkTimeRange(startTime, endTime);
  if (!timeCheck.success) {
    return timeCheck;
  }

  const magnitudeCheck = checkMagnitudeRange(draft.minMagnitude, draft.maxMagnitude);
  if (!magnitudeCheck.success) {
    return magnitudeCheck;
  }

  let countryCode: string | undefined;
  if (draft.countryCode !== undefined) {
    countryCode = normalizeCountryCode(draft.countryCode);
    if (!boundaries.hasCountry(countryCode)) {
      return err(new UnknownCountryError(draft.countryCode));
    }
  }

  if (draft.limit !== undefined && !isValidLimit(draft.limit)) {
    return err(new LimitRangeError(draft.limit, MAX_LIMIT));
  }

  const descriptor: QueryDescriptor = {
    ...(startTime !== undefined && { startTime }),
    ...(endTime !== undefined && { endTime }),
    ...(draft.minMagnitude !== undefined && { minMagnitude: draft.minMagnitude }),
    ...(draft.maxMagnitude !== undefined && { maxMagnitude: draft.maxMagnitude }),
    ...(draft.alertLevel !== undefined && { alertLevel: draft.alertLevel }),
    ...(draft.orderBy !== undefined && { orderBy: draft.orderBy }),
    ...(countryCode !== undefined && { countryCode }),
    ...(draft.limit !== undefined && { limit: draft.limit }),
  };

  return ok(Object.freeze(descriptor));
}

/**
 * Start must not be after end when both are set
 */
export function checkTimeRange(
  startTime: UtcInstant | undefined,
  endTime: UtcInstant | undefined
): Result<true, TimeRangeError> {
  if (startTime !== undefined && endTime !== undefined && startTime > endTime) {
    return err(new TimeRangeError(startTime, endTime));
  }
  return ok(true);
}

/**
 * Each bound within 0..10, and min <= max when both are set
 */
export function checkMagnitudeRange(
  minMagnitude: number | undefined,
  maxMagnitude: number | undefined
): Result<true, MagnitudeRangeError> {
  if (minMagnitude !== undefined) {
    if (!Number.isFinite(minMagnitude) || minMagnitude < MIN_MAGNITUDE || minMagnitude > MAX_MAGNITUDE) {
      return err(
        new MagnitudeRangeError(
          `Minimum magnitude must be within ${MIN_MAGNITUDE}..${MAX_MAGNITUDE}, got ${minMagnitude}`,
          minMagnitude,
          maxMagnitude
        )
      );
    }
  }

  if (maxMagnitude !== undefined) {
    if (!Number.isFinite(maxMagnitude) || maxMagnitude < MIN_MAGNITUDE || maxMagnitude > MAX_MAGNITUDE) {
      return err(
        new MagnitudeRangeError(
          `Maximum magnitude must be within ${MIN_MAGNITUDE}..${MAX_MAGNITUDE}, got ${maxMagnitude}`,
          minMagnitude,
          maxMagnitude
        )
      );
    }
  }

  if (minMagnitude !== undefined && maxMagnitude !== undefined && minMagnitude > maxMagnitude) {
    return err(
      new MagnitudeRangeError(
        `Minimum magnitude ${minMagnitude} exceeds maximum magnitude ${maxMagnitude}`,
        minMagnitude,
        maxMagnitude
      )
    );
  }

  return ok(true);
}

function isValidLimit(limit: number): boolean {
  return Number.isInteger(limit) && limit >= 1 && limit <= MAX_LIMIT;
}
