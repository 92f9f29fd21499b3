/**
 * Time Normalizer
 *
 * Converts wall-clock date/time fields plus an optional UTC offset into the
 * UTC instant used by every range filter.
 *
 * Offsets are minutes EAST of UTC (+180 for UTC+03:00), the opposite sign of
 * Date#getTimezoneOffset. When no offset is given the system zone's offset
 * for that wall-clock time applies, so DST is honoured.
 */

import type { LocalDateTime, UtcInstant } from './types/query.js';
import { InvalidTimeError } from './types/errors.js';
import { err, ok, type Result } from './types/result.js';

/** ±18 hours, the widest fixed offset ISO-8601 allows */
export const MAX_OFFSET_MINUTES = 18 * 60;

const MS_PER_MINUTE = 60_000;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Convert local components to a UTC instant
 *
 * Fails with InvalidTimeError when the fields are not integers, fall outside
 * their calendar range (month 13, Feb 30, hour 24), or name a local time
 * skipped by a DST transition.
 */
export function normalizeLocalTime(
  components: LocalDateTime,
  offsetMinutes?: number
): Result<UtcInstant, InvalidTimeError> {
  const fieldCheck = checkCalendarFields(components);
  if (!fieldCheck.success) {
    return fieldCheck;
  }

  const { year, month, day, hour, minute } = components;

  if (offsetMinutes !== undefined) {
    const offsetCheck = checkOffset(offsetMinutes);
    if (!offsetCheck.success) {
      return offsetCheck;
    }

    const wallClock = new Date(0);
    wallClock.setUTCFullYear(year, month - 1, day);
    wallClock.setUTCHours(hour, minute, 0, 0);
    return ok(wallClock.getTime() - offsetMinutes * MS_PER_MINUTE);
  }

  const local = new Date(0);
  local.setFullYear(year, month - 1, day);
  local.setHours(hour, minute, 0, 0);

  // Date silently shifts times inside a DST gap forward; detect that.
  if (
    local.getFullYear() !== year ||
    local.getMonth() !== month - 1 ||
    local.getDate() !== day ||
    local.getHours() !== hour ||
    local.getMinutes() !== minute
  ) {
    return err(
      new InvalidTimeError(
        `${formatComponents(components)} does not exist in the local time zone`
      )
    );
  }

  return ok(local.getTime());
}

/**
 * Inverse of normalizeLocalTime: wall-clock fields for an instant
 */
export function toLocalComponents(instant: UtcInstant, offsetMinutes?: number): LocalDateTime {
  if (offsetMinutes !== undefined) {
    const shifted = new Date(instant + offsetMinutes * MS_PER_MINUTE);
    return {
      year: shifted.getUTCFullYear(),
      month: shifted.getUTCMonth() + 1,
      day: shifted.getUTCDate(),
      hour: shifted.getUTCHours(),
      minute: shifted.getUTCMinutes(),
    };
  }

  const local = new Date(instant);
  return {
    year: local.getFullYear(),
    month: local.getMonth() + 1,
    day: local.getDate(),
    hour: local.getHours(),
    minute: local.getMinutes(),
  };
}

/**
 * System offset (minutes east of UTC) in effect at an instant
 */
export function localOffsetMinutes(instant: UtcInstant): number {
  const offset = -new Date(instant).getTimezoneOffset();
  // getTimezoneOffset() of 0 yields -0
  return offset === 0 ? 0 : offset;
}

// ============================================================================
// Parsing & Formatting
// ============================================================================

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;
const LOCAL_DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}))?$/;

/**
 * Parse "Z", "+03:00", "-0530" into minutes east of UTC
 */
export function parseUtcOffset(text: string): Result<number, InvalidTimeError> {
  const trimmed = text.trim();
  if (trimmed === 'Z' || trimmed === 'z') {
    return ok(0);
  }

  const match = OFFSET_PATTERN.exec(trimmed);
  if (!match) {
    return err(new InvalidTimeError(`Invalid UTC offset: "${text}"`, 'offset'));
  }

  const [, sign, hours, minutes] = match;
  const magnitude = Number(hours) * 60 + Number(minutes);
  if (Number(minutes) >= 60) {
    return err(new InvalidTimeError(`Invalid UTC offset: "${text}"`, 'offset'));
  }

  const offset = sign === '-' ? -magnitude : magnitude;
  const offsetCheck = checkOffset(offset);
  return offsetCheck.success ? ok(offset) : offsetCheck;
}

/**
 * Parse "YYYY-MM-DD" or "YYYY-MM-DDTHH:mm" into components.
 *
 * Only the shape is checked here; calendar validity is normalizeLocalTime's job.
 */
export function parseLocalDateTime(text: string): Result<LocalDateTime, InvalidTimeError> {
  const match = LOCAL_DATE_TIME_PATTERN.exec(text.trim());
  if (!match) {
    return err(
      new InvalidTimeError(`Expected YYYY-MM-DD or YYYY-MM-DDTHH:mm, got "${text}"`)
    );
  }

  const [, year, month, day, hour, minute] = match;
  return ok({
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: hour === undefined ? 0 : Number(hour),
    minute: minute === undefined ? 0 : Number(minute),
  });
}

/**
 * ISO-8601 UTC without milliseconds, e.g. 2024-12-01T00:00:00Z
 */
export function formatUtcInstant(instant: UtcInstant): string {
  return new Date(instant).toISOString().replace(/\.000Z$/, 'Z');
}

/**
 * Minutes east of UTC as "+03:00" / "-05:30"
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const magnitude = Math.abs(offsetMinutes);
  return `${sign}${pad(Math.floor(magnitude / 60))}:${pad(magnitude % 60)}`;
}

/**
 * Wall-clock rendering at a fixed offset, e.g. 2024-12-01T03:00+03:00
 */
export function formatLocalInstant(instant: UtcInstant, offsetMinutes: number): string {
  return `${formatComponents(toLocalComponents(instant, offsetMinutes))}${formatUtcOffset(offsetMinutes)}`;
}

// ============================================================================
// Validation Helpers
// ============================================================================

function daysInMonth(year: number, month: number): number {
  // Day 0 of the next month is the last day of this one
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

function checkCalendarFields(components: LocalDateTime): Result<true, InvalidTimeError> {
  const ranges: ReadonlyArray<readonly [keyof LocalDateTime, number, number]> = [
    ['year', 1, 9999],
    ['month', 1, 12],
    ['hour', 0, 23],
    ['minute', 0, 59],
  ];

  for (const [field, min, max] of ranges) {
    const value = components[field];
    if (!Number.isInteger(value) || value < min || value > max) {
      return err(
        new InvalidTimeError(`${field} must be an integer in ${min}..${max}, got ${value}`, field)
      );
    }
  }

  const lastDay = daysInMonth(components.year, components.month);
  if (!Number.isInteger(components.day) || components.day < 1 || components.day > lastDay) {
    return err(
      new InvalidTimeError(
        `day must be an integer in 1..${lastDay} for ${components.year}-${pad(components.month)}, got ${components.day}`,
        'day'
      )
    );
  }

  return ok(true);
}

function checkOffset(offsetMinutes: number): Result<true, InvalidTimeError> {
  if (!Number.isInteger(offsetMinutes) || Math.abs(offsetMinutes) > MAX_OFFSET_MINUTES) {
    return err(
      new InvalidTimeError(
        `UTC offset must be whole minutes within ±${MAX_OFFSET_MINUTES}, got ${offsetMinutes}`,
        'offset'
      )
    );
  }
  return ok(true);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatComponents(components: LocalDateTime): string {
  return `${components.year}-${pad(components.month)}-${pad(components.day)}T${pad(components.hour)}:${pad(components.minute)}`;
}
