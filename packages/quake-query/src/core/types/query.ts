/**
 * Query Types
 *
 * Filter criteria accepted by the FDSN event search endpoint.
 */

/**
 * Milliseconds since the Unix epoch, UTC
 */
export type UtcInstant = number;

/**
 * Wall-clock date/time fields, all integers, month 1-12
 */
export interface LocalDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
}

/**
 * PAGER alert levels.
 *
 * `all` leaves the feed unfiltered; `none` keeps only events without an alert.
 */
export const ALERT_LEVELS = ['none', 'green', 'yellow', 'orange', 'red', 'all'] as const;
export type AlertLevel = (typeof ALERT_LEVELS)[number];

/**
 * Alert levels an individual event can carry
 */
export const EVENT_ALERT_LEVELS = ['green', 'yellow', 'orange', 'red'] as const;
export type EventAlertLevel = (typeof EVENT_ALERT_LEVELS)[number];

/**
 * Result ordering. `time` and `magnitude` are descending.
 */
export const ORDER_BY_VALUES = ['time', 'time-asc', 'magnitude', 'magnitude-asc'] as const;
export type OrderBy = (typeof ORDER_BY_VALUES)[number];

/**
 * Magnitude bounds accepted by the validator
 */
export const MIN_MAGNITUDE = 0;
export const MAX_MAGNITUDE = 10;

/**
 * Largest page the feed will return in one request
 */
export const MAX_LIMIT = 20000;

/**
 * Validated, immutable query
 */
export interface QueryDescriptor {
  readonly startTime?: UtcInstant;
  readonly endTime?: UtcInstant;
  readonly minMagnitude?: number;
  readonly maxMagnitude?: number;
  readonly alertLevel?: AlertLevel;
  readonly orderBy?: OrderBy;
  /** ISO-3166 alpha-2, upper case */
  readonly countryCode?: string;
  readonly limit?: number;
}

export function isAlertLevel(value: string): value is AlertLevel {
  return ALERT_LEVELS.some((level) => level === value);
}

export function isEventAlertLevel(value: string): value is EventAlertLevel {
  return EVENT_ALERT_LEVELS.some((level) => level === value);
}

export function isOrderBy(value: string): value is OrderBy {
  return ORDER_BY_VALUES.some((order) => order === value);
}
