/**
 * Earthquake Types
 *
 * Typed view of the GeoJSON FeatureCollection returned by the feed.
 */

import type { BBox } from 'geojson';
import type { LatLng } from './boundary.js';
import type { EventAlertLevel, QueryDescriptor, UtcInstant } from './query.js';

/**
 * Scalar passthrough values from a feature's `properties`
 */
export type PropertyValue = string | number | boolean | null;

/**
 * One reported seismic event
 */
export interface EarthquakeRecord {
  readonly id: string;
  /** null when the network has not reported a magnitude */
  readonly magnitude: number | null;
  readonly place: string;
  readonly epicenter: LatLng;
  readonly depthKm: number | null;
  readonly time: UtcInstant;
  readonly alertLevel: EventAlertLevel | null;
  /** Remaining feed properties (felt, cdi, mmi, tsunami, sig, magType, ...) */
  readonly properties: Readonly<Record<string, PropertyValue>>;
}

/**
 * Feed metadata block
 */
export interface FeedMetadata {
  readonly generated: UtcInstant;
  readonly url: string;
  readonly title: string;
  readonly status: number;
  readonly api: string;
  readonly count: number;
}

/**
 * Records returned by one query, with the descriptor that produced them
 */
export interface ResultSet {
  readonly records: readonly EarthquakeRecord[];
  readonly count: number;
  readonly query: QueryDescriptor;
  readonly metadata: FeedMetadata;
  readonly bbox?: BBox;
}

/**
 * Build a frozen ResultSet; `count` and `metadata.count` follow `records`
 */
export function createResultSet(
  records: readonly EarthquakeRecord[],
  query: QueryDescriptor,
  metadata: FeedMetadata,
  bbox?: BBox
): ResultSet {
  const frozen = Object.freeze([...records]);
  return Object.freeze({
    records: frozen,
    count: frozen.length,
    query,
    metadata: Object.freeze({ ...metadata, count: frozen.length }),
    ...(bbox ? { bbox } : {}),
  });
}
