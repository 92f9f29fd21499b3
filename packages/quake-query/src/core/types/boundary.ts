/**
 * Boundary Types
 *
 * Country outlines used for epicenter filtering.
 *
 * GeoJSON ordering applies throughout: positions are [lng, lat].
 */

import type { Polygon, Position } from 'geojson';
import type { Result } from './result.js';
import type { UnknownCountryError } from './errors.js';

/**
 * Geographic point
 */
export interface LatLng {
  readonly lat: number;
  readonly lng: number;
}

/**
 * Closed ring of [lng, lat] positions (first == last)
 */
export type PolygonRing = readonly Position[];

/**
 * Boundary polygon: exterior ring first, holes after
 */
export type BoundaryPolygon = Polygon;

/**
 * All territory claimed under one country code.
 * Disjoint islands and exclaves are separate polygons.
 */
export interface CountryBoundary {
  readonly code: string;
  readonly name: string;
  readonly polygons: readonly BoundaryPolygon[];
}

/**
 * Membership lookup the validator needs
 */
export interface BoundaryLookup {
  hasCountry(countryCode: string): boolean;
}

/**
 * Full boundary index contract
 */
export interface BoundaryIndex extends BoundaryLookup {
  polygonsFor(countryCode: string): Result<readonly BoundaryPolygon[], UnknownCountryError>;
  contains(point: LatLng, countryCode: string): Result<boolean, UnknownCountryError>;
  countries(): readonly CountryBoundary[];
}

/**
 * Supplies raw polygon data when the index initializes
 */
export interface BoundaryDataSource {
  /** Human-readable origin, used in error messages */
  readonly description: string;
  load(): readonly CountryBoundary[];
}

/**
 * Normalize a caller-supplied country code for lookup
 */
export function normalizeCountryCode(countryCode: string): string {
  return countryCode.trim().toUpperCase();
}
