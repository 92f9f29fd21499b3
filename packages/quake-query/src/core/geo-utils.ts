/**
 * Geographic Utilities - Shared Geometry Functions
 *
 * - wrapLongitude: fold a longitude or longitude delta into [-180, 180)
 * - unrollRing: make a ring's longitudes continuous around a reference meridian
 * - latitudeExtent: latitude band covered by a polygon's exterior ring
 *
 * Positions follow GeoJSON order: [lng, lat].
 */

import type { Polygon, Position } from 'geojson';
import type { LatLng } from './types/boundary.js';

// ============================================================================
// Longitude Arithmetic
// ============================================================================

/**
 * Fold degrees into [-180, 180)
 */
export function wrapLongitude(degrees: number): number {
  return ((((degrees + 180) % 360) + 360) % 360) - 180;
}

/**
 * Ring vertices in a planar frame centred on a meridian
 */
export interface UnrolledRing {
  /** [x, y] pairs; x is degrees east of the reference meridian */
  readonly points: ReadonlyArray<readonly [number, number]>;
  readonly minX: number;
  readonly maxX: number;
}

/**
 * Unroll a ring around `referenceLng`.
 *
 * The first vertex is placed at its shortest-arc offset from the reference;
 * every later vertex is placed at the previous one plus the shortest-arc delta
 * between them. A ring crossing ±180° therefore stays contiguous instead of
 * jumping across the map: around Greenwich, Fiji's [177, …, -179] becomes
 * [177, …, 181].
 *
 * Edges are assumed shorter than 180° of longitude.
 */
export function unrollRing(ring: readonly Position[], referenceLng: number): UnrolledRing {
  const points: Array<readonly [number, number]> = [];
  let minX = Infinity;
  let maxX = -Infinity;
  let previousLng = 0;
  let x = 0;

  for (let i = 0; i < ring.length; i++) {
    const [lng, lat] = ring[i];
    x = i === 0 ? wrapLongitude(lng - referenceLng) : x + wrapLongitude(lng - previousLng);
    previousLng = lng;

    points.push([x, lat]);
    minX = Math.min(minX, x);
    maxX = Math.max(maxX, x);
  }

  return { points, minX, maxX };
}

// ============================================================================
// Extents
// ============================================================================

/**
 * [minLat, maxLat] of a polygon's exterior ring
 */
export function latitudeExtent(polygon: Polygon): readonly [number, number] {
  let minLat = Infinity;
  let maxLat = -Infinity;

  for (const position of polygon.coordinates[0] ?? []) {
    minLat = Math.min(minLat, position[1]);
    maxLat = Math.max(maxLat, position[1]);
  }

  return [minLat, maxLat];
}

/**
 * WGS84 range check
 */
export function isValidLatLng(point: LatLng): boolean {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lng) &&
    point.lat >= -90 &&
    point.lat <= 90 &&
    point.lng >= -180 &&
    point.lng <= 180
  );
}
