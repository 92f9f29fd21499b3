/**
 * Synthetic boundary shapes for index and filter tests
 */

import type { Polygon, Position } from 'geojson';
import type { BoundaryIndex, CountryBoundary } from '../../core/types/boundary.js';
import { createBoundaryIndex } from '../../services/boundary-index.js';
import { InMemoryBoundarySource } from '../../services/boundary-loader.js';

/**
 * Axis-aligned closed ring, counter-clockwise from the south-west corner
 */
export function rectRing(west: number, south: number, east: number, north: number): Position[] {
  return [
    [west, south],
    [east, south],
    [east, north],
    [west, north],
    [west, south],
  ];
}

export function square(
  west: number,
  south: number,
  east: number,
  north: number,
  holes: Position[][] = []
): Polygon {
  return { type: 'Polygon', coordinates: [rectRing(west, south, east, north), ...holes] };
}

/** Straddles 180°: lng 177 east across to -179 */
export const FIJI_POLYGON: Polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [177, -16],
      [-179, -16],
      [-179, -19.5],
      [177, -19.5],
      [177, -16],
    ],
  ],
};

/** Band from lng 0 east to lng 200 (-160), lat 0..10, with a doubled-back vertex order */
export const WIDE_BAND_POLYGON: Polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [-160, 0],
      [-160, 10],
      [100, 10],
      [0, 10],
      [0, 0],
      [100, 0],
      [-160, 0],
    ],
  ],
};

export function testBoundaries(): CountryBoundary[] {
  return [
    { code: 'AA', name: 'Squareland', polygons: [square(0, 0, 10, 10)] },
    { code: 'BB', name: 'Holeland', polygons: [square(20, 0, 30, 10, [rectRing(24, 4, 26, 6)])] },
    { code: 'CC', name: 'Overlap', polygons: [square(5, 0, 15, 10)] },
    { code: 'FJ', name: 'Fiji', polygons: [FIJI_POLYGON] },
    { code: 'MP', name: 'Islands', polygons: [square(40, 0, 42, 2), square(50, 0, 52, 2)] },
  ];
}

export function createTestIndex(): BoundaryIndex {
  return createBoundaryIndex(new InMemoryBoundarySource(testBoundaries()));
}
