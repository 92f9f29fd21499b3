/**
 * Point-in-Polygon Engine
 *
 * Ray-casting containment test, safe across the anti-meridian.
 *
 * PHILOSOPHY:
 * - Correctness first (vertices, edges, holes, ±180° crossings)
 * - Closed boundaries: a point on an edge or vertex is inside
 * - Pure and allocation-light: no state between calls
 */

import type { MultiPolygon, Polygon, Position } from 'geojson';
import type { LatLng, PolygonRing } from '../core/types/boundary.js';
import { unrollRing, type UnrolledRing } from '../core/geo-utils.js';

/** Distance (degrees) within which a point counts as on the boundary, ≈ 0.1 mm */
export const DEFAULT_BOUNDARY_TOLERANCE = 1e-9;

/**
 * Point-in-Polygon Engine
 *
 * Every ring is unrolled around the query point's meridian before testing,
 * so longitude deltas always follow the shorter arc and a ring that crosses
 * ±180° is handled like any other.
 */
export class PointInPolygonEngine {
  /**
   * Test if point is inside polygon
   *
   * Algorithm: Ray-casting (horizontal ray from point to +infinity)
   * - Odd intersections = inside, Even = outside
   * - Exterior ring must contain the point, no hole may
   * - MultiPolygon: inside ANY member polygon
   *
   * @param tolerance - Distance tolerance for "on boundary"
   * @returns true if point inside polygon or on its boundary
   */
  isPointInPolygon(
    point: LatLng,
    polygon: Polygon | MultiPolygon,
    tolerance: number = DEFAULT_BOUNDARY_TOLERANCE
  ): boolean {
    if (polygon.type === 'Polygon') {
      return this.testPolygon(point, polygon.coordinates, tolerance);
    }

    return polygon.coordinates.some((polygonCoords) =>
      this.testPolygon(point, polygonCoords, tolerance)
    );
  }

  /**
   * Test if point is within tolerance of any ring of the polygon
   */
  isPointOnBoundary(
    point: LatLng,
    polygon: Polygon | MultiPolygon,
    tolerance: number = DEFAULT_BOUNDARY_TOLERANCE
  ): boolean {
    const rings =
      polygon.type === 'Polygon'
        ? polygon.coordinates
        : polygon.coordinates.flat();

    return rings.some((ring) => this.isPointOnRing(point, unrollRing(ring, point.lng), tolerance));
  }

  /**
   * Validate polygon ring geometry
   *
   * Checks for common errors:
   * - Too few points (< 4 for closed ring)
   * - Non-closed ring (first != last point)
   * - Coordinates outside WGS84 range
   *
   * @returns Validation errors (empty if valid)
   */
  validateRing(ring: PolygonRing): string[] {
    const errors: string[] = [];

    if (ring.length < 4) {
      errors.push(
        `Ring has ${ring.length} points, minimum 4 required (triangle + closure)`
      );
      return errors;
    }

    const first = ring[0];
    const last = ring[ring.length - 1];
    if (first[0] !== last[0] || first[1] !== last[1]) {
      errors.push('Ring is not closed (first point != last point)');
    }

    const outOfRange = ring.findIndex(
      ([lng, lat]) => !(Math.abs(lng) <= 180 && Math.abs(lat) <= 90)
    );
    if (outOfRange !== -1) {
      errors.push(`Vertex ${outOfRange} is outside WGS84 range`);
    }

    return errors;
  }

  /**
   * Single Polygon (with holes)
   *
   * - coordinates[0]: Exterior ring (must contain point)
   * - coordinates[1..n]: Interior rings (holes, must NOT strictly contain point)
   */
  private testPolygon(point: LatLng, coordinates: Position[][], tolerance: number): boolean {
    const exterior = unrollRing(coordinates[0], point.lng);

    if (this.isPointOnRing(point, exterior, tolerance)) {
      return true;
    }
    if (!this.testRing(point, exterior)) {
      return false;
    }

    for (let i = 1; i < coordinates.length; i++) {
      const hole = unrollRing(coordinates[i], point.lng);

      // Hole edges belong to the polygon (closed boundary)
      if (this.isPointOnRing(point, hole, tolerance)) {
        return true;
      }
      if (this.testRing(point, hole)) {
        return false;
      }
    }

    return true;
  }

  private testRing(point: LatLng, ring: UnrolledRing): boolean {
    const px = this.queryX(ring, 0);
    if (px === null) {
      return false;
    }
    return this.countRayIntersections(px, point.lat, ring) % 2 === 1;
  }

  /**
   * Where the query point sits in the ring's unrolled frame.
   *
   * The point is at x = 0 modulo 360. A ring wider than 180° may have been
   * unrolled so that it spans 360 rather than 0; pick the copy of the point
   * that falls within the ring's x-range, or null if none does.
   */
  private queryX(ring: UnrolledRing, tolerance: number): number | null {
    const candidate = Math.ceil((ring.minX - tolerance) / 360) * 360;
    return candidate <= ring.maxX + tolerance ? candidate : null;
  }

  /**
   * Count ray intersections with an unrolled ring
   *
   * Given edge from (x1, y1) to (x2, y2), ray at height py:
   * - Edge intersects ray if: min(y1, y2) <= py < max(y1, y2)
   * - Intersection x-coordinate: x1 + (py - y1) / (y2 - y1) * (x2 - x1)
   * - Count intersection if: xIntersection > px
   */
  private countRayIntersections(px: number, py: number, ring: UnrolledRing): number {
    let intersections = 0;
    const points = ring.points;

    for (let i = 0; i < points.length - 1; i++) {
      const [x1, y1] = points[i];
      const [x2, y2] = points[i + 1];

      // Skip horizontal edges (parallel to ray)
      if (y1 === y2) {
        continue;
      }

      // Half-open range so a vertex on the ray is counted once
      if (py < Math.min(y1, y2) || py >= Math.max(y1, y2)) {
        continue;
      }

      const t = (py - y1) / (y2 - y1);
      const xIntersection = x1 + t * (x2 - x1);

      if (xIntersection > px) {
        intersections++;
      }
    }

    return intersections;
  }

  private isPointOnRing(point: LatLng, ring: UnrolledRing, tolerance: number): boolean {
    const px = this.queryX(ring, tolerance);
    if (px === null) {
      return false;
    }

    const points = ring.points;
    for (let i = 0; i < points.length - 1; i++) {
      const [x1, y1] = points[i];
      const [x2, y2] = points[i + 1];

      if (this.pointToSegmentDistance(px, point.lat, x1, y1, x2, y2) <= tolerance) {
        return true;
      }
    }

    return false;
  }

  /**
   * Perpendicular distance from point to line segment
   */
  private pointToSegmentDistance(
    px: number,
    py: number,
    x1: number,
    y1: number,
    x2: number,
    y2: number
  ): number {
    const dx = x2 - x1;
    const dy = y2 - y1;
    const lengthSquared = dx * dx + dy * dy;

    if (lengthSquared === 0) {
      // Degenerate segment (point)
      return Math.sqrt((px - x1) ** 2 + (py - y1) ** 2);
    }

    // Project point onto line (parameter t ∈ [0, 1] for segment)
    let t = ((px - x1) * dx + (py - y1) * dy) / lengthSquared;
    t = Math.max(0, Math.min(1, t));

    const closestX = x1 + t * dx;
    const closestY = y1 + t * dy;

    return Math.sqrt((px - closestX) ** 2 + (py - closestY) ** 2);
  }
}
