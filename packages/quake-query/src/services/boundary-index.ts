/**
 * Boundary Index
 *
 * Country code → polygons, with union-semantics containment tests.
 *
 * The dataset is read once, on first use. The index keeps a deep-frozen
 * copy, so polygons handed out by polygonsFor() and countries() are
 * read-only at run time as well as in their types.
 * Overlapping claims between countries are not disambiguated: a point is
 * "in TR" whenever any TR polygon contains it, regardless of other codes.
 */

import type { Polygon } from 'geojson';
import type {
  BoundaryDataSource,
  BoundaryIndex,
  BoundaryPolygon,
  CountryBoundary,
  LatLng,
} from '../core/types/boundary.js';
import { normalizeCountryCode } from '../core/types/boundary.js';
import { UnknownCountryError } from '../core/types/errors.js';
import { err, ok, type Result } from '../core/types/result.js';
import { latitudeExtent } from '../core/geo-utils.js';
import { loadClientConfig } from '../core/config.js';
import { createLogger } from '../core/utils/logger.js';
import { DEFAULT_BOUNDARY_TOLERANCE, PointInPolygonEngine } from './pip-engine.js';
import { GeoJSONFileBoundarySource } from './boundary-loader.js';

const logger = createLogger('boundary-index');

interface IndexedPolygon {
  readonly polygon: Polygon;
  readonly minLat: number;
  readonly maxLat: number;
}

interface IndexedCountry {
  readonly boundary: CountryBoundary;
  readonly polygons: readonly IndexedPolygon[];
}

/**
 * Deep copy of a polygon with every position, ring and the polygon frozen
 */
function frozenCopy(polygon: Polygon): Polygon {
  const coordinates = polygon.coordinates.map((ring) => {
    const positions = ring.map((position) => {
      const copy = [...position];
      Object.freeze(copy);
      return copy;
    });
    Object.freeze(positions);
    return positions;
  });
  Object.freeze(coordinates);

  const copy: Polygon = { type: 'Polygon', coordinates };
  Object.freeze(copy);
  return copy;
}

/**
 * BoundaryIndex backed by a data source, loaded lazily
 */
export class PolygonBoundaryIndex implements BoundaryIndex {
  private readonly engine = new PointInPolygonEngine();
  private entries: ReadonlyMap<string, IndexedCountry> | null = null;

  constructor(private readonly source: BoundaryDataSource) {}

  hasCountry(countryCode: string): boolean {
    return this.getEntries().has(normalizeCountryCode(countryCode));
  }

  countries(): readonly CountryBoundary[] {
    return [...this.getEntries().values()].map((entry) => entry.boundary);
  }

  polygonsFor(countryCode: string): Result<readonly BoundaryPolygon[], UnknownCountryError> {
    const entry = this.getEntries().get(normalizeCountryCode(countryCode));
    if (!entry) {
      return err(new UnknownCountryError(countryCode));
    }
    return ok(entry.boundary.polygons);
  }

  /**
   * True if ANY polygon of the country contains the point (edges included)
   */
  contains(point: LatLng, countryCode: string): Result<boolean, UnknownCountryError> {
    const entry = this.getEntries().get(normalizeCountryCode(countryCode));
    if (!entry) {
      return err(new UnknownCountryError(countryCode));
    }

    const inside = entry.polygons.some(
      ({ polygon, minLat, maxLat }) =>
        point.lat >= minLat - DEFAULT_BOUNDARY_TOLERANCE &&
        point.lat <= maxLat + DEFAULT_BOUNDARY_TOLERANCE &&
        this.engine.isPointInPolygon(point, polygon)
    );
    return ok(inside);
  }

  /**
   * Load and index the dataset once
   */
  private getEntries(): ReadonlyMap<string, IndexedCountry> {
    if (this.entries) {
      return this.entries;
    }

    const boundaries = this.source.load();
    const entries = new Map<string, IndexedCountry>();

    for (const boundary of boundaries) {
      const code = normalizeCountryCode(boundary.code);
      const existing = entries.get(code);
      const polygons = [
        ...(existing?.boundary.polygons ?? []),
        ...boundary.polygons.map(frozenCopy),
      ];
      Object.freeze(polygons);

      entries.set(code, {
        boundary: Object.freeze({ code, name: existing?.boundary.name ?? boundary.name, polygons }),
        polygons: polygons.map((polygon) => {
          const [minLat, maxLat] = latitudeExtent(polygon);
          return { polygon, minLat, maxLat };
        }),
      });
    }

    logger.debug('Boundary dataset loaded', {
      source: this.source.description,
      countries: entries.size,
    });

    this.entries = entries;
    return entries;
  }
}

// ============================================================================
// Process-wide Instance
// ============================================================================

let defaultIndex: BoundaryIndex | null = null;

/**
 * Get the shared BoundaryIndex.
 * Created on first call from the configured dataset path; the data itself
 * loads on the first lookup.
 */
export function getBoundaryIndex(): BoundaryIndex {
  if (!defaultIndex) {
    defaultIndex = new PolygonBoundaryIndex(
      new GeoJSONFileBoundarySource(loadClientConfig().boundariesPath)
    );
  }
  return defaultIndex;
}

/**
 * Substitute the shared index (alternate dataset, tests)
 */
export function setBoundaryIndex(index: BoundaryIndex): void {
  defaultIndex = index;
}

/**
 * Reset the shared index.
 * Useful for testing.
 */
export function resetBoundaryIndex(): void {
  defaultIndex = null;
}

/**
 * Convenience: index over a fixed set of boundaries
 */
export function createBoundaryIndex(source: BoundaryDataSource): BoundaryIndex {
  return new PolygonBoundaryIndex(source);
}
