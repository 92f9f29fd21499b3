/**
 * Boundary Data Sources
 *
 * Supply country outlines to the BoundaryIndex at initialization.
 *
 * FILE FORMAT (GeoJSON FeatureCollection):
 * ```json
 * {
 *   "type": "FeatureCollection",
 *   "features": [{
 *     "type": "Feature",
 *     "properties": { "code": "TR", "name": "Türkiye" },
 *     "geometry": { "type": "Polygon", "coordinates": [[[26.0, 40.0], ...]] }
 *   }]
 * }
 * ```
 *
 * A country may appear in several features; its polygons are merged.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Polygon } from 'geojson';
import type { BoundaryDataSource, CountryBoundary } from '../core/types/boundary.js';
import { normalizeCountryCode } from '../core/types/boundary.js';
import { BoundaryDataError } from '../core/types/errors.js';
import { PointInPolygonEngine } from './pip-engine.js';

// ============================================================================
// Schemas
// ============================================================================

const PositionSchema = z.array(z.number()).min(2);
const RingSchema = z.array(PositionSchema);

const GeometrySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('Polygon'),
    coordinates: z.array(RingSchema).min(1),
  }),
  z.object({
    type: z.literal('MultiPolygon'),
    coordinates: z.array(z.array(RingSchema).min(1)).min(1),
  }),
]);

const BoundaryFeatureSchema = z.object({
  type: z.literal('Feature'),
  properties: z.object({
    code: z.string().regex(/^[A-Za-z]{2}$/, 'code must be an ISO-3166 alpha-2 code'),
    name: z.string().optional(),
  }),
  geometry: GeometrySchema,
});

export const BoundaryCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(BoundaryFeatureSchema),
});

export type BoundaryCollection = z.infer<typeof BoundaryCollectionSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate a parsed GeoJSON document and group its polygons per country
 *
 * @throws {BoundaryDataError} On schema or ring-geometry violations
 */
export function parseBoundaryCollection(data: unknown, source: string): CountryBoundary[] {
  const parsed = BoundaryCollectionSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid document';
    throw new BoundaryDataError(`Invalid boundary dataset (${where})`, source);
  }

  const engine = new PointInPolygonEngine();
  const grouped = new Map<string, { name: string; polygons: Polygon[] }>();

  for (const [index, feature] of parsed.data.features.entries()) {
    const code = normalizeCountryCode(feature.properties.code);
    const polygons: Polygon[] =
      feature.geometry.type === 'Polygon'
        ? [{ type: 'Polygon', coordinates: feature.geometry.coordinates }]
        : feature.geometry.coordinates.map((coordinates): Polygon => ({ type: 'Polygon', coordinates }));

    for (const polygon of polygons) {
      for (const ring of polygon.coordinates) {
        const ringErrors = engine.validateRing(ring);
        if (ringErrors.length > 0) {
          throw new BoundaryDataError(
            `Invalid ring in feature ${index} (${code}): ${ringErrors.join('; ')}`,
            source
          );
        }
      }
    }

    const entry = grouped.get(code) ?? { name: feature.properties.name ?? code, polygons: [] };
    entry.polygons.push(...polygons);
    grouped.set(code, entry);
  }

  return [...grouped.entries()].map(([code, { name, polygons }]) => ({ code, name, polygons }));
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Reads a GeoJSON file synchronously on first load()
 */
export class GeoJSONFileBoundarySource implements BoundaryDataSource {
  readonly description: string;

  constructor(private readonly filePath: string) {
    this.description = `file:${filePath}`;
  }

  load(): readonly CountryBoundary[] {
    let content: string;
    try {
      content = readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      throw new BoundaryDataError(
        `Cannot read boundary dataset: ${error instanceof Error ? error.message : String(error)}`,
        this.description,
        { cause: error }
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new BoundaryDataError(
        `Boundary dataset is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        this.description,
        { cause: error }
      );
    }

    return parseBoundaryCollection(data, this.description);
  }
}

/**
 * Fixed in-memory dataset (tests, embedded use)
 */
export class InMemoryBoundarySource implements BoundaryDataSource {
  readonly description = 'memory';

  constructor(private readonly boundaries: readonly CountryBoundary[]) {}

  load(): readonly CountryBoundary[] {
    return this.boundaries;
  }
}
