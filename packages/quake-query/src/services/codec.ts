/**
 * Feed Codec
 *
 * encodeQuery: QueryDescriptor → FDSN event query URL
 * decodeResponse: GeoJSON FeatureCollection body → ResultSet
 *
 * Wire keys: starttime, endtime (ISO-8601 UTC), minmagnitude, maxmagnitude,
 * alertlevel, orderby, limit. `format=geojson` is always sent. The country
 * code never reaches the wire; it is applied client-side.
 */

import { z } from 'zod';
import type { QueryDescriptor } from '../core/types/query.js';
import { isEventAlertLevel } from '../core/types/query.js';
import {
  createResultSet,
  type EarthquakeRecord,
  type PropertyValue,
  type ResultSet,
} from '../core/types/earthquake.js';
import { DecodeError, TransportError } from '../core/types/errors.js';
import { err, ok, type Result } from '../core/types/result.js';
import { formatUtcInstant } from '../core/time-normalizer.js';

// ============================================================================
// Encoding
// ============================================================================

const BaseUrlSchema = z.string().url();

/**
 * Build the request URL for a validated descriptor.
 *
 * Alert levels `all` and `none` send no `alertlevel`: the feed has no
 * server-side "no alert" filter, so `none` is applied after decoding.
 * A base URL that does not parse yields TransportError; nothing is sent.
 */
export function encodeQuery(
  query: QueryDescriptor,
  baseUrl: string
): Result<string, TransportError> {
  if (!BaseUrlSchema.safeParse(baseUrl).success) {
    return err(new TransportError(`Invalid base URL: "${baseUrl}"`, baseUrl));
  }

  const url = new URL(baseUrl);
  const params = url.searchParams;

  params.set('format', 'geojson');

  if (query.startTime !== undefined) {
    params.set('starttime', formatUtcInstant(query.startTime));
  }
  if (query.endTime !== undefined) {
    params.set('endtime', formatUtcInstant(query.endTime));
  }
  if (query.minMagnitude !== undefined) {
    params.set('minmagnitude', String(query.minMagnitude));
  }
  if (query.maxMagnitude !== undefined) {
    params.set('maxmagnitude', String(query.maxMagnitude));
  }
  if (query.alertLevel !== undefined && query.alertLevel !== 'all' && query.alertLevel !== 'none') {
    params.set('alertlevel', query.alertLevel);
  }
  if (query.orderBy !== undefined) {
    params.set('orderby', query.orderBy);
  }
  if (query.limit !== undefined) {
    params.set('limit', String(query.limit));
  }

  return ok(url.toString());
}

// ============================================================================
// Decoding
// ============================================================================

const FeedPropertiesSchema = z
  .object({
    mag: z.number().nullable().optional(),
    place: z.string().nullable().optional(),
    time: z.number(),
    alert: z.string().nullable().optional(),
  })
  .passthrough();

const FeedFeatureSchema = z.object({
  type: z.literal('Feature'),
  id: z.string(),
  properties: FeedPropertiesSchema,
  geometry: z.object({
    type: z.literal('Point'),
    // [longitude, latitude, depth]
    coordinates: z.array(z.number()).min(2),
  }),
});

const FeedMetadataSchema = z.object({
  generated: z.number(),
  url: z.string(),
  title: z.string(),
  status: z.number(),
  api: z.string().default(''),
  count: z.number(),
});

export const FeedSchema = z.object({
  type: z.literal('FeatureCollection'),
  metadata: FeedMetadataSchema,
  features: z.array(FeedFeatureSchema),
  bbox: z
    .union([
      z.tuple([z.number(), z.number(), z.number(), z.number()]),
      z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]),
    ])
    .optional(),
});

type FeedFeature = z.infer<typeof FeedFeatureSchema>;

/** Properties lifted into EarthquakeRecord fields */
const PROMOTED_PROPERTIES = new Set(['mag', 'place', 'time', 'alert']);

/**
 * Decode a response body into a ResultSet echoing `query`
 */
export function decodeResponse(
  raw: string | Uint8Array,
  query: QueryDescriptor
): Result<ResultSet, DecodeError> {
  const text = typeof raw === 'string' ? raw : new TextDecoder().decode(raw);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(
      new DecodeError(
        `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`,
        text,
        { cause: error }
      )
    );
  }

  const parsed = FeedSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown shape';
    return err(new DecodeError(`Unexpected feed response (${where})`, text));
  }

  const feed = parsed.data;
  return ok(createResultSet(feed.features.map(toRecord), query, feed.metadata, feed.bbox));
}

function toRecord(feature: FeedFeature): EarthquakeRecord {
  const { mag, place, time, alert } = feature.properties;
  const [lng, lat, depth] = feature.geometry.coordinates;

  const properties: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(feature.properties)) {
    if (!PROMOTED_PROPERTIES.has(key) && isPropertyValue(value)) {
      properties[key] = value;
    }
  }

  return Object.freeze({
    id: feature.id,
    magnitude: mag ?? null,
    place: place ?? '',
    epicenter: Object.freeze({ lat, lng }),
    depthKm: depth ?? null,
    time,
    alertLevel: alert && isEventAlertLevel(alert) ? alert : null,
    properties: Object.freeze(properties),
  });
}

function isPropertyValue(value: unknown): value is PropertyValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}
