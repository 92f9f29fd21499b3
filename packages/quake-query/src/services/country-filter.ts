/**
 * Country Filter
 *
 * Post-processes a ResultSet, keeping only events whose epicenter lies in
 * the requested country's polygons. Always returns a new ResultSet; the
 * input is left as it was, relative order is preserved, and the count
 * (including metadata.count) follows the kept records.
 */

import type { BoundaryIndex } from '../core/types/boundary.js';
import { createResultSet, type EarthquakeRecord, type ResultSet } from '../core/types/earthquake.js';
import type { UnknownCountryError } from '../core/types/errors.js';
import { ok, type Result } from '../core/types/result.js';
import { getBoundaryIndex } from './boundary-index.js';

/**
 * Keep records inside `countryCode`
 *
 * @param index - Defaults to the shared process-wide index
 */
export function applyCountryFilter(
  resultSet: ResultSet,
  countryCode: string,
  index: BoundaryIndex = getBoundaryIndex()
): Result<ResultSet, UnknownCountryError> {
  // Resolve up front so an unknown code fails on empty input too
  const lookup = index.polygonsFor(countryCode);
  if (!lookup.success) {
    return lookup;
  }

  const kept: EarthquakeRecord[] = [];
  for (const record of resultSet.records) {
    const inside = index.contains(record.epicenter, countryCode);
    if (!inside.success) {
      return inside;
    }
    if (inside.data) {
      kept.push(record);
    }
  }

  return ok(createResultSet(kept, resultSet.query, resultSet.metadata, resultSet.bbox));
}
