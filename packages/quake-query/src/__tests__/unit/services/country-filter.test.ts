/**
 * Country Filter Tests
 */

import { describe, it, expect } from 'vitest';
import { applyCountryFilter } from '../../../services/country-filter.js';
import { setBoundaryIndex } from '../../../services/boundary-index.js';
import { createResultSet } from '../../../core/types/earthquake.js';
import { UnknownCountryError } from '../../../core/types/errors.js';
import { createTestIndex } from '../../fixtures/boundaries.js';
import { FEED_METADATA, makeRecord } from '../../fixtures/feed.js';

const records = [
  makeRecord('inside-1', 5, 5),
  makeRecord('outside', 50, 50),
  makeRecord('inside-2', 1, 9),
  makeRecord('on-edge', 0, 0),
];

const resultSet = createResultSet(records, { countryCode: 'AA' }, { ...FEED_METADATA, count: 4 }, [
  0, 0, 50, 50,
]);

describe('applyCountryFilter', () => {
  it('keeps records inside the country in their original order', () => {
    const result = applyCountryFilter(resultSet, 'AA', createTestIndex());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.records.map((record) => record.id)).toEqual([
        'inside-1',
        'inside-2',
        'on-edge',
      ]);
      expect(result.data.count).toBe(3);
      expect(result.data.metadata.count).toBe(3);
      expect(result.data.query).toBe(resultSet.query);
      expect(result.data.bbox).toEqual([0, 0, 50, 50]);
    }
  });

  it('leaves the input untouched', () => {
    const result = applyCountryFilter(resultSet, 'AA', createTestIndex());

    expect(result.success && result.data).not.toBe(resultSet);
    expect(resultSet.count).toBe(4);
    expect(resultSet.records).toHaveLength(4);
    expect(resultSet.metadata.count).toBe(4);
  });

  it('accepts lower-case codes', () => {
    const result = applyCountryFilter(resultSet, 'cc', createTestIndex());
    expect(result.success ? result.data.records.map((record) => record.id) : null).toEqual([
      'inside-1',
      'inside-2',
    ]);
  });

  it('keeps events on both sides of 180°', () => {
    const pacific = createResultSet(
      [makeRecord('suva', -18.14, 178.44), makeRecord('east', -17, -179.5), makeRecord('samoa', -13.8, -171.8)],
      {},
      FEED_METADATA
    );

    const result = applyCountryFilter(pacific, 'FJ', createTestIndex());
    expect(result.success ? result.data.records.map((record) => record.id) : null).toEqual([
      'suva',
      'east',
    ]);
  });

  it('returns an empty set when nothing matches', () => {
    const result = applyCountryFilter(resultSet, 'MP', createTestIndex());
    expect(result.success ? result.data.count : null).toBe(0);
  });

  it('returns an empty set for empty input and a known code', () => {
    const empty = createResultSet([], { countryCode: 'AA' }, FEED_METADATA);
    const result = applyCountryFilter(empty, 'AA', createTestIndex());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.records).toEqual([]);
      expect(result.data.count).toBe(0);
      expect(result.data.metadata.count).toBe(0);
      expect(result.data).not.toBe(empty);
    }
  });

  it('fails on an unknown code even for empty input', () => {
    const empty = createResultSet([], {}, FEED_METADATA);
    const result = applyCountryFilter(empty, 'ZZ', createTestIndex());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(UnknownCountryError);
    }
  });

  it('uses the shared index by default', () => {
    setBoundaryIndex(createTestIndex());
    const result = applyCountryFilter(resultSet, 'AA');
    expect(result.success ? result.data.count : null).toBe(3);
  });
});
