/**
 * Boundary Index Tests
 *
 * Lookup normalization, union semantics, lazy loading and the shared
 * process-wide instance.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createBoundaryIndex,
  getBoundaryIndex,
  resetBoundaryIndex,
  setBoundaryIndex,
} from '../../../services/boundary-index.js';
import { InMemoryBoundarySource } from '../../../services/boundary-loader.js';
import { UnknownCountryError } from '../../../core/types/errors.js';
import { createTestIndex, square, testBoundaries } from '../../fixtures/boundaries.js';

describe('PolygonBoundaryIndex', () => {
  describe('hasCountry', () => {
    it('normalizes case and whitespace', () => {
      const index = createTestIndex();
      expect(index.hasCountry('AA')).toBe(true);
      expect(index.hasCountry('aa')).toBe(true);
      expect(index.hasCountry(' fj ')).toBe(true);
      expect(index.hasCountry('ZZ')).toBe(false);
    });
  });

  describe('polygonsFor', () => {
    it('returns the polygons of a known code', () => {
      const result = createTestIndex().polygonsFor('mp');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toHaveLength(2);
      }
    });

    it('hands out polygons that cannot be edited', () => {
      const index = createTestIndex();
      const result = index.polygonsFor('AA');
      const ring = result.success ? result.data[0]?.coordinates[0] : undefined;
      const corner = ring?.[0];

      expect(corner).toEqual([0, 0]);
      expect(() => {
        if (corner) corner[0] = 100;
      }).toThrow(TypeError);
      expect(() => ring?.push([1, 1])).toThrow(TypeError);
      expect(index.contains({ lat: 5, lng: 5 }, 'AA')).toEqual({ success: true, data: true });
    });

    it('copies rather than freezes the source polygons', () => {
      const boundaries = testBoundaries();
      createBoundaryIndex(new InMemoryBoundarySource(boundaries)).hasCountry('AA');

      expect(Object.isFrozen(boundaries[0]?.polygons[0]?.coordinates)).toBe(false);
    });

    it('reports unknown codes as they were given', () => {
      const result = createTestIndex().polygonsFor('zz');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(UnknownCountryError);
        expect(result.error.countryCode).toBe('zz');
      }
    });
  });

  describe('contains', () => {
    it('tests membership in the named country', () => {
      const index = createTestIndex();
      expect(index.contains({ lat: 5, lng: 5 }, 'AA')).toEqual({ success: true, data: true });
      expect(index.contains({ lat: 5, lng: 25 }, 'AA')).toEqual({ success: true, data: false });
    });

    it('uses union semantics for overlapping countries', () => {
      const index = createTestIndex();
      expect(index.contains({ lat: 5, lng: 7 }, 'AA')).toEqual({ success: true, data: true });
      expect(index.contains({ lat: 5, lng: 7 }, 'CC')).toEqual({ success: true, data: true });
      expect(index.contains({ lat: 5, lng: 12 }, 'AA')).toEqual({ success: true, data: false });
      expect(index.contains({ lat: 5, lng: 12 }, 'CC')).toEqual({ success: true, data: true });
    });

    it('matches any member polygon', () => {
      const index = createTestIndex();
      expect(index.contains({ lat: 1, lng: 51 }, 'MP')).toEqual({ success: true, data: true });
      expect(index.contains({ lat: 1, lng: 45 }, 'MP')).toEqual({ success: true, data: false });
    });

    it('gives the same answer when asked twice', () => {
      const index = createTestIndex();
      const points = [
        { lat: 5, lng: 5 },
        { lat: 5, lng: 25 },
        { lat: 0, lng: 10 },
      ];

      for (const point of points) {
        expect(index.contains(point, 'AA')).toEqual(index.contains(point, 'AA'));
      }
      expect(index.contains({ lat: 0, lng: 10 }, 'AA')).toEqual({ success: true, data: true });
    });

    it('excludes points outside every polygon latitude band', () => {
      expect(createTestIndex().contains({ lat: 50, lng: 5 }, 'AA')).toEqual({
        success: true,
        data: false,
      });
    });

    it('includes latitude-band edges', () => {
      expect(createTestIndex().contains({ lat: 10, lng: 5 }, 'AA')).toEqual({
        success: true,
        data: true,
      });
    });

    it('fails for unknown codes', () => {
      const result = createTestIndex().contains({ lat: 5, lng: 5 }, 'ZZ');
      expect(result.success ? null : result.error.message).toBe('Unknown country code: ZZ');
    });

    it('handles a country straddling 180°', () => {
      const index = createTestIndex();
      expect(index.contains({ lat: -18.14, lng: 178.44 }, 'FJ')).toEqual({ success: true, data: true });
      expect(index.contains({ lat: -17, lng: -179.5 }, 'FJ')).toEqual({ success: true, data: true });
      expect(index.contains({ lat: -17, lng: 170 }, 'FJ')).toEqual({ success: true, data: false });
    });
  });

  describe('countries', () => {
    it('lists every code once', () => {
      const codes = createTestIndex()
        .countries()
        .map((country) => country.code);
      expect(codes).toEqual(['AA', 'BB', 'CC', 'FJ', 'MP']);
    });

    it('merges entries sharing a code', () => {
      const index = createBoundaryIndex(
        new InMemoryBoundarySource([
          { code: 'AA', name: 'Squareland', polygons: [square(0, 0, 10, 10)] },
          { code: 'aa', name: 'Later name', polygons: [square(60, 0, 70, 10)] },
        ])
      );

      expect(index.countries()).toHaveLength(1);
      const [merged] = index.countries();
      expect(merged?.name).toBe('Squareland');
      expect(merged?.polygons).toHaveLength(2);
      expect(index.contains({ lat: 5, lng: 65 }, 'AA')).toEqual({ success: true, data: true });
    });
  });

  describe('loading', () => {
    it('reads the source once, on first lookup', () => {
      const source = new InMemoryBoundarySource(testBoundaries());
      const load = vi.spyOn(source, 'load');

      const index = createBoundaryIndex(source);
      expect(load).not.toHaveBeenCalled();

      index.hasCountry('AA');
      index.contains({ lat: 5, lng: 5 }, 'AA');
      index.countries();
      expect(load).toHaveBeenCalledTimes(1);
    });
  });
});

describe('shared index', () => {
  it('returns the same instance until reset', () => {
    const first = getBoundaryIndex();
    expect(getBoundaryIndex()).toBe(first);

    resetBoundaryIndex();
    expect(getBoundaryIndex()).not.toBe(first);
  });

  it('can be replaced', () => {
    const custom = createTestIndex();
    setBoundaryIndex(custom);
    expect(getBoundaryIndex()).toBe(custom);
  });
});
