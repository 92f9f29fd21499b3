/**
 * Earthquake Client Tests
 *
 * End-to-end through the public API with an in-process transport:
 * - Türkiye, December 2024, M5.0+
 * - Magnitude bounds reversed (no request sent)
 * - Unknown country (no request sent)
 * - Unalerted events only
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EarthquakeClient } from '../../../services/earthquake-client.js';
import { createBoundaryIndex, getBoundaryIndex } from '../../../services/boundary-index.js';
import { GeoJSONFileBoundarySource } from '../../../services/boundary-loader.js';
import { BUNDLED_BOUNDARIES_PATH, DEFAULT_CLIENT_CONFIG } from '../../../core/config.js';
import { MagnitudeRangeError, TransportError, UnknownCountryError } from '../../../core/types/errors.js';
import { TEST_BASE_URL, createFakeTransport, feature, feedBody, sentParams } from '../../fixtures/feed.js';

const ENV_KEYS = ['BASE_URL', 'TIMEOUT_MS', 'MAX_RETRIES', 'USER_AGENT', 'BOUNDARIES'];

const DECEMBER_FEED = feedBody([
  feature({ id: 'ankara', lat: 39.93, lng: 32.85, mag: 5.1 }),
  feature({ id: 'athens', lat: 37.98, lng: 23.73, mag: 5.3 }),
  feature({ id: 'istanbul', lat: 41.01, lng: 28.97, mag: 6.0, alert: 'yellow' }),
  feature({ id: 'suva', lat: -18.14, lng: 178.44, mag: 5.8 }),
]);

function createClient(body = DECEMBER_FEED) {
  const fake = createFakeTransport(body);
  const client = new EarthquakeClient({
    config: { baseUrl: TEST_BASE_URL },
    transport: fake.transport,
    boundaries: createBoundaryIndex(new GeoJSONFileBoundarySource(BUNDLED_BOUNDARIES_PATH)),
  });
  return { client, send: fake.send };
}

describe('EarthquakeClient', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) {
      vi.stubEnv(`QUAKE_QUERY_${key}`, '');
    }
  });

  it('fetches Türkiye events for December 2024 above M5', async () => {
    const { client, send } = createClient();

    const result = await client
      .query()
      .withStartTime({ year: 2024, month: 12, day: 1, hour: 0, minute: 0 }, 0)
      .withEndTime({ year: 2024, month: 12, day: 31, hour: 23, minute: 59 }, 0)
      .withMinMagnitude(5.0)
      .withCountryCode('TR')
      .fetch();

    const params = sentParams(send);
    expect(params.get('starttime')).toBe('2024-12-01T00:00:00Z');
    expect(params.get('endtime')).toBe('2024-12-31T23:59:00Z');
    expect(params.get('minmagnitude')).toBe('5');
    expect(params.has('country')).toBe(false);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.records.map((record) => record.id)).toEqual(['ankara', 'istanbul']);
      expect(result.data.count).toBe(2);
      expect(result.data.query.countryCode).toBe('TR');
    }
  });

  it('rejects reversed magnitude bounds without a request', async () => {
    const { client, send } = createClient();

    const result = await client.query().withMinMagnitude(7).withMaxMagnitude(3).fetch();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(MagnitudeRangeError);
    }
    expect(send).not.toHaveBeenCalled();
  });

  it('rejects an unknown country without a request', async () => {
    const { client, send } = createClient();

    const result = await client.query().withCountryCode('ZZ').fetch();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(UnknownCountryError);
      expect(result.error.message).toBe('Unknown country code: ZZ');
    }
    expect(send).not.toHaveBeenCalled();
  });

  it('resolves to TransportError when the base URL does not parse', async () => {
    const fake = createFakeTransport(DECEMBER_FEED);
    const client = new EarthquakeClient({
      config: { baseUrl: 'not a url' },
      transport: fake.transport,
      boundaries: createBoundaryIndex(new GeoJSONFileBoundarySource(BUNDLED_BOUNDARIES_PATH)),
    });

    const result = await client.query().withMinMagnitude(5).fetch();

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Invalid base URL: "not a url"');
    }
    expect(fake.send).not.toHaveBeenCalled();
  });

  it('keeps only unalerted events for alert level none', async () => {
    const { client } = createClient();

    const result = await client.query().withAlertLevel('none').withCountryCode('TR').fetch();

    expect(result.success ? result.data.records.map((record) => record.id) : null).toEqual(['ankara']);
  });

  it('passes the configured timeout, or the per-fetch one, to the transport', async () => {
    const { client, send } = createClient();

    await client.query().fetch();
    await client.query().fetch({ timeoutMs: 10 });

    expect(send.mock.calls[0]?.[1]).toEqual({ timeoutMs: DEFAULT_CLIENT_CONFIG.timeoutMs });
    expect(send.mock.calls[1]?.[1]).toEqual({ timeoutMs: 10 });
  });

  it('hands out fresh builders', () => {
    const { client } = createClient();
    const narrowed = client.query().withMinMagnitude(6);

    expect(client.query()).not.toBe(client.query());
    expect(client.query().build()).toEqual({ success: true, data: {} });
    expect(narrowed.build()).toEqual({ success: true, data: { minMagnitude: 6 } });
  });

  describe('wiring', () => {
    it('shares the process-wide index by default', () => {
      const { transport } = createFakeTransport();
      expect(new EarthquakeClient({ transport }).boundaries).toBe(getBoundaryIndex());
    });

    it('builds a dedicated index for an explicit dataset path', () => {
      const { transport } = createFakeTransport();
      const client = new EarthquakeClient({
        transport,
        config: { boundariesPath: BUNDLED_BOUNDARIES_PATH },
      });

      expect(client.boundaries).not.toBe(getBoundaryIndex());
      expect(client.boundaries.hasCountry('JP')).toBe(true);
    });

    it('sends through fetch with the configured User-Agent by default', async () => {
      const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(feedBody([]), { status: 200 }));
      vi.stubGlobal('fetch', fetchMock);

      const client = new EarthquakeClient({
        config: { baseUrl: TEST_BASE_URL, userAgent: 'test-agent/1.0' },
        boundaries: createBoundaryIndex(new GeoJSONFileBoundarySource(BUNDLED_BOUNDARIES_PATH)),
      });
      const result = await client.query().withLimit(5).fetch();

      expect(result.success ? result.data.count : null).toBe(0);
      expect(fetchMock).toHaveBeenCalledWith(
        `${TEST_BASE_URL}?format=geojson&limit=5`,
        expect.objectContaining({
          headers: expect.objectContaining({ 'User-Agent': 'test-agent/1.0' }),
        })
      );
    });
  });
});
