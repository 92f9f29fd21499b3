/**
 * CLI Command Tests
 *
 * Commands run against an EarthquakeClient with an in-process transport and
 * the synthetic boundary set; console output is captured.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { searchCommand } from '../../../cli/commands/search.js';
import { containsCommand } from '../../../cli/commands/contains.js';
import { countriesCommand } from '../../../cli/commands/countries.js';
import type { CommandContext } from '../../../cli/lib/context.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { EarthquakeClient } from '../../../services/earthquake-client.js';
import { TimeoutError } from '../../../core/types/errors.js';
import { err } from '../../../core/types/result.js';
import { createTestIndex } from '../../fixtures/boundaries.js';
import { TEST_BASE_URL, createFakeTransport, feature, feedBody, sentParams } from '../../fixtures/feed.js';

const FEED = feedBody([
  feature({ id: 'aa-1', lat: 5, lng: 5, mag: 5.2, depth: 10, time: Date.UTC(2024, 11, 5, 12, 30) }),
  feature({ id: 'far', lat: 50, lng: 50, mag: 6.1 }),
]);

function createContext(options: { json?: boolean; body?: string } = {}) {
  const fake = createFakeTransport(options.body ?? FEED);
  const context: CommandContext = {
    client: new EarthquakeClient({
      config: { baseUrl: TEST_BASE_URL },
      transport: fake.transport,
      boundaries: createTestIndex(),
    }),
    logger: createCLILogger({ level: 'error', json: true }),
    json: options.json ?? false,
  };
  return { context, send: fake.send };
}

let log: ReturnType<typeof spyOnLog>;
let error: ReturnType<typeof spyOnError>;

function spyOnLog() {
  return vi.spyOn(console, 'log').mockImplementation(() => {});
}

function spyOnError() {
  return vi.spyOn(console, 'error').mockImplementation(() => {});
}

function printed(): string[] {
  return log.mock.calls.map((call) => String(call[0]));
}

describe('searchCommand', () => {
  beforeEach(() => {
    log = spyOnLog();
    error = spyOnError();
  });

  it('prints a table in the requested offset', async () => {
    const { context, send } = createContext();

    const code = await searchCommand(
      {
        start: '2024-12-01',
        end: '2024-12-31T23:59',
        utcOffset: '+03:00',
        minMagnitude: 5,
        country: 'aa',
      },
      context
    );

    expect(code).toBe(0);

    const params = sentParams(send);
    expect(params.get('starttime')).toBe('2024-11-30T21:00:00Z');
    expect(params.get('endtime')).toBe('2024-12-31T20:59:00Z');
    expect(params.get('minmagnitude')).toBe('5');

    const [table, blank, summary] = printed();
    expect(table?.split('\n')).toEqual([
      'Time                   | Mag | Depth | Alert |   Lat |   Lng | Place     ',
      '-----------------------+-----+-------+-------+-------+-------+-----------',
      '2024-12-05T15:30+03:00 | 5.2 |  10.0 | -     | 5.000 | 5.000 | Test place',
    ]);
    expect(blank).toBe('');
    expect(summary).toBe('1 earthquake in AA');
  });

  it('prints UTC times without an offset', async () => {
    const { context } = createContext();

    await searchCommand({ start: '2024-12-01T00:00', utcOffset: 'Z' }, context);
    await searchCommand({}, context);

    const secondTable = printed()[3];
    expect(secondTable?.split('\n')[2]?.startsWith('2024-12-05T12:30:00Z | 5.2 |')).toBe(true);
    expect(printed()[5]).toBe('2 earthquakes');
  });

  it('prints JSON when the global flag is set', async () => {
    const { context } = createContext({ json: true });

    const code = await searchCommand(
      { start: '2024-12-01', utcOffset: '+03:00', country: 'AA' },
      context
    );

    expect(code).toBe(0);
    const output: unknown = JSON.parse(printed()[0] ?? '');
    expect(output).toMatchObject({
      count: 1,
      query: { startTime: '2024-11-30T21:00:00Z', countryCode: 'AA' },
      metadata: { count: 1 },
      records: [{ id: 'aa-1', magnitude: 5.2, epicenter: { lat: 5, lng: 5 } }],
    });
  });

  it('prints one line per record for ndjson', async () => {
    const { context } = createContext();

    await searchCommand({ format: 'ndjson' }, context);

    const lines = (printed()[0] ?? '').split('\n');
    expect(lines).toHaveLength(2);
    expect(lines.map((line): unknown => JSON.parse(line))).toMatchObject([{ id: 'aa-1' }, { id: 'far' }]);
  });

  describe('failures', () => {
    it('rejects reversed magnitudes before any request', async () => {
      const { context, send } = createContext();

      const code = await searchCommand({ minMagnitude: 7, maxMagnitude: 3 }, context);

      expect(code).toBe(2);
      expect(error).toHaveBeenCalledWith('Error: Minimum magnitude 7 exceeds maximum magnitude 3');
      expect(send).not.toHaveBeenCalled();
    });

    it('rejects an unknown country', async () => {
      const { context, send } = createContext();

      expect(await searchCommand({ country: 'ZZ' }, context)).toBe(2);
      expect(error).toHaveBeenCalledWith('Error: Unknown country code: ZZ');
      expect(send).not.toHaveBeenCalled();
    });

    it('rejects unparseable dates', async () => {
      const { context } = createContext();

      expect(await searchCommand({ start: 'yesterday' }, context)).toBe(2);
      expect(error).toHaveBeenCalledWith(
        'Error: Expected YYYY-MM-DD or YYYY-MM-DDTHH:mm, got "yesterday"'
      );
    });

    it('rejects impossible dates', async () => {
      const { context } = createContext();

      expect(await searchCommand({ start: '2024-02-30', utcOffset: 'Z' }, context)).toBe(2);
      expect(error).toHaveBeenCalledWith('Error: day must be an integer in 1..29 for 2024-02, got 30');
    });

    it('rejects unknown option values', async () => {
      const { context } = createContext();

      expect(await searchCommand({ alertLevel: 'purple' }, context)).toBe(2);
      expect(error).toHaveBeenCalledWith(
        'Error: Invalid alert level "purple" (expected none|green|yellow|orange|red|all)'
      );

      expect(await searchCommand({ orderBy: 'depth' }, context)).toBe(2);
      expect(error).toHaveBeenCalledWith(
        'Error: Invalid order "depth" (expected time|time-asc|magnitude|magnitude-asc)'
      );

      expect(await searchCommand({ format: 'csv' }, context)).toBe(2);
      expect(error).toHaveBeenCalledWith('Error: Invalid format "csv" (expected table|json|ndjson)');
    });

    it('exits 4 on a timeout', async () => {
      const { context, send } = createContext();
      send.mockResolvedValueOnce(err(new TimeoutError(TEST_BASE_URL, 30000)));

      expect(await searchCommand({}, context)).toBe(4);
      expect(error).toHaveBeenCalledWith(`Error: Request timeout after 30000ms: ${TEST_BASE_URL}`);
    });

    it('exits 5 on a malformed response', async () => {
      const { context } = createContext({ body: 'not json' });
      expect(await searchCommand({}, context)).toBe(5);
    });
  });
});

describe('containsCommand', () => {
  beforeEach(() => {
    log = spyOnLog();
    error = spyOnError();
  });

  it('reports a point inside', () => {
    const { context } = createContext();
    expect(containsCommand({ lat: '5', lng: '5', country: 'aa' }, context)).toBe(0);
    expect(printed()).toEqual(['(5, 5) is inside AA (Squareland)']);
  });

  it('reports a point outside', () => {
    const { context } = createContext();
    containsCommand({ lat: '50', lng: '5', country: 'AA' }, context);
    expect(printed()).toEqual(['(50, 5) is outside AA (Squareland)']);
  });

  it('prints JSON when the global flag is set', () => {
    const { context } = createContext({ json: true });
    containsCommand({ lat: '-17', lng: '-179.5', country: 'fj' }, context);
    expect(printed()).toEqual(['{"lat":-17,"lng":-179.5,"country":"FJ","inside":true}']);
  });

  it('rejects invalid coordinates', () => {
    const { context } = createContext();
    expect(containsCommand({ lat: 'abc', lng: '5', country: 'AA' }, context)).toBe(2);
    expect(containsCommand({ lat: '', lng: '5', country: 'AA' }, context)).toBe(2);
    expect(containsCommand({ lat: '5', lng: '181', country: 'AA' }, context)).toBe(2);
    expect(error).toHaveBeenCalledWith('Error: Invalid coordinates: abc, 5');
    expect(log).not.toHaveBeenCalled();
  });

  it('rejects an unknown country', () => {
    const { context } = createContext();
    expect(containsCommand({ lat: '5', lng: '5', country: 'ZZ' }, context)).toBe(2);
    expect(error).toHaveBeenCalledWith('Error: Unknown country code: ZZ');
  });
});

describe('countriesCommand', () => {
  beforeEach(() => {
    log = spyOnLog();
    error = spyOnError();
  });

  it('lists countries as a table', () => {
    const { context } = createContext();

    expect(countriesCommand({}, context)).toBe(0);

    const lines = (printed()[0] ?? '').split('\n');
    expect(lines[0]).toBe('Code | Name       | Polygons');
    expect(lines.slice(2)).toEqual([
      'AA   | Squareland |        1',
      'BB   | Holeland   |        1',
      'CC   | Overlap    |        1',
      'FJ   | Fiji       |        1',
      'MP   | Islands    |        2',
    ]);
  });

  it('lists countries as JSON', () => {
    const { context } = createContext({ json: true });

    countriesCommand({}, context);

    const rows: unknown = JSON.parse(printed()[0] ?? '');
    expect(rows).toEqual([
      { code: 'AA', name: 'Squareland', polygons: 1 },
      { code: 'BB', name: 'Holeland', polygons: 1 },
      { code: 'CC', name: 'Overlap', polygons: 1 },
      { code: 'FJ', name: 'Fiji', polygons: 1 },
      { code: 'MP', name: 'Islands', polygons: 2 },
    ]);
  });

  it('rejects an unknown format', () => {
    const { context } = createContext();
    expect(countriesCommand({ format: 'xml' }, context)).toBe(2);
    expect(error).toHaveBeenCalledWith('Error: Invalid format "xml" (expected table|json|ndjson)');
  });
});
