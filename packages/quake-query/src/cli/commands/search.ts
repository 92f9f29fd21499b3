/**
 * Search Command
 *
 * Query the feed and print matching earthquakes.
 *
 * Usage:
 *   quake-query search [options]
 *
 * Options:
 *   --start <datetime>        Lower bound, local wall-clock YYYY-MM-DD[THH:mm]
 *   --end <datetime>          Upper bound, local wall-clock YYYY-MM-DD[THH:mm]
 *   --utc-offset <offset>     Offset for --start/--end (Z, +03:00); system zone if omitted
 *   --min-magnitude <n>       Minimum magnitude (0-10)
 *   --max-magnitude <n>       Maximum magnitude (0-10)
 *   --alert-level <level>     none|green|yellow|orange|red|all
 *   --order-by <order>        time|time-asc|magnitude|magnitude-asc
 *   --country <code>          ISO-3166 alpha-2; filters epicenters client-side
 *   --limit <n>               Max events requested from the feed
 *   --format <fmt>            Output format: table|json|ndjson
 *
 * @module cli/commands/search
 */

import type { EarthquakeRecord, ResultSet } from '../../core/types/earthquake.js';
import type { QuakeQueryError } from '../../core/types/errors.js';
import { ALERT_LEVELS, ORDER_BY_VALUES, isAlertLevel, isOrderBy } from '../../core/types/query.js';
import {
  formatLocalInstant,
  formatUtcInstant,
  parseLocalDateTime,
  parseUtcOffset,
} from '../../core/time-normalizer.js';
import type { CommandContext } from '../lib/context.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import {
  OUTPUT_FORMATS,
  formatJson,
  formatNdjson,
  formatTable,
  formatters,
  isOutputFormat,
  printError,
  printOutput,
  type OutputFormat,
  type TableColumn,
} from '../lib/output.js';

/**
 * Search command options (raw commander values)
 */
export interface SearchOptions {
  start?: string;
  end?: string;
  utcOffset?: string;
  minMagnitude?: number;
  maxMagnitude?: number;
  alertLevel?: string;
  orderBy?: string;
  country?: string;
  limit?: number;
  format?: string;
}

const EVENT_COLUMNS: TableColumn[] = [
  { key: 'time', header: 'Time' },
  { key: 'magnitude', header: 'Mag', align: 'right', formatter: formatters.fixed(1) },
  { key: 'depthKm', header: 'Depth', align: 'right', formatter: formatters.fixed(1) },
  { key: 'alertLevel', header: 'Alert', formatter: formatters.optional },
  { key: 'lat', header: 'Lat', align: 'right', formatter: formatters.fixed(3) },
  { key: 'lng', header: 'Lng', align: 'right', formatter: formatters.fixed(3) },
  { key: 'place', header: 'Place', formatter: formatters.truncate(40) },
];

/**
 * Execute the search command
 */
export async function searchCommand(
  options: SearchOptions,
  context: CommandContext
): Promise<ExitCode> {
  const { client, logger } = context;
  logger.commandStart('search', { ...options });

  const format = options.format ?? (context.json ? 'json' : 'table');
  if (!isOutputFormat(format)) {
    return usageError(`Invalid format "${format}" (expected ${OUTPUT_FORMATS.join('|')})`, context);
  }

  let offsetMinutes: number | undefined;
  if (options.utcOffset !== undefined) {
    const offset = parseUtcOffset(options.utcOffset);
    if (!offset.success) {
      return queryError(offset.error, context);
    }
    offsetMinutes = offset.data;
  }

  let builder = client.query();

  if (options.start !== undefined) {
    const start = parseLocalDateTime(options.start);
    if (!start.success) {
      return queryError(start.error, context);
    }
    builder = builder.withStartTime(start.data, offsetMinutes);
  }

  if (options.end !== undefined) {
    const end = parseLocalDateTime(options.end);
    if (!end.success) {
      return queryError(end.error, context);
    }
    builder = builder.withEndTime(end.data, offsetMinutes);
  }

  if (options.minMagnitude !== undefined) {
    builder = builder.withMinMagnitude(options.minMagnitude);
  }
  if (options.maxMagnitude !== undefined) {
    builder = builder.withMaxMagnitude(options.maxMagnitude);
  }

  if (options.alertLevel !== undefined) {
    if (!isAlertLevel(options.alertLevel)) {
      return usageError(
        `Invalid alert level "${options.alertLevel}" (expected ${ALERT_LEVELS.join('|')})`,
        context
      );
    }
    builder = builder.withAlertLevel(options.alertLevel);
  }

  if (options.orderBy !== undefined) {
    if (!isOrderBy(options.orderBy)) {
      return usageError(
        `Invalid order "${options.orderBy}" (expected ${ORDER_BY_VALUES.join('|')})`,
        context
      );
    }
    builder = builder.withOrderBy(options.orderBy);
  }

  if (options.country !== undefined) {
    builder = builder.withCountryCode(options.country);
  }
  if (options.limit !== undefined) {
    builder = builder.withLimit(options.limit);
  }

  const result = await builder.fetch();
  if (!result.success) {
    return queryError(result.error, context);
  }

  render(result.data, format, offsetMinutes);
  logger.commandEnd(true, { count: result.data.count });
  return EXIT_CODES.SUCCESS;
}

function render(resultSet: ResultSet, format: OutputFormat, offsetMinutes?: number): void {
  switch (format) {
    case 'json':
      printOutput(
        formatJson({
          count: resultSet.count,
          query: describeQuery(resultSet),
          metadata: resultSet.metadata,
          records: resultSet.records,
        })
      );
      return;

    case 'ndjson':
      if (resultSet.count > 0) {
        printOutput(formatNdjson(resultSet.records));
      }
      return;

    case 'table': {
      const rows = resultSet.records.map((record) => toRow(record, offsetMinutes));
      printOutput(formatTable(rows, EVENT_COLUMNS));
      printOutput('');
      const country = resultSet.query.countryCode;
      printOutput(
        `${resultSet.count} earthquake${resultSet.count === 1 ? '' : 's'}` +
          (country ? ` in ${country}` : '')
      );
      return;
    }
  }
}

function toRow(record: EarthquakeRecord, offsetMinutes?: number): Record<string, unknown> {
  return {
    time:
      offsetMinutes === undefined
        ? formatUtcInstant(record.time)
        : formatLocalInstant(record.time, offsetMinutes),
    magnitude: record.magnitude,
    depthKm: record.depthKm,
    alertLevel: record.alertLevel,
    lat: record.epicenter.lat,
    lng: record.epicenter.lng,
    place: record.place,
  };
}

/**
 * Query echo with readable instants
 */
function describeQuery(resultSet: ResultSet): Record<string, unknown> {
  const { startTime, endTime, ...rest } = resultSet.query;
  return {
    ...(startTime !== undefined && { startTime: formatUtcInstant(startTime) }),
    ...(endTime !== undefined && { endTime: formatUtcInstant(endTime) }),
    ...rest,
  };
}

function queryError(error: QuakeQueryError, context: CommandContext): ExitCode {
  printError(error.message);
  context.logger.commandEnd(false, { code: error.code });
  return exitCodeFor(error);
}

function usageError(message: string, context: CommandContext): ExitCode {
  printError(message);
  context.logger.commandEnd(false);
  return EXIT_CODES.ERRORS;
}
