/**
 * Countries Command
 *
 * List the country codes available for --country filtering.
 *
 * Usage:
 *   quake-query countries [--format table|json|ndjson]
 *
 * @module cli/commands/countries
 */

import type { CommandContext } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import {
  OUTPUT_FORMATS,
  formatOutput,
  isOutputFormat,
  printError,
  printOutput,
  type TableColumn,
} from '../lib/output.js';

export interface CountriesOptions {
  format?: string;
}

const COUNTRY_COLUMNS: TableColumn[] = [
  { key: 'code', header: 'Code' },
  { key: 'name', header: 'Name' },
  { key: 'polygons', header: 'Polygons', align: 'right' },
];

/**
 * Execute the countries command
 */
export function countriesCommand(options: CountriesOptions, context: CommandContext): ExitCode {
  const { logger } = context;
  logger.commandStart('countries');

  const format = options.format ?? (context.json ? 'json' : 'table');
  if (!isOutputFormat(format)) {
    printError(`Invalid format "${format}" (expected ${OUTPUT_FORMATS.join('|')})`);
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }

  const rows = context.client.boundaries
    .countries()
    .map((country) => ({
      code: country.code,
      name: country.name,
      polygons: country.polygons.length,
    }))
    .sort((a, b) => a.code.localeCompare(b.code));

  printOutput(formatOutput(rows, format, COUNTRY_COLUMNS));
  logger.commandEnd(true, { countries: rows.length });
  return EXIT_CODES.SUCCESS;
}
