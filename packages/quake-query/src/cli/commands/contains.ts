/**
 * Contains Command
 *
 * Test a single coordinate against a country's boundary polygons.
 *
 * Usage:
 *   quake-query contains <lat> <lng> <country>
 *
 * @module cli/commands/contains
 */

import { isValidLatLng } from '../../core/geo-utils.js';
import { normalizeCountryCode } from '../../core/types/boundary.js';
import type { CommandContext } from '../lib/context.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { formatJson, printError, printOutput } from '../lib/output.js';

export interface ContainsArgs {
  readonly lat: string;
  readonly lng: string;
  readonly country: string;
}

/**
 * Execute the contains command
 */
export function containsCommand(args: ContainsArgs, context: CommandContext): ExitCode {
  const { logger } = context;
  const boundaries = context.client.boundaries;
  logger.commandStart('contains', { ...args });

  const point = { lat: parseCoordinate(args.lat), lng: parseCoordinate(args.lng) };
  if (!isValidLatLng(point)) {
    printError(`Invalid coordinates: ${args.lat}, ${args.lng}`);
    logger.commandEnd(false);
    return EXIT_CODES.ERRORS;
  }

  const result = boundaries.contains(point, args.country);
  if (!result.success) {
    printError(result.error.message);
    logger.commandEnd(false, { code: result.error.code });
    return exitCodeFor(result.error);
  }

  const code = normalizeCountryCode(args.country);
  const inside = result.data;

  if (context.json) {
    printOutput(formatJson({ lat: point.lat, lng: point.lng, country: code, inside }, false));
  } else {
    const name = boundaries.countries().find((country) => country.code === code)?.name ?? code;
    printOutput(
      `(${point.lat}, ${point.lng}) is ${inside ? 'inside' : 'outside'} ${code} (${name})`
    );
  }

  logger.commandEnd(true, { inside });
  return EXIT_CODES.SUCCESS;
}

function parseCoordinate(text: string): number {
  return text.trim() === '' ? NaN : Number(text);
}
