#!/usr/bin/env tsx
/**
 * Quake Query CLI Entry Point
 *
 * Search the USGS earthquake feed with client-side country filtering, and
 * inspect the bundled boundary dataset.
 *
 * @module quake-query-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, validateConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { isQuakeQueryError } from '../src/core/types/errors.js';
import { EarthquakeClient } from '../src/services/earthquake-client.js';

import type { CommandContext } from '../src/cli/lib/context.js';
import { searchCommand, type SearchOptions } from '../src/cli/commands/search.js';
import { containsCommand } from '../src/cli/commands/contains.js';
import { countriesCommand, type CountriesOptions } from '../src/cli/commands/countries.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  client: EarthquakeClient;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

async function initializeContext(options: {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  timeout?: number;
}): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'warn',
    json: config.json,
  });

  const client = new EarthquakeClient({ config: config.client });

  logger.debug('Configuration loaded', {
    configPath: config.configPath,
    baseUrl: config.client.baseUrl,
    boundaries: config.client.boundariesPath,
  });

  globalContext = { config, logger, client, startTime };
  return globalContext;
}

function commandContext(): CommandContext {
  const { client, logger, config } = getGlobalContext();
  return { client, logger, json: config.json };
}

function exitWith(code: number): void {
  if (code !== EXIT_CODES.SUCCESS) {
    process.exit(code);
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('quake-query')
    .description('Search the USGS earthquake feed, filtered by time, magnitude, alert level and country')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .quake-queryrc)')
    .option('--timeout <ms>', 'Request timeout in milliseconds', parseInt)
    .hook('preAction', async (thisCommand) => {
      const options = thisCommand.opts();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('search')
    .description('Query earthquakes')
    .option('--start <datetime>', 'Start time, local YYYY-MM-DD[THH:mm]')
    .option('--end <datetime>', 'End time, local YYYY-MM-DD[THH:mm]')
    .option('--utc-offset <offset>', 'UTC offset for --start/--end (Z, +03:00, -0530)')
    .option('--min-magnitude <n>', 'Minimum magnitude (0-10)', parseFloat)
    .option('--max-magnitude <n>', 'Maximum magnitude (0-10)', parseFloat)
    .option('--alert-level <level>', 'Alert level: none|green|yellow|orange|red|all')
    .option('--order-by <order>', 'Order: time|time-asc|magnitude|magnitude-asc')
    .option('--country <code>', 'ISO-3166 alpha-2 country code (client-side filter)')
    .option('--limit <n>', 'Max events requested from the feed', parseInt)
    .option('--format <fmt>', 'Output format: table|json|ndjson')
    .action(async (options: SearchOptions) => {
      const exitCode = await searchCommand(options, commandContext());
      exitWith(exitCode);
    });

  program
    .command('contains <lat> <lng> <country>')
    .description('Test whether a coordinate lies inside a country boundary')
    .action((lat: string, lng: string, country: string) => {
      exitWith(containsCommand({ lat, lng, country }, commandContext()));
    });

  program
    .command('countries')
    .description('List country codes in the boundary dataset')
    .option('--format <fmt>', 'Output format: table|json|ndjson')
    .action((options: CountriesOptions) => {
      exitWith(countriesCommand(options, commandContext()));
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: message,
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${message}`);
    }
    // A corrupt boundary dataset surfaces here as a thrown BoundaryDataError
    process.exit(isQuakeQueryError(error) ? exitCodeFor(error) : EXIT_CODES.ERRORS);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
