/**
 * Quake Query CLI Configuration Management
 *
 * Loads configuration from .quake-queryrc (YAML or JSON) with environment
 * variable overrides and sensible defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (QUAKE_QUERY_*)
 * 3. Config file (.quake-queryrc or --config path)
 * 4. Default values
 *
 * Example .quake-queryrc:
 * ```yaml
 * version: 1
 * client:
 *   base_url: https://earthquake.usgs.gov/fdsnws/event/1/query
 *   timeout_ms: 15000
 *   max_retries: 2
 *   boundaries: ./data/country-boundaries.geojson
 * ```
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { loadClientConfig, type QuakeQueryConfig } from '../../core/config.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  /** Resolved library configuration */
  readonly client: QuakeQueryConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    client: z
      .object({
        base_url: z.string().url().optional(),
        timeout_ms: z.number().int().positive().optional(),
        max_retries: z.number().int().min(0).max(10).optional(),
        user_agent: z.string().min(1).optional(),
        boundaries: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        json: z.boolean().optional(),
        verbose: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.quake-queryrc',
  '.quake-queryrc.yaml',
  '.quake-queryrc.yml',
  '.quake-queryrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, but keep JSON errors precise for .json files
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new Error(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty YAML document parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid';
    throw new Error(`Invalid config file ${filePath} (${where})`);
  }

  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`QUAKE_QUERY_${name}`];
  return value === '' ? undefined : value;
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the rc file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    timeout?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws Error when an explicit config file is missing or any config file is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (!existsSync(configPath)) {
        throw new Error(`Config file not found: ${configPath}`);
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const fileClient = fileConfig.client;
  // Relative dataset paths are relative to the file that names them
  const fileBoundaries =
    fileClient?.boundaries !== undefined && configPath !== null
      ? resolve(dirname(configPath), fileClient.boundaries)
      : undefined;

  const client = loadClientConfig(
    {
      ...(options.overrides?.timeout !== undefined && { timeoutMs: options.overrides.timeout }),
    },
    {
      ...(fileClient?.base_url !== undefined && { baseUrl: fileClient.base_url }),
      ...(fileClient?.timeout_ms !== undefined && { timeoutMs: fileClient.timeout_ms }),
      ...(fileClient?.max_retries !== undefined && { maxRetries: fileClient.max_retries }),
      ...(fileClient?.user_agent !== undefined && { userAgent: fileClient.user_agent }),
      ...(fileBoundaries !== undefined && { boundariesPath: fileBoundaries }),
    }
  );

  return {
    version: fileConfig.version ?? 1,
    client,
    verbose:
      options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? fileConfig.output?.verbose ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? fileConfig.output?.json ?? false,
    configPath,
  };
}

/**
 * Validate configuration
 *
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (!Number.isInteger(config.client.timeoutMs) || config.client.timeoutMs <= 0) {
    throw new Error(`Timeout must be a positive integer, got ${config.client.timeoutMs}`);
  }

  try {
    new URL(config.client.baseUrl);
  } catch {
    throw new Error(`Invalid base URL: ${config.client.baseUrl}`);
  }

  if (!existsSync(config.client.boundariesPath)) {
    throw new Error(`Boundary dataset not found: ${config.client.boundariesPath}`);
  }
}
