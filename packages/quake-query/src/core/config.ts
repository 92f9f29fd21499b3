/**
 * Quake Query Client Configuration
 *
 * Defaults for the feed endpoint, transport and boundary dataset, with
 * environment overrides. Precedence (highest first):
 *
 * 1. Explicit overrides passed to loadClientConfig()
 * 2. Environment variables (QUAKE_QUERY_*)
 * 3. File values (the CLI's rc file)
 * 4. DEFAULT_CLIENT_CONFIG
 */

import { fileURLToPath } from 'node:url';

// ============================================================================
// Configuration Types
// ============================================================================

export interface QuakeQueryConfig {
  /** FDSN event query endpoint; `format=geojson` is added by the codec */
  readonly baseUrl: string;

  /** Request timeout in milliseconds */
  readonly timeoutMs: number;

  /** Transport retries for retryable statuses (0 = fail on first error) */
  readonly maxRetries: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** GeoJSON FeatureCollection of country outlines */
  readonly boundariesPath: string;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Coarse country outlines shipped with the package
 */
export const BUNDLED_BOUNDARIES_PATH = fileURLToPath(
  new URL('../../data/country-boundaries.geojson', import.meta.url)
);

export const DEFAULT_CLIENT_CONFIG: QuakeQueryConfig = {
  baseUrl: 'https://earthquake.usgs.gov/fdsnws/event/1/query',
  timeoutMs: 30000,
  maxRetries: 0,
  userAgent: 'quake-query/0.1',
  boundariesPath: BUNDLED_BOUNDARIES_PATH,
};

// ============================================================================
// Environment
// ============================================================================

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`QUAKE_QUERY_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Get non-negative integer environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) || num < 0 ? undefined : num;
}

/**
 * Resolve client configuration from defaults, file values, env and overrides
 */
export function loadClientConfig(
  overrides: Partial<QuakeQueryConfig> = {},
  fileConfig: Partial<QuakeQueryConfig> = {}
): QuakeQueryConfig {
  return {
    baseUrl:
      overrides.baseUrl ??
      getEnvVar('BASE_URL') ??
      fileConfig.baseUrl ??
      DEFAULT_CLIENT_CONFIG.baseUrl,
    timeoutMs:
      overrides.timeoutMs ??
      getEnvNumber('TIMEOUT_MS') ??
      fileConfig.timeoutMs ??
      DEFAULT_CLIENT_CONFIG.timeoutMs,
    maxRetries:
      overrides.maxRetries ??
      getEnvNumber('MAX_RETRIES') ??
      fileConfig.maxRetries ??
      DEFAULT_CLIENT_CONFIG.maxRetries,
    userAgent:
      overrides.userAgent ??
      getEnvVar('USER_AGENT') ??
      fileConfig.userAgent ??
      DEFAULT_CLIENT_CONFIG.userAgent,
    boundariesPath:
      overrides.boundariesPath ??
      getEnvVar('BOUNDARIES') ??
      fileConfig.boundariesPath ??
      DEFAULT_CLIENT_CONFIG.boundariesPath,
  };
}
