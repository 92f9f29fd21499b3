/**
 * Dependencies handed to every command
 *
 * @module cli/lib/context
 */

import type { EarthquakeClient } from '../../services/earthquake-client.js';
import type { CLILogger } from './logger.js';

export interface CommandContext {
  readonly client: EarthquakeClient;
  readonly logger: CLILogger;
  /** Global --json flag; commands default their format from it */
  readonly json: boolean;
}
