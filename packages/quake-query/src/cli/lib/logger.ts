/**
 * CLI Logging
 *
 * Wraps the library Logger with the running command and its duration.
 * `--json` switches to JSON lines; otherwise one readable line per entry.
 *
 * Command results are printed through cli/lib/output, not through here.
 *
 * @module cli/lib/logger
 */

import { Logger, type LogLevel, type LogMetadata } from '../../core/utils/logger.js';

export interface CLILoggerOptions {
  /** Minimum log level to output (default: info) */
  readonly level?: LogLevel;
  /** Output as JSON */
  readonly json?: boolean;
}

export class CLILogger {
  private readonly logger: Logger;
  private command: string | null = null;
  private startTime = Date.now();

  constructor(options: CLILoggerOptions = {}) {
    this.logger = new Logger({
      level: options.level ?? 'info',
      service: 'quake-query',
      pretty: !(options.json ?? false),
    });
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.logger.debug(message, this.withCommand(metadata));
  }

  info(message: string, metadata?: LogMetadata): void {
    this.logger.info(message, this.withCommand(metadata));
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.logger.warn(message, this.withCommand(metadata));
  }

  error(message: string, metadata?: LogMetadata): void {
    this.logger.error(message, this.withCommand(metadata));
  }

  /**
   * Start timing a command (debug: the result itself is the normal output)
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.startTime = Date.now();
    this.debug(`Starting ${command}`, options);
  }

  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const withDuration = { duration_ms: Date.now() - this.startTime, ...metadata };

    if (success) {
      this.debug('Command completed', withDuration);
    } else {
      this.error('Command failed', withDuration);
    }
  }

  private withCommand(metadata?: LogMetadata): LogMetadata {
    return {
      ...(this.command !== null ? { command: this.command } : {}),
      ...metadata,
    };
  }
}

export function createCLILogger(options: CLILoggerOptions = {}): CLILogger {
  return new CLILogger(options);
}
