/**
 * Process exit codes and the error → exit code mapping
 *
 * @module cli/lib/exit-codes
 */

import type { QuakeQueryErrorCode } from '../../core/types/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const EXIT_CODE_BY_ERROR: Record<QuakeQueryErrorCode, ExitCode> = {
  INVALID_TIME: EXIT_CODES.ERRORS,
  TIME_RANGE: EXIT_CODES.ERRORS,
  MAGNITUDE_RANGE: EXIT_CODES.ERRORS,
  UNKNOWN_COUNTRY: EXIT_CODES.ERRORS,
  LIMIT_RANGE: EXIT_CODES.ERRORS,
  TRANSPORT: EXIT_CODES.NETWORK_ERROR,
  TIMEOUT: EXIT_CODES.NETWORK_ERROR,
  DECODE: EXIT_CODES.DATA_INTEGRITY_ERROR,
  BOUNDARY_DATA: EXIT_CODES.DATA_INTEGRITY_ERROR,
};

export function exitCodeFor(error: { readonly code: QuakeQueryErrorCode }): ExitCode {
  return EXIT_CODE_BY_ERROR[error.code];
}
