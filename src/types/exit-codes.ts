/**
 * Standardized exit codes
 * Every options failure aborts the run before any build work starts
 */

import type { OptionsErrorKind } from '../errors/options-error';

export const ExitCode = {
  /** Successful execution */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** The option schema itself is broken (duplicate or malformed registration) */
  SCHEMA_ERROR: 2,
  /** A user-supplied value is not a member of its enum */
  INVALID_ENUM_VALUE: 3,
  /** Option values are individually or jointly invalid */
  VALIDATION_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.SCHEMA_ERROR:
      return 'Option schema registration failed';
    case ExitCode.INVALID_ENUM_VALUE:
      return 'Option value is not one of the allowed choices';
    case ExitCode.VALIDATION_ERROR:
      return 'Option configuration is invalid';
    default:
      return 'Unknown exit code';
  }
}

/**
 * Exit code for an options failure of the given kind
 */
export function exitCodeForErrorKind(kind: OptionsErrorKind): ExitCode {
  switch (kind) {
    case 'schema':
      return ExitCode.SCHEMA_ERROR;
    case 'invalid-enum-value':
      return ExitCode.INVALID_ENUM_VALUE;
    case 'validation':
      return ExitCode.VALIDATION_ERROR;
  }
}
