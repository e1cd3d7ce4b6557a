/**
 * Error hierarchy for the global options subsystem.
 *
 * Every kind aborts the run before any build or execution work begins; none is
 * retried and none is silently replaced by a default.
 *
 * This module has no internal dependencies (leaf module).
 */

export type OptionsErrorKind = 'schema' | 'invalid-enum-value' | 'validation';

/**
 * Base class for all option errors
 */
export abstract class OptionsError extends Error {
  abstract readonly kind: OptionsErrorKind;

  constructor(message: string) {
    super(message);
    this.name = 'OptionsError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export type SchemaErrorCode = 'DUPLICATE_OPTION' | 'MALFORMED_OPTION' | 'PHASE_ORDER';

/**
 * A broken option declaration. Raised at registration time; fatal at startup.
 */
export class SchemaError extends OptionsError {
  readonly kind = 'schema' as const;

  constructor(
    readonly code: SchemaErrorCode,
    message: string,
    readonly flag?: string
  ) {
    super(message);
    this.name = 'SchemaError';
  }
}

/**
 * A string that is not a member of the enum it was parsed as
 */
export class InvalidEnumValueError extends OptionsError {
  readonly kind = 'invalid-enum-value' as const;

  constructor(
    readonly enumName: string,
    readonly value: string,
    readonly allowed: readonly string[]
  ) {
    super(
      `Invalid value "${value}" for ${enumName}. Must be one of: ${allowed.map((v) => `"${v}"`).join(', ')}`
    );
    this.name = 'InvalidEnumValueError';
  }
}

export type ValidationErrorCode =
  | 'MISSING_DEPENDENCY'
  | 'INVALID_VALUE'
  | 'UNKNOWN_OPTION'
  | 'REMOVED_OPTION';

/**
 * User-facing configuration error raised after values are resolved
 */
export class ValidationError extends OptionsError {
  readonly kind = 'validation' as const;

  constructor(
    readonly code: ValidationErrorCode,
    message: string,
    /** The flag whose value triggered the error */
    readonly flag: string,
    /** For MISSING_DEPENDENCY, the flag that must also be set */
    readonly missing?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Narrow an unknown thrown value to an OptionsError
 */
export function isOptionsError(value: unknown): value is OptionsError {
  return value instanceof OptionsError;
}
