/**
 * Tests for exit codes
 */

import { describe, it, expect } from 'vitest';
import { ExitCode, exitCodeForErrorKind, getExitCodeDescription } from './exit-codes';
import { InvalidEnumValueError, SchemaError, ValidationError } from '../errors/options-error';

describe('exitCodeForErrorKind', () => {
  it('should give each error kind its own code', () => {
    expect(exitCodeForErrorKind(new SchemaError('DUPLICATE_OPTION', 'dup').kind)).toBe(ExitCode.SCHEMA_ERROR);
    expect(exitCodeForErrorKind(new InvalidEnumValueError('E', 'x', ['a']).kind)).toBe(
      ExitCode.INVALID_ENUM_VALUE
    );
    expect(exitCodeForErrorKind(new ValidationError('UNKNOWN_OPTION', 'unknown', '--x').kind)).toBe(
      ExitCode.VALIDATION_ERROR
    );
  });

  it('should never map an error to success', () => {
    for (const kind of ['schema', 'invalid-enum-value', 'validation'] as const) {
      expect(exitCodeForErrorKind(kind)).not.toBe(ExitCode.SUCCESS);
    }
  });
});

describe('getExitCodeDescription', () => {
  it('should describe every code', () => {
    expect(getExitCodeDescription(ExitCode.SUCCESS)).toBe('Successful execution');
    expect(getExitCodeDescription(ExitCode.SCHEMA_ERROR)).toBe('Option schema registration failed');
    expect(getExitCodeDescription(ExitCode.VALIDATION_ERROR)).toBe('Option configuration is invalid');
  });
});
