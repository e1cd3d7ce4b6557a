/**
 * Types module - shared interfaces and types
 */

// Result type for typed error handling
export { ok, err, isOk, isErr, unwrap, map, andThen } from './result';
export type { Result, Ok, Err } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription, exitCodeForErrorKind } from './exit-codes';

// Logger
export {
  LOG_LEVELS,
  compareLogLevels,
  shouldLog,
  levelForEvent,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from './logger';
export type {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
} from './logger';

// Option model
export { isListValue, isDictValue, freezeOptionValue } from './option';
export type {
  OptionDefinition,
  OptionType,
  OptionKind,
  OptionValue,
  ScalarKind,
  ScalarValue,
  ValueSource,
} from './option';
