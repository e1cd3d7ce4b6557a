/**
 * Logger interface
 * Structured logging with event types and metadata
 */

/**
 * Log levels, in the same order and spelling as the `--level` option
 */
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Structured event types for the option lifecycle
 */
export type LogEventType =
  // Registration
  | 'options_registered'
  | 'option_deprecated'
  // Resolution
  | 'options_resolved'
  | 'option_value_rejected'
  | 'unknown_option_ignored'
  // Projection and validation
  | 'execution_options_built'
  | 'options_validated'
  | 'options_validation_failed'
  // General
  | 'trace'
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in all log events
 */
export interface LogMetadata {
  /** Option scope the event belongs to (the global scope is the empty string) */
  scope?: string;
  /** Registration phase that was active when the event was emitted */
  phase?: string;
  /** The option flag the event is about */
  flag?: string;
  [key: string]: unknown;
}

/**
 * A structured log event
 */
export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

/**
 * Options for configuring the logger
 */
export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Whether to use JSON format for output */
  jsonOutput?: boolean;
  /** Patterns to redact from log output */
  redactPatterns?: RegExp[];
}

/**
 * Interface for structured logging
 * Implementations can write to console or to a buffer (for testing)
 */
export interface Logger {
  trace(message: string, metadata?: LogMetadata): void;

  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Set context (scope, phase, ...) for all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;

  clearContext(): void;

  /**
   * Get all logged events (for testing/diagnostics)
   */
  getEvents(): LogEvent[];

  setMinLevel(level: LogLevel): void;

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVELS.indexOf(a) - LOG_LEVELS.indexOf(b);
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at
 */
export function levelForEvent(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'option_value_rejected':
    case 'options_validation_failed':
      return 'error';
    case 'warn':
    case 'option_deprecated':
    case 'unknown_option_ignored':
      return 'warn';
    case 'debug':
    case 'options_registered':
      return 'debug';
    case 'trace':
      return 'trace';
    default:
      return 'info';
  }
}

/**
 * Secret patterns that can show up in remote execution settings
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // Bearer tokens (as passed in --remote-execution-headers)
  /Bearer\s+[a-zA-Z0-9._~+/-]+=*/gi,
  // authorization=<value> style header entries
  /(?:authorization|x-api-key)[=:\s]+['"]?[^\s'",}]+['"]?/gi,
  // Generic secrets
  /(?:password|secret|token)[=:\s]+['"]?[^\s'",}]{8,}['"]?/gi,
];

/**
 * Redact secrets from a string using the given patterns
 */
export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    // Reset lastIndex for stateful regexes
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
