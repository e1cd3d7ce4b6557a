/**
 * Console Logger implementation
 * Structured logging with event types and metadata
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  levelForEvent,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from '../types/logger';

const BASIC_EVENT_TYPES: readonly LogEventType[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Console-based logger implementation
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private context: Partial<LogMetadata> = {};
  private events: LogEvent[] = [];
  private readonly options: LoggerOptions;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.options = {
      includeTimestamp: true,
      jsonOutput: false,
      redactPatterns: DEFAULT_REDACT_PATTERNS,
      ...options,
    };
  }

  trace(message: string, metadata?: LogMetadata): void {
    this.log('trace', 'trace', message, metadata);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(levelForEvent(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    const childLogger = new ConsoleLogger(this.options);
    childLogger.setContext({ ...this.context, ...additionalContext });
    childLogger.setMinLevel(this.minLevel);
    return childLogger;
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: this.redact(message),
      metadata: this.mergeMetadata(metadata),
    };

    this.events.push(event);
    this.output(event);
  }

  private mergeMetadata(metadata?: LogMetadata): LogMetadata {
    const merged = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = this.redact(value);
      }
    }
    return merged;
  }

  private redact(text: string): string {
    return redactSecrets(text, this.options.redactPatterns);
  }

  private output(event: LogEvent): void {
    const line = this.options.jsonOutput ? JSON.stringify(event) : this.formatPretty(event);

    if (event.level === 'error') {
      console.error(line);
    } else if (event.level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private formatPretty(event: LogEvent): string {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      const time = new Date(event.timestamp).toLocaleTimeString();
      parts.push(`[${time}]`);
    }

    parts.push(event.level.toUpperCase().padEnd(5));

    if (!BASIC_EVENT_TYPES.includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const { scope, phase, flag } = event.metadata;
    const metaParts: string[] = [];
    if (scope) metaParts.push(`scope=${scope}`);
    if (phase) metaParts.push(`phase=${phase}`);
    if (flag) metaParts.push(`flag=${flag}`);

    if (metaParts.length > 0) {
      parts.push(`{${metaParts.join(', ')}}`);
    }

    return parts.join(' ');
  }
}

/**
 * Create a console logger with optional options
 */
export function createConsoleLogger(options?: LoggerOptions): Logger {
  return new ConsoleLogger(options);
}
