/**
 * Tests for BufferLogger
 */

import { describe, it, expect } from 'vitest';
import { BufferLogger } from './buffer-logger';

describe('BufferLogger', () => {
  it('should capture every level by default', () => {
    const logger = new BufferLogger();
    logger.trace('t');
    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');
    expect(logger.getEvents().map((e) => e.level)).toEqual(['trace', 'debug', 'info', 'warn', 'error']);
  });

  it('should drop events below the minimum level', () => {
    const logger = new BufferLogger({ minLevel: 'warn' });
    logger.info('hidden');
    logger.warn('shown');
    expect(logger.getEvents().map((e) => e.message)).toEqual(['shown']);
  });

  it('should log structured events at their mapped level', () => {
    const logger = new BufferLogger();
    logger.event('option_deprecated', 'old option');
    logger.event('options_validation_failed', 'bad');
    logger.event('options_registered', 'registered');
    logger.event('options_resolved', 'resolved');
    expect(logger.getEvents().map((e) => [e.eventType, e.level])).toEqual([
      ['option_deprecated', 'warn'],
      ['options_validation_failed', 'error'],
      ['options_registered', 'debug'],
      ['options_resolved', 'info'],
    ]);
  });

  it('should merge context into metadata', () => {
    const logger = new BufferLogger();
    logger.setContext({ scope: '' });
    logger.info('message', { flag: '--level' });
    expect(logger.getLastEvent()?.metadata).toEqual({ scope: '', flag: '--level' });

    logger.clearContext();
    logger.info('again');
    expect(logger.getLastEvent()?.metadata).toEqual({});
  });

  it('should share events with child loggers', () => {
    const logger = new BufferLogger();
    const child = logger.child({ phase: 'BOOTSTRAP_REGISTERED' });
    child.info('from child');
    expect(logger.getEvents()).toHaveLength(1);
    expect(logger.getLastEvent()?.metadata.phase).toBe('BOOTSTRAP_REGISTERED');
  });

  it('should redact secrets in messages and metadata', () => {
    const logger = new BufferLogger();
    logger.info('using Bearer abcdefgh', { header: 'token=supersecretvalue' });
    const event = logger.getLastEvent();
    expect(event?.message).toBe('using Bea[REDACTED]');
    expect(event?.metadata.header).toBe('toke[REDACTED]');
  });

  it('should filter and clear', () => {
    const logger = new BufferLogger();
    logger.warn('w');
    logger.event('unknown_option_ignored', 'skip');
    expect(logger.getEventsByLevel('warn')).toHaveLength(2);
    expect(logger.getEventsByType('unknown_option_ignored')).toHaveLength(1);
    logger.clear();
    expect(logger.getEvents()).toEqual([]);
    expect(logger.hasEventType('warn')).toBe(false);
  });
});
