/**
 * Tests for option value resolution
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { resolveOptionValues, coerceOptionValue } from './resolve-values';
import { OptionRegistry } from '../options/option-registry';
import { option } from '../options/option-builder';
import { LogLevelEnum } from '../enums/option-enums';
import { BufferLogger } from '../logging/buffer-logger';
import { InvalidEnumValueError, SchemaError, ValidationError } from '../errors/options-error';

function createRegistry(): OptionRegistry {
  const registry = new OptionRegistry('test');
  registry.register(option('--level', '-l').enumOf(LogLevelEnum).default('info'));
  registry.register(option('--jobs').int().default(4));
  registry.register(option('--strategy').choices(['fast', 'slow']).default('fast'));
  registry.register(option('--paths').listOf('string'));
  registry.register(option('--headers').dict());
  registry.register(option('--verify-config').bool().default(true));
  registry.register(option('--old-flag').bool().deprecated('2.1.0.dev0', 'Use --jobs'));
  registry.markBootstrapRegistered();
  registry.markFullRegistered();
  return registry;
}

describe('resolveOptionValues', () => {
  let registry: OptionRegistry;
  let logger: BufferLogger;

  beforeEach(() => {
    registry = createRegistry();
    logger = new BufferLogger();
  });

  describe('defaults', () => {
    it('should use declared defaults when nothing is explicit', () => {
      const result = resolveOptionValues(registry, {});
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const values = result.value;
      expect(values.get('level')).toBe('info');
      expect(values.get('jobs')).toBe(4);
      expect(values.get('strategy')).toBe('fast');
      expect(values.get('paths')).toEqual([]);
      expect(values.get('headers')).toEqual({});
      expect(values.get('oldFlag')).toBe(false);
      expect(values.source('jobs')).toBe('default');
      expect(values.isExplicit('jobs')).toBe(false);
      expect(values.scope).toBe('test');
    });

    it('should evaluate default factories', () => {
      const computed = new OptionRegistry('test');
      computed.register(option('--computed').int().defaultFactory(() => 7));
      const result = resolveOptionValues(computed, {});
      expect(result.ok && result.value.get('computed')).toBe(7);
    });

    it('should reject a factory default that does not fit the type', () => {
      const computed = new OptionRegistry('test');
      computed.register(option('--computed').int().defaultFactory(() => 'seven'));
      const result = resolveOptionValues(computed, {});
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SchemaError);
        expect(result.error.message).toContain('Option --computed: computed default is invalid');
      }
    });
  });

  describe('explicit values', () => {
    it('should match keys by flag, alias and dest', () => {
      const result = resolveOptionValues(registry, { '-l': 'debug', '--jobs': 8, paths: ['a', 'b'] });
      expect(result.ok).toBe(true);
      if (!result.ok) return;

      expect(result.value.get('level')).toBe('debug');
      expect(result.value.get('jobs')).toBe(8);
      expect(result.value.get('paths')).toEqual(['a', 'b']);
      expect(result.value.isExplicit('level')).toBe(true);
      expect(result.value.source('paths')).toBe('explicit');
    });

    it('should reject an option given under two keys', () => {
      const result = resolveOptionValues(registry, { '--jobs': 8, jobs: 9 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toBe('Invalid value for --jobs: given more than once (last as "jobs")');
      }
    });

    it('should copy list values', () => {
      const paths = ['a'];
      const result = resolveOptionValues(registry, { '--paths': paths });
      paths.push('b');
      expect(result.ok && result.value.get('paths')).toEqual(['a']);
    });

    it('should accept a mapping for a dict option', () => {
      const result = resolveOptionValues(registry, { '--headers': { 'x-request-id': 'test-id' } });
      expect(result.ok && result.value.get('headers')).toEqual({ 'x-request-id': 'test-id' });
    });
  });

  describe('invalid values', () => {
    it('should reject an unknown enum member', () => {
      const result = resolveOptionValues(registry, { '--level': 'verbose' }, { logger });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidEnumValueError);
        expect(result.error.kind).toBe('invalid-enum-value');
      }
      expect(logger.hasEventType('option_value_rejected')).toBe(true);
      expect(logger.getLastEvent()?.metadata.flag).toBe('--level');
    });

    it('should reject a non-string enum value', () => {
      const result = resolveOptionValues(registry, { '--level': 3 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'Invalid value for --level: expected one of trace, debug, info, warn, error'
        );
      }
    });

    it('should reject a value of the wrong type', () => {
      const result = resolveOptionValues(registry, { '--jobs': 'eight' });
      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof ValidationError) {
        expect(result.error.code).toBe('INVALID_VALUE');
        expect(result.error.flag).toBe('--jobs');
      } else {
        throw new Error('expected a ValidationError');
      }
    });

    it('should reject a fractional int', () => {
      const result = resolveOptionValues(registry, { '--jobs': 2.5 });
      expect(result.ok).toBe(false);
    });

    it('should reject a list member of the wrong kind', () => {
      const result = resolveOptionValues(registry, { '--paths': ['a', 1] });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toContain('Invalid value for --paths: [1]');
      }
    });

    it('should report a value outside the choices as an enum error', () => {
      const result = resolveOptionValues(registry, { '--strategy': 'medium' });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidEnumValueError);
        expect(result.error.message).toBe(
          'Invalid value "medium" for --strategy. Must be one of: "fast", "slow"'
        );
      }
    });
  });

  describe('deprecated options', () => {
    it('should warn when a deprecated option is used', () => {
      const result = resolveOptionValues(registry, { '--old-flag': true }, { logger, toolVersion: '2.0.0' });
      expect(result.ok).toBe(true);

      const [event] = logger.getEventsByType('option_deprecated');
      expect(event.level).toBe('warn');
      expect(event.message).toBe(
        'DEPRECATED: option --old-flag will be removed in version 2.1.0.dev0. Use --jobs'
      );
      expect(event.metadata.flag).toBe('--old-flag');
    });

    it('should not warn when a deprecated option keeps its default', () => {
      resolveOptionValues(registry, {}, { logger, toolVersion: '2.0.0' });
      expect(logger.hasEventType('option_deprecated')).toBe(false);
    });

    it('should reject a deprecated option once its removal version is reached', () => {
      const result = resolveOptionValues(registry, { '--old-flag': true }, { toolVersion: '2.1.0.dev0' });
      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof ValidationError) {
        expect(result.error.code).toBe('REMOVED_OPTION');
        expect(result.error.message).toBe('Option --old-flag was removed in version 2.1.0.dev0. Use --jobs');
      } else {
        throw new Error('expected a ValidationError');
      }
    });

    it('should reject a tool version that cannot be parsed', () => {
      const result = resolveOptionValues(registry, {}, { toolVersion: 'latest' });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SchemaError);
        expect(result.error.message).toBe('Tool version "latest" is not a valid version');
      }
    });
  });

  describe('unknown keys', () => {
    it('should reject unknown keys by default', () => {
      const result = resolveOptionValues(registry, { '--nope': 1 });
      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof ValidationError) {
        expect(result.error.code).toBe('UNKNOWN_OPTION');
        expect(result.error.flag).toBe('--nope');
        expect(result.error.message).toBe('Unknown option --nope in scope "test"');
      } else {
        throw new Error('expected a ValidationError');
      }
    });

    it('should log and skip unknown keys when verify-config is off', () => {
      const result = resolveOptionValues(registry, { '--verify-config': false, '--nope': 1 }, { logger });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.has('nope')).toBe(false);
      }
      const [event] = logger.getEventsByType('unknown_option_ignored');
      expect(event.message).toBe('Ignoring unknown option --nope');
      expect(event.level).toBe('warn');
    });

    it('should skip ignored keys without logging them', () => {
      const result = resolveOptionValues(
        registry,
        { '--jobs': 2, '--loop': true },
        { logger, ignoredKeys: new Set(['--loop']) }
      );
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.get('jobs')).toBe(2);
        expect(result.value.has('loop')).toBe(false);
      }
      expect(logger.hasEventType('unknown_option_ignored')).toBe(false);
    });

    it('should reject unknown keys next to ignored ones', () => {
      const result = resolveOptionValues(
        registry,
        { '--loop': true, '--nope': 1 },
        { ignoredKeys: new Set(['--loop']) }
      );
      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof ValidationError) {
        expect(result.error.flag).toBe('--nope');
      } else {
        throw new Error('expected a ValidationError');
      }
    });

    it('should always reject unknown keys in a scope without verify-config', () => {
      const bare = new OptionRegistry('bare');
      bare.register(option('--name'));
      const result = resolveOptionValues(bare, { '--other': 'x' });
      expect(result.ok).toBe(false);
    });
  });

  it('should log the resolution', () => {
    resolveOptionValues(registry, { '--jobs': 2 }, { logger });
    const [event] = logger.getEventsByType('options_resolved');
    expect(event.message).toBe('Resolved 7 options');
    expect(event.level).toBe('info');
    expect(event.metadata).toEqual({ scope: 'test', phase: 'FULL_REGISTERED', explicitCount: 1 });
  });
});

describe('coerceOptionValue', () => {
  const jobs = option('--jobs').int().build();

  it('should pass valid values through', () => {
    const result = coerceOptionValue(jobs, 3);
    expect(result.ok && result.value).toBe(3);
  });

  it('should accept null for a nullable scalar', () => {
    const result = coerceOptionValue(jobs, null);
    expect(result.ok).toBe(true);
  });

  it('should not accept null for a bool', () => {
    const flag = option('--flag').bool().build();
    expect(coerceOptionValue(flag, null).ok).toBe(false);
  });

  it('should freeze list values', () => {
    const paths = option('--paths').listOf('string').build();
    const result = coerceOptionValue(paths, ['a']);
    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
  });
});
