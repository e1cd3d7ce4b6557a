/**
 * Integration Tests for Global Options Loading
 *
 * Runs the whole pipeline (register, resolve, project, validate, fingerprint)
 * against a fixed host environment.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { loadBootstrapOptions, loadGlobalOptions } from '../../src/orchestration/load-global-options';
import { BufferLogger } from '../../src/logging/buffer-logger';
import { ExitCode, exitCodeForErrorKind } from '../../src/types/exit-codes';
import { ValidationError } from '../../src/errors/options-error';
import { createDefaultExecutionOptions } from '../../src/execution/execution-options';
import { createTestEnvironment } from '../utils/test-environment';

const environment = createTestEnvironment();

const REMOTE_SETUP = {
  '--remote-execution': true,
  '--remote-execution-server': 'remote.example.test:8980',
  '--remote-store-server': ['remote.example.test:8980'],
};

describe('loadGlobalOptions', () => {
  let logger: BufferLogger;

  beforeEach(() => {
    logger = new BufferLogger();
  });

  it('should load the defaults', () => {
    const result = loadGlobalOptions({ environment, logger });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const snapshot = result.value;
    expect(snapshot.registry.phase).toBe('FULL_REGISTERED');
    expect(snapshot.values.get('level')).toBe('info');
    expect(snapshot.values.get('loop')).toBe(false);
    expect(snapshot.executionOptions).toEqual(createDefaultExecutionOptions(environment));
    expect(snapshot.fingerprint).toMatch(/^[0-9a-f]{64}$/);
    expect(snapshot.daemonFingerprint).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should log each step in order', () => {
    loadGlobalOptions({ environment, logger });
    expect(logger.getEvents().map((e) => e.eventType)).toEqual([
      'options_registered',
      'options_registered',
      'options_resolved',
      'execution_options_built',
      'options_validated',
    ]);
  });

  it('should accept a complete remote execution setup', () => {
    const result = loadGlobalOptions({ environment, explicit: REMOTE_SETUP });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.executionOptions.remoteExecution).toBe(true);
      expect(result.value.executionOptions.remoteStoreServer).toEqual(['remote.example.test:8980']);
    }
  });

  it('should reject remote execution without a server', () => {
    const result = loadGlobalOptions({ environment, logger, explicit: { '--remote-execution': true } });
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(ValidationError);
    expect(exitCodeForErrorKind(result.error.kind)).toBe(ExitCode.VALIDATION_ERROR);
    const [event] = logger.getEventsByType('options_validation_failed');
    expect(event.metadata).toEqual({
      flag: '--remote-execution',
      missing: '--remote-execution-server',
    });
  });

  it('should reject an execution server without a store server', () => {
    const result = loadGlobalOptions({
      environment,
      explicit: { '--remote-execution-server': 'remote.example.test:8980' },
    });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error instanceof ValidationError) {
      expect(result.error.missing).toBe('--remote-store-server');
    }
  });

  it('should reject an unknown log level', () => {
    const result = loadGlobalOptions({ environment, explicit: { '-l': 'loud' } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(exitCodeForErrorKind(result.error.kind)).toBe(ExitCode.INVALID_ENUM_VALUE);
    }
  });

  it('should reject an unknown speculation strategy', () => {
    const result = loadGlobalOptions({
      environment,
      explicit: { '--process-execution-speculation-strategy': 'both' },
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Invalid value "both" for --process-execution-speculation-strategy. ' +
          'Must be one of: "remote_first", "local_first", "none"'
      );
    }
  });

  it('should warn about deprecated options before their removal', () => {
    const result = loadGlobalOptions({ environment, logger, explicit: { '--spec-file': ['specs.txt'] } });
    expect(result.ok).toBe(true);
    expect(logger.getEventsByType('option_deprecated').map((e) => e.message)).toEqual([
      'DEPRECATED: option --spec-file will be removed in version 2.1.0.dev0. Use --spec-files',
    ]);
  });

  it('should reject deprecated options once removed', () => {
    const result = loadGlobalOptions({
      environment: createTestEnvironment({ toolVersion: '2.1.0' }),
      explicit: { '--print-exception-stacktrace': true },
    });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error instanceof ValidationError) {
      expect(result.error.code).toBe('REMOVED_OPTION');
    } else {
      throw new Error('expected a ValidationError');
    }
  });

  it('should skip unknown keys when verify-config is off', () => {
    const result = loadGlobalOptions({
      environment,
      logger,
      explicit: { '--verify-config': false, '--no-such-option': 1 },
    });
    expect(result.ok).toBe(true);
    expect(logger.hasEventType('unknown_option_ignored')).toBe(true);
  });

  describe('fingerprints', () => {
    function fingerprints(explicit: Record<string, unknown>): [string, string] {
      const result = loadGlobalOptions({ environment, explicit });
      if (!result.ok) {
        throw result.error;
      }
      return [result.value.fingerprint, result.value.daemonFingerprint];
    }

    it('should not change with config file locations', () => {
      expect(fingerprints({ '--pants-config-files': ['/repo/other.toml'], '--pantsrc': false })).toEqual(
        fingerprints({})
      );
    });

    it('should change both keys for a daemon option', () => {
      const [base, baseDaemon] = fingerprints({});
      const [changed, changedDaemon] = fingerprints({ '--pants-workdir': '/scratch/workdir' });
      expect(changed).not.toBe(base);
      expect(changedDaemon).not.toBe(baseDaemon);
    });

    it('should only change the options key for other options', () => {
      const [base, baseDaemon] = fingerprints({});
      const [changed, changedDaemon] = fingerprints({ '--loop': true });
      expect(changed).not.toBe(base);
      expect(changedDaemon).toBe(baseDaemon);
    });
  });
});

describe('loadBootstrapOptions', () => {
  it('should resolve only the bootstrap set', () => {
    const result = loadBootstrapOptions({ environment });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.registry.phase).toBe('BOOTSTRAP_REGISTERED');
    expect(result.value.values.has('loop')).toBe(false);
    expect(result.value.executionOptions.processExecutionLocalParallelism).toBe(8);
  });

  it('should not validate cross-option rules', () => {
    const result = loadBootstrapOptions({ environment, explicit: { '--remote-execution': true } });
    expect(result.ok).toBe(true);
  });

  it('should skip values for full-phase options', () => {
    const logger = new BufferLogger();
    const explicit = {
      '--remote-store-thread-count': 4,
      '--files-not-found-behavior': 'error',
      '--loop': true,
    };

    const result = loadBootstrapOptions({ environment, logger, explicit });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.executionOptions.remoteStoreThreadCount).toBe(4);
    expect(result.value.values.has('loop')).toBe(false);
    expect(result.value.values.has('filesNotFoundBehavior')).toBe(false);
    expect(logger.hasEventType('unknown_option_ignored')).toBe(false);

    expect(loadGlobalOptions({ environment, explicit }).ok).toBe(true);
  });

  it('should still reject keys no global option declares', () => {
    const result = loadBootstrapOptions({
      environment,
      explicit: { '--loop': true, '--no-such-option': 1 },
    });
    expect(result.ok).toBe(false);
    if (!result.ok && result.error instanceof ValidationError) {
      expect(result.error.code).toBe('UNKNOWN_OPTION');
      expect(result.error.flag).toBe('--no-such-option');
      expect(result.error.message).toBe('Unknown option --no-such-option in scope ""');
    } else {
      throw new Error('expected a ValidationError');
    }
  });
});
