/**
 * Global options loading
 *
 * Wires the option phases together:
 *   register -> resolve -> project ExecutionOptions -> validate
 *
 * Every step is synchronous. Any failure aborts before build work begins.
 */

import { captureHostEnvironment, HostEnvironment } from '../config/host-environment';
import { ExplicitValues, resolveOptionValues } from '../config/resolve-values';
import type { ResolvedOptions } from '../config/resolved-options';
import { OptionsError, isOptionsError } from '../errors/options-error';
import {
  ExecutionOptions,
  executionOptionsFromResolved,
} from '../execution/execution-options';
import { registerBootstrapOptions, registerOptions } from '../options/global-options';
import { GLOBAL_SCOPE, OptionRegistry } from '../options/option-registry';
import {
  computeDaemonFingerprint,
  computeOptionsFingerprint,
} from '../options/options-fingerprint';
import { validateResolvedGlobalOptions } from '../options/validate-global-options';
import type { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';

export interface LoadGlobalOptionsInput {
  /** Values supplied by flags, config files or the environment */
  explicit?: ExplicitValues;
  /** Defaults to the current process */
  environment?: HostEnvironment;
  logger?: Logger;
}

/**
 * Everything the bootstrap phase produces
 */
export interface BootstrapOptionsSnapshot {
  registry: OptionRegistry;
  values: ResolvedOptions;
  executionOptions: ExecutionOptions;
}

/**
 * Everything the full phase produces
 */
export interface GlobalOptionsSnapshot extends BootstrapOptionsSnapshot {
  /** Cache key over fingerprinted options */
  fingerprint: string;
  /** Key over daemon-affecting options */
  daemonFingerprint: string;
}

/**
 * Build a registry holding only the bootstrap options
 */
export function createBootstrapRegistry(
  environment: HostEnvironment,
  logger?: Logger
): OptionRegistry {
  const registry = new OptionRegistry(GLOBAL_SCOPE, logger);
  registerBootstrapOptions(registry, environment);
  return registry;
}

/**
 * Build a registry holding every global option
 */
export function createGlobalRegistry(environment: HostEnvironment, logger?: Logger): OptionRegistry {
  const registry = new OptionRegistry(GLOBAL_SCOPE, logger);
  registerOptions(registry, environment);
  return registry;
}

function buildRegistry(
  factory: (environment: HostEnvironment, logger?: Logger) => OptionRegistry,
  environment: HostEnvironment,
  logger?: Logger
): Result<OptionRegistry, OptionsError> {
  try {
    return ok(factory(environment, logger));
  } catch (error) {
    if (isOptionsError(error)) {
      return err(error);
    }
    throw error;
  }
}

function project(
  registry: OptionRegistry,
  input: LoadGlobalOptionsInput,
  environment: HostEnvironment,
  ignoredKeys?: ReadonlySet<string>
): Result<BootstrapOptionsSnapshot, OptionsError> {
  const { logger } = input;
  const resolved = resolveOptionValues(registry, input.explicit ?? {}, {
    logger,
    toolVersion: environment.toolVersion,
    ignoredKeys,
  });
  if (!resolved.ok) {
    return resolved;
  }

  const executionOptions = executionOptionsFromResolved(resolved.value);
  if (!executionOptions.ok) {
    return executionOptions;
  }
  logger?.event('execution_options_built', 'Execution options built', {
    phase: registry.phase,
    remoteExecution: executionOptions.value.remoteExecution,
    localParallelism: executionOptions.value.processExecutionLocalParallelism,
    remoteParallelism: executionOptions.value.processExecutionRemoteParallelism,
    speculationStrategy: executionOptions.value.processExecutionSpeculationStrategy,
  });

  return ok({ registry, values: resolved.value, executionOptions: executionOptions.value });
}

/**
 * Resolve the bootstrap options and project ExecutionOptions from them.
 * This is all the execution engine needs to be constructed.
 *
 * The input is the same one the full load sees: values for full-phase options
 * are skipped here, and only keys no global option declares are rejected.
 */
export function loadBootstrapOptions(
  input: LoadGlobalOptionsInput = {}
): Result<BootstrapOptionsSnapshot, OptionsError> {
  const environment = input.environment ?? captureHostEnvironment();
  const registry = buildRegistry(createBootstrapRegistry, environment, input.logger);
  if (!registry.ok) {
    return registry;
  }
  const fullSchema = buildRegistry(createGlobalRegistry, environment);
  if (!fullSchema.ok) {
    return fullSchema;
  }
  return project(registry.value, input, environment, fullSchema.value.keys());
}

/**
 * Resolve and validate every global option
 */
export function loadGlobalOptions(
  input: LoadGlobalOptionsInput = {}
): Result<GlobalOptionsSnapshot, OptionsError> {
  const { logger } = input;
  const environment = input.environment ?? captureHostEnvironment();
  const registry = buildRegistry(createGlobalRegistry, environment, logger);
  if (!registry.ok) {
    return registry;
  }

  const snapshot = project(registry.value, input, environment);
  if (!snapshot.ok) {
    return snapshot;
  }

  const validation = validateResolvedGlobalOptions(snapshot.value.values);
  if (!validation.ok) {
    logger?.event('options_validation_failed', validation.error.message, {
      flag: validation.error.flag,
      missing: validation.error.missing,
    });
    return validation;
  }
  logger?.event('options_validated', 'Global options are valid', { phase: registry.value.phase });

  return ok({
    ...snapshot.value,
    fingerprint: computeOptionsFingerprint(registry.value, snapshot.value.values),
    daemonFingerprint: computeDaemonFingerprint(registry.value, snapshot.value.values),
  });
}
