/**
 * ExecutionOptions
 * Immutable snapshot of the bootstrap options that configure local and remote
 * process execution. Built once per run, right after bootstrap values resolve,
 * and read (never written) by every process executor for the rest of the run.
 */

import { ValidationError } from '../errors/options-error';
import { captureHostEnvironment, HostEnvironment } from '../config/host-environment';
import type { ResolvedOptions } from '../config/resolved-options';
import type { SpeculationStrategy } from '../enums/option-enums';
import {
  BootstrapExecutionValues,
  EXECUTION_FIELDS,
  executionValuesSchema,
} from '../schemas/execution-values.schema';
import { describeIssue } from '../schemas/option-value.schema';
import { Result, ok, err } from '../types/result';

export interface ExecutionOptions {
  /** Run processes on remote workers */
  readonly remoteExecution: boolean;
  /** host:port addresses of the remote file store */
  readonly remoteStoreServer: readonly string[];
  readonly remoteStoreThreadCount: number;
  /** host:port of the remote execution scheduler */
  readonly remoteExecutionServer: string | null;
  readonly remoteStoreChunkBytes: number;
  readonly remoteStoreChunkUploadTimeoutSeconds: number;
  readonly remoteStoreRpcRetries: number;
  readonly remoteStoreConnectionLimit: number;
  readonly processExecutionLocalParallelism: number;
  readonly processExecutionRemoteParallelism: number;
  /** Remove local sandboxes after a process finishes */
  readonly processExecutionCleanupLocalDirs: boolean;
  /** Seconds to wait before speculating a second request for a slow process */
  readonly processExecutionSpeculationDelay: number;
  readonly processExecutionSpeculationStrategy: SpeculationStrategy;
  readonly processExecutionUseLocalCache: boolean;
  readonly remoteExecutionProcessCacheNamespace: string | null;
  readonly remoteInstanceName: string | null;
  readonly remoteCaCertsPath: string | null;
  readonly remoteOauthBearerTokenPath: string | null;
  /** `property=value` pairs sent with every remote execution request */
  readonly remoteExecutionExtraPlatformProperties: readonly string[];
  readonly remoteExecutionHeaders: Readonly<Record<string, string>>;
  readonly remoteExecutionOverallDeadlineSecs: number;
  readonly processExecutionLocalEnableNailgun: boolean;
}

/**
 * Project resolved bootstrap values into ExecutionOptions.
 * Field-by-field copy; lists and mappings are copied so the result shares
 * nothing mutable with its input.
 */
export function executionOptionsFromBootstrapValues(
  values: BootstrapExecutionValues
): ExecutionOptions {
  return Object.freeze({
    remoteExecution: values.remoteExecution,
    remoteStoreServer: Object.freeze([...values.remoteStoreServer]),
    remoteStoreThreadCount: values.remoteStoreThreadCount,
    remoteExecutionServer: values.remoteExecutionServer,
    remoteStoreChunkBytes: values.remoteStoreChunkBytes,
    remoteStoreChunkUploadTimeoutSeconds: values.remoteStoreChunkUploadTimeoutSeconds,
    remoteStoreRpcRetries: values.remoteStoreRpcRetries,
    remoteStoreConnectionLimit: values.remoteStoreConnectionLimit,
    processExecutionLocalParallelism: values.processExecutionLocalParallelism,
    processExecutionRemoteParallelism: values.processExecutionRemoteParallelism,
    processExecutionCleanupLocalDirs: values.processExecutionCleanupLocalDirs,
    processExecutionSpeculationDelay: values.processExecutionSpeculationDelay,
    processExecutionSpeculationStrategy: values.processExecutionSpeculationStrategy,
    processExecutionUseLocalCache: values.processExecutionUseLocalCache,
    remoteExecutionProcessCacheNamespace: values.remoteExecutionProcessCacheNamespace,
    remoteInstanceName: values.remoteInstanceName,
    remoteCaCertsPath: values.remoteCaCertsPath,
    remoteOauthBearerTokenPath: values.remoteOauthBearerTokenPath,
    remoteExecutionExtraPlatformProperties: Object.freeze([
      ...values.remoteExecutionExtraPlatformProperties,
    ]),
    remoteExecutionHeaders: Object.freeze({ ...values.remoteExecutionHeaders }),
    remoteExecutionOverallDeadlineSecs: values.remoteExecutionOverallDeadlineSecs,
    processExecutionLocalEnableNailgun: values.processExecutionLocalEnableNailgun,
  });
}

/**
 * Read the execution fields out of a resolved option bag
 */
export function readExecutionValues(
  resolved: ResolvedOptions
): Result<BootstrapExecutionValues, ValidationError> {
  const view: Record<string, unknown> = {};
  for (const field of EXECUTION_FIELDS) {
    view[field] = resolved.get(field);
  }
  const parsed = executionValuesSchema.safeParse(view);
  if (!parsed.success) {
    const field = String(parsed.error.issues[0]?.path[0] ?? 'unknown');
    return err(
      new ValidationError(
        'INVALID_VALUE',
        `Cannot build execution options: ${describeIssue(parsed.error)}`,
        `--${field.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`
      )
    );
  }
  return ok(parsed.data);
}

/**
 * Build ExecutionOptions straight from a resolved option bag
 */
export function executionOptionsFromResolved(
  resolved: ResolvedOptions
): Result<ExecutionOptions, ValidationError> {
  const values = readExecutionValues(resolved);
  return values.ok ? ok(executionOptionsFromBootstrapValues(values.value)) : values;
}

const ONE_HOUR_SECS = 60 * 60;

/**
 * The default execution options for a host.
 * The bootstrap options declare their defaults from this record, so the two
 * cannot drift apart.
 */
export function createDefaultExecutionOptions(environment: HostEnvironment): ExecutionOptions {
  return executionOptionsFromBootstrapValues({
    remoteExecution: false,
    remoteStoreServer: [],
    remoteStoreThreadCount: 1,
    remoteExecutionServer: null,
    remoteStoreChunkBytes: 1024 * 1024,
    remoteStoreChunkUploadTimeoutSeconds: 60,
    remoteStoreRpcRetries: 2,
    remoteStoreConnectionLimit: 5,
    processExecutionLocalParallelism: environment.cpuCount,
    processExecutionRemoteParallelism: 128,
    processExecutionCleanupLocalDirs: true,
    processExecutionSpeculationDelay: 1,
    processExecutionSpeculationStrategy: 'none',
    processExecutionUseLocalCache: true,
    remoteExecutionProcessCacheNamespace: null,
    remoteInstanceName: null,
    remoteCaCertsPath: null,
    remoteOauthBearerTokenPath: null,
    remoteExecutionExtraPlatformProperties: [],
    remoteExecutionHeaders: {},
    remoteExecutionOverallDeadlineSecs: ONE_HOUR_SECS,
    processExecutionLocalEnableNailgun: false,
  });
}

/**
 * Default execution options for the host this process started on
 */
export const DEFAULT_EXECUTION_OPTIONS: ExecutionOptions = createDefaultExecutionOptions(
  captureHostEnvironment()
);
