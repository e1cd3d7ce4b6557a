/**
 * Execution values schema
 * The typed view of the bootstrap options that parameterize process execution.
 */

import { z } from 'zod';
import { SPECULATION_STRATEGIES } from '../enums/option-enums';

const count = z.number().int().nonnegative();

export const executionValuesSchema = z.object({
  remoteExecution: z.boolean(),
  remoteStoreServer: z.array(z.string()),
  remoteStoreThreadCount: count,
  remoteExecutionServer: z.string().nullable(),
  remoteStoreChunkBytes: count,
  remoteStoreChunkUploadTimeoutSeconds: count,
  remoteStoreRpcRetries: count,
  remoteStoreConnectionLimit: count,
  processExecutionLocalParallelism: count,
  processExecutionRemoteParallelism: count,
  processExecutionCleanupLocalDirs: z.boolean(),
  processExecutionSpeculationDelay: z.number().nonnegative(),
  processExecutionSpeculationStrategy: z.enum(SPECULATION_STRATEGIES),
  processExecutionUseLocalCache: z.boolean(),
  remoteExecutionProcessCacheNamespace: z.string().nullable(),
  remoteInstanceName: z.string().nullable(),
  remoteCaCertsPath: z.string().nullable(),
  remoteOauthBearerTokenPath: z.string().nullable(),
  remoteExecutionExtraPlatformProperties: z.array(z.string()),
  remoteExecutionHeaders: z.record(z.string(), z.string()),
  remoteExecutionOverallDeadlineSecs: count,
  processExecutionLocalEnableNailgun: z.boolean(),
});

/**
 * Resolved bootstrap values, by name, that ExecutionOptions is projected from
 */
export type BootstrapExecutionValues = z.infer<typeof executionValuesSchema>;

/**
 * Names of the execution fields, in declaration order
 */
export const EXECUTION_FIELDS = executionValuesSchema.keyof().options;
