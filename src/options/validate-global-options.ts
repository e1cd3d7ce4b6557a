/**
 * Cross-option validation
 * Checks that single-option declarations cannot express. Runs after every
 * global option is resolved; stops at the first failing rule.
 */

import { ValidationError } from '../errors/options-error';
import type { ResolvedOptions } from '../config/resolved-options';
import { isListValue, OptionValue } from '../types/option';
import { Result, ok, err } from '../types/result';

/**
 * The resolved values the rules look at
 */
export interface RemoteExecutionSettings {
  remoteExecution: boolean;
  remoteExecutionServer: string | null;
  remoteStoreServer: readonly string[];
}

function isSet(value: OptionValue | undefined): boolean {
  if (isListValue(value)) {
    return value.length > 0;
  }
  return value !== null && value !== undefined && value !== false && value !== '';
}

/**
 * Validate the remote execution settings.
 * The store-server rule applies whenever an execution server is set, even
 * with remote execution turned off.
 */
export function validateGlobalOptions(
  settings: RemoteExecutionSettings
): Result<void, ValidationError> {
  if (settings.remoteExecution && !isSet(settings.remoteExecutionServer)) {
    return err(
      new ValidationError(
        'MISSING_DEPENDENCY',
        'The `--remote-execution` option requires also setting `--remote-execution-server` to work properly.',
        '--remote-execution',
        '--remote-execution-server'
      )
    );
  }

  if (isSet(settings.remoteExecutionServer) && !isSet(settings.remoteStoreServer)) {
    return err(
      new ValidationError(
        'MISSING_DEPENDENCY',
        'The `--remote-execution-server` option requires also setting `--remote-store-server`. ' +
          'Often these have the same value.',
        '--remote-execution-server',
        '--remote-store-server'
      )
    );
  }

  return ok(undefined);
}

/**
 * Validate a resolved global option bag
 */
export function validateResolvedGlobalOptions(
  resolved: ResolvedOptions
): Result<void, ValidationError> {
  const remoteExecutionServer = resolved.get('remoteExecutionServer');
  const remoteStoreServer = resolved.get('remoteStoreServer');
  return validateGlobalOptions({
    remoteExecution: resolved.get('remoteExecution') === true,
    remoteExecutionServer: typeof remoteExecutionServer === 'string' ? remoteExecutionServer : null,
    remoteStoreServer: isListValue(remoteStoreServer) ? remoteStoreServer.map(String) : [],
  });
}
