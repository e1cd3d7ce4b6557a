/**
 * Global options for the build tool: schema, resolution, execution options
 * and validation.
 */

export * from './types';
export * from './enums';
export * from './schemas';
export * from './config';
export * from './options';
export * from './orchestration';
export * from './logging';
export * from './cli';

export {
  OptionsError,
  SchemaError,
  InvalidEnumValueError,
  ValidationError,
  isOptionsError,
} from './errors/options-error';
export type {
  OptionsErrorKind,
  SchemaErrorCode,
  ValidationErrorCode,
} from './errors/options-error';

export {
  DEFAULT_EXECUTION_OPTIONS,
  createDefaultExecutionOptions,
  executionOptionsFromBootstrapValues,
  executionOptionsFromResolved,
  readExecutionValues,
} from './execution/execution-options';
export type { ExecutionOptions } from './execution/execution-options';

export { TOOL_VERSION } from './version';
