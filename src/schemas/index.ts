/**
 * Schemas module - zod schemas for option values
 */

export { schemaForOptionType, describeIssue } from './option-value.schema';
export { executionValuesSchema, EXECUTION_FIELDS } from './execution-values.schema';
export type { BootstrapExecutionValues } from './execution-values.schema';
