/**
 * Zod schemas for option values, one per option type
 */

import { z } from 'zod';
import type { OptionType, OptionValue, ScalarKind } from '../types/option';

const scalarSchemas: Record<ScalarKind, z.ZodType<string | number | boolean>> = {
  string: z.string(),
  int: z.number().int(),
  float: z.number().finite(),
  bool: z.boolean(),
};

const dictSchema = z.record(z.string(), z.string());

/**
 * Schema a value of the given option type must satisfy.
 * Scalars other than booleans may be `null` (unset).
 * Enum membership is checked by the enum descriptor, not here.
 */
export function schemaForOptionType(type: OptionType): z.ZodType<OptionValue> {
  switch (type.kind) {
    case 'bool':
      return z.boolean();
    case 'int':
      return z.number().int().nullable();
    case 'float':
      return z.number().finite().nullable();
    case 'string':
    case 'dir':
    case 'enum':
      return z.string().nullable();
    case 'list':
      return z.array(scalarSchemas[type.member]);
    case 'dict':
      return dictSchema;
  }
}

/**
 * Describe the first problem in a failed parse
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'invalid value';
  }
  const path = issue.path.length > 0 ? `[${issue.path.join('.')}] ` : '';
  return `${path}${issue.message}`;
}
