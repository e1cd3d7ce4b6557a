/**
 * Option attribute model
 * The shape of a single declared option. Pure data; behavior lives in the
 * builder (construction checks) and the resolver (value checks).
 */

import type { EnumDescriptor } from '../enums/enum-descriptor';

/**
 * Kinds a list option's members can take
 */
export type ScalarKind = 'string' | 'int' | 'float' | 'bool';

/**
 * The value type of an option. Exactly one per option.
 */
export type OptionType =
  | { readonly kind: 'bool' }
  | { readonly kind: 'int' }
  | { readonly kind: 'float' }
  | { readonly kind: 'string' }
  /** A directory path; resolves like a string */
  | { readonly kind: 'dir' }
  | { readonly kind: 'enum'; readonly descriptor: EnumDescriptor<string> }
  | { readonly kind: 'list'; readonly member: ScalarKind }
  | { readonly kind: 'dict' };

export type OptionKind = OptionType['kind'];

export type ScalarValue = boolean | number | string;

/**
 * A resolved option value. `null` means "not set".
 */
export type OptionValue =
  | null
  | ScalarValue
  | readonly ScalarValue[]
  | Readonly<Record<string, string>>;

/**
 * A fully declared option
 */
export interface OptionDefinition {
  /** Long name, e.g. `--remote-execution` */
  readonly flag: string;
  /** Single-letter short name, e.g. `-l` */
  readonly alias?: string;
  /** Key the resolved value is stored under (camelCase of the flag) */
  readonly dest: string;
  readonly type: OptionType;
  /** Static default; ignored when `defaultFactory` is set */
  readonly defaultValue: OptionValue;
  /** Computed default, evaluated at resolution time */
  readonly defaultFactory?: () => OptionValue;
  /** Hidden from basic help */
  readonly advanced: boolean;
  /** Changing it invalidates a running daemon */
  readonly daemon: boolean;
  /** Participates in cache-key computation */
  readonly fingerprint: boolean;
  /** Closed set of literal values the option accepts */
  readonly choices?: readonly string[];
  readonly metavar?: string;
  /** Version in which the option stops being accepted */
  readonly removalVersion?: string;
  /** What to use instead, shown in deprecation warnings */
  readonly removalHint?: string;
  readonly help: string;
}

/**
 * Where a resolved value came from
 */
export type ValueSource = 'explicit' | 'default';

/**
 * Type guard for list values
 */
export function isListValue(value: OptionValue | undefined): value is readonly ScalarValue[] {
  return Array.isArray(value);
}

/**
 * Type guard for mapping values
 */
export function isDictValue(
  value: OptionValue | undefined
): value is Readonly<Record<string, string>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy a value so the result shares no mutable structure with the input
 */
export function freezeOptionValue(value: OptionValue): OptionValue {
  if (isListValue(value)) {
    return Object.freeze([...value]);
  }
  if (isDictValue(value)) {
    return Object.freeze({ ...value });
  }
  return value;
}
