/**
 * Closed string enumerations with checked construction from user input
 */

import { InvalidEnumValueError } from '../errors/options-error';
import { Result, ok, err } from '../types/result';

/**
 * A named, closed set of string members
 */
export interface EnumDescriptor<T extends string> {
  /** Name used in error messages and help output */
  readonly name: string;
  /** Members in declaration order */
  readonly members: readonly T[];
  /**
   * Check whether a string is a member
   */
  is(value: string): value is T;
  /**
   * Construct a member from a literal string
   */
  parse(value: string): Result<T, InvalidEnumValueError>;
}

/**
 * Member type of an enum descriptor
 */
export type EnumMember<D> = D extends EnumDescriptor<infer T> ? T : never;

/**
 * Define a closed enumeration
 */
export function defineEnum<T extends string>(name: string, members: readonly T[]): EnumDescriptor<T> {
  const frozen = Object.freeze([...members]);

  function is(value: string): value is T {
    return frozen.some((member) => member === value);
  }

  return Object.freeze({
    name,
    members: frozen,
    is,
    parse(value: string): Result<T, InvalidEnumValueError> {
      if (is(value)) {
        return ok(value);
      }
      return err(new InvalidEnumValueError(name, value, frozen));
    },
  });
}
