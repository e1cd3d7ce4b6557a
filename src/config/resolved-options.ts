/**
 * Resolved option values for one scope
 * Frozen once built
 */

import type { OptionValue, ValueSource } from '../types/option';

export class ResolvedOptions {
  private readonly values: ReadonlyMap<string, OptionValue>;
  private readonly sources: ReadonlyMap<string, ValueSource>;

  constructor(
    values: ReadonlyMap<string, OptionValue>,
    sources: ReadonlyMap<string, ValueSource>,
    readonly scope: string
  ) {
    this.values = new Map(values);
    this.sources = new Map(sources);
    Object.freeze(this);
  }

  /**
   * Value of the option stored under `dest`, or undefined if no such option exists
   */
  get(dest: string): OptionValue | undefined {
    return this.values.get(dest);
  }

  has(dest: string): boolean {
    return this.values.has(dest);
  }

  source(dest: string): ValueSource | undefined {
    return this.sources.get(dest);
  }

  /**
   * Whether the value was supplied rather than defaulted
   */
  isExplicit(dest: string): boolean {
    return this.sources.get(dest) === 'explicit';
  }
}
