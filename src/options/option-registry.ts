/**
 * Option Registry
 *
 * Holds the declared options of one scope and tracks the registration phase:
 *
 *   EMPTY -> BOOTSTRAP_REGISTERED -> FULL_REGISTERED
 *
 * Options registered while EMPTY are bootstrap options. The phase only
 * matters during registration; every option can be looked up afterwards.
 */

import { SchemaError } from '../errors/options-error';
import type { Logger } from '../types/logger';
import type { OptionDefinition } from '../types/option';
import { OptionBuilder } from './option-builder';

/** The global scope has no name */
export const GLOBAL_SCOPE = '';

export type RegistrationPhase = 'EMPTY' | 'BOOTSTRAP_REGISTERED' | 'FULL_REGISTERED';

/**
 * The registration surface handed to schema owners
 */
export interface Registrar {
  /**
   * Declare an option. Throws SchemaError on a duplicate or malformed declaration.
   */
  register(option: OptionBuilder | OptionDefinition): OptionDefinition;

  /**
   * Mark the end of bootstrap registration
   */
  markBootstrapRegistered(): void;

  /**
   * Mark the end of full registration; no further options may be added
   */
  markFullRegistered(): void;
}

export class OptionRegistry implements Registrar {
  private readonly definitions: OptionDefinition[] = [];
  private readonly byKey = new Map<string, OptionDefinition>();
  private readonly bootstrapDests = new Set<string>();
  private currentPhase: RegistrationPhase = 'EMPTY';

  constructor(
    readonly scope: string = GLOBAL_SCOPE,
    private readonly logger?: Logger
  ) {}

  get phase(): RegistrationPhase {
    return this.currentPhase;
  }

  get size(): number {
    return this.definitions.length;
  }

  register(option: OptionBuilder | OptionDefinition): OptionDefinition {
    if (this.currentPhase === 'FULL_REGISTERED') {
      throw new SchemaError(
        'PHASE_ORDER',
        `Cannot register ${option.flag}: registration of scope "${this.scope}" is complete`,
        option.flag
      );
    }

    const definition = option instanceof OptionBuilder ? option.build() : option;
    const keys = [definition.flag, definition.dest, definition.alias].filter(
      (key): key is string => key !== undefined
    );

    for (const key of keys) {
      const existing = this.byKey.get(key);
      if (existing) {
        throw new SchemaError(
          'DUPLICATE_OPTION',
          `${key} is already registered in scope "${this.scope}" (by ${existing.flag})`,
          definition.flag
        );
      }
    }

    for (const key of keys) {
      this.byKey.set(key, definition);
    }
    this.definitions.push(definition);
    if (this.currentPhase === 'EMPTY') {
      this.bootstrapDests.add(definition.dest);
    }
    return definition;
  }

  markBootstrapRegistered(): void {
    this.transition('EMPTY', 'BOOTSTRAP_REGISTERED');
  }

  markFullRegistered(): void {
    this.transition('BOOTSTRAP_REGISTERED', 'FULL_REGISTERED');
  }

  /**
   * Find an option by flag, short alias or dest
   */
  lookup(key: string): OptionDefinition | undefined {
    return this.byKey.get(key);
  }

  /**
   * All options in registration order
   */
  list(): readonly OptionDefinition[] {
    return [...this.definitions];
  }

  /**
   * Every flag, alias and dest the registry answers to
   */
  keys(): ReadonlySet<string> {
    return new Set(this.byKey.keys());
  }

  bootstrapOptions(): readonly OptionDefinition[] {
    return this.definitions.filter((definition) => this.bootstrapDests.has(definition.dest));
  }

  isBootstrapOption(key: string): boolean {
    const definition = this.lookup(key);
    return definition !== undefined && this.bootstrapDests.has(definition.dest);
  }

  private transition(from: RegistrationPhase, to: RegistrationPhase): void {
    if (this.currentPhase !== from) {
      throw new SchemaError(
        'PHASE_ORDER',
        `Cannot move scope "${this.scope}" to ${to}: registry is ${this.currentPhase}, expected ${from}`
      );
    }
    this.currentPhase = to;
    this.logger?.event('options_registered', `Registry reached ${to} with ${this.size} options`, {
      scope: this.scope,
      phase: to,
      optionCount: this.size,
    });
  }
}
