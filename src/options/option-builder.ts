/**
 * Option Builder
 *
 * Fluent declaration of a single option. All attribute checks run in
 * build(), so a malformed declaration fails at startup with a SchemaError
 * instead of surfacing when a value is resolved.
 */

import type { EnumDescriptor } from '../enums/enum-descriptor';
import { SchemaError } from '../errors/options-error';
import { parseVersion } from '../config/version';
import { describeIssue, schemaForOptionType } from '../schemas/option-value.schema';
import {
  OptionDefinition,
  OptionType,
  OptionValue,
  ScalarKind,
  freezeOptionValue,
} from '../types/option';

const FLAG_PATTERN = /^--[a-z0-9][a-z0-9-]*$/;
const ALIAS_PATTERN = /^-[a-zA-Z]$/;

/**
 * Convert a long flag to the key its value resolves under
 * (`--remote-store-server` -> `remoteStoreServer`)
 */
export function flagToDest(flag: string): string {
  const [first, ...rest] = flag.replace(/^--/, '').split('-');
  return first + rest.map((part) => part.charAt(0).toUpperCase() + part.slice(1)).join('');
}

function implicitDefault(type: OptionType): OptionValue {
  switch (type.kind) {
    case 'bool':
      return false;
    case 'list':
      return [];
    case 'dict':
      return {};
    default:
      return null;
  }
}

export class OptionBuilder {
  private optionType?: OptionType;
  private defaultValue?: OptionValue;
  private factory?: () => OptionValue;
  private isAdvanced = false;
  private isDaemon = false;
  private isFingerprinted = true;
  private choiceValues?: readonly string[];
  private metavarText?: string;
  private removal?: { version: string; hint: string };
  private helpText = '';
  private readonly problems: string[] = [];

  constructor(
    readonly flag: string,
    readonly alias?: string
  ) {}

  bool(): this {
    return this.setType({ kind: 'bool' });
  }

  int(): this {
    return this.setType({ kind: 'int' });
  }

  float(): this {
    return this.setType({ kind: 'float' });
  }

  string(): this {
    return this.setType({ kind: 'string' });
  }

  /**
   * A directory path
   */
  dir(): this {
    return this.setType({ kind: 'dir' });
  }

  enumOf<T extends string>(descriptor: EnumDescriptor<T>): this {
    return this.setType({ kind: 'enum', descriptor });
  }

  /**
   * A list whose members all have the given kind
   */
  listOf(member: ScalarKind): this {
    return this.setType({ kind: 'list', member });
  }

  /**
   * A string-to-string mapping
   */
  dict(): this {
    return this.setType({ kind: 'dict' });
  }

  /**
   * Restrict a string option to a literal set of values
   */
  choices(values: readonly string[]): this {
    this.choiceValues = [...values];
    return this;
  }

  default(value: OptionValue): this {
    this.defaultValue = value;
    return this;
  }

  /**
   * Compute the default when values are resolved rather than at declaration
   */
  defaultFactory(factory: () => OptionValue): this {
    this.factory = factory;
    return this;
  }

  advanced(): this {
    this.isAdvanced = true;
    return this;
  }

  daemon(): this {
    this.isDaemon = true;
    return this;
  }

  /**
   * Exclude the option's value from every cache key
   */
  noFingerprint(): this {
    this.isFingerprinted = false;
    return this;
  }

  metavar(text: string): this {
    this.metavarText = text;
    return this;
  }

  deprecated(removalVersion: string, removalHint: string): this {
    this.removal = { version: removalVersion, hint: removalHint };
    return this;
  }

  help(text: string): this {
    this.helpText = text;
    return this;
  }

  /**
   * Validate the declaration and produce an immutable definition
   */
  build(): OptionDefinition {
    if (!FLAG_PATTERN.test(this.flag)) {
      throw this.malformed('long names must look like --kebab-case-name');
    }
    if (this.alias !== undefined && !ALIAS_PATTERN.test(this.alias)) {
      throw this.malformed(`short alias "${this.alias}" must be a single letter like -x`);
    }
    if (this.problems.length > 0) {
      throw this.malformed(this.problems.join('; '));
    }

    // Untyped options are strings
    const type: OptionType = this.optionType ?? { kind: 'string' };

    if (this.choiceValues !== undefined) {
      if (type.kind !== 'string') {
        throw this.malformed('choices can only restrict a string option');
      }
      if (this.choiceValues.length === 0) {
        throw this.malformed('choices must not be empty');
      }
    }

    const defaultValue = this.defaultValue === undefined ? implicitDefault(type) : this.defaultValue;

    if (this.factory === undefined) {
      const parsed = schemaForOptionType(type).safeParse(defaultValue);
      if (!parsed.success) {
        throw this.malformed(`default does not match type ${type.kind}: ${describeIssue(parsed.error)}`);
      }
      if (type.kind === 'enum') {
        if (typeof defaultValue !== 'string' || !type.descriptor.is(defaultValue)) {
          throw this.malformed(
            `default must be a member of ${type.descriptor.name} (${type.descriptor.members.join(', ')})`
          );
        }
      }
      if (
        this.choiceValues !== undefined &&
        defaultValue !== null &&
        !this.choiceValues.some((choice) => choice === defaultValue)
      ) {
        throw this.malformed(`default must be one of the choices (${this.choiceValues.join(', ')})`);
      }
    }

    if (this.removal !== undefined) {
      if (parseVersion(this.removal.version) === null) {
        throw this.malformed(`removal version "${this.removal.version}" is not a valid version`);
      }
      if (this.removal.hint.trim() === '') {
        throw this.malformed('deprecated options need a removal hint');
      }
    }

    return Object.freeze({
      flag: this.flag,
      alias: this.alias,
      dest: flagToDest(this.flag),
      type,
      defaultValue: freezeOptionValue(defaultValue),
      defaultFactory: this.factory,
      advanced: this.isAdvanced,
      daemon: this.isDaemon,
      fingerprint: this.isFingerprinted,
      choices: this.choiceValues,
      metavar: this.metavarText,
      removalVersion: this.removal?.version,
      removalHint: this.removal?.hint,
      help: this.helpText,
    });
  }

  private malformed(message: string): SchemaError {
    return new SchemaError('MALFORMED_OPTION', `Option ${this.flag}: ${message}`, this.flag);
  }

  private setType(type: OptionType): this {
    if (this.optionType !== undefined) {
      this.problems.push(`type declared twice (${this.optionType.kind}, then ${type.kind})`);
    } else {
      this.optionType = type;
    }
    return this;
  }
}

/**
 * Start declaring an option
 */
export function option(flag: string, alias?: string): OptionBuilder {
  return new OptionBuilder(flag, alias);
}
