/**
 * Option Value Resolution
 * Single pass with explicit precedence: explicit value > declared default.
 *
 * Turning argv and config files into explicit values is the job of the
 * caller; this module only checks those values against the declared schema.
 */

import {
  InvalidEnumValueError,
  OptionsError,
  SchemaError,
  ValidationError,
} from '../errors/options-error';
import { describeIssue, schemaForOptionType } from '../schemas/option-value.schema';
import type { OptionRegistry } from '../options/option-registry';
import type { Logger } from '../types/logger';
import { OptionDefinition, OptionValue, ValueSource, freezeOptionValue } from '../types/option';
import { Result, ok, err } from '../types/result';
import { TOOL_VERSION } from '../version';
import { ResolvedOptions } from './resolved-options';
import { ParsedVersion, compareVersions, parseVersion } from './version';

export interface ResolveOptions {
  logger?: Logger;
  /** Version of the running tool, for deciding whether deprecated options are gone */
  toolVersion?: string;
  /**
   * Keys declared outside this registry, e.g. full-phase options during a
   * bootstrap-only resolution. They are skipped without a log entry.
   */
  ignoredKeys?: ReadonlySet<string>;
}

/**
 * Values keyed by flag (`--remote-execution`), short alias (`-l`) or dest (`remoteExecution`)
 */
export type ExplicitValues = Readonly<Record<string, unknown>>;

const VERIFY_CONFIG_DEST = 'verifyConfig';

function invalidValue(definition: OptionDefinition, detail: string): ValidationError {
  return new ValidationError(
    'INVALID_VALUE',
    `Invalid value for ${definition.flag}: ${detail}`,
    definition.flag
  );
}

/**
 * Check one explicit value against its option's declared type
 */
export function coerceOptionValue(
  definition: OptionDefinition,
  raw: unknown
): Result<OptionValue, OptionsError> {
  const { type } = definition;

  if (type.kind === 'enum') {
    if (typeof raw !== 'string') {
      return err(invalidValue(definition, `expected one of ${type.descriptor.members.join(', ')}`));
    }
    const parsed = type.descriptor.parse(raw);
    return parsed.ok ? ok(parsed.value) : parsed;
  }

  const parsed = schemaForOptionType(type).safeParse(raw);
  if (!parsed.success) {
    return err(invalidValue(definition, describeIssue(parsed.error)));
  }
  const value = parsed.data;

  const { choices } = definition;
  if (choices !== undefined && value !== null && !choices.some((choice) => choice === value)) {
    return err(new InvalidEnumValueError(definition.flag, String(value), choices));
  }

  return ok(freezeOptionValue(value));
}

function checkDeprecation(
  definition: OptionDefinition,
  toolVersion: ParsedVersion,
  logger?: Logger
): Result<void, OptionsError> {
  const { removalVersion, removalHint } = definition;
  if (removalVersion === undefined) {
    return ok(undefined);
  }
  const removal = parseVersion(removalVersion);
  if (removal === null) {
    return err(
      new SchemaError(
        'MALFORMED_OPTION',
        `Option ${definition.flag}: removal version "${removalVersion}" is not a valid version`,
        definition.flag
      )
    );
  }
  if (compareVersions(toolVersion, removal) >= 0) {
    return err(
      new ValidationError(
        'REMOVED_OPTION',
        `Option ${definition.flag} was removed in version ${removalVersion}. ${removalHint ?? ''}`.trim(),
        definition.flag
      )
    );
  }
  logger?.event(
    'option_deprecated',
    `DEPRECATED: option ${definition.flag} will be removed in version ${removalVersion}. ${removalHint ?? ''}`.trim(),
    { flag: definition.flag, removalVersion }
  );
  return ok(undefined);
}

function resolveDefault(definition: OptionDefinition): Result<OptionValue, OptionsError> {
  if (definition.defaultFactory === undefined) {
    return ok(definition.defaultValue);
  }
  const coerced = coerceOptionValue(definition, definition.defaultFactory());
  if (!coerced.ok) {
    // A default that fails its own type is a schema bug, not a user error
    return err(
      new SchemaError(
        'MALFORMED_OPTION',
        `Option ${definition.flag}: computed default is invalid: ${coerced.error.message}`,
        definition.flag
      )
    );
  }
  return coerced;
}

/**
 * Resolve every registered option of a scope
 */
export function resolveOptionValues(
  registry: OptionRegistry,
  explicit: ExplicitValues,
  options: ResolveOptions = {}
): Result<ResolvedOptions, OptionsError> {
  const { logger } = options;
  const toolVersionText = options.toolVersion ?? TOOL_VERSION;
  const toolVersion = parseVersion(toolVersionText);
  if (toolVersion === null) {
    return err(
      new SchemaError('MALFORMED_OPTION', `Tool version "${toolVersionText}" is not a valid version`)
    );
  }

  // Match explicit keys to definitions
  const explicitByDest = new Map<string, unknown>();
  const unknownKeys: string[] = [];
  for (const [key, raw] of Object.entries(explicit)) {
    const definition = registry.lookup(key);
    if (!definition) {
      if (!options.ignoredKeys?.has(key)) {
        unknownKeys.push(key);
      }
      continue;
    }
    if (explicitByDest.has(definition.dest)) {
      return err(invalidValue(definition, `given more than once (last as "${key}")`));
    }
    explicitByDest.set(definition.dest, raw);
  }

  const values = new Map<string, OptionValue>();
  const sources = new Map<string, ValueSource>();

  for (const definition of registry.list()) {
    if (explicitByDest.has(definition.dest)) {
      const coerced = coerceOptionValue(definition, explicitByDest.get(definition.dest));
      if (!coerced.ok) {
        logger?.event('option_value_rejected', coerced.error.message, { flag: definition.flag });
        return coerced;
      }
      const deprecation = checkDeprecation(definition, toolVersion, logger);
      if (!deprecation.ok) {
        return deprecation;
      }
      values.set(definition.dest, coerced.value);
      sources.set(definition.dest, 'explicit');
    } else {
      const resolved = resolveDefault(definition);
      if (!resolved.ok) {
        return resolved;
      }
      values.set(definition.dest, resolved.value);
      sources.set(definition.dest, 'default');
    }
  }

  if (unknownKeys.length > 0) {
    // Without a verify-config option in scope, unknown keys are always rejected
    const verify = values.get(VERIFY_CONFIG_DEST) ?? true;
    if (verify === true) {
      const key = unknownKeys[0];
      return err(
        new ValidationError('UNKNOWN_OPTION', `Unknown option ${key} in scope "${registry.scope}"`, key)
      );
    }
    for (const key of unknownKeys) {
      logger?.event('unknown_option_ignored', `Ignoring unknown option ${key}`, {
        scope: registry.scope,
        flag: key,
      });
    }
  }

  logger?.event('options_resolved', `Resolved ${values.size} options`, {
    scope: registry.scope,
    phase: registry.phase,
    explicitCount: explicitByDest.size,
  });

  return ok(new ResolvedOptions(values, sources, registry.scope));
}
