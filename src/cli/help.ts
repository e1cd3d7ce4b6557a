/**
 * Option Help Text
 *
 * Renders the declared options of a registry as help text
 */

import type { OptionRegistry } from '../options/option-registry';
import { OptionDefinition, OptionValue, isDictValue, isListValue } from '../types/option';

export interface HelpOptions {
  /** Include options marked advanced */
  showAdvanced?: boolean;
}

const INDENT = '  ';
const BODY_INDENT = '      ';

function metavarFor(definition: OptionDefinition): string | undefined {
  if (definition.metavar !== undefined) {
    return definition.metavar;
  }
  const stem = definition.flag.slice(2);
  switch (definition.type.kind) {
    case 'bool':
      return undefined;
    case 'list':
      return `<${stem}>...`;
    case 'dict':
      return '<key=value>...';
    default:
      return `<${stem}>`;
  }
}

/** Format a value for display; `undefined` when there is nothing worth showing */
export function formatDefaultValue(value: OptionValue): string | undefined {
  if (value === null) {
    return undefined;
  }
  if (isListValue(value) || isDictValue(value)) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * The signature line of an option, e.g. `-l, --level <level>`
 */
export function formatOptionSignature(definition: OptionDefinition): string {
  const names = definition.alias ? `${definition.alias}, ${definition.flag}` : definition.flag;
  const metavar = metavarFor(definition);
  return metavar ? `${names} ${metavar}` : names;
}

function formatOption(definition: OptionDefinition): string[] {
  const lines = [`${INDENT}${formatOptionSignature(definition)}`];
  lines.push(`${BODY_INDENT}${definition.help}`);

  const defaultValue = formatDefaultValue(
    definition.defaultFactory ? definition.defaultFactory() : definition.defaultValue
  );
  if (defaultValue !== undefined) {
    lines.push(`${BODY_INDENT}default: ${defaultValue}`);
  }

  if (definition.removalVersion !== undefined) {
    const hint = definition.removalHint ? ` ${definition.removalHint}` : '';
    lines.push(`${BODY_INDENT}DEPRECATED: will be removed in version ${definition.removalVersion}.${hint}`);
  }
  return lines;
}

/**
 * Render help for every option in a registry, in registration order
 */
export function formatOptionsHelp(registry: OptionRegistry, options: HelpOptions = {}): string {
  const showAdvanced = options.showAdvanced ?? false;
  const all = registry.list();
  const shown = showAdvanced ? all : all.filter((definition) => !definition.advanced);

  const title = registry.scope === '' ? 'Global options:' : `Options for scope "${registry.scope}":`;
  const lines = [title];
  for (const definition of shown) {
    lines.push('', ...formatOption(definition));
  }

  const hidden = all.length - shown.length;
  if (hidden > 0) {
    lines.push('', `${hidden} advanced options hidden.`);
  }
  return lines.join('\n');
}
