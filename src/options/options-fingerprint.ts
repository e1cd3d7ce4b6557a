/**
 * Option fingerprints
 * Cache keys computed from resolved values. Options declared with
 * noFingerprint() never reach the hash.
 */

import { createHash } from 'crypto';
import type { ResolvedOptions } from '../config/resolved-options';
import { isDictValue, isListValue, OptionDefinition, OptionValue } from '../types/option';
import type { OptionRegistry } from './option-registry';

/**
 * JSON with mapping keys sorted, so equal values always hash the same
 */
export function canonicalJson(value: OptionValue | undefined): string {
  if (value === undefined) {
    return 'null';
  }
  if (isListValue(value)) {
    return `[${value.map((member) => JSON.stringify(member)).join(',')}]`;
  }
  if (isDictValue(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((key) => `${JSON.stringify(key)}:${JSON.stringify(value[key])}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

function fingerprintOf(
  definitions: readonly OptionDefinition[],
  resolved: ResolvedOptions
): string {
  const hash = createHash('sha256');
  const dests = definitions.map((definition) => definition.dest).sort();
  for (const dest of dests) {
    hash.update(`${dest}=${canonicalJson(resolved.get(dest))}\n`);
  }
  return hash.digest('hex');
}

/**
 * Cache key over every option that participates in fingerprinting
 */
export function computeOptionsFingerprint(
  registry: OptionRegistry,
  resolved: ResolvedOptions
): string {
  return fingerprintOf(
    registry.list().filter((definition) => definition.fingerprint),
    resolved
  );
}

/**
 * Key over the daemon-affecting options. A running daemon whose key differs
 * from the current run's must be restarted.
 */
export function computeDaemonFingerprint(
  registry: OptionRegistry,
  resolved: ResolvedOptions
): string {
  return fingerprintOf(
    registry.list().filter((definition) => definition.daemon && definition.fingerprint),
    resolved
  );
}
