/**
 * Options module - option declaration, registration and the global option schema
 */

export { option, flagToDest, OptionBuilder } from './option-builder';
export { OptionRegistry, GLOBAL_SCOPE } from './option-registry';
export type { Registrar, RegistrationPhase } from './option-registry';
export { registerBootstrapOptions, registerOptions } from './global-options';
export { validateGlobalOptions, validateResolvedGlobalOptions } from './validate-global-options';
export type { RemoteExecutionSettings } from './validate-global-options';
export {
  canonicalJson,
  computeOptionsFingerprint,
  computeDaemonFingerprint,
} from './options-fingerprint';
