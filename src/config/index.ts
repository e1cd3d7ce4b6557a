/**
 * Config module - host environment and option value resolution
 */

export {
  captureHostEnvironment,
  getCacheDir,
  getConfigDir,
  getDefaultConfigFile,
  isContinuousIntegration,
} from './host-environment';
export type { HostEnvironment } from './host-environment';

export { coerceOptionValue, resolveOptionValues } from './resolve-values';
export type { ExplicitValues, ResolveOptions } from './resolve-values';

export { ResolvedOptions } from './resolved-options';

export { parseVersion, compareVersions } from './version';
export type { ParsedVersion } from './version';
