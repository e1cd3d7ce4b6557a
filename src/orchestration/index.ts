/**
 * Orchestration module - wires registration, resolution, projection and validation
 */

export {
  createBootstrapRegistry,
  createGlobalRegistry,
  loadBootstrapOptions,
  loadGlobalOptions,
} from './load-global-options';
export type {
  LoadGlobalOptionsInput,
  BootstrapOptionsSnapshot,
  GlobalOptionsSnapshot,
} from './load-global-options';
