/**
 * Host environment
 * Process-wide inputs that option defaults depend on. Captured once at
 * process start and passed in explicitly, so the schema and validator never
 * read the process state themselves.
 */

import { availableParallelism, homedir, tmpdir } from 'os';
import { join } from 'path';
import { TOOL_VERSION } from '../version';

export interface HostEnvironment {
  /** Number of processors available to this process */
  readonly cpuCount: number;
  /** Whether stdout is an interactive terminal */
  readonly stdoutIsTty: boolean;
  /** Whether stderr is an interactive terminal */
  readonly stderrIsTty: boolean;
  /** Environment variables */
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Root of the repository being built */
  readonly buildroot: string;
  readonly homeDir: string;
  readonly tempDir: string;
  /** Version of the running tool, compared against option removal versions */
  readonly toolVersion: string;
}

/**
 * Read the host environment from the current process
 */
export function captureHostEnvironment(overrides: Partial<HostEnvironment> = {}): HostEnvironment {
  return Object.freeze({
    cpuCount: availableParallelism(),
    stdoutIsTty: process.stdout.isTTY === true,
    stderrIsTty: process.stderr.isTTY === true,
    env: Object.freeze({ ...process.env }),
    buildroot: process.cwd(),
    homeDir: homedir(),
    tempDir: tmpdir(),
    toolVersion: TOOL_VERSION,
    ...overrides,
  });
}

/**
 * Global cache directory (`$XDG_CACHE_HOME/pants` or `~/.cache/pants`)
 */
export function getCacheDir(environment: HostEnvironment): string {
  const xdg = environment.env.XDG_CACHE_HOME;
  return xdg ? join(xdg, 'pants') : join(environment.homeDir, '.cache', 'pants');
}

/**
 * Global config directory (`$XDG_CONFIG_HOME/pants` or `~/.config/pants`)
 */
export function getConfigDir(environment: HostEnvironment): string {
  const xdg = environment.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, 'pants') : join(environment.homeDir, '.config', 'pants');
}

export function getDefaultConfigFile(environment: HostEnvironment): string {
  return join(environment.buildroot, 'pants.toml');
}

/**
 * Whether a CI system is driving the run (any value of `CI` counts)
 */
export function isContinuousIntegration(environment: HostEnvironment): boolean {
  return environment.env.CI !== undefined;
}
