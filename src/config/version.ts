/**
 * Version comparison for option deprecation
 * Accepts dotted numeric releases with an optional `devN` pre-release,
 * e.g. `2.0.0`, `2.1.0.dev0`, `2.1.0dev3`.
 */

export interface ParsedVersion {
  release: number[];
  /** Dev pre-release number; undefined for a final release */
  dev?: number;
}

const VERSION_PATTERN = /^(\d+(?:\.\d+)*)(?:\.?dev(\d+))?$/;

export function parseVersion(version: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return null;
  }
  const release = match[1].split('.').map((part) => parseInt(part, 10));
  return match[2] === undefined ? { release } : { release, dev: parseInt(match[2], 10) };
}

/**
 * Compare two parsed versions (returns positive if a > b)
 * A dev release sorts before the final release it precedes.
 */
export function compareVersions(a: ParsedVersion, b: ParsedVersion): number {
  const length = Math.max(a.release.length, b.release.length);
  for (let i = 0; i < length; i++) {
    const diff = (a.release[i] ?? 0) - (b.release[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  const aDev = a.dev ?? Number.POSITIVE_INFINITY;
  const bDev = b.dev ?? Number.POSITIVE_INFINITY;
  if (aDev === bDev) {
    return 0;
  }
  return aDev < bDev ? -1 : 1;
}
