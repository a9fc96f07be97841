/**
 * Dotted version helpers for CUDA toolkit and compute capability versions
 *
 * @module version-utils
 */

import { Result, ok, err } from './result-types.js';

const VERSION_PATTERN = /^\d+(\.\d+)*$/;

/**
 * Parsed dotted version, e.g. "11.8" -> [11n, 8n].
 * Components are bigints so arbitrarily long digit runs compare exactly.
 */
export type VersionComponents = readonly bigint[];

/**
 * Parse a dotted version string into numeric components
 *
 * @param version - Version string such as "12.0"
 * @returns Result with components, or an Error describing the malformed input
 */
export function parseVersion(version: string): Result<VersionComponents, Error> {
  const trimmed = version.trim();
  if (!VERSION_PATTERN.test(trimmed)) {
    return err(new Error(`"${version}" is not a dotted numeric version`));
  }
  return ok(trimmed.split('.').map(part => BigInt(part)));
}

/**
 * Check a version string without keeping the parsed value
 */
export function isValidVersion(version: string): boolean {
  return VERSION_PATTERN.test(version.trim());
}

/**
 * Compare two parsed versions component-wise.
 * Missing trailing components count as 0, so [12] equals [12, 0] and
 * "12.0" equals "12.0.0". Orderings that rank a shorter version below a
 * longer one with the same prefix would put "12.0" before "12.0.0"; this
 * one does not.
 *
 * @returns -1 if a < b, 0 if equal, 1 if a > b
 */
export function compareVersions(a: VersionComponents, b: VersionComponents): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0n;
    const right = b[i] ?? 0n;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  return 0;
}

/**
 * True when `version` is the same as or newer than `minimum`
 */
export function versionAtLeast(version: VersionComponents, minimum: VersionComponents): boolean {
  return compareVersions(version, minimum) >= 0;
}

/**
 * True when `version` is strictly older than `other`
 */
export function versionOlder(version: VersionComponents, other: VersionComponents): boolean {
  return compareVersions(version, other) < 0;
}

/**
 * Drop the separators of a dotted version: "8.6" -> "86"
 */
export function dropDot(version: string): string {
  return version.replace(/\./g, '');
}
