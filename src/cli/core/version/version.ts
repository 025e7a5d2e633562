/**
 * Version Lookup
 *
 * Role:
 *   Lazy-load and cache the package version for `--version`.
 *
 * Responsibilities:
 *   - Read package.json beside the installed sources on first access
 *   - Fall back to a sentinel when the manifest is unreadable
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

let cachedPkgVersion: string | undefined;

const pkgPath = fileURLToPath(new URL(`../../../../${PKG_FILENAME}`, import.meta.url));

const readVersionField = (raw: string): string => {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || !('version' in parsed)) {
    return PKG_VERSION_FALLBACK;
  }
  const { version } = parsed;
  return typeof version === 'string' || typeof version === 'number'
    ? String(version)
    : PKG_VERSION_FALLBACK;
};

/**
 * Read and cache the package version from package.json.
 *
 * Failures are written to stderr once and the fallback sentinel is cached.
 */
function getPkgVersion(): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    cachedPkgVersion = readVersionField(readFileSync(pkgPath, 'utf8'));
  } catch (error) {
    console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

/**
 * Public accessor for the resolved package version.
 */
export function getPackageVersion(): string {
  return getPkgVersion();
}

/**
 * Test-only helpers that expose private helpers without reloading the module.
 */
export const __test__ = {
  getPkgVersion,
  readVersionField,
  reset: (): void => {
    cachedPkgVersion = undefined;
  },
};
