/**
 * Module Resolution
 *
 * Role:
 *   Map a module id onto a script file.
 *
 * Relative ids (`./x`, `../x`) and absolute paths resolve against the requesting
 * directory only. Bare ids are tried against each search root in order.
 */

import { statSync } from 'node:fs';
import path from 'node:path';

export const SCRIPT_EXTENSION = '.js';
export const MODULES_DIRNAME = 'modules';

function isFile(candidate: string): boolean {
  return statSync(candidate, { throwIfNoEntry: false })?.isFile() === true;
}

function candidatesFor(base: string): readonly string[] {
  return [base, `${base}${SCRIPT_EXTENSION}`, path.join(base, `index${SCRIPT_EXTENSION}`)];
}

/**
 * Whether the id is explicitly relative or absolute.
 */
export function isPathLike(id: string): boolean {
  return path.isAbsolute(id) || id.startsWith('./') || id.startsWith('../');
}

/**
 * Build the ordered search roots: module path entries (relative to home), then `<home>/modules`.
 */
export function buildSearchRoots(
  home: string,
  modulePath: readonly string[],
  cwd: string,
): readonly string[] {
  const resolvedHome = path.resolve(cwd, home);
  return [
    ...modulePath.map((entry) => path.resolve(resolvedHome, entry)),
    path.join(resolvedHome, MODULES_DIRNAME),
  ];
}

/**
 * Resolve `id` to an absolute file path, or `undefined` when nothing matches.
 */
export function resolveModulePath(
  id: string,
  fromDir: string,
  roots: readonly string[],
): string | undefined {
  const bases = isPathLike(id)
    ? [path.resolve(fromDir, id)]
    : roots.map((root) => path.resolve(root, id));

  for (const base of bases) {
    const match = candidatesFor(base).find(isFile);
    if (match !== undefined) {
      return match;
    }
  }
  return undefined;
}
