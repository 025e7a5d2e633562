/**
 * Shared Test Utilities: temporary directories and script files.
 *
 * Usage:
 *   - createTempDir() in beforeEach, removeTempDir() in afterEach
 *   - writeScript() to lay out script and module files inside it
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Create a temporary directory.
 * Caller must clean up with removeTempDir().
 */
export async function createTempDir(prefix: string = 'tmp-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

/**
 * Remove a temporary directory and everything below it.
 */
export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write `source` to `relative` under `dir`, creating parent directories.
 *
 * @returns the absolute path of the written file
 */
export async function writeScript(dir: string, relative: string, source: string): Promise<string> {
  const file = path.join(dir, relative);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, source);
  return file;
}
