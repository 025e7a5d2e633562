/**
 * Help & Version API
 *
 * Role:
 *   Re-export public API for help and version functions.
 */

import { PROGRAM_NAME } from '../../constants/paths.ts';
import { getPackageVersion } from '../version/version.ts';
export { showHelp } from './formatter.ts';

/**
 * Return the string printed by `--version`, e.g. `spindle v1.2.3`.
 */
export function showVersion(): string {
  return `${PROGRAM_NAME} v${getPackageVersion()}`;
}
