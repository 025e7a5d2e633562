/**
 * @packageDocumentation
 * File names and package metadata used across the CLI.
 *
 * @remarks
 * Keep this file focused on literal values that are unlikely to change per
 * execution; avoid introducing logic here.
 */

/** Name printed in usage and version output. */
export const PROGRAM_NAME = 'spindle';

/** Filename for the package manifest used when resolving the version. */
export const PKG_FILENAME = 'package.json';

/** Fallback value to use when a package version cannot be determined. */
export const PKG_VERSION_FALLBACK = 'unknown';

/** Shell history file created in the user's home directory. */
export const DEFAULT_HISTORY_FILENAME = '.spindle-history';
