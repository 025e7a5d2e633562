/**
 * Help Text Formatter
 *
 * Role:
 *   Format the usage screen from the option table.
 *
 * Responsibilities:
 *   - List options in table order with their value placeholders
 *   - Escape/sanitize tokens for display
 */

import { OPTION_TABLE, type OptionSpec } from '../../config/option-table.ts';
import { PROGRAM_NAME } from '../../constants/paths.ts';

/** Width of the `-x --long VALUE` column. */
const OPTION_COLUMN_WIDTH = 22;

/**
 * Sanitize a token for inclusion in help output.
 *
 * Removes non-printable or non-ASCII characters to avoid control
 * characters or terminal escape sequences in the help text.
 */
export const escapeHelpToken = (value: string): string =>
  value.replaceAll(/[^\u0020-\u007E]/g, '');

/**
 * Render one option row: two-space indent, padded option column, description.
 */
export function formatOptionRow(spec: OptionSpec): string {
  const placeholder = spec.argPlaceholder.length > 0 ? ` ${spec.argPlaceholder}` : '';
  const usage = escapeHelpToken(`-${spec.short} --${spec.long}${placeholder}`);
  return `  ${usage.padEnd(OPTION_COLUMN_WIDTH)} ${escapeHelpToken(spec.description)}`;
}

/**
 * Build the usage screen printed by `--help`.
 */
export function showHelp(table: readonly OptionSpec[] = OPTION_TABLE): string {
  return [
    'Usage:',
    `  ${PROGRAM_NAME} [option] ... [script] [arg] ...`,
    'Options:',
    ...table.map(formatOptionRow),
  ].join('\n');
}
