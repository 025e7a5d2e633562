/**
 * Option Table
 *
 * Role: Authoritative registry of recognized command-line options.
 *
 * This file is:
 *   - A single source of truth for parsing and help output
 *   - Ordered: order decides help listing and short-letter precedence
 *   - Immutable and side-effect free
 */

/**
 * Long names of every recognized option.
 */
export type OptionName =
  | 'bootscript'
  | 'debug'
  | 'expression'
  | 'help'
  | 'history'
  | 'interactive'
  | 'optlevel'
  | 'policy'
  | 'silent'
  | 'verbose'
  | 'version';

/**
 * Canonical description of a single option.
 */
export interface OptionSpec {
  /** Single letter used after `-` */
  readonly short: string;

  /** Name used after `--` */
  readonly long: OptionName;

  /** Help text */
  readonly description: string;

  /** Value placeholder for help output; empty means the option is a flag */
  readonly argPlaceholder: string;
}

export const OPTION_TABLE: readonly OptionSpec[] = Object.freeze([
  {
    short: 'b',
    long: 'bootscript',
    description: 'Run additional bootstrap script',
    argPlaceholder: 'FILE',
  },
  { short: 'd', long: 'debug', description: 'Run with debugger integration', argPlaceholder: '' },
  {
    short: 'e',
    long: 'expression',
    description: 'Run the given expression as script',
    argPlaceholder: 'EXPR',
  },
  { short: 'h', long: 'help', description: 'Display this help message', argPlaceholder: '' },
  {
    short: 'H',
    long: 'history',
    description: 'Use custom history file (default: ~/.spindle-history)',
    argPlaceholder: 'FILE',
  },
  {
    short: 'i',
    long: 'interactive',
    description: 'Start shell after script file has run',
    argPlaceholder: '',
  },
  {
    short: 'o',
    long: 'optlevel',
    description: 'Set optimization level (-1 to 9)',
    argPlaceholder: 'OPT',
  },
  {
    short: 'p',
    long: 'policy',
    description: 'Set policy file and enable the script sandbox',
    argPlaceholder: 'URL',
  },
  {
    short: 's',
    long: 'silent',
    description: 'Disable shell prompt and echo for piped stdin/stdout',
    argPlaceholder: '',
  },
  {
    short: 'V',
    long: 'verbose',
    description: 'Verbose mode: print native stack traces',
    argPlaceholder: '',
  },
  { short: 'v', long: 'version', description: 'Print version number and exit', argPlaceholder: '' },
] satisfies OptionSpec[]);

/**
 * Outcome of looking an option up in the table.
 */
export type OptionMatch =
  | { readonly kind: 'not-found' }
  | { readonly kind: 'flag'; readonly spec: OptionSpec }
  | { readonly kind: 'value'; readonly spec: OptionSpec };

const NOT_FOUND: OptionMatch = { kind: 'not-found' };

/**
 * Whether the option expects a value.
 */
export function takesValue(spec: OptionSpec): boolean {
  return spec.argPlaceholder.length > 0;
}

function toMatch(spec: OptionSpec): OptionMatch {
  return takesValue(spec) ? { kind: 'value', spec } : { kind: 'flag', spec };
}

/**
 * Find the first table entry with the given short letter.
 */
export function findShortOption(
  letter: string,
  table: readonly OptionSpec[] = OPTION_TABLE,
): OptionMatch {
  const spec = table.find((entry) => entry.short === letter);
  return spec === undefined ? NOT_FOUND : toMatch(spec);
}

/**
 * Find the first table entry matching a long option token (the text after `--`).
 *
 * Flags match by exact name only; value options also match `name=value`.
 */
export function findLongOption(
  token: string,
  table: readonly OptionSpec[] = OPTION_TABLE,
): OptionMatch {
  const spec = table.find(
    (entry) =>
      token === entry.long || (takesValue(entry) && token.startsWith(`${entry.long}=`)),
  );
  return spec === undefined ? NOT_FOUND : toMatch(spec);
}
