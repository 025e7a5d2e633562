/**
 * Option Parser
 *
 * Role:
 *   Scan argv against the option table and find where positional arguments begin.
 *
 * Responsibilities:
 *   - Split short clusters (`-is`) into individual options
 *   - Resolve `--name` and `--name=value` long options
 *   - Consume the next argument for value options given without a value
 *   - Delegate each resolved option to the applier as soon as it is found
 *
 * Everything at and after the returned index is passed through verbatim as the
 * script name and its arguments, even tokens that start with `-`.
 */

import { OptionSyntaxError } from '../../errors/errors.ts';
import { findLongOption, findShortOption, OPTION_TABLE, type OptionSpec } from '../config/option-table.ts';
import {
  type ApplyOutcome,
  applyOption,
  type ExitReason,
  type ResolvedOption,
} from './apply.ts';
import {
  createRunConfiguration,
  finalizeRunConfiguration,
  type RunConfiguration,
} from './run-configuration.ts';

export const HELP_HINT = 'Use -h or --help for a list of supported options.';

export type OptionSink = (option: ResolvedOption) => ApplyOutcome;

export type OptionScan =
  | {
      readonly kind: 'scanned';
      /** Index of the first positional argument (argv.length when there is none) */
      readonly index: number;
      readonly resolved: readonly ResolvedOption[];
    }
  | { readonly kind: 'exit'; readonly reason: ExitReason };

export type ParseOutcome =
  | { readonly kind: 'parsed'; readonly config: RunConfiguration }
  | { readonly kind: 'exit'; readonly reason: ExitReason };

function unknownOption(option: string): OptionSyntaxError {
  return new OptionSyntaxError('CLI_UNKNOWN_OPTION', option, `Unknown option: ${option}`);
}

function missingValue(option: string): OptionSyntaxError {
  return new OptionSyntaxError('CLI_MISSING_VALUE', option, `${option} option requires a value.`);
}

interface TokenResult {
  readonly resolved: readonly ResolvedOption[];
  /** Extra argv entries consumed as a value */
  readonly consumedNext: number;
}

function resolveShortCluster(
  cluster: string,
  nextArg: string | undefined,
  table: readonly OptionSpec[],
): TokenResult {
  const resolved: ResolvedOption[] = [];

  for (let i = 0; i < cluster.length; i++) {
    const letter = cluster.charAt(i);
    const match = findShortOption(letter, table);

    if (match.kind === 'not-found') {
      throw unknownOption(`-${letter}`);
    }
    if (match.kind === 'flag') {
      resolved.push({ longName: match.spec.long });
      continue;
    }

    // A value option ends the cluster: the rest of it, or the next argument, is the value.
    const isLast = i === cluster.length - 1;
    if (!isLast) {
      resolved.push({ longName: match.spec.long, rawArgument: cluster.slice(i + 1) });
      return { resolved, consumedNext: 0 };
    }
    if (nextArg === undefined) {
      throw missingValue(`-${match.spec.short}`);
    }
    resolved.push({ longName: match.spec.long, rawArgument: nextArg });
    return { resolved, consumedNext: 1 };
  }

  return { resolved, consumedNext: 0 };
}

function resolveLongOption(
  token: string,
  nextArg: string | undefined,
  table: readonly OptionSpec[],
): TokenResult {
  const match = findLongOption(token, table);

  if (match.kind === 'not-found') {
    throw unknownOption(`--${token}`);
  }
  if (match.kind === 'flag') {
    return { resolved: [{ longName: match.spec.long }], consumedNext: 0 };
  }

  const { long } = match.spec;
  if (token === long) {
    if (nextArg === undefined) {
      throw missingValue(`--${long}`);
    }
    return { resolved: [{ longName: long, rawArgument: nextArg }], consumedNext: 1 };
  }
  return {
    resolved: [{ longName: long, rawArgument: token.slice(long.length + 1) }],
    consumedNext: 0,
  };
}

/**
 * Scan the leading options of argv, handing each one to `sink`.
 *
 * @throws {OptionSyntaxError} for unknown options or missing values.
 */
export function parseOptions(
  argv: readonly string[],
  sink: OptionSink,
  table: readonly OptionSpec[] = OPTION_TABLE,
): OptionScan {
  const all: ResolvedOption[] = [];
  let index = 0;

  while (index < argv.length) {
    const token = argv[index] ?? '';
    // A lone `-` is an empty cluster and a lone `--` an unknown long option.
    if (!token.startsWith('-')) {
      break;
    }

    const nextArg = argv[index + 1];
    const result = token.startsWith('--')
      ? resolveLongOption(token.slice(2), nextArg, table)
      : resolveShortCluster(token.slice(1), nextArg, table);

    for (const option of result.resolved) {
      all.push(option);
      const outcome = sink(option);
      if (outcome.kind === 'exit') {
        return outcome;
      }
    }
    index += 1 + result.consumedNext;
  }

  return { kind: 'scanned', index, resolved: all };
}

/**
 * Parse a full command line into a finalized run configuration.
 *
 * @throws {OptionSyntaxError} for unknown options or missing values.
 * @throws {OptionRangeError} for an invalid optimization level.
 */
export function parseCommandLine(argv: readonly string[]): ParseOutcome {
  const draft = createRunConfiguration();
  const scan = parseOptions(argv, (option) => applyOption(draft, option));

  if (scan.kind === 'exit') {
    return scan;
  }

  const scriptName = argv[scan.index];
  if (scriptName !== undefined) {
    draft.scriptName = scriptName;
    draft.scriptArgs = argv.slice(scan.index + 1);
  }

  return { kind: 'parsed', config: finalizeRunConfiguration(draft) };
}
