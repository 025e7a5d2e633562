/**
 * Option Applier
 *
 * Role:
 *   Validate one resolved option and apply it to the run configuration draft.
 *
 * Responsibilities:
 *   - Range-check the optimization level
 *   - Accumulate bootstrap scripts in command-line order
 *   - Request an early exit for help and version
 */

import { OptionRangeError } from '../../errors/errors.ts';
import type { OptionName } from '../config/option-table.ts';
import { MAX_OPT_LEVEL, MIN_OPT_LEVEL, type RunConfigurationDraft } from './run-configuration.ts';

/**
 * An option after table lookup, with its raw value for value options.
 */
export interface ResolvedOption {
  readonly longName: OptionName;
  readonly rawArgument?: string;
}

export type ExitReason = 'help' | 'version';

export type ApplyOutcome =
  | { readonly kind: 'continue' }
  | { readonly kind: 'exit'; readonly reason: ExitReason };

const CONTINUE: ApplyOutcome = { kind: 'continue' };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse an optimization level, rejecting anything outside [-1, 9].
 */
export function parseOptLevel(raw: string | undefined): number {
  const rangeError = () =>
    new OptionRangeError(
      'optlevel',
      `optlevel value must be a number between ${MIN_OPT_LEVEL} and ${MAX_OPT_LEVEL}.`,
    );

  if (raw === undefined || !INTEGER_PATTERN.test(raw)) {
    throw rangeError();
  }
  const level = Number.parseInt(raw, 10);
  if (level < MIN_OPT_LEVEL || level > MAX_OPT_LEVEL) {
    throw rangeError();
  }
  return level;
}

/**
 * Apply a resolved option to the draft.
 *
 * @throws {OptionRangeError} when the optimization level is invalid.
 */
export function applyOption(draft: RunConfigurationDraft, option: ResolvedOption): ApplyOutcome {
  const value = option.rawArgument ?? '';

  switch (option.longName) {
    case 'help':
      return { kind: 'exit', reason: 'help' };
    case 'version':
      return { kind: 'exit', reason: 'version' };
    case 'interactive':
      draft.runShell = true;
      break;
    case 'debug':
      draft.debug = true;
      break;
    case 'verbose':
      draft.verbose = true;
      break;
    case 'silent':
      // silent implies the shell
      draft.silent = true;
      draft.runShell = true;
      break;
    case 'optlevel':
      draft.optLevel = parseOptLevel(option.rawArgument);
      break;
    case 'history':
      draft.historyFile = value;
      break;
    case 'policy':
      draft.policyUrl = value;
      break;
    case 'bootscript':
      draft.bootScripts.push(value);
      break;
    case 'expression':
      draft.expression = value;
      break;
  }

  return CONTINUE;
}
