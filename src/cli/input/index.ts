/**
 * Input handling: option scanning, option application and the run configuration.
 *
 * This barrel re-exports the parser and its data model so other layers import
 * from a single stable path.
 */

export {
  type ApplyOutcome,
  applyOption,
  type ExitReason,
  parseOptLevel,
  type ResolvedOption,
} from './apply.ts';
export {
  HELP_HINT,
  type OptionScan,
  type OptionSink,
  type ParseOutcome,
  parseCommandLine,
  parseOptions,
} from './parser.ts';
export {
  createRunConfiguration,
  DEFAULT_OPT_LEVEL,
  finalizeRunConfiguration,
  MAX_OPT_LEVEL,
  MIN_OPT_LEVEL,
  type RunConfiguration,
  type RunConfigurationDraft,
} from './run-configuration.ts';
