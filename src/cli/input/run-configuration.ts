/**
 * Run Configuration
 *
 * Role:
 *   Settings resolved from the command line, handed to engine construction.
 *
 * The draft is mutated while options are applied, then frozen by
 * `finalizeRunConfiguration` and treated as read-only from there on.
 */

export const DEFAULT_OPT_LEVEL = 0;
export const MIN_OPT_LEVEL = -1;
export const MAX_OPT_LEVEL = 9;

export interface RunConfiguration {
  readonly runShell: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
  readonly verbose: boolean;
  readonly optLevel: number;
  readonly expression?: string;
  readonly historyFile?: string;
  readonly bootScripts: readonly string[];
  readonly scriptName?: string;
  readonly scriptArgs: readonly string[];
  /** When present, scripts run sandboxed without host module access */
  readonly policyUrl?: string;
}

export interface RunConfigurationDraft {
  runShell: boolean;
  debug: boolean;
  silent: boolean;
  verbose: boolean;
  optLevel: number;
  expression?: string;
  historyFile?: string;
  bootScripts: string[];
  scriptName?: string;
  scriptArgs: string[];
  policyUrl?: string;
}

/**
 * Create an empty draft with default settings.
 */
export function createRunConfiguration(): RunConfigurationDraft {
  return {
    runShell: false,
    debug: false,
    silent: false,
    verbose: false,
    optLevel: DEFAULT_OPT_LEVEL,
    bootScripts: [],
    scriptArgs: [],
  };
}

/**
 * Copy the draft into an immutable configuration.
 */
export function finalizeRunConfiguration(draft: RunConfigurationDraft): RunConfiguration {
  const { expression, historyFile, scriptName, policyUrl } = draft;

  return Object.freeze({
    runShell: draft.runShell,
    debug: draft.debug,
    silent: draft.silent,
    verbose: draft.verbose,
    optLevel: draft.optLevel,
    bootScripts: Object.freeze([...draft.bootScripts]),
    scriptArgs: Object.freeze([...draft.scriptArgs]),
    ...(expression === undefined ? {} : { expression }),
    ...(historyFile === undefined ? {} : { historyFile }),
    ...(scriptName === undefined ? {} : { scriptName }),
    ...(policyUrl === undefined ? {} : { policyUrl }),
  });
}
