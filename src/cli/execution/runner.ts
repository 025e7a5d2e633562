/**
 * One-shot Runner
 *
 * Role:
 *   Execute the `spindle` command: expression, then script, then shell.
 *
 * Responsibilities:
 *   - Decide whether the interactive shell starts
 *   - Auto-detect silent mode when stdin or stdout is not a terminal
 *   - Report script failures with the engine's syntax errors
 */

import type { ScriptEngine } from '../../engine/types.ts';
import { createReplShell, type ShellFactory } from '../../shell/repl-shell.ts';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../constants/exit-codes.ts';
import type { RunConfiguration } from '../input/run-configuration.ts';
import { reportError } from '../observability/error-reporter.ts';
import { bootstrap, type BootstrapDeps } from './bootstrap.ts';

export interface RunnerDeps extends BootstrapDeps {
  readonly shellFactory?: ShellFactory;
  /** True when both stdin and stdout are attached to a terminal */
  readonly isInteractiveTerminal?: () => boolean;
}

export interface RunResult {
  readonly exitCode: number;
}

const processIsInteractive = (): boolean =>
  process.stdin.isTTY === true && process.stdout.isTTY === true;

/**
 * Whether the shell starts after the expression and script have run.
 */
export function shouldStartShell(config: RunConfiguration): boolean {
  return (config.scriptName === undefined && config.expression === undefined) || config.runShell;
}

/**
 * Parse argv, build the engine and run what the configuration asks for.
 */
export async function executeRun(
  argv: readonly string[],
  deps: RunnerDeps = {},
): Promise<RunResult> {
  const {
    shellFactory = createReplShell,
    isInteractiveTerminal = processIsInteractive,
    ...bootstrapDeps
  } = deps;
  const out = bootstrapDeps.console ?? console;

  const ready = bootstrap(argv, bootstrapDeps);
  if (ready.kind === 'done') {
    return { exitCode: ready.exitCode };
  }
  const { config, engine, logger } = ready;

  try {
    runOneShot(config, engine);
    if (shouldStartShell(config)) {
      const silent = config.silent || !isInteractiveTerminal();
      logger.debug(`starting shell (silent=${String(silent)})`);
      const shell = shellFactory({
        engine,
        silent,
        verbose: config.verbose,
        errorSink: out,
        ...(config.historyFile === undefined ? {} : { historyFile: config.historyFile }),
      });
      await shell.run();
    }
  } catch (error) {
    reportError(error, out, { verbose: config.verbose, syntaxErrors: engine.syntaxErrors });
    return { exitCode: EXIT_FAILURE };
  }

  return { exitCode: EXIT_SUCCESS };
}

function runOneShot(config: RunConfiguration, engine: ScriptEngine): void {
  if (config.expression !== undefined) {
    engine.evaluateExpression(config.expression);
  }
  if (config.scriptName !== undefined) {
    engine.runScript(config.scriptName, config.scriptArgs);
  }
}
