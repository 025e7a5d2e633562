/**
 * Engine Bootstrap
 *
 * Role:
 *   Shared front half of every run: parse the command line, then build the engine.
 *
 * Responsibilities:
 *   - Print help/version and stop with exit code 0
 *   - Print option errors with the help hint
 *   - Report engine construction failures
 *
 * Nothing here exits the process; callers get a typed outcome and choose.
 */

import { EngineConstructionError, isOptionError } from '../../errors/errors.ts';
import type { EngineFactory, ScriptEngine } from '../../engine/types.ts';
import { createVmEngine } from '../../engine/vm-engine.ts';
import { resolveEnvironment, type RuntimeEnvironment } from '../config/environment.ts';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../constants/exit-codes.ts';
import { PROGRAM_NAME } from '../constants/paths.ts';
import { showHelp } from '../core/help/formatter.ts';
import { showVersion } from '../core/help/help.ts';
import type { ExitReason } from '../input/apply.ts';
import { HELP_HINT, parseCommandLine } from '../input/parser.ts';
import type { RunConfiguration } from '../input/run-configuration.ts';
import { reportError } from '../observability/error-reporter.ts';
import {
  createLogger,
  type Logger,
  type LogSink,
  makeLogOptions,
} from '../observability/logger.ts';

export type BootstrapConsole = Pick<typeof console, 'log' | 'error'>;

export interface BootstrapDeps {
  readonly engineFactory?: EngineFactory;
  readonly console?: BootstrapConsole;
  readonly environment?: RuntimeEnvironment;
  readonly cwd?: string;
  /** Destination for debug logging (defaults to stderr) */
  readonly logSink?: LogSink;
}

export type Bootstrap =
  | {
      readonly kind: 'ready';
      readonly config: RunConfiguration;
      readonly engine: ScriptEngine;
      readonly logger: Logger;
    }
  | { readonly kind: 'done'; readonly exitCode: number };

/**
 * Print the output requested by `--help` or `--version`.
 */
export function printEarlyExit(reason: ExitReason, out: BootstrapConsole): void {
  out.log(reason === 'help' ? showHelp() : showVersion());
}

/**
 * Construct the engine described by the configuration.
 *
 * @throws {EngineConstructionError} wrapping whatever the factory raised.
 */
export function buildEngine(
  config: RunConfiguration,
  environment: RuntimeEnvironment,
  factory: EngineFactory,
  logger: Logger,
  cwd?: string,
): ScriptEngine {
  try {
    return factory({
      home: environment.home,
      modulePath: environment.modulePath,
      bootScripts: config.bootScripts,
      optLevel: config.optLevel,
      debug: config.debug,
      sandboxed: config.policyUrl !== undefined,
      systemArgs: config.scriptName === undefined ? [] : [config.scriptName, ...config.scriptArgs],
      logger: logger.child('engine'),
      ...(cwd === undefined ? {} : { cwd }),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EngineConstructionError(
      'ENGINE_CONSTRUCTION_FAILED',
      `Failed to construct engine: ${reason}`,
      { cause: error },
    );
  }
}

/**
 * Parse argv and construct the engine, reporting anything that stops the run.
 */
export function bootstrap(argv: readonly string[], deps: BootstrapDeps = {}): Bootstrap {
  const {
    engineFactory = createVmEngine,
    console: out = console,
    environment = resolveEnvironment(),
    cwd,
    logSink = process.stderr,
  } = deps;

  let config: RunConfiguration;
  try {
    const outcome = parseCommandLine(argv);
    if (outcome.kind === 'exit') {
      printEarlyExit(outcome.reason, out);
      return { kind: 'done', exitCode: EXIT_SUCCESS };
    }
    config = outcome.config;
  } catch (error) {
    if (isOptionError(error)) {
      out.error(error.message);
      out.error(HELP_HINT);
      return { kind: 'done', exitCode: EXIT_FAILURE };
    }
    throw error;
  }

  const logger = createLogger(
    makeLogOptions({
      component: PROGRAM_NAME,
      sink: logSink,
      structured: environment.structuredLogs,
      enabled: config.debug,
    }),
  );

  try {
    const engine = buildEngine(config, environment, engineFactory, logger, cwd);
    return { kind: 'ready', config, engine, logger };
  } catch (error) {
    reportError(error, out, { verbose: config.verbose });
    return { kind: 'done', exitCode: EXIT_FAILURE };
  }
}
