/**
 * Interactive Shell
 *
 * Role:
 *   Read-eval-print loop over the script engine.
 *
 * Responsibilities:
 *   - Evaluate each line through the engine's shared global scope
 *   - Report failures and keep the loop running
 *   - Continue multi-line input while the statement is incomplete
 *   - Persist history when attached to a terminal
 */

import os from 'node:os';
import path from 'node:path';
import repl from 'node:repl';
import type { Context } from 'node:vm';
import { types } from 'node:util';

import { isScriptExecutionError } from '../errors/errors.ts';
import { DEFAULT_HISTORY_FILENAME } from '../cli/constants/paths.ts';
import { reportError, type ReportSink } from '../cli/observability/error-reporter.ts';
import type { ScriptEngine } from '../engine/types.ts';

export const DEFAULT_PROMPT = '>> ';

export interface ShellOptions {
  readonly engine: ScriptEngine;
  readonly silent: boolean;
  readonly verbose: boolean;
  readonly historyFile?: string;
  readonly input?: NodeJS.ReadableStream;
  readonly output?: NodeJS.WritableStream;
  readonly errorSink?: ReportSink;
  /** Treat the streams as a terminal (line editing and history). Defaults to the output's TTY state. */
  readonly terminal?: boolean;
}

export interface Shell {
  /** Resolves once the input ends or the user exits. */
  run(): Promise<void>;
}

export type ShellFactory = (options: ShellOptions) => Shell;

type EvalCallback = (err: Error | null, result?: unknown) => void;

/**
 * The underlying SyntaxError when the failure only means the input has not ended yet.
 */
export function incompleteInputCause(error: unknown): Error | undefined {
  if (!isScriptExecutionError(error)) {
    return undefined;
  }
  const { cause } = error;
  if (
    types.isNativeError(cause) &&
    cause.name === 'SyntaxError' &&
    /Unexpected end of input|Unterminated template/.test(cause.message)
  ) {
    return cause;
  }
  return undefined;
}

export function defaultHistoryFile(): string {
  return path.join(os.homedir(), DEFAULT_HISTORY_FILENAME);
}

/**
 * `Shell` backed by `node:repl`.
 */
export class ReplShell implements Shell {
  constructor(private readonly options: ShellOptions) {}

  run(): Promise<void> {
    const {
      engine,
      silent,
      verbose,
      input = process.stdin,
      output = process.stdout,
      errorSink = console,
    } = this.options;
    const terminal =
      this.options.terminal ?? (!silent && output === process.stdout && process.stdout.isTTY);

    const evaluate = (code: string, _context: Context, _file: string, cb: EvalCallback): void => {
      try {
        cb(null, engine.evaluateExpression(code));
      } catch (error) {
        const incomplete = incompleteInputCause(error);
        if (incomplete !== undefined) {
          cb(new repl.Recoverable(incomplete));
          return;
        }
        reportError(error, errorSink, { verbose, syntaxErrors: engine.syntaxErrors });
        cb(null, undefined);
      }
    };

    const server = repl.start({
      prompt: silent ? '' : DEFAULT_PROMPT,
      input,
      output,
      terminal,
      useColors: false,
      ignoreUndefined: true,
      eval: evaluate,
    });

    const exited = new Promise<void>((resolve) => {
      server.on('exit', () => resolve());
    });

    if (terminal && !silent) {
      const historyFile = this.options.historyFile ?? defaultHistoryFile();
      server.setupHistory(historyFile, (error) => {
        if (error !== null) {
          errorSink.error(`Could not open history file ${historyFile}: ${error.message}`);
        }
      });
    }

    return exited;
  }
}

/**
 * Default shell factory.
 */
export function createReplShell(options: ShellOptions): Shell {
  return new ReplShell(options);
}
