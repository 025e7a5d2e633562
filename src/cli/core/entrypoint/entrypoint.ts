/**
 * CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, unexpected rejections, exit code).
 *
 * Responsibilities:
 *   - Set up EPIPE error handling
 *   - Translate the run result into `process.exitCode`
 *   - Enable module self-execution detection
 */

import { pathToFileURL } from 'node:url';

import { AppError, isAppError } from '../../../errors/errors.ts';
import { EXIT_FAILURE } from '../../constants/exit-codes.ts';
import { executeRun, type RunnerDeps, type RunResult } from '../../execution/runner.ts';

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<RunResult>;
  readonly console?: Pick<typeof console, 'error'>;
}

/**
 * Ignore EPIPE errors raised when piping output (`spindle -e ... | head`);
 * rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

function setupBrokenPipeHandlers(): void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);
}

/**
 * Scrub argv values for logging to avoid leaking secrets.
 *
 * Option names and short clusters are kept; option values and positionals
 * (scripts, their arguments, `-e` expressions) are replaced by `<redacted>`.
 */
export function sanitizeArgs(argv: readonly string[]): string[] {
  return argv.map((arg) => {
    if (arg.startsWith('--')) {
      const [key = arg, val] = arg.split('=', 2);
      return val === undefined ? key : `${key}=<redacted>`;
    }
    if (arg.startsWith('-') && arg.length > 1) {
      return arg;
    }
    return '<redacted>';
  });
}

/**
 * Run `mainFn`, wiring up broken pipes and top-level error reporting, and set
 * `process.exitCode` from its result.
 */
export async function runEntrypoint(deps: EntrypointDeps = {}): Promise<void> {
  const { mainFn = main, console: injectedConsole } = deps;
  const errorConsole = injectedConsole ?? console;

  setupBrokenPipeHandlers();

  try {
    const { exitCode } = await mainFn();
    process.exitCode = exitCode;
  } catch (error) {
    const wrapped = isAppError(error)
      ? error
      : new AppError('UNEXPECTED_ERROR', error instanceof Error ? error.message : String(error), {
          cause: error,
          details: { context: { argv: sanitizeArgs(process.argv.slice(2)) } },
        });
    errorConsole.error('Fatal error:', wrapped);
    process.exitCode = EXIT_FAILURE;
  }
}

/**
 * `spindle` command: parse argv and run expression, script and shell.
 */
export function main(
  argv: readonly string[] = process.argv.slice(2),
  deps: RunnerDeps = {},
): Promise<RunResult> {
  return executeRun(argv, deps);
}

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  void runEntrypoint();
}
