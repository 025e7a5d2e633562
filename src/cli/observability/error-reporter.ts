/**
 * Error Reporter
 *
 * Role:
 *   Print any failure to a diagnostic sink in one fixed order.
 *
 * Output order (log scrapers rely on it):
 *   1. The message for script failures, the string form otherwise
 *   2. Each syntax error recorded by the failing operation, one per line
 *   3. The script-level stack, for script failures
 *   4. The native stack and its causes, in verbose mode only
 */

import { types } from 'node:util';

import {
  formatSyntaxDiagnostic,
  isScriptExecutionError,
  type ScriptExecutionError,
  type SyntaxDiagnostic,
} from '../../errors/errors.ts';

export type ReportSink = Pick<typeof console, 'error'>;

export interface ReportOptions {
  readonly verbose?: boolean;
  /** Syntax errors from the engine's last operation; defaults to those the error (or a cause) carries */
  readonly syntaxErrors?: readonly SyntaxDiagnostic[];
}

function nativeTrace(error: unknown): string[] {
  const lines: string[] = [];
  let current: unknown = error;
  let prefix = '';

  while (current !== undefined && current !== null) {
    if (types.isNativeError(current)) {
      lines.push(`${prefix}${current.stack ?? String(current)}`);
      current = current.cause;
    } else {
      lines.push(`${prefix}${String(current)}`);
      current = undefined;
    }
    prefix = 'Caused by: ';
  }
  return lines;
}

function findScriptCause(error: unknown): ScriptExecutionError | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if (isScriptExecutionError(current)) {
      return current;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Report a failure to `sink`.
 */
export function reportError(error: unknown, sink: ReportSink, options: ReportOptions = {}): void {
  const scriptError = isScriptExecutionError(error) ? error : undefined;

  sink.error(scriptError === undefined ? String(error) : scriptError.message);

  const syntaxErrors = options.syntaxErrors ?? findScriptCause(error)?.syntaxErrors ?? [];
  for (const diagnostic of syntaxErrors) {
    sink.error(formatSyntaxDiagnostic(diagnostic));
  }

  if (scriptError !== undefined && scriptError.scriptStack.length > 0) {
    sink.error(scriptError.scriptStack);
  }

  if (options.verbose === true) {
    for (const trace of nativeTrace(error)) {
      sink.error(trace);
    }
  }
}
