/**
 * Shared error hierarchy for consistent error handling.
 */

export type ErrorCode =
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_MISSING_VALUE'
  | 'CLI_OPTION_RANGE'
  | 'DAEMON_SCRIPT_REQUIRED'
  | 'ENGINE_CONSTRUCTION_FAILED'
  | 'SCRIPT_EXECUTION_FAILED'
  | 'UNEXPECTED_ERROR';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/**
 * A syntax error recorded by the engine while compiling a script.
 */
export interface SyntaxDiagnostic {
  readonly sourceName: string;
  readonly line: number;
  readonly message: string;
}

/**
 * Render a syntax diagnostic as a single report line.
 */
export function formatSyntaxDiagnostic(diagnostic: SyntaxDiagnostic): string {
  return `${diagnostic.sourceName}, line ${diagnostic.line}: ${diagnostic.message}`;
}

/**
 * Base class for every failure the CLI reports; `code` identifies the category.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

/**
 * Malformed or unknown option, or an option missing its value.
 */
export class OptionSyntaxError extends AppError {
  /** The option exactly as it should be named back to the user. */
  readonly option: string;

  constructor(code: 'CLI_UNKNOWN_OPTION' | 'CLI_MISSING_VALUE', option: string, message: string) {
    super(code, message, { details: { option } });
    this.option = option;
  }
}

/**
 * Option value outside its accepted range.
 */
export class OptionRangeError extends AppError {
  readonly option: string;

  constructor(option: string, message: string) {
    super('CLI_OPTION_RANGE', message, { details: { option } });
    this.option = option;
  }
}

/**
 * Settings that are well-formed but unusable for the requested mode.
 */
export class ConfigurationError extends AppError {}

export class EngineConstructionError extends AppError {}

/**
 * Failure raised while compiling or running script code.
 *
 * `scriptStack` only holds the frames that belong to script sources; the full
 * native trace stays on `stack` (or on `cause` when the failure was wrapped).
 */
export class ScriptExecutionError extends AppError {
  readonly syntaxErrors: readonly SyntaxDiagnostic[];
  readonly scriptStack: string;

  constructor(
    message: string,
    options: {
      cause?: unknown;
      syntaxErrors?: readonly SyntaxDiagnostic[];
      scriptStack?: string;
    } = {},
  ) {
    super('SCRIPT_EXECUTION_FAILED', message, { cause: options.cause });
    this.syntaxErrors = options.syntaxErrors ?? [];
    this.scriptStack = options.scriptStack ?? '';
  }
}

/**
 * Format an arbitrary error into a concise string for logging or display.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Narrow an unknown value to a ScriptExecutionError.
 */
export function isScriptExecutionError(error: unknown): error is ScriptExecutionError {
  return error instanceof ScriptExecutionError;
}

/**
 * Errors raised while reading options; these are printed with the help hint.
 */
export function isOptionError(error: unknown): error is OptionSyntaxError | OptionRangeError {
  return error instanceof OptionSyntaxError || error instanceof OptionRangeError;
}
