/**
 * spindle - Main Entry Point
 *
 * Command-line front end and daemon lifecycle driver for an embedded script
 * runtime built on `node:vm`.
 */

export * from './cli/core/index.ts';
export {
  createVmEngine,
  type EngineFactory,
  type EngineOptions,
  type InvokeResult,
  type ScriptEngine,
  type ScriptModule,
  VmEngine,
} from './engine/index.ts';
export {
  AppError,
  ConfigurationError,
  EngineConstructionError,
  type ErrorCode,
  OptionRangeError,
  OptionSyntaxError,
  ScriptExecutionError,
  type SyntaxDiagnostic,
} from './errors/errors.ts';
export { createReplShell, ReplShell, type Shell, type ShellOptions } from './shell/repl-shell.ts';
