/**
 * Script engine contracts shared by the runner, the lifecycle controller and
 * the shell.
 */

import type { SyntaxDiagnostic } from '../errors/errors.ts';
import type { Logger } from '../cli/observability/logger.ts';

export interface EngineOptions {
  /** Base directory for `modules/` and relative module path entries */
  readonly home: string;
  readonly modulePath: readonly string[];
  readonly bootScripts: readonly string[];
  readonly optLevel: number;
  readonly debug: boolean;
  /**
   * Deny scripts access to host (`node:`) modules.
   *
   * This is a module-access policy, not isolation: `require`, `module` and
   * `exports` are still host objects, so a hostile script can climb to the
   * host realm through their constructors. Do not run untrusted code.
   */
  readonly sandboxed: boolean;
  /** Value of `require('system').args` until `runScript` replaces it */
  readonly systemArgs?: readonly string[];
  /** Directory scripts and bootstrap files are resolved against */
  readonly cwd?: string;
  readonly logger?: Logger;
}

/**
 * A module loaded into the engine.
 */
export interface ScriptModule {
  readonly id: string;
  readonly filename: string;
  readonly exports: unknown;
}

/**
 * Outcome of calling a named export on a module.
 */
export type InvokeResult =
  | { readonly kind: 'missing' }
  | { readonly kind: 'invoked'; readonly value: unknown };

export interface ScriptEngine {
  /** Syntax errors recorded by the most recent operation */
  readonly syntaxErrors: readonly SyntaxDiagnostic[];

  /** @throws {ScriptExecutionError} */
  evaluateExpression(expression: string): unknown;

  /** Load and run the main script with its arguments. @throws {ScriptExecutionError} */
  runScript(scriptName: string, args: readonly string[]): ScriptModule;

  /** Load a module into a fresh module scope. @throws {ScriptExecutionError} */
  loadModule(id: string): ScriptModule;

  /** Call `name` on the module when it exports a function by that name. @throws {ScriptExecutionError} */
  invoke(module: ScriptModule, name: string, args?: readonly unknown[]): InvokeResult;
}

export type EngineFactory = (options: EngineOptions) => ScriptEngine;
