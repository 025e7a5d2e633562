/**
 * In-memory `ScriptEngine` for runner and lifecycle tests.
 *
 * Records every call in `calls` so tests can assert ordering, and lets a test
 * install module exports or make a single operation fail.
 */

import type {
  EngineFactory,
  EngineOptions,
  InvokeResult,
  ScriptEngine,
  ScriptModule,
} from '../../../engine/types.ts';
import type { SyntaxDiagnostic } from '../../../errors/errors.ts';

export type FakeHook = (...args: unknown[]) => unknown;

export interface FakeEngineSetup {
  /** Exported functions of the module returned by `loadModule` */
  readonly hooks?: Readonly<Record<string, FakeHook>>;
  readonly expressionError?: unknown;
  readonly scriptError?: unknown;
  readonly loadError?: unknown;
  /** Syntax errors reported after a failing operation */
  readonly failureSyntaxErrors?: readonly SyntaxDiagnostic[];
}

export class FakeEngine implements ScriptEngine {
  readonly calls: string[] = [];
  syntaxErrors: readonly SyntaxDiagnostic[] = [];

  constructor(private readonly setup: FakeEngineSetup = {}) {}

  evaluateExpression(expression: string): unknown {
    this.calls.push(`evaluate ${expression}`);
    this.fail(this.setup.expressionError);
    return undefined;
  }

  runScript(scriptName: string, args: readonly string[]): ScriptModule {
    this.calls.push(`run ${[scriptName, ...args].join(' ')}`);
    this.fail(this.setup.scriptError);
    return { id: scriptName, filename: scriptName, exports: {} };
  }

  loadModule(id: string): ScriptModule {
    this.calls.push(`load ${id}`);
    this.fail(this.setup.loadError);
    return { id, filename: id, exports: { ...this.setup.hooks } };
  }

  invoke(module: ScriptModule, name: string, args: readonly unknown[] = []): InvokeResult {
    const hook = this.setup.hooks?.[name];
    if (hook === undefined) {
      this.calls.push(`missing ${module.id}#${name}`);
      return { kind: 'missing' };
    }
    this.calls.push(`invoke ${module.id}#${name}(${args.map(String).join(',')})`);
    return { kind: 'invoked', value: hook(...args) };
  }

  private fail(error: unknown): void {
    this.syntaxErrors = [];
    if (error !== undefined) {
      this.syntaxErrors = this.setup.failureSyntaxErrors ?? [];
      throw error;
    }
  }
}

/**
 * Factory that always returns `engine` and remembers the options it was given.
 */
export function fakeEngineFactory(engine: ScriptEngine): EngineFactory & {
  readonly received: EngineOptions[];
} {
  const received: EngineOptions[] = [];
  const factory = (options: EngineOptions): ScriptEngine => {
    received.push(options);
    return engine;
  };
  return Object.assign(factory, { received });
}
