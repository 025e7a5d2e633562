/**
 * VM Script Engine
 *
 * Role:
 *   Run scripts and CommonJS-style modules inside a single `node:vm` context.
 *
 * Responsibilities:
 *   - Run bootstrap scripts when the engine is constructed
 *   - Load modules from the module search roots, with a per-engine module cache
 *   - Record syntax errors for the operation in progress
 *   - Wrap script failures as ScriptExecutionError with script-only stack frames
 *
 * Security:
 *   - In sandboxed mode scripts cannot reach host (`node:`) modules
 *   - `console` is built inside the context; `require` and module objects are
 *     still host objects, so this is not an isolation boundary
 */

import { readFileSync, statSync } from 'node:fs';
import { createRequire } from 'node:module';
import path from 'node:path';
import { format, types } from 'node:util';
import vm from 'node:vm';

import { ScriptExecutionError, type SyntaxDiagnostic } from '../errors/errors.ts';
import { type Logger, silentLogger } from '../cli/observability/logger.ts';
import { buildSearchRoots, resolveModulePath } from './module-resolver.ts';
import type {
  EngineOptions,
  InvokeResult,
  ScriptEngine,
  ScriptModule,
} from './types.ts';

export const EXPRESSION_SOURCE = '<expression>';
export const SYSTEM_MODULE = 'system';
const HOST_MODULE_PREFIX = 'node:';

const hostRequire = createRequire(import.meta.url);

const CONSOLE_LEVELS = ['log', 'info', 'debug', 'warn', 'error'] as const;

// Compiled inside the context so script-visible functions belong to its realm.
const CONSOLE_FACTORY_SOURCE = `(function (levels, write) {
  const target = {};
  for (const level of levels) {
    target[level] = (...args) => { write(level, args); };
  }
  return Object.freeze(target);
})`;

function writeConsole(level: unknown, args: unknown): void {
  const line = Array.isArray(args) ? format(...args) : '';
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

type ModuleRequire = (id: string) => unknown;

interface MutableModule {
  id: string;
  filename: string;
  exports: unknown;
}

interface CachedScript {
  readonly mtimeMs: number;
  readonly script: vm.Script;
}

/**
 * Extract the line of a compile-time SyntaxError from its `file:line` stack header.
 */
export function toSyntaxDiagnostic(error: Error, fallbackSource: string): SyntaxDiagnostic {
  const header = error.stack?.split('\n')[0] ?? '';
  const match = /^(.*):(\d+)$/.exec(header);
  return {
    sourceName: match?.[1] ?? fallbackSource,
    line: match?.[2] === undefined ? 0 : Number.parseInt(match[2], 10),
    message: error.message,
  };
}

function wrapModuleSource(source: string): string {
  return `(function (exports, require, module, __filename, __dirname) {${source}\n})`;
}

function getMember(target: unknown, name: string): unknown {
  if ((typeof target === 'object' && target !== null) || typeof target === 'function') {
    return Reflect.get(target, name);
  }
  return undefined;
}

/**
 * `ScriptEngine` backed by `node:vm`.
 *
 * @throws {ScriptExecutionError} from the constructor when a bootstrap script fails.
 */
export class VmEngine implements ScriptEngine {
  readonly optLevel: number;
  readonly debug: boolean;
  readonly sandboxed: boolean;

  private readonly context: vm.Context;
  private readonly cwd: string;
  private readonly roots: readonly string[];
  private readonly logger: Logger;
  private readonly moduleCache = new Map<string, MutableModule>();
  private readonly scriptCache = new Map<string, CachedScript>();
  private readonly sourceNames = new Set<string>([EXPRESSION_SOURCE]);
  private lastSyntaxErrors: SyntaxDiagnostic[] = [];
  private systemArgs: readonly string[];

  constructor(options: EngineOptions) {
    this.optLevel = options.optLevel;
    this.debug = options.debug;
    this.sandboxed = options.sandboxed;
    this.cwd = path.resolve(options.cwd ?? process.cwd());
    this.roots = buildSearchRoots(options.home, options.modulePath, this.cwd);
    this.logger = options.logger ?? silentLogger;
    this.systemArgs = Object.freeze([...(options.systemArgs ?? [])]);

    this.context = vm.createContext({
      require: this.createRequire(this.cwd),
    });
    this.installConsole();

    this.run(() => {
      for (const bootScript of options.bootScripts) {
        const filename = path.resolve(this.cwd, bootScript);
        this.logger.debug(`bootstrap ${filename}`);
        this.compile(readFileSync(filename, 'utf8'), filename).runInContext(
          this.context,
          this.runOptions(),
        );
      }
    });
  }

  get syntaxErrors(): readonly SyntaxDiagnostic[] {
    return this.lastSyntaxErrors;
  }

  evaluateExpression(expression: string): unknown {
    return this.run(() =>
      this.compile(expression, EXPRESSION_SOURCE).runInContext(this.context, this.runOptions()),
    );
  }

  runScript(scriptName: string, args: readonly string[]): ScriptModule {
    this.systemArgs = Object.freeze([scriptName, ...args]);
    return this.loadModule(scriptName);
  }

  loadModule(id: string): ScriptModule {
    return this.run(() => {
      const filename = resolveModulePath(id, this.cwd, [this.cwd, ...this.roots]);
      if (filename === undefined) {
        throw new ScriptExecutionError(`Module "${id}" not found`);
      }
      return this.instantiate(id, filename, false);
    });
  }

  invoke(module: ScriptModule, name: string, args: readonly unknown[] = []): InvokeResult {
    const hook = getMember(module.exports, name);
    if (typeof hook !== 'function') {
      return { kind: 'missing' };
    }
    this.logger.debug(`invoke ${module.id}#${name}`);
    const value = this.run(() => Reflect.apply(hook, module.exports, [...args]));
    return { kind: 'invoked', value };
  }

  /* ------------------------------------------------------------------------ */
  /* Internals                                                                */
  /* ------------------------------------------------------------------------ */

  private installConsole(): void {
    const factory: unknown = vm.runInContext(CONSOLE_FACTORY_SOURCE, this.context);
    if (typeof factory !== 'function') {
      throw new TypeError('console factory did not compile to a function');
    }
    const levels: unknown = vm.runInContext(JSON.stringify(CONSOLE_LEVELS), this.context);
    Reflect.set(this.context, 'console', Reflect.apply(factory, undefined, [levels, writeConsole]));
  }

  private run<T>(operation: () => T): T {
    this.lastSyntaxErrors = [];
    try {
      return operation();
    } catch (error) {
      throw this.toScriptError(error);
    }
  }

  private runOptions(): vm.RunningScriptOptions {
    return { breakOnSigint: this.debug, displayErrors: true };
  }

  private compile(source: string, filename: string): vm.Script {
    this.sourceNames.add(filename);
    try {
      return new vm.Script(source, { filename });
    } catch (error) {
      if (types.isNativeError(error) && error.name === 'SyntaxError') {
        const diagnostic = toSyntaxDiagnostic(error, filename);
        this.lastSyntaxErrors.push(diagnostic);
        throw new ScriptExecutionError(`SyntaxError: ${error.message}`, {
          cause: error,
          syntaxErrors: [diagnostic],
        });
      }
      throw error;
    }
  }

  private compileModule(filename: string): vm.Script {
    if (this.optLevel <= 0) {
      return this.compile(wrapModuleSource(readFileSync(filename, 'utf8')), filename);
    }
    const { mtimeMs } = statSync(filename);
    const cached = this.scriptCache.get(filename);
    if (cached !== undefined && cached.mtimeMs === mtimeMs) {
      return cached.script;
    }
    const script = this.compile(wrapModuleSource(readFileSync(filename, 'utf8')), filename);
    this.scriptCache.set(filename, { mtimeMs, script });
    return script;
  }

  private instantiate(id: string, filename: string, cached: boolean): MutableModule {
    this.logger.debug(`load ${id} (${filename})`);
    const module: MutableModule = { id, filename, exports: {} };
    if (cached) {
      // registered before running so cyclic requires see partial exports
      this.moduleCache.set(filename, module);
    }
    const factory: unknown = this.compileModule(filename).runInContext(
      this.context,
      this.runOptions(),
    );
    if (typeof factory !== 'function') {
      throw new ScriptExecutionError(`Module "${id}" did not compile to a function`);
    }
    const dirname = path.dirname(filename);
    Reflect.apply(factory, module.exports, [
      module.exports,
      this.createRequire(dirname),
      module,
      filename,
      dirname,
    ]);
    return module;
  }

  private createRequire(fromDir: string): ModuleRequire {
    return (id: string): unknown => {
      if (id === SYSTEM_MODULE) {
        return { args: this.systemArgs };
      }
      if (id.startsWith(HOST_MODULE_PREFIX)) {
        if (this.sandboxed) {
          throw new ScriptExecutionError(`Access to host module "${id}" is denied by policy`);
        }
        return hostRequire(id);
      }

      const filename = resolveModulePath(id, fromDir, this.roots);
      if (filename === undefined) {
        throw new ScriptExecutionError(`Module "${id}" not found`);
      }
      const cached = this.moduleCache.get(filename);
      if (cached !== undefined) {
        return cached.exports;
      }
      return this.instantiate(id, filename, true).exports;
    };
  }

  private scriptFrames(stack: string | undefined): string {
    if (stack === undefined) {
      return '';
    }
    return stack
      .split('\n')
      .map((line) => line.trim())
      .filter(
        (line) =>
          line.startsWith('at ') &&
          [...this.sourceNames].some((source) => line.includes(`${source}:`)),
      )
      .join('\n');
  }

  private toScriptError(error: unknown): ScriptExecutionError {
    if (error instanceof ScriptExecutionError) {
      return error;
    }
    if (types.isNativeError(error)) {
      return new ScriptExecutionError(`${error.name}: ${error.message}`, {
        cause: error,
        scriptStack: this.scriptFrames(error.stack),
      });
    }
    return new ScriptExecutionError(String(error), { cause: error });
  }
}

/**
 * Default engine factory.
 */
export function createVmEngine(options: EngineOptions): ScriptEngine {
  return new VmEngine(options);
}
