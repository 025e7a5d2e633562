/**
 * Lifecycle Controller
 *
 * Role:
 *   Drive a loaded program module through init, start, stop and destroy.
 *
 * States:
 *   unconfigured → parsed → engine-ready → module-loaded → running ⇄ stopped → destroyed
 *
 * Every hook is optional on the module. A missing hook is skipped; any other
 * failure is reported, the handle is dropped and the state becomes `destroyed`.
 * Operations return an exit code and never exit the process themselves.
 */

import { ConfigurationError, formatErrorMessage } from '../../errors/errors.ts';
import type { ScriptEngine, ScriptModule } from '../../engine/types.ts';
import { EXIT_FAILURE, EXIT_SUCCESS } from '../constants/exit-codes.ts';
import type { RunConfiguration } from '../input/run-configuration.ts';
import { reportError } from '../observability/error-reporter.ts';
import { type Logger, silentLogger } from '../observability/logger.ts';
import { bootstrap, type BootstrapConsole, type BootstrapDeps } from './bootstrap.ts';

export type LifecycleState =
  | 'unconfigured'
  | 'parsed'
  | 'engine-ready'
  | 'module-loaded'
  | 'running'
  | 'stopped'
  | 'destroyed';

export type LifecycleHook = 'init' | 'start' | 'stop' | 'destroy';

export interface LifecycleResult {
  readonly exitCode: number;
}

/** Engine plus loaded module; only exists between a successful `init` and `destroy`. */
export interface LifecycleHandle {
  readonly engine: ScriptEngine;
  readonly module: ScriptModule;
}

export const DAEMON_SCRIPT_REQUIRED_MESSAGE = 'daemon interface requires a script argument';

const OK: LifecycleResult = { exitCode: EXIT_SUCCESS };
const FAILED: LifecycleResult = { exitCode: EXIT_FAILURE };

export class LifecycleController {
  private current: LifecycleState = 'unconfigured';
  private handle: LifecycleHandle | undefined;
  private config: RunConfiguration | undefined;
  private logger: Logger = silentLogger;
  private readonly out: BootstrapConsole;

  constructor(private readonly deps: BootstrapDeps = {}) {
    this.out = deps.console ?? console;
  }

  get state(): LifecycleState {
    return this.current;
  }

  get hasHandle(): boolean {
    return this.handle !== undefined;
  }

  /**
   * Parse argv, construct the engine, load the script module and call its `init`
   * with the script arguments.
   */
  init(argv: readonly string[]): LifecycleResult {
    if (this.current !== 'unconfigured') {
      this.out.error(`init called in state ${this.current}`);
      return FAILED;
    }

    const ready = bootstrap(argv, this.deps);
    if (ready.kind === 'done') {
      if (ready.exitCode !== EXIT_SUCCESS) {
        this.current = 'destroyed';
      }
      return { exitCode: ready.exitCode };
    }

    const { config, engine, logger } = ready;
    this.config = config;
    this.logger = logger.child('lifecycle');
    this.transition('parsed');
    this.transition('engine-ready');

    if (config.scriptName === undefined) {
      return this.fail(
        new ConfigurationError('DAEMON_SCRIPT_REQUIRED', DAEMON_SCRIPT_REQUIRED_MESSAGE),
        engine,
      );
    }

    let module: ScriptModule;
    try {
      module = engine.loadModule(config.scriptName);
    } catch (error) {
      return this.fail(error, engine);
    }
    this.handle = { engine, module };
    this.transition('module-loaded');

    return this.invokeHook('init', 'running', config.scriptArgs);
  }

  /** Call `start`; may be repeated and never changes the state. */
  start(): LifecycleResult {
    return this.invokeHook('start', undefined);
  }

  stop(): LifecycleResult {
    return this.invokeHook('stop', 'stopped');
  }

  /** Call `destroy` and drop the handle. */
  destroy(): LifecycleResult {
    const result = this.invokeHook('destroy', 'destroyed');
    this.handle = undefined;
    return result;
  }

  private invokeHook(
    hook: LifecycleHook,
    next: LifecycleState | undefined,
    args: readonly unknown[] = [],
  ): LifecycleResult {
    const { handle } = this;
    if (handle === undefined) {
      return OK;
    }

    try {
      const result = handle.engine.invoke(handle.module, hook, args);
      if (result.kind === 'missing') {
        this.logger.debug(`no ${hook} hook on ${handle.module.id}`);
      }
    } catch (error) {
      return this.fail(error, handle.engine);
    }

    if (next !== undefined) {
      this.transition(next);
    }
    return OK;
  }

  private fail(error: unknown, engine: ScriptEngine): LifecycleResult {
    this.logger.error(`failed in ${this.current}: ${formatErrorMessage(error)}`);
    reportError(error, this.out, {
      verbose: this.config?.verbose ?? false,
      syntaxErrors: engine.syntaxErrors,
    });
    this.handle = undefined;
    this.transition('destroyed');
    return FAILED;
  }

  private transition(next: LifecycleState): void {
    if (next !== this.current) {
      this.logger.info(`${this.current} -> ${next}`);
      this.current = next;
    }
  }
}
