/**
 * Execution: engine bootstrap, the one-shot runner and the lifecycle controller
 */

export {
  type Bootstrap,
  type BootstrapConsole,
  type BootstrapDeps,
  bootstrap,
  buildEngine,
} from './bootstrap.ts';
export {
  DAEMON_SCRIPT_REQUIRED_MESSAGE,
  LifecycleController,
  type LifecycleHandle,
  type LifecycleHook,
  type LifecycleResult,
  type LifecycleState,
} from './lifecycle.ts';
export { executeRun, type RunnerDeps, type RunResult, shouldStartShell } from './runner.ts';
