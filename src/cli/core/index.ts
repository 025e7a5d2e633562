/**
 * Spindle CLI
 *
 * Role:
 *   Command-line front end for the embedded script runtime.
 *
 * Principles:
 *   - Fail fast on invalid input
 *   - Parser and lifecycle return outcomes; only entrypoints set exit codes
 *   - No implicit behaviour
 */

// Config re-exports
export { OPTION_TABLE, type OptionSpec, resolveEnvironment } from '../config/index.ts';
export { EXIT_FAILURE, EXIT_SUCCESS } from '../constants/exit-codes.ts';
// Daemon re-exports
export { type DaemonDeps, runDaemon, type SignalSource } from '../daemon/daemon.ts';
// Execution re-exports
export {
  executeRun,
  LifecycleController,
  type LifecycleState,
  type RunnerDeps,
  type RunResult,
} from '../execution/index.ts';
// Input handling re-exports
export { parseCommandLine, type RunConfiguration } from '../input/index.ts';
// Observability re-exports
export { createLogger, reportError } from '../observability/index.ts';
// Core exports
export { type EntrypointDeps, main, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp } from './help/formatter.ts';
export { showVersion } from './help/help.ts';
