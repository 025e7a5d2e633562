/**
 * Daemon Adapter
 *
 * Role:
 *   Run a program module as a long-lived service (`spindle-daemon`).
 *
 * Sequence:
 *   init → start → (wait for SIGINT/SIGTERM) → stop → destroy
 *
 * The first failing step ends the sequence with its exit code; the controller
 * has already reported the failure.
 */

import { pathToFileURL } from 'node:url';

import { EXIT_SUCCESS } from '../constants/exit-codes.ts';
import { runEntrypoint } from '../core/entrypoint/entrypoint.ts';
import type { BootstrapDeps } from '../execution/bootstrap.ts';
import { LifecycleController, type LifecycleResult } from '../execution/lifecycle.ts';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/** The part of `process` the daemon listens on. */
export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

export interface DaemonDeps extends BootstrapDeps {
  readonly signals?: SignalSource;
  /** Hold the event loop open until a signal arrives (off in tests) */
  readonly keepAlive?: boolean;
  readonly controller?: LifecycleController;
}

/** Longest delay `setInterval` accepts. */
const KEEP_ALIVE_INTERVAL_MS = 2 ** 31 - 1;

/**
 * Resolve with the first shutdown signal received.
 */
export function waitForShutdown(signals: SignalSource, keepAlive: boolean): Promise<ShutdownSignal> {
  return new Promise((resolve) => {
    const timer = keepAlive ? setInterval(() => undefined, KEEP_ALIVE_INTERVAL_MS) : undefined;
    const listeners = SHUTDOWN_SIGNALS.map((signal) => {
      const listener = (): void => {
        clearInterval(timer);
        for (const [other, registered] of listeners) {
          signals.off(other, registered);
        }
        resolve(signal);
      };
      return [signal, listener] as const;
    });
    for (const [signal, listener] of listeners) {
      signals.once(signal, listener);
    }
  });
}

/**
 * Drive the script module named in argv through its whole lifecycle.
 */
export async function runDaemon(
  argv: readonly string[],
  deps: DaemonDeps = {},
): Promise<LifecycleResult> {
  const {
    signals = process,
    keepAlive = true,
    controller = new LifecycleController(deps),
  } = deps;

  const initialized = controller.init(argv);
  if (initialized.exitCode !== EXIT_SUCCESS || !controller.hasHandle) {
    return initialized;
  }

  const started = controller.start();
  if (started.exitCode !== EXIT_SUCCESS) {
    return started;
  }

  await waitForShutdown(signals, keepAlive);

  const stopped = controller.stop();
  if (stopped.exitCode !== EXIT_SUCCESS) {
    return stopped;
  }
  return controller.destroy();
}

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  void runEntrypoint({ mainFn: () => runDaemon(process.argv.slice(2)) });
}
