/**
 * Console mock factory for tests that inject a console into the CLI.
 */

import type { Mock } from 'vitest';
import { vi } from 'vitest';

export interface FakeConsole {
  readonly log: Mock;
  readonly error: Mock;
  /** First argument of every `error` call, stringified, in call order */
  errorLines(): string[];
}

/**
 * Create the `log`/`error` pair the entrypoints, runner and reporter write to.
 */
export function fakeConsole(): FakeConsole {
  const error = vi.fn();
  return {
    log: vi.fn(),
    error,
    errorLines: () => error.mock.calls.map((call: unknown[]) => String(call[0])),
  };
}
