/**
 * Test Utilities Index
 *
 * Role:
 *   Centralized export point for all test utilities.
 *
 * This file is:
 *   - Test-only infrastructure
 *   - Pure re-exports with no logic
 */

export { type FakeConsole, fakeConsole } from './mocks/console/fake-console.ts';
export {
  FakeEngine,
  type FakeEngineSetup,
  fakeEngineFactory,
  type FakeHook,
} from './mocks/engine/fake-engine.ts';
export {
  type PipeErrorHandler,
  type PipeHandlerTracker,
  trackPipeErrorHandlers,
} from './mocks/process/pipe-handlers.ts';
export type { StreamMock } from './mocks/streams/stream-mocks.ts';
export { createStreamMock, createStreamMockPair } from './mocks/streams/stream-mocks.ts';
export { restoreEnv, snapshotEnv, withEnv } from './utils/env.ts';
export { createTempDir, removeTempDir, writeScript } from './utils/temp-utils.ts';
