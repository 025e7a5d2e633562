/**
 * Stream Mock Utilities
 *
 * Role:
 *   Write-only sinks that capture output for deterministic assertions.
 *
 * This file is:
 *   - Test-only infrastructure
 *   - Shaped like the `write` side of a Node.js stream
 */

/**
 * Captures every chunk written; `closed` streams reject further writes.
 */
export interface StreamMock {
  isTTY: boolean;
  readonly data: string[];
  closed: boolean;
  write(chunk: string | Buffer): boolean;
  end(): void;
}

/**
 * Create a mock write stream for testing.
 */
export function createStreamMock(): StreamMock {
  const stream: StreamMock = {
    isTTY: false,
    data: [],
    closed: false,
    write(chunk) {
      if (stream.closed) {
        throw new Error('write() called on closed stream');
      }
      stream.data.push(typeof chunk === 'string' ? chunk : chunk.toString());
      return true;
    },
    end() {
      stream.closed = true;
    },
  };
  return stream;
}

/**
 * Create a pair of stdout/stderr mocks.
 */
export function createStreamMockPair(): {
  readonly stdout: StreamMock;
  readonly stderr: StreamMock;
} {
  return {
    stdout: createStreamMock(),
    stderr: createStreamMock(),
  };
}
