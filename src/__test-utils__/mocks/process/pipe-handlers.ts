/**
 * Track the `error` handlers an entrypoint adds to stdout/stderr so tests can
 * call them directly and detach them afterwards.
 */

export type PipeErrorHandler = (err: NodeJS.ErrnoException) => void;

type PipeStream = NodeJS.WriteStream;

export interface PipeHandlerTracker {
  /** Handlers attached to `stream` since the tracker was created */
  added(stream: PipeStream): PipeErrorHandler[];
  /** Detach every handler added since the tracker was created */
  restore(): void;
}

function isHandler(listener: unknown): listener is PipeErrorHandler {
  return typeof listener === 'function';
}

export function trackPipeErrorHandlers(
  streams: readonly PipeStream[] = [process.stdout, process.stderr],
): PipeHandlerTracker {
  const before = new Map<PipeStream, Set<unknown>>(
    streams.map((stream) => [stream, new Set<unknown>(stream.listeners('error'))]),
  );

  const added = (stream: PipeStream): PipeErrorHandler[] => {
    const known = before.get(stream) ?? new Set<unknown>();
    return stream.listeners('error').filter(isHandler).filter((listener) => !known.has(listener));
  };

  return {
    added,
    restore(): void {
      for (const stream of streams) {
        for (const handler of added(stream)) {
          stream.off('error', handler);
        }
      }
    },
  };
}
