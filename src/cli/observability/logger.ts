/**
 * Logging System
 *
 * Role:
 *   Line-oriented diagnostic logging for engine and lifecycle tracing.
 *
 * Guarantees:
 *   - One output line per message line
 *   - Standard mode prefixes each line with timestamp and component
 *   - Structured mode emits one JSON payload per line
 *
 * Non-goals:
 *   - No buffering
 *   - No log files; output goes to the configured sink (stderr by default)
 */

export type LogLevel = 'debug' | 'info' | 'error';

interface StructuredPayload {
  timestamp: string;
  component: string;
  level: LogLevel;
  message: string;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LogOptions {
  readonly component: string;
  readonly sink: LogSink;
  /** Emit JSON payloads instead of prefixed text lines. */
  readonly structured?: boolean;
  /** When false, every call is a no-op. */
  readonly enabled?: boolean;
  readonly now?: () => Date;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
  child(component: string): Logger;
}

/**
 * Build `LogOptions` with optional fields in a type-safe manner.
 */
export function makeLogOptions(opts: {
  component: string;
  sink: LogSink;
  structured?: boolean;
  enabled?: boolean;
}): LogOptions {
  const { component, sink, structured, enabled } = opts;

  return {
    component,
    sink,
    ...(structured === undefined ? {} : { structured }),
    ...(enabled === undefined ? {} : { enabled }),
  };
}

/* -------------------------------------------------------------------------- */
/* Line formatting                                                            */
/* -------------------------------------------------------------------------- */

function formatPlainLine(line: string, component: string, timestamp: string): string {
  const suffix = line.length === 0 ? '' : ` ${line}`;
  return `[${timestamp}] [${component}]${suffix}`;
}

function formatStructuredLine(
  line: string,
  component: string,
  timestamp: string,
  level: LogLevel,
): string {
  const payload: StructuredPayload = { timestamp, component, level, message: line };
  return JSON.stringify(payload);
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                  */
/* -------------------------------------------------------------------------- */

/**
 * Create a logger writing to `options.sink`.
 */
export function createLogger(options: LogOptions): Logger {
  const { component, sink, structured = false, enabled = true, now = () => new Date() } = options;

  const emit = (level: LogLevel, message: string): void => {
    if (!enabled) {
      return;
    }
    const timestamp = now().toISOString();
    for (const line of message.split('\n')) {
      const formatted = structured
        ? formatStructuredLine(line, component, timestamp, level)
        : formatPlainLine(line, component, timestamp);
      sink.write(`${formatted}\n`);
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    error: (message) => emit('error', message),
    child: (child) => createLogger({ ...options, component: `${component}:${child}` }),
  };
}

/**
 * A logger that discards everything.
 */
export const silentLogger: Logger = createLogger({
  component: 'silent',
  sink: { write: () => true },
  enabled: false,
});
