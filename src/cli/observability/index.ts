/**
 * Observability: logging and error reporting
 */

export { type ReportOptions, type ReportSink, reportError } from './error-reporter.ts';
export {
  createLogger,
  type Logger,
  type LogLevel,
  type LogOptions,
  type LogSink,
  makeLogOptions,
  silentLogger,
} from './logger.ts';
