import type { LogLevel } from '@chainfeed/config';

/**
 * Structured fields attached to a log line. In pretty mode `module` and
 * `feed` become bracketed prefixes and `error` is expanded.
 */
export interface LogContext {
  module?: string;
  feed?: string;
  block?: bigint | number;
  txHash?: string;
  contract?: string;
  event?: string;
  error?: Error;
  [key: string]: unknown;
}

/**
 * Leveled logger handed to feeds, the registry listener and the runner
 */
export interface ILogger {
  readonly level: LogLevel;

  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;

  /** Logger whose lines also carry `context` */
  child(context: LogContext): ILogger;
}

/** Least to most verbose */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const satisfies readonly LogLevel[];

/**
 * Level selected by a count of `-v` flags. Zero counts as one; five or more
 * select trace.
 */
export function verbosityToLogLevel(verbosity: number): LogLevel {
  const clamped = Math.min(Math.max(Math.trunc(verbosity), 1), LOG_LEVELS.length);
  return LOG_LEVELS[clamped - 1] ?? 'trace';
}
