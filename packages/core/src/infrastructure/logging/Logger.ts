import type { LogLevel } from '@chainfeed/config';
import type { ILogger, LogContext } from '../../application/ports/ILogger.ts';
import { LOG_LEVELS, verbosityToLogLevel } from '../../application/ports/ILogger.ts';

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const MAGENTA = '\x1b[35m';
const BLUE = '\x1b[34m';

const LEVEL_STYLE: Record<LogLevel, { color: string; tag: string }> = {
  error: { color: '\x1b[31m', tag: 'ERR' },
  warn: { color: '\x1b[33m', tag: 'WRN' },
  info: { color: '\x1b[32m', tag: 'INF' },
  debug: { color: '\x1b[36m', tag: 'DBG' },
  trace: { color: '\x1b[90m', tag: 'TRC' },
};

/** Printed as prefixes or expanded separately, never as key=value */
const PREFIX_KEYS = new Set(['module', 'feed', 'error']);

export interface LoggerOptions {
  level: LogLevel;
  /** @default true */
  timestamps?: boolean;
  /** One JSON object per line instead of colored text */
  json?: boolean;
  context?: LogContext;
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Console logger. Every line goes through `console.log` so tests can
 * capture output with a single spy.
 */
export class Logger implements ILogger {
  readonly level: LogLevel;
  private readonly options: Required<LoggerOptions>;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.options = {
      level: options.level,
      timestamps: options.timestamps ?? true,
      json: options.json ?? false,
      context: options.context ?? {},
    };
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  child(context: LogContext): ILogger {
    return new Logger({ ...this.options, context: { ...this.options.context, ...context } });
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (rank(level) > rank(this.level)) return;

    const fields: LogContext = { ...this.options.context, ...context };
    if (this.options.json) {
      console.log(this.formatJson(level, message, fields));
      return;
    }

    console.log(this.formatPretty(level, message, fields));
    if (level === 'error' && fields.error instanceof Error) {
      console.log(`${DIM}${fields.error.stack}${RESET}`);
    }
  }

  private formatJson(level: LogLevel, message: string, fields: LogContext): string {
    const { error, ...rest } = fields;
    const entry: Record<string, unknown> = { level, message, ...rest };
    if (this.options.timestamps) {
      entry.timestamp = new Date().toISOString();
    }
    if (error instanceof Error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }
    return JSON.stringify(entry, bigintReplacer);
  }

  private formatPretty(level: LogLevel, message: string, fields: LogContext): string {
    const { color, tag } = LEVEL_STYLE[level];
    const parts: string[] = [];

    if (this.options.timestamps) {
      parts.push(`${DIM}${new Date().toISOString().replace('T', ' ').slice(0, -1)}${RESET}`);
    }
    parts.push(`${color}${BOLD}${tag}${RESET}`);
    if (fields.module) parts.push(`${MAGENTA}[${fields.module}]${RESET}`);
    if (fields.feed) parts.push(`${BLUE}[${fields.feed}]${RESET}`);
    parts.push(message);

    for (const [key, value] of Object.entries(fields)) {
      if (PREFIX_KEYS.has(key)) continue;
      parts.push(`${DIM}${key}=${RESET}${String(value)}`);
    }

    // The stack follows on its own line at error level
    if (level !== 'error' && fields.error instanceof Error) {
      parts.push(`${DIM}error=${RESET}${fields.error.message}`);
    }

    return parts.join(' ');
  }
}

/**
 * Logger for a configured level, or for a `-v` count when one is given
 */
export function createLogger(options: {
  level?: LogLevel;
  verbosity?: number;
  timestamps?: boolean;
  json?: boolean;
}): ILogger {
  const level =
    options.verbosity !== undefined ? verbosityToLogLevel(options.verbosity) : (options.level ?? 'info');
  return new Logger({ level, timestamps: options.timestamps, json: options.json });
}
