/**
 * Component loggers
 *
 * Writes through `console` with a `[Component]` prefix. A message is written
 * only when its level is at or above the configured `logLevel`, so the
 * default ("warn") keeps data-error degradations (logged at debug) quiet.
 */

import { getCellConfig, type LogLevel } from './config.js';

/** Extra context appended to a log line */
export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, ctx?: LogContext): void;
  warn(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  debug(message: string, ctx?: LogContext): void;
}

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Whether a message at `level` passes the configured threshold
 */
export function isLevelEnabled(level: MessageLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[getCellConfig().logLevel];
}

function write(level: MessageLevel, prefix: string, message: string, ctx?: LogContext): void {
  if (!isLevelEnabled(level)) return;
  const line = `${prefix} ${message}`;
  const sink =
    level === 'error'
      ? console.error
      : level === 'warn'
        ? console.warn
        : level === 'info'
          ? console.log
          : console.debug;
  if (ctx !== undefined) {
    sink(line, ctx);
  } else {
    sink(line);
  }
}

/**
 * Create a logger for a component
 *
 * @example
 * const log = createLogger("CellId");
 * log.debug("Rejected token", { token });
 * // => [CellId] Rejected token { token: '...' }
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    error: (message, ctx) => write('error', prefix, message, ctx),
    warn: (message, ctx) => write('warn', prefix, message, ctx),
    info: (message, ctx) => write('info', prefix, message, ctx),
    debug: (message, ctx) => write('debug', prefix, message, ctx),
  };
}
