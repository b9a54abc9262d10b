/**
 * Leveled logger.
 *
 * Logs go to stderr by default: stdout belongs to the rendered frame.
 */

import { Console } from 'node:console';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export interface Logger {
  readonly level: LogLevel;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export function createLogger(
  level: LogLevel = 'info',
  stream: NodeJS.WritableStream = process.stderr,
  prefix = 'steep',
): Logger {
  const out = new Console({ stdout: stream, stderr: stream });
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (at: LogLevel): boolean => threshold >= LOG_LEVELS.indexOf(at);

  return {
    level,
    error(message, ...details) {
      if (enabled('error')) out.error(`[${prefix}] error: ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) out.warn(`[${prefix}] warn: ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) out.info(`[${prefix}] info: ${message}`, ...details);
    },
    debug(message, ...details) {
      if (enabled('debug')) out.debug(`[${prefix}] debug: ${message}`, ...details);
    },
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent');
