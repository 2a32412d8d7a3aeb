/**
 * Levelled stderr logger
 *
 * stdout carries the MCP stdio protocol, so every log line goes to stderr.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

/**
 * Create a logger whose lines are tagged with `scope`
 */
export function createLogger(scope: string): Logger {
  const emit = (
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    meta: unknown[]
  ): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
      return;
    }
    console.error(
      `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`,
      ...meta
    );
  };

  return {
    debug: (message, ...meta) => emit('debug', message, meta),
    info: (message, ...meta) => emit('info', message, meta),
    warn: (message, ...meta) => emit('warn', message, meta),
    error: (message, ...meta) => emit('error', message, meta),
  };
}
