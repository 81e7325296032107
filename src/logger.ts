/**
 * Logging
 *
 * Minimal logger interface shared by the pipeline, the HTTP service and
 * the CLI, plus the two implementations the project needs: a silent one
 * for library use and tests, and a chalk-coloured console logger for the
 * server process.
 *
 * @module logger
 */

import chalk from 'chalk';

/**
 * Minimal logger interface.
 * Allows modules to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Create a console logger with timestamps and coloured level tags.
 *
 * @param minLevel - Lowest level to print (default: 'info')
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  const stamp = (): string => chalk.dim(new Date().toISOString());

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.log(stamp(), chalk.gray('DEBUG'), message, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(stamp(), chalk.cyan('INFO'), message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(stamp(), chalk.yellow('WARN'), message, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(stamp(), chalk.red('ERROR'), message, ...args);
    },
  };
}
