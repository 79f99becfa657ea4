/**
 * Console logger with chalk colouring and a level threshold
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function createLogger(level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug(message) {
      if (enabled('debug')) console.log(chalk.dim(message));
    },
    info(message) {
      if (enabled('info')) console.log(message);
    },
    warn(message) {
      if (enabled('warn')) console.warn(chalk.yellow(message));
    },
    error(message) {
      if (enabled('error')) console.error(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
