import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[currentLevel];
}

/**
 * Console logger that prefixes every line with `[scope]`, in the same
 * way the pool and monitor classes tag their output.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) {
        console.debug(chalk.gray(`${tag} ${message}`), ...details);
      }
    },
    info(message, ...details) {
      if (enabled('info')) {
        console.log(`${chalk.cyan(tag)} ${message}`, ...details);
      }
    },
    warn(message, ...details) {
      if (enabled('warn')) {
        console.warn(chalk.yellow(`${tag} ${message}`), ...details);
      }
    },
    error(message, ...details) {
      if (enabled('error')) {
        console.error(chalk.red(`${tag} ${message}`), ...details);
      }
    },
  };
}
