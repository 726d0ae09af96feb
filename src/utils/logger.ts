import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function timestamp(): string {
  return new Date().toISOString().slice(11, 23);
}

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose lines carry a `[scope]` tag, e.g. `[pool]`.
 * All loggers share the process-wide level set by `setLogLevel`.
 */
export function createLogger(scope?: string): Logger {
  const tag = scope ? `[${scope}] ` : '';
  return {
    debug(msg, ...args) {
      if (shouldLog('debug')) {
        console.error(chalk.gray(`[${timestamp()}] DEBUG ${tag}${msg}`), ...args);
      }
    },

    info(msg, ...args) {
      if (shouldLog('info')) {
        console.error(chalk.blue(`[${timestamp()}] INFO  ${tag}${msg}`), ...args);
      }
    },

    warn(msg, ...args) {
      if (shouldLog('warn')) {
        console.error(chalk.yellow(`[${timestamp()}] WARN  ${tag}${msg}`), ...args);
      }
    },

    error(msg, ...args) {
      if (shouldLog('error')) {
        console.error(chalk.red(`[${timestamp()}] ERROR ${tag}${msg}`), ...args);
      }
    },
  };
}

export const logger = createLogger();
