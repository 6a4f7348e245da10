/**
 * Logger utility for the Whale Watcher
 *
 * One process-wide level; scoped loggers prefix their component name.
 * Warnings and errors go to stderr so stdout stays readable under a supervisor.
 */

import chalk from 'chalk';
import dayjs from 'dayjs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  success(message: string): void;
}

export function formatLine(level: LogLevel, message: string, scope?: string, at: Date = new Date()): string {
  const prefix = scope ? `[${scope}] ` : '';
  return `${dayjs(at).format('YYYY-MM-DD HH:mm:ss')} - ${level.toUpperCase()} - ${prefix}${message}`;
}

export function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) return;
    const line = LEVEL_STYLES[level](formatLine(level, message, scope));
    if (level === 'warn' || level === 'error') {
      console.error(line, ...args);
    } else {
      console.log(line, ...args);
    }
  };

  return {
    debug: (message, ...args) => write('debug', message, args),
    info: (message, ...args) => write('info', message, args),
    warn: (message, ...args) => write('warn', message, args),
    error: (message, ...args) => write('error', message, args),
    success(message) {
      if (shouldLog('info')) {
        console.log(chalk.green(`  ✓ ${message}`));
      }
    },
  };
}

export const logger = createLogger();
