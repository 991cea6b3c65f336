import chalk from 'chalk';

import type { LogLevel } from './config.js';

type Level = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const PAINT: Record<Level, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red
};

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function formatLogLine(level: Level, message: string, data?: unknown): string {
  const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  return `[${level}] ${message}${suffix}`;
}

export function createLogger(
  threshold: LogLevel,
  write: (line: string) => void = (line) => process.stderr.write(line + '\n')
): Logger {
  const log = (level: Level, message: string, data?: unknown) => {
    if (RANK[level] < RANK[threshold]) return;
    write(PAINT[level](formatLogLine(level, message, data)));
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data)
  };
}

export const silentLogger: Logger = createLogger('silent', () => {});
