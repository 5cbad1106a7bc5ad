/**
 * Logger
 * Timestamped diagnostics on stderr, so command output on stdout stays clean.
 */

import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';
import { DEFAULT_LOG_LEVEL } from '../constants.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_COLORS: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

class Logger {
  private static instance: Logger;
  private level: LogLevel = DEFAULT_LOG_LEVEL;
  private sink: (line: string) => void = line => process.stderr.write(line + '\n');

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Redirect output; used by tests */
  setSink(sink: (line: string) => void): void {
    this.sink = sink;
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    const timestamp = new Date().toISOString();
    const tag = LEVEL_COLORS[level](`[${level.toUpperCase()}]`);
    this.sink(`${chalk.gray(`[${timestamp}]`)} ${tag} ${message}`);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string, error?: Error): void {
    const errorMessage = error ? `${message}: ${error.message}` : message;
    this.write('error', errorMessage);
    if (error?.stack && this.level === 'debug') {
      this.sink(error.stack);
    }
  }
}

export const logger = Logger.getInstance();
