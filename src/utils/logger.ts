/**
 * Home Dashboard - Console Logger
 *
 * Writes `<timestamp> <LEVEL> [context] message` lines to the console.
 * The threshold comes from DASHBOARD_LOG_LEVEL unless given explicitly.
 */

import { formatError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  readonly context: string;
  debug(message: string, error?: unknown): void;
  info(message: string, error?: unknown): void;
  warn(message: string, error?: unknown): void;
  error(message: string, error?: unknown): void;
  child(context: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.DASHBOARD_LOG_LEVEL?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

class ConsoleLogger implements Logger {
  constructor(
    public readonly context: string,
    private readonly level: LogLevel
  ) {}

  debug(message: string, error?: unknown): void {
    this.write('debug', message, error);
  }

  info(message: string, error?: unknown): void {
    this.write('info', message, error);
  }

  warn(message: string, error?: unknown): void {
    this.write('warn', message, error);
  }

  error(message: string, error?: unknown): void {
    this.write('error', message, error);
  }

  child(context: string): Logger {
    return new ConsoleLogger(`${this.context}:${context}`, this.level);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, error?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    let line = `${new Date().toISOString()} ${level.toUpperCase()} [${this.context}] ${message}`;
    if (error !== undefined) {
      line += `: ${formatError(error)}`;
      if (this.level === 'debug' && error instanceof Error && error.stack) {
        line += `\n${error.stack}`;
      }
    }

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Create a logger tagged with a component name
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(context, options.level ?? levelFromEnv());
}

/**
 * Logger that drops everything; handy for tests
 */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
