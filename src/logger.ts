/**
 * Diagnostics for the sweep and aggregate CLIs.
 *
 * Everything goes to stderr: stdout carries the per-point report lines and
 * the markdown table, which are meant to be piped or redirected. Long sweeps
 * usually run with stderr captured to a file, so colour is only used on a
 * terminal and structured data is written as `key=value` pairs on one line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  /** Component tag, e.g. SweepCLI, PowerSampler */
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  /** Defaults to true when stderr is a terminal and NO_COLOR is unset */
  color?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some(level => level === value);
}

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m'
};
const RESET = '\x1b[0m';

function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  return JSON.stringify(value);
}

/** Renders `{ devices: 2, reason: 'no driver' }` as `devices=2 reason="no driver"` */
export function formatFields(data: Record<string, unknown>): string {
  return Object.entries(data)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

export class Logger {
  private minLevel: LogLevel;
  private color: boolean;

  constructor(minLevel: LogLevel = 'info', options: LoggerOptions = {}) {
    this.minLevel = minLevel;
    this.color = options.color ?? (process.stderr.isTTY === true && !process.env.NO_COLOR);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  formatMessage(entry: LogEntry): string {
    const parts = [entry.timestamp.toISOString(), entry.level.toUpperCase().padEnd(5)];
    if (entry.context) parts.push(`[${entry.context}]`);
    parts.push(entry.message);
    if (entry.data && Object.keys(entry.data).length > 0) {
      parts.push(formatFields(entry.data));
    }

    let message = parts.join(' ');
    // Stack traces only for unexpected failures; AppErrors carry a readable message
    if (entry.error && !(entry.error instanceof AppError)) {
      message += `\n  ${entry.error.stack ?? entry.error.message}`;
    }
    return message;
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    const formatted = this.formatMessage(entry);
    const line = this.color ? `${COLORS[entry.level]}${formatted}${RESET}` : formatted;

    if (entry.level === 'warn') {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({ timestamp: new Date(), level: 'error', message, error, context });
  }

  /** The config file's logLevel is only known after the logger exists */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

// Shared by both CLIs; LOG_LEVEL applies before any config file is read
export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');

/**
 * An expected failure of a sweep or aggregation: bad flags, an unreachable
 * server, an empty results tree. `code` names it for callers and tests.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Logs whatever reached a CLI's top level and returns it as an AppError
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 500);
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 500);
  logger.error(String(error), undefined, context);
  return appError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
