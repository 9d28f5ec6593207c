/**
 * Centralized logging system with multiple output levels
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  context?: string;
  level?: LogLevel | Uppercase<LogLevel>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LEVELS.some(level => level === value);
}

function normalizeLevel(level: string | undefined, fallback: LogLevel): LogLevel {
  const lowered = level?.toLowerCase();
  return isLogLevel(lowered) ? lowered : fallback;
}

// Shared by every Logger so that context loggers created at import time
// still follow the level and file chosen later by the CLI.
let logFile: string | null = null;
let globalLevel: LogLevel = normalizeLevel(process.env.LOG_LEVEL, 'info');

/**
 * Level used by every logger that was not given one explicitly
 */
export function setGlobalLogLevel(level: LogLevel): void {
  globalLevel = level;
}

/**
 * Send every subsequent log line to `path` as well. The file is truncated.
 */
export function enableFileLogging(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, '', 'utf-8');
  logFile = path;
}

export function disableFileLogging(): void {
  logFile = null;
}

export class Logger {
  private static buffer: LogEntry[] = [];
  private static maxLogs = 1000;

  private context?: string;
  private minLevel?: LogLevel;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    if (options.level) {
      this.minLevel = normalizeLevel(options.level, 'info');
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.getMinLevel());
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}] ` : '';

    let message = `${timestamp} ${level} ${context}${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack && this.getMinLevel() === 'debug') {
        message += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    Logger.buffer.push(entry);
    if (Logger.buffer.length > Logger.maxLogs) {
      Logger.buffer = Logger.buffer.slice(-Logger.maxLogs);
    }

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }

    if (logFile) {
      appendFileSync(logFile, formatted + '\n', 'utf-8');
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.log({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.log({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context: context ?? this.context
    });
  }

  success(message: string): void {
    this.info(`✅ ${message}`);
  }

  getLogs(level?: LogLevel): LogEntry[] {
    return level ? Logger.buffer.filter(log => log.level === level) : [...Logger.buffer];
  }

  clear(): void {
    Logger.buffer = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel ?? globalLevel;
  }
}

// Singleton instance
export const logger = new Logger();

/**
 * Custom error class for application errors
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
 * Normalize anything thrown into an AppError and log it
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

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Node system error code (ENOENT, EACCES, ...) of a thrown value, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
