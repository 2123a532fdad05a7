/**
 * Centralized logging system with multiple output levels
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

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
  /** Children without their own level follow the parent's */
  level?: LogLevel;
  maxLogs?: number;
  /** Entries of a child are kept by its root logger */
  parent?: Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function safeStringify(data: Record<string, unknown>): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    data,
    (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      return value;
    },
    2
  );
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private minLevel?: LogLevel;
  private context?: string;
  private parent?: Logger;

  constructor(options: LoggerOptions = {}) {
    this.context = options.context;
    this.parent = options.parent;
    this.minLevel = options.level ?? (options.parent ? undefined : 'info');
    this.maxLogs = options.maxLogs ?? 1000;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.getMinLevel());
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + safeStringify(entry.data).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
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

  private record(entry: LogEntry): void {
    if (this.parent) {
      this.parent.record(entry);
      return;
    }

    this.logs.push(entry);
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.record(entry);

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

  /**
   * Logger labelled `parent:sub` that follows this one's level
   */
  child(subContext: string): Logger {
    const context = this.context ? `${this.context}:${subContext}` : subContext;
    return new Logger({ context, parent: this });
  }

  getLogs(level?: LogLevel): LogEntry[] {
    if (this.parent) return this.parent.getLogs(level);
    return level ? this.logs.filter(log => log.level === level) : this.logs;
  }

  clear(): void {
    if (this.parent) {
      this.parent.clear();
      return;
    }
    this.logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel ?? this.parent?.getMinLevel() ?? 'info';
  }
}

// Singleton instance
export const logger = new Logger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'
});

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public exitCode: number = 1,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { name: string; message: string; code: string; exitCode: number; context?: Record<string, unknown> } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      context: this.context
    };
  }
}

/**
 * Invalid settings or target directory. Raised before anything on disk changes.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, code: string = 'CONFIGURATION_ERROR', context?: Record<string, unknown>) {
    super(message, code, 2, context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize an unknown throwable into an AppError and log it
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 1);
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 1);
  logger.error(String(error), undefined, context);
  return appError;
}

/**
 * Error code of a Node.js system error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
