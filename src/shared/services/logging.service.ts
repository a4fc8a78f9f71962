/**
 * Logging Service
 *
 * Structured logging with RFC 5424 levels. Output goes to stderr so stdout
 * stays free for the session payload.
 */

import { ErrorSeverity } from '../errors/error-codes.js';

/**
 * Log level type (RFC 5424)
 */
export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  logger: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  notice(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  critical(message: string, error?: Error, context?: Record<string, unknown>): void;
  alert(message: string, error?: Error, context?: Record<string, unknown>): void;
  emergency(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Receives formatted log lines. Defaults to console.error.
 */
export type LogWriter = (line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warning: 3,
  error: 4,
  critical: 5,
  alert: 6,
  emergency: 7,
};

/**
 * Narrow an arbitrary string (e.g. an env var) to a LogLevel
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logging Service
 *
 * Centralized logging service with a configurable minimum level and a
 * bounded buffer of recent entries.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly loggerName: string;
  private writer: LogWriter;

  constructor(
    minLevel: LogLevel = 'info',
    maxEntries = 1000,
    loggerName = 'session-plan',
    writer: LogWriter = (line) => console.error(line),
  ) {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
    this.writer = writer;
  }

  /**
   * Replace the output writer
   */
  setWriter(writer: LogWriter): void {
    this.writer = writer;
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  /**
   * Log a notice message (normal but significant)
   */
  notice(message: string, context?: Record<string, unknown>): void {
    this.log('notice', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  critical(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('critical', message, context, error);
  }

  /**
   * Log an alert message (action must be taken immediately)
   */
  alert(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('alert', message, context, error);
  }

  /**
   * Log an emergency message (system is unusable)
   */
  emergency(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('emergency', message, context, error);
  }

  /**
   * Record an entry on behalf of a named child logger
   */
  log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    logger: string = this.loggerName,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      logger,
      context,
      error,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    this.writer(LoggingService.format(entry));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  /**
   * Render an entry as a single stderr line (plus context/error continuation lines)
   */
  static format(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(9);

    let output = `[${timestamp}] ${levelStr} [${entry.logger}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    return output;
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }

  /**
   * Convert ErrorSeverity to LogLevel
   */
  static severityToLogLevel(severity: ErrorSeverity): LogLevel {
    switch (severity) {
      case ErrorSeverity.DEBUG:
        return 'debug';
      case ErrorSeverity.INFO:
        return 'info';
      case ErrorSeverity.WARNING:
        return 'warning';
      case ErrorSeverity.ERROR:
        return 'error';
      case ErrorSeverity.CRITICAL:
        return 'critical';
      default:
        return 'info';
    }
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }
}

/**
 * Global logger instance (singleton pattern)
 */
let globalLogger: LoggingService | null = null;

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  const envLevel = process.env.LOG_LEVEL;
  globalLogger ??= new LoggingService(isLogLevel(envLevel) ? envLevel : 'info');
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}

/**
 * Create a named logger that writes through the global LoggingService.
 * The global instance is resolved on every call so setLogger() takes
 * effect for module-level loggers created earlier.
 */
export function createLogger(name: string): Logger {
  const write = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void => {
    getLogger().log(level, message, context, error, name);
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    notice: (message, context) => write('notice', message, context),
    warning: (message, context) => write('warning', message, context),
    error: (message, error, context) => write('error', message, context, error),
    critical: (message, error, context) => write('critical', message, context, error),
    alert: (message, error, context) => write('alert', message, context, error),
    emergency: (message, error, context) => write('emergency', message, context, error),
  };
}
