/**
 * Log level type.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Output format of a log line.
 */
export type LogFormat = 'pretty' | 'json';

/**
 * Log metadata type.
 */
export type LogMetadata = Record<string, unknown>;

/**
 * Interface for structured logging.
 */
export interface ILogger {
  /**
   * Log an error message.
   * @param error - Error object (optional)
   * @param meta - Additional metadata (optional)
   */
  error(message: string, error?: Error, meta?: LogMetadata): void;

  warn(message: string, meta?: LogMetadata): void;

  info(message: string, meta?: LogMetadata): void;

  debug(message: string, meta?: LogMetadata): void;

  /**
   * Create a child logger with additional context.
   * @param context - Additional context to include in all logs
   */
  child(context: LogMetadata): ILogger;

  /**
   * Set log level dynamically.
   */
  setLevel(level: LogLevel): void;
}
