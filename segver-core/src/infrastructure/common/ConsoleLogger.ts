import type { ILogger, LogFormat, LogLevel, LogMetadata } from '../../domain/common/ILogger.js';

/**
 * Console logger writing every line to stderr, so stdout stays free for command results.
 */
export class ConsoleLogger implements ILogger {
  private level: LogLevel;
  private readonly context: LogMetadata;
  private readonly format: LogFormat;

  private static readonly LEVELS: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
  };

  constructor(level: LogLevel = 'info', context: LogMetadata = {}, format: LogFormat = 'pretty') {
    this.level = level;
    this.context = context;
    this.format = format;
  }

  private shouldLog(level: LogLevel): boolean {
    return ConsoleLogger.LEVELS[level] <= ConsoleLogger.LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      return JSON.stringify({ timestamp, level, message, ...this.context, ...meta });
    }

    const contextStr = Object.keys(this.context).length > 0
      ? ` [${Object.entries(this.context).map(([k, v]) => `${k}=${String(v)}`).join(' ')}]`
      : '';
    const metaStr = meta && Object.keys(meta).length > 0
      ? ` ${JSON.stringify(meta)}`
      : '';
    return `${timestamp} [${level.toUpperCase()}]${contextStr} ${message}${metaStr}`;
  }

  private write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(level)) return;
    console.error(this.formatMessage(level, message, meta));
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const fullMeta = error ? { ...meta, error: error.message, stack: error.stack } : meta;
    this.write('error', message, fullMeta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: LogMetadata): void {
    this.write('debug', message, meta);
  }

  child(context: LogMetadata): ILogger {
    return new ConsoleLogger(this.level, { ...this.context, ...context }, this.format);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}
