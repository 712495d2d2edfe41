/**
 * Centralized logging service using Winston
 * Provides structured file logging and a human-readable console stream
 */

import winston from 'winston';
import { LogLevel } from '../domain/models/types';

/**
 * LoggingService provides centralized, structured logging
 * for all pipeline components
 */
export class LoggingService {
  private logger: winston.Logger;
  private context: string;

  private constructor(logger: winston.Logger, context: string) {
    this.logger = logger;
    this.context = context;
  }

  /**
   * Creates a root logger
   * @param context - The context/module name for log messages
   * @param logFile - Path to the log file; console only when omitted
   * @param level - Minimum logging level (default: 'info')
   */
  static create(context: string, logFile?: string, level: LogLevel = 'info'): LoggingService {
    const transports: winston.transport[] = [
      // Console transport with human-readable format
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ level, message, context, timestamp }) => {
            return `${timestamp} [${context}] ${level}: ${message}`;
          })
        ),
      }),
    ];

    if (logFile) {
      transports.push(
        new winston.transports.File({
          filename: logFile,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
      );
    }

    const logger = winston.createLogger({
      level,
      silent: process.env.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
      ),
      defaultMeta: { context },
      transports,
    });

    return new LoggingService(logger, context);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  /**
   * Log an error message
   * @param message - The error message
   * @param error - The error object (optional)
   * @param meta - Additional metadata
   */
  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    this.logger.error(message, {
      ...meta,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : error,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  /**
   * Create a child logger sharing this logger's transports
   * @param childContext - Additional context to append
   */
  child(childContext: string): LoggingService {
    const newContext = `${this.context}:${childContext}`;
    return new LoggingService(this.logger.child({ context: newContext }), newContext);
  }

  /**
   * Close the logger and flush any pending writes.
   * Call on the root logger only; children share its transports.
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on('finish', () => resolve());
      this.logger.end();
    });
  }
}

/**
 * Factory function to create a logger instance
 * @param context - The context/module name
 * @param logFile - Path to the log file
 * @param level - Logging level
 */
export function createLogger(
  context: string,
  logFile?: string,
  level: LogLevel = 'info'
): LoggingService {
  return LoggingService.create(context, logFile, level);
}
