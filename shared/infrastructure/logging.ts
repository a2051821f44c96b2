/**
 * Logging infrastructure for DocShelf
 *
 * Structured log lines go to stderr (stdout carries the MCP stdio transport)
 * and, when enabled, to a size-rotated log file.
 */

import path from 'path';
import { createWriteStream, existsSync, mkdirSync, renameSync, statSync, type WriteStream } from 'fs';
import { getConfig, type LogLevelName } from './config.js';

/**
 * Log level enumeration, most severe first
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Base directory for log files */
  logDir: string;

  /** Minimum log level to record */
  minLevel: LogLevel;

  /** File name for the log file */
  logFile: string;

  /** Whether to write to the log file at all */
  toFile: boolean;

  /** Whether to mirror log lines to stderr */
  toStderr: boolean;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of rotated log files to keep */
  maxFiles: number;
}

/**
 * Map a configured level name onto the LogLevel enumeration
 */
export function toLogLevel(name: LogLevelName): LogLevel {
  switch (name) {
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
      return LogLevel.WARN;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Format a single log line
 */
export function formatLogEntry(level: LogLevel, message: string, context: string, metadata?: unknown, timestamp: Date = new Date()): string {
  let entry = `${timestamp.toISOString()} [${level}] [${context}] ${message}`;

  if (metadata !== undefined && metadata !== null) {
    if (metadata instanceof Error) {
      entry += ` ${JSON.stringify({ name: metadata.name, message: metadata.message })}`;
    } else if (typeof metadata === 'object') {
      entry += ` ${JSON.stringify(metadata)}`;
    } else {
      entry += ` ${String(metadata)}`;
    }
  }

  return entry;
}

/**
 * Class for structured logging
 */
export class Logger {
  private static instance: Logger | null = null;
  private config: LoggerConfig;
  private writeStream: WriteStream | null = null;
  private currentLogSize = 0;
  private logFilePath: string;

  /**
   * Create a new logger
   * @param config Logger configuration
   */
  private constructor(config: LoggerConfig) {
    this.config = config;
    this.logFilePath = path.join(config.logDir, config.logFile);
    this.setupLogger();
  }

  /**
   * Get the singleton logger instance
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      const appConfig = getConfig();
      Logger.instance = new Logger({
        logDir: path.join(appConfig.dataDir, 'logs'),
        minLevel: toLogLevel(appConfig.logLevel),
        logFile: 'docshelf.log',
        toFile: appConfig.logToFile,
        toStderr: true,
        maxFileSize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5
      });
    }

    return Logger.instance;
  }

  /**
   * Reconfigure the logger
   * @param config Settings to change
   */
  public static configure(config: Partial<LoggerConfig>): void {
    const logger = Logger.getInstance();
    logger.close();
    logger.config = { ...logger.config, ...config };
    logger.logFilePath = path.join(logger.config.logDir, logger.config.logFile);
    logger.setupLogger();
  }

  /**
   * Create the log directory and open the file stream
   */
  private setupLogger(): void {
    if (!this.config.toFile) {
      return;
    }

    try {
      if (!existsSync(this.config.logDir)) {
        mkdirSync(this.config.logDir, { recursive: true });
      }
      this.currentLogSize = existsSync(this.logFilePath) ? statSync(this.logFilePath).size : 0;
      this.writeStream = createWriteStream(this.logFilePath, { flags: 'a' });
      this.writeStream.on('error', (error) => {
        process.stderr.write(`Log file stream failed: ${error.message}\n`);
        this.writeStream = null;
      });
    } catch (error) {
      // Keep logging to stderr if the file cannot be opened
      process.stderr.write(`Failed to setup log file: ${error instanceof Error ? error.message : String(error)}\n`);
      this.writeStream = null;
    }
  }

  /**
   * Rotate the log file once it exceeds the maximum size
   */
  private rotateLogFile(): void {
    if (this.currentLogSize < this.config.maxFileSize) {
      return;
    }

    this.close();

    try {
      for (let i = this.config.maxFiles - 1; i > 0; i--) {
        const oldPath = path.join(this.config.logDir, `${this.config.logFile}.${i}`);
        if (existsSync(oldPath)) {
          renameSync(oldPath, path.join(this.config.logDir, `${this.config.logFile}.${i + 1}`));
        }
      }
      renameSync(this.logFilePath, path.join(this.config.logDir, `${this.config.logFile}.1`));
    } catch (error) {
      process.stderr.write(`Failed to rotate log file: ${error instanceof Error ? error.message : String(error)}\n`);
    }

    this.setupLogger();
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.minLevel);
  }

  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const line = `${formatLogEntry(level, message, context, metadata)}\n`;

    if (this.config.toStderr) {
      process.stderr.write(line);
    }

    if (this.writeStream) {
      this.rotateLogFile();
      this.writeStream?.write(line);
      this.currentLogSize += Buffer.byteLength(line);
    }
  }

  public error(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, context, metadata);
  }

  public warn(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.WARN, message, context, metadata);
  }

  public info(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.INFO, message, context, metadata);
  }

  public debug(message: string, context: string, metadata?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, context, metadata);
  }

  /**
   * Log an error with its stack trace
   * @param error Error object
   * @param context Log context (e.g., class or module name)
   * @param message Optional message to use instead of the error's own
   */
  public logError(error: Error, context: string, message?: string): void {
    this.error(message || error.message, context, {
      name: error.name,
      message: error.message,
      stack: error.stack
    });
  }

  /**
   * Close the log file stream
   */
  public close(): void {
    if (this.writeStream) {
      this.writeStream.end();
      this.writeStream = null;
    }
  }
}

// Convenience function to get the logger instance
export function getLogger(): Logger {
  return Logger.getInstance();
}
