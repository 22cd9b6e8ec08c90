/**
 * Logging infrastructure for the SCR knowledge base
 *
 * Structured log lines written to stderr and, optionally, to a rotated
 * log file. A Logger is built once by the composition root and passed to
 * every component that logs.
 */

import fs from 'fs';
import path from 'path';

/**
 * Log level enumeration
 */
export enum LogLevel {
  ERROR = 'ERROR',
  WARN = 'WARN',
  INFO = 'INFO',
  DEBUG = 'DEBUG'
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Minimum log level to record */
  minLevel: LogLevel;

  /** Write entries to stderr */
  console: boolean;

  /** Directory for the log file; no file is written when absent */
  logDir?: string;

  /** File name for the log file */
  logFile: string;

  /** Maximum log file size before rotation (in bytes) */
  maxFileSize: number;

  /** Maximum number of rotated log files to keep */
  maxFiles: number;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  console: true,
  logFile: 'scrkb.log',
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5
};

const LEVEL_ORDER: LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

export function parseLogLevel(level: 'debug' | 'info' | 'warn' | 'error'): LogLevel {
  switch (level) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
  }
}

/**
 * Class for structured logging
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly logFilePath: string | null;
  private currentLogSize = 0;

  /**
   * Create a new logger
   * @param config Logger configuration, merged over the defaults
   */
  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logFilePath = this.config.logDir ? path.join(this.config.logDir, this.config.logFile) : null;
    this.setupLogFile();
  }

  /**
   * A logger that records nothing
   */
  static silent(): Logger {
    return new Logger({ minLevel: LogLevel.ERROR, console: false });
  }

  /**
   * Create the log directory and pick up the size of an existing file
   */
  private setupLogFile(): void {
    if (!this.logFilePath || !this.config.logDir) {
      return;
    }
    fs.mkdirSync(this.config.logDir, { recursive: true });
    this.currentLogSize = fs.existsSync(this.logFilePath) ? fs.statSync(this.logFilePath).size : 0;
  }

  /**
   * Rotate log file if it exceeds the maximum size
   */
  private rotateLogFile(logFilePath: string, logDir: string): void {
    if (this.currentLogSize < this.config.maxFileSize) {
      return;
    }

    for (let i = this.config.maxFiles - 1; i > 0; i--) {
      const oldPath = path.join(logDir, `${this.config.logFile}.${i}`);
      const newPath = path.join(logDir, `${this.config.logFile}.${i + 1}`);
      if (fs.existsSync(oldPath)) {
        fs.renameSync(oldPath, newPath);
      }
    }

    fs.renameSync(logFilePath, path.join(logDir, `${this.config.logFile}.1`));
    this.currentLogSize = 0;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.minLevel);
  }

  /**
   * Write a log entry
   * @param context Log context (e.g., class or module name)
   */
  private writeLog(level: LogLevel, message: string, context: string, metadata?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    let logEntry = `${timestamp} [${level}] [${context}] ${message}`;

    if (metadata !== undefined) {
      logEntry += typeof metadata === 'object' ? ` ${safeStringify(metadata)}` : ` ${String(metadata)}`;
    }

    logEntry += '\n';

    if (this.config.console) {
      process.stderr.write(logEntry);
    }

    if (this.logFilePath && this.config.logDir) {
      try {
        this.rotateLogFile(this.logFilePath, this.config.logDir);
        fs.appendFileSync(this.logFilePath, logEntry);
        this.currentLogSize += Buffer.byteLength(logEntry);
      } catch (error) {
        process.stderr.write(`Failed to write log file ${this.logFilePath}: ${String(error)}\n`);
      }
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
   * Log an error with stack trace
   * @param message Optional message to add
   */
  public logError(error: unknown, context: string, message?: string): void {
    if (error instanceof Error) {
      this.error(message || error.message, context, {
        stack: error.stack,
        name: error.name,
        message: error.message
      });
      return;
    }
    this.error(message || String(error), context);
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}
