/**
 * Winston-based logging for gatewatch
 * Console output is always on; JSON file logs are optional
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';

/**
 * Log levels enumeration
 */
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  HTTP = 'http',
  DEBUG = 'debug'
}

/**
 * Log context merged into every entry
 */
export interface LogContext {
  /** Component or module name */
  component?: string;
  /** Test cycle number */
  cycle?: number;
  /** Interactive session ID */
  sessionId?: string;
}

export type LogMeta = Record<string, unknown>;

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Log level threshold */
  level: LogLevel;
  /** Output directory for log files */
  logDir: string;
  /** Whether to log to console */
  enableConsole: boolean;
  /** Whether to log to file */
  enableFile: boolean;
  /** Maximum size of each log file in bytes */
  maxFileSize: number;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Whether to include stack traces for errors */
  includeStackTrace: boolean;
}

/**
 * Resolve a level name (case-insensitive), falling back when unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized) ?? fallback;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: parseLogLevel(process.env.GATEWATCH_LOG_LEVEL ?? process.env.LOG_LEVEL),
  logDir: './logs',
  enableConsole: true,
  enableFile: false,
  maxFileSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
  includeStackTrace: true
};

/**
 * Winston logger carrying a monitoring context
 */
export class MonitorLogger {
  private logger: winston.Logger;
  private config: LoggerConfig;
  private readonly context: LogContext;

  constructor(config: Partial<LoggerConfig> = {}, parent?: { logger: winston.Logger; context: LogContext }) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = parent ? parent.logger : this.createLogger();
    this.context = parent ? { ...parent.context } : {};
  }

  /**
   * Create the Winston logger instance with configured transports
   */
  private createLogger(): winston.Logger {
    const transports: winston.transport[] = [];

    if (this.config.enableConsole) {
      transports.push(
        new winston.transports.Console({
          level: this.config.level,
          stderrLevels: [LogLevel.ERROR, LogLevel.WARN],
          format: winston.format.combine(
            winston.format.colorize({ all: true }),
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.printf(({ timestamp, level, message, component, cycle, sessionId, ...meta }) => {
              let output = `${timestamp} [${level}]`;

              if (component) {
                output += ` [${component}]`;
              }
              if (cycle !== undefined) {
                output += ` [cycle ${cycle}]`;
              }

              output += `: ${message}`;

              delete meta.service;
              if (sessionId) {
                meta.sessionId = sessionId;
              }
              if (Object.keys(meta).length > 0) {
                output += ` ${JSON.stringify(meta)}`;
              }

              return output;
            })
          )
        })
      );
    }

    if (this.config.enableFile) {
      transports.push(...this.createFileTransports());
    }

    return winston.createLogger({
      level: this.config.level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: this.config.includeStackTrace }),
        winston.format.json()
      ),
      defaultMeta: { service: 'gatewatch' },
      silent: transports.length === 0,
      transports
    });
  }

  /**
   * JSON file transports: everything at the configured level, plus errors only
   */
  private createFileTransports(): winston.transport[] {
    if (!fs.existsSync(this.config.logDir)) {
      fs.mkdirSync(this.config.logDir, { recursive: true });
    }

    return [
      new winston.transports.File({
        filename: path.join(this.config.logDir, 'combined.log'),
        level: this.config.level,
        maxsize: this.config.maxFileSize,
        maxFiles: this.config.maxFiles,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: this.config.includeStackTrace }),
          winston.format.json()
        )
      }),
      new winston.transports.File({
        filename: path.join(this.config.logDir, 'error.log'),
        level: LogLevel.ERROR,
        maxsize: this.config.maxFileSize,
        maxFiles: this.config.maxFiles,
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.json()
        )
      })
    ];
  }

  error(message: string, meta?: LogMeta): void {
    this.logger.error(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, { ...this.context, ...meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, { ...this.context, ...meta });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, { ...this.context, ...meta });
  }

  /**
   * Log a line sent to an interactive session
   */
  inputSent(line: string, hidden: boolean): void {
    this.debug('Sending line to session', {
      event: 'input_sent',
      input: hidden ? '[HIDDEN]' : line
    });
  }

  /**
   * Log the outcome of a probe
   */
  probeComplete(address: string, outcome: string, duration: number): void {
    this.debug(`Probe of ${address} completed: ${outcome}`, {
      event: 'probe_complete',
      address,
      outcome,
      duration
    });
  }

  /**
   * Create a child logger sharing the transports with additional context
   */
  child(context: LogContext): MonitorLogger {
    return new MonitorLogger(this.config, {
      logger: this.logger,
      context: { ...this.context, ...context }
    });
  }

  /**
   * Change the log level at runtime
   */
  setLevel(level: LogLevel): void {
    this.config.level = level;
    this.logger.level = level;

    this.logger.transports.forEach(transport => {
      if (transport.level !== LogLevel.ERROR) {
        transport.level = level;
      }
    });
  }

  /**
   * Add JSON file transports at runtime (used when --log-dir is given)
   */
  enableFileLogging(logDir: string): void {
    if (this.config.enableFile) return;
    this.config.enableFile = true;
    this.config.logDir = logDir;
    for (const transport of this.createFileTransports()) {
      this.logger.add(transport);
    }
    this.logger.silent = false;
  }

  /**
   * Flush pending writes and release the transports
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      if (this.logger.transports.length === 0) {
        resolve();
        return;
      }
      this.logger.once('finish', () => resolve());
      this.logger.end();
    });
  }
}

export function createLogger(config?: Partial<LoggerConfig>): MonitorLogger {
  return new MonitorLogger(config);
}

/**
 * Default logger instance for the application
 */
export const logger = new MonitorLogger();
