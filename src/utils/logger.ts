import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { emergencyWarn } from './emergencyLog.js';

/**
 * Clean Winston metadata by removing internal symbols and keeping only string keys
 */
function cleanWinstonMeta(
  info: Record<string | symbol, unknown>
): Record<string, unknown> {
  const meta = { ...info };

  delete meta.level;
  delete meta.message;
  delete meta.timestamp;
  delete meta.context;
  delete meta.stack;

  const winstonSymbols = [
    Symbol.for('level'),
    Symbol.for('message'),
    Symbol.for('splat'),
  ];

  winstonSymbols.forEach((symbol) => {
    if (symbol in meta) {
      delete meta[symbol];
    }
  });

  // Only include string keys for JSON serialization
  const cleanMeta: Record<string, unknown> = {};
  Object.keys(meta).forEach((key) => {
    cleanMeta[key] = meta[key];
  });

  return cleanMeta;
}

function formatMetaString(info: Record<string | symbol, unknown>): string {
  const cleanMeta = cleanWinstonMeta(info);
  if (Object.keys(cleanMeta).length > 0) {
    return ` ${JSON.stringify(cleanMeta)}`;
  }
  return '';
}

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export enum LogTarget {
  CONSOLE = 'console',
  FILE = 'file',
  BOTH = 'both',
}

export enum LogFormat {
  TEXT = 'text',
  JSON = 'json',
}

export interface LoggerConfig {
  level?: LogLevel;
  target?: LogTarget;
  format?: LogFormat;
  context?: string;
  logDir?: string;
  /** Drop every entry; used by tests and by commands that only print */
  silent?: boolean;
}

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

function textFormat(colorize: boolean): winston.Logform.Format {
  const formats: winston.Logform.Format[] = [];
  if (colorize) {
    formats.push(winston.format.colorize());
  }
  formats.push(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf((info) => {
      const contextStr =
        typeof info.context === 'string' ? ` [${info.context}]` : '';
      const stackStr = typeof info.stack === 'string' ? `\n${info.stack}` : '';
      const metaStr = formatMetaString(info);
      return `${String(info.timestamp)} ${info.level}${contextStr}: ${String(info.message)}${metaStr}${stackStr}`;
    })
  );
  return winston.format.combine(...formats);
}

function jsonFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );
}

/**
 * Logger class wrapper around winston.
 *
 * Console output goes to stderr at every level: stdout carries protocol
 * frames and must never see a log line.
 */
export class Logger {
  private readonly winstonLogger: winston.Logger;
  private readonly config: Required<Omit<LoggerConfig, 'logDir'>> & {
    logDir: string | undefined;
  };

  constructor(config?: LoggerConfig, parent?: winston.Logger) {
    this.config = {
      level: config?.level ?? LogLevel.INFO,
      target: config?.target ?? LogTarget.CONSOLE,
      format: config?.format ?? LogFormat.TEXT,
      context: config?.context ?? 'mcp-stdio-host',
      logDir: config?.logDir,
      silent: config?.silent ?? false,
    };

    if (parent) {
      this.winstonLogger = parent.child({ context: this.config.context });
      return;
    }

    const transports: winston.transport[] = [];

    if (
      this.config.target === LogTarget.CONSOLE ||
      this.config.target === LogTarget.BOTH
    ) {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ALL_LEVELS,
          format:
            this.config.format === LogFormat.JSON
              ? jsonFormat()
              : textFormat(process.stderr.isTTY === true),
        })
      );
    }

    if (
      this.config.target === LogTarget.FILE ||
      this.config.target === LogTarget.BOTH
    ) {
      const fileTransport = this.createFileTransport();
      if (fileTransport) {
        transports.push(fileTransport);
      } else if (this.config.target === LogTarget.FILE) {
        emergencyWarn(
          'File transport creation failed, falling back to stderr to prevent log loss'
        );
        transports.push(
          new winston.transports.Console({
            stderrLevels: ALL_LEVELS,
            format: textFormat(false),
          })
        );
      }
    }

    this.winstonLogger = winston.createLogger({
      level: this.config.level,
      defaultMeta: { context: this.config.context },
      transports,
      exitOnError: false,
      silent: this.config.silent,
    });
  }

  private createFileTransport(): winston.transports.FileTransportInstance | null {
    const logDir = this.config.logDir ?? path.join(process.cwd(), '.logs');
    try {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const timestamp = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
      const logFile = path.join(logDir, `mcp-stdio-host-${timestamp}.log`);

      return new winston.transports.File({
        filename: logFile,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true,
        format:
          this.config.format === LogFormat.JSON ? jsonFormat() : textFormat(false),
      });
    } catch (error) {
      emergencyWarn('Failed to create file transport', error);
      return null;
    }
  }

  get level(): LogLevel {
    return this.config.level;
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.winstonLogger.debug(message, meta);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.winstonLogger.info(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.winstonLogger.warn(message, meta);
  }

  public error(message: string | Error, meta?: Record<string, unknown>): void {
    if (message instanceof Error) {
      this.winstonLogger.error(message.message, {
        ...meta,
        stack: message.stack,
      });
    } else {
      this.winstonLogger.error(message, meta);
    }
  }

  public setLevel(level: LogLevel): void {
    this.config.level = level;
    this.winstonLogger.level = level;
  }

  /**
   * Child loggers share the parent's transports and only change the context tag
   */
  public child(context: string): Logger {
    return new Logger({ ...this.config, context }, this.winstonLogger);
  }

  public end(): void {
    this.winstonLogger.end();
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return ALL_LEVELS.includes(value);
}

/**
 * Logger that drops everything; the default for embedders that pass none
 */
export function createSilentLogger(): Logger {
  return new Logger({ silent: true });
}
