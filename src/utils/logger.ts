/**
 * Centralized logging utility with an append-only error file and optional Loki shipping
 * Console output goes to stderr so it never mixes with the selection prompt
 */

import winston from 'winston';
import LokiTransport from 'winston-loki';
import type { LogContext, LogLevel } from '../types/logging';

const SERVICE_NAME = 'group-member-pruner';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'verbose'];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && LOG_LEVELS.some(level => level === value);

const stringifyMeta = (meta: Record<string, unknown>): string =>
  Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';

export class Logger {
  private logger: winston.Logger;

  private consoleFormat = (info: winston.Logform.TransformableInfo): string => {
    const { timestamp, level, message, traceId, service, version, environment, ...meta } = info;
    const trace = typeof traceId === 'string' ? `[${traceId.slice(0, 8)}]` : '';
    return `${String(timestamp)} ${level}: ${trace} ${String(message)} ${stringifyMeta(meta)}`;
  };

  // One line per entry: timestamp - LEVEL - message {context}
  private fileFormat = (info: winston.Logform.TransformableInfo): string => {
    const { timestamp, level, message, service, version, environment, ...meta } = info;
    return `${String(timestamp)} - ${level.toUpperCase()} - ${String(message)} ${stringifyMeta(meta)}`.trimEnd();
  };

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const isTest = env.NODE_ENV === 'test';

    const transports: winston.transport[] = [
      new winston.transports.Console({
        silent: isTest,
        stderrLevels: [...LOG_LEVELS],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(this.consoleFormat)
        ),
      }),
    ];

    // Under test the error file is written only when LOG_FILE names one
    if (!isTest || env.LOG_FILE) {
      transports.push(
        new winston.transports.File({
          filename: env.LOG_FILE || 'error_log.txt',
          level: 'error',
          options: { flags: 'a' },
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.printf(this.fileFormat)
          ),
        })
      );
    }

    if (env.LOKI_HOST) {
      transports.push(
        new LokiTransport({
          host: env.LOKI_HOST,
          labels: {
            service: SERVICE_NAME,
            environment: env.NODE_ENV || 'development',
          },
          json: true,
          format: winston.format.json(),
          replaceTimestamp: true,
          onConnectionError: err => {
            let fallbackMessage = 'Loki connection error, falling back to console';
            if (err instanceof Error) {
              fallbackMessage += `: ${err.message}`;
            }
            console.error(fallbackMessage);
          },
        })
      );
    }

    const level = env.LOG_LEVEL;

    this.logger = winston.createLogger({
      level: isLogLevel(level) ? level : 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: {
        service: SERVICE_NAME,
        version: env.npm_package_version || '1.0.0',
        environment: env.NODE_ENV || 'development',
      },
      transports,
    });
  }

  public info(message: string, context?: LogContext): void {
    this.logger.info(message, context);
  }

  public error(message: string, context?: LogContext & { error?: Error | string }): void {
    this.logger.error(message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.logger.warn(message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.logger.debug(message, context);
  }

  public verbose(message: string, context?: LogContext): void {
    this.logger.verbose(message, context);
  }

  // Method for logging with trace ID
  public withTrace(traceId: string): TracedLogger {
    return {
      info: (message, context) => this.info(message, { ...context, traceId }),
      error: (message, context) => this.error(message, { ...context, traceId }),
      warn: (message, context) => this.warn(message, { ...context, traceId }),
      debug: (message, context) => this.debug(message, { ...context, traceId }),
      verbose: (message, context) => this.verbose(message, { ...context, traceId }),
    };
  }

  /**
   * Wait for buffered transports to flush before the process exits.
   * The logger can finish before its file transport has written the last lines, so wait on both.
   */
  public async close(): Promise<void> {
    const fileTransports = this.logger.transports.filter(transport => transport instanceof winston.transports.File);
    const streams: NodeJS.EventEmitter[] = [this.logger, ...fileTransports];
    const flushed = streams.map(
      stream => new Promise<void>(resolve => stream.once('finish', () => resolve()))
    );
    this.logger.end();
    await Promise.all(flushed);
  }
}

export interface TracedLogger {
  info(message: string, context?: Omit<LogContext, 'traceId'>): void;
  error(message: string, context?: Omit<LogContext, 'traceId'> & { error?: Error | string }): void;
  warn(message: string, context?: Omit<LogContext, 'traceId'>): void;
  debug(message: string, context?: Omit<LogContext, 'traceId'>): void;
  verbose(message: string, context?: Omit<LogContext, 'traceId'>): void;
}

// Export singleton instance
export const logger = new Logger();
export default logger;
