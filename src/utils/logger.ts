import * as winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function resolveLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  return LOG_LEVELS.find(level => level === configured) ?? 'info';
}

// token amounts are bigints, which JSON.stringify refuses
function stringifyMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

/**
 * Minimal Winston-based logger
 * Supports console + optional file logging
 */
export class Logger {
  private winston: winston.Logger;

  constructor(service: string, logFile?: string) {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'HH:mm:ss' }),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${stringifyMeta(meta)}` : '';
            return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
          })
        )
      })
    ];

    if (logFile) {
      const fileFormat = winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      );

      transports.push(
        new winston.transports.File({
          filename: logFile,
          format: fileFormat
        }),
        new winston.transports.File({
          filename: logFile.replace('.log', '-error.log'),
          level: 'error',
          format: fileFormat
        })
      );
    }

    this.winston = winston.createLogger({
      level: resolveLevel(),
      defaultMeta: { service },
      transports,
      exitOnError: false
    });
  }

  error(message: string, context?: LogContext): void {
    this.winston.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.winston.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    this.winston.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.winston.debug(message, context);
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(service: string, logFile?: string): Logger {
  return new Logger(service, logFile);
}

