/**
 * Structured Logging
 * ==================
 * One winston instance per process. Packages get a namespaced Logger, and
 * run-scoped code derives children carrying the run context.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  runId?: string;
  strategyId?: string;
  label?: string;
  [key: string]: unknown;
}

const env = process.env;
const isProduction = env.NODE_ENV === 'production';
const level = env.LOG_LEVEL || (isProduction ? 'info' : 'debug');
const logDir = env.LOG_DIR || path.join(process.cwd(), 'logs');
const rotation = { maxSize: env.LOG_MAX_SIZE || '20m', maxFiles: env.LOG_MAX_FILES || '14d' };

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${lvl}: ${String(message)}${extra}`;
  })
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [];
  if (env.LOG_CONSOLE !== 'false') {
    transports.push(new winston.transports.Console({ format: isProduction ? jsonFormat : prettyFormat }));
  }
  if (env.LOG_FILE !== 'false' && env.NODE_ENV !== 'test') {
    try {
      fs.mkdirSync(logDir, { recursive: true });
      for (const [name, fileLevel] of [['error', 'error'], ['combined', undefined]] as const) {
        transports.push(
          new DailyRotateFile({
            filename: path.join(logDir, `${name}-%DATE%.log`),
            datePattern: 'YYYY-MM-DD',
            level: fileLevel,
            format: jsonFormat,
            zippedArchive: true,
            ...rotation,
          })
        );
      }
    } catch (error) {
      console.error(`Log files disabled, cannot use ${logDir}:`, error);
    }
  }
  return transports;
}

const transports = buildTransports();

export const winstonLogger = winston.createLogger({
  level,
  format: jsonFormat,
  defaultMeta: { service: 'racelab' },
  transports,
  silent: transports.length === 0,
  exitOnError: false,
});

/**
 * Namespaced logger with a fixed context merged into every entry
 */
export class Logger {
  constructor(
    private readonly namespace: string = 'racelab',
    private readonly context: LogContext = {}
  ) {}

  private meta(extra?: LogContext): LogContext {
    return { namespace: this.namespace, ...this.context, ...extra };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...this.meta(context),
        error: { name: error.name, message: error.message, stack: error.stack },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...this.meta(context), error });
    } else {
      winstonLogger.error(message, this.meta(context));
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.meta(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.meta(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.meta(context));
  }

  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context });
  }
}

export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

export const logger = new Logger();
