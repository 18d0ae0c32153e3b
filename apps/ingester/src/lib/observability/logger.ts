/**
 * Structured Logger using Winston
 * Supports correlation IDs, log levels, and file rotation
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';
const level = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.metadata(),
  isDevelopment
    ? winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, metadata }) => {
          const meta = metadata as Record<string, unknown>;
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `[${timestamp}] ${level}: ${message}${metaStr}`;
        })
      )
    : winston.format.json()
);

const consoleTransport = new winston.transports.Console({ level });

// File transports with rotation (only in production)
const fileTransports: winston.transport[] = [];

if (!isDevelopment) {
  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/ingester-error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '14d',
      format: winston.format.json(),
    })
  );

  fileTransports.push(
    new DailyRotateFile({
      filename: 'logs/ingester-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '7d',
      format: winston.format.json(),
    })
  );
}

const logger = winston.createLogger({
  level,
  format: logFormat,
  transports: [consoleTransport, ...fileTransports],
  silent: isTest,
  exitOnError: false,
});

export type LogContext = Record<string, unknown>;

export function withCorrelationId(correlationId: string): winston.Logger {
  return logger.child({ correlationId });
}

export function serializeError(error: unknown): LogContext {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export const logInfo = (message: string, context?: LogContext) => logger.info(message, context);

export const logWarn = (message: string, context?: LogContext) => logger.warn(message, context);

export const logError = (message: string, error?: unknown, context?: LogContext) => {
  logger.error(message, {
    ...context,
    error: error === undefined ? undefined : serializeError(error),
  });
};

export const logDebug = (message: string, context?: LogContext) => logger.debug(message, context);

export default logger;
