/**
 * Logger Utility
 * Structured logging with winston for error handling and debugging
 */

import winston from 'winston';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const NODE_ENV = process.env['NODE_ENV'] || 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] || (NODE_ENV === 'production' ? 'info' : 'debug');
const LOGS_DIR = process.env['LOGS_DIR'] || resolve(__dirname, '../../../../logs');

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, service, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    const label = typeof component === 'string' ? component : String(service || 'Orchestrator');
    return `${String(timestamp)} [${label}] ${level}: ${String(message)}${metaStr}`;
  })
);

// JSON format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleFormat,
    silent: NODE_ENV === 'test',
  }),
];

// Add file transports in production
if (NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'orchestrator-error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'orchestrator-combined.log'),
      format: fileFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: LOG_LEVEL,
  defaultMeta: { service: 'Orchestrator' },
  transports,
  exceptionHandlers: NODE_ENV === 'production' ? [
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'orchestrator-exceptions.log'),
    }),
  ] : undefined,
  rejectionHandlers: NODE_ENV === 'production' ? [
    new winston.transports.File({
      filename: resolve(LOGS_DIR, 'orchestrator-rejections.log'),
    }),
  ] : undefined,
});

export type Logger = winston.Logger;

// Create child loggers for different components
export function createLogger(component: string): Logger {
  return logger.child({ component });
}

// Structured error logging helper
export function logError(
  target: Logger,
  message: string,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const errorObj = error instanceof Error ? error : new Error(String(error));
  target.error(message, {
    error: {
      name: errorObj.name,
      message: errorObj.message,
      stack: errorObj.stack,
    },
    ...context,
  });
}

// Performance logging helper
export function logPerformance(
  operation: string,
  durationMs: number,
  context?: Record<string, unknown>
): void {
  const level = durationMs > 5000 ? 'warn' : 'debug';
  logger[level](`Performance: ${operation}`, {
    durationMs,
    ...context,
  });
}
