import winston from 'winston';

import { config } from '../config/index.js';

const logger = winston.createLogger({
  level: config.logging.level,
  silent: !config.logging.enabled,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: config.app.name },
  transports: [
    // stdout carries command output; diagnostics go to stderr
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      ),
    }),
  ],
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5242880,
      maxFiles: 5,
    })
  );
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
