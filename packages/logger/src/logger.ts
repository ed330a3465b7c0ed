/**
 * @wp-promote/logger - Structured Logging with Winston
 *
 * - Console: `[YYYY-MM-DD HH:mm:ss] level: message`
 * - File: JSON lines appended to <backupDir>/deployment.log
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger as createWinstonLogger, format, transports, type Logger } from 'winston';
import { DEPLOYMENT_LOG_FILE, type LoggerLike } from '@wp-promote/shared';
import { maskEntry } from './sanitizer.js';

// ============================================================================
// Custom Formats
// ============================================================================

const RESERVED_KEYS = new Set(['level', 'message', 'timestamp']);

const maskFormat = format(info => {
  for (const key of Object.keys(info)) {
    if (!RESERVED_KEYS.has(key)) {
      info[key] = maskEntry(key, info[key]);
    }
  }
  return info;
});

const consoleFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  maskFormat(),
  format.colorize(),
  format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0
      ? `\n${JSON.stringify(meta, null, 2)}`
      : '';
    return `[${timestamp}] ${level}: ${message}${metaStr}`;
  }),
);

const fileFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  maskFormat(),
  format.json(),
);

// ============================================================================
// Factory
// ============================================================================

export interface LoggerOptions {
  level?: string;
  /** Console threshold when it should differ from the file log */
  consoleLevel?: string;
  /** Directory holding the append-only deployment.log; omitted -> console only */
  logDir?: string;
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const logger = createWinstonLogger({
    level: options.level || process.env.LOG_LEVEL || 'info',
    silent: options.silent,
    transports: [new transports.Console({ level: options.consoleLevel, format: consoleFormat })],
  });

  if (options.logDir) {
    mkdirSync(options.logDir, { recursive: true });
    logger.add(
      new transports.File({
        filename: join(options.logDir, DEPLOYMENT_LOG_FILE),
        format: fileFormat,
      }),
    );
  }

  return logger;
}

/**
 * Adapter from a winston Logger to the LoggerLike contract the services use.
 */
export function toLoggerLike(logger: Logger): LoggerLike {
  return {
    info: (message, meta) => logger.info(message, meta),
    warn: (message, meta) => logger.warn(message, meta),
    error: (message, meta) => logger.error(message, meta),
    debug: (message, meta) => logger.debug(message, meta),
  };
}

/** Flush file transports before the process exits. */
export function closeLogger(logger: Logger): Promise<void> {
  return new Promise(resolve => {
    logger.on('finish', () => resolve());
    logger.end();
  });
}
