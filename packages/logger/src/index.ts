/**
 * @wp-promote/logger
 */

export { createLogger, toLoggerLike, closeLogger, type LoggerOptions } from './logger.js';
export { maskSensitiveData, maskEntry, SENSITIVE_KEYS } from './sanitizer.js';
