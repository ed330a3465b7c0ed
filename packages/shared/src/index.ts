/**
 * @wp-promote/shared
 * Types, config, errors and constants shared by every workspace.
 */

export * from './types/index.js';
export * from './errors/index.js';
export * from './constants/index.js';
export * from './utils/index.js';
export * from './config/index.js';
