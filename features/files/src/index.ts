/**
 * @wp-promote/files
 * File sync, permission normalization and cache cleanup
 */

export { SyncService, SECRETS_BACKUP_FILE, type SyncDeps, type SyncResult } from './sync.service.js';
export { PermissionService, modeFor, type PermissionOptions } from './permission.service.js';
export { CacheService, type CacheDeps } from './cache.service.js';
