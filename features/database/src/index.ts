/**
 * @wp-promote/database
 * Table preservation and schema replacement
 */

export { PreservationService, type PreservationDeps, type SnapshotBatch } from './preservation.service.js';
export { MigrateService, type MigrateDeps, type MigrationResult } from './migrate.service.js';
