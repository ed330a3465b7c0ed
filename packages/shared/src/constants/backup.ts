/**
 * @wp-promote/shared - Backup directory layout
 */

export const ARCHIVE_PREFIX = 'prod_backup_';
export const ARCHIVE_SUFFIX = '.tar.gz';
export const ARCHIVE_FILES_DIR = 'files';
export const ARCHIVE_DATABASE_FILE = 'database.sql';
export const ARCHIVE_INFO_FILE = 'backup_info.txt';
export const DEPLOYMENT_LOG_FILE = 'deployment.log';

/** Matches current (14-digit) and legacy (YYYYMMDD_HHMMSS) archive names. */
export const ARCHIVE_NAME_PATTERN = /^prod_backup_(\d{14}|\d{8}_\d{6})\.tar\.gz$/;

export function archiveFileName(timestamp: string): string {
  return `${ARCHIVE_PREFIX}${timestamp}${ARCHIVE_SUFFIX}`;
}

export function preservedDumpFileName(table: string, timestamp: string): string {
  return `preserved_${table}_${timestamp}.sql`;
}

/** INSERT-only extract of a preserved dump, loaded when the full dump fails */
export function rowsDumpFileName(table: string, timestamp: string): string {
  return `rows_${table}_${timestamp}.sql`;
}

export function stageDumpFileName(timestamp: string): string {
  return `stage_export_${timestamp}.sql`;
}
