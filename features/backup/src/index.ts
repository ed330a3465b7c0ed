/**
 * @wp-promote/backup
 * Production backups, retention and restore
 */

export { BackupService, type BackupDeps } from './backup.service.js';
export {
  RestoreService,
  PRE_RESTORE_SECRETS_FILE,
  type RestoreDeps,
  type RestorePreview,
} from './restore.service.js';
export { formatBackupInfo, parseBackupInfo, readBackupInfo } from './backup-info.js';
