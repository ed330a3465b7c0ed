/**
 * RestoreService - Inverse of BackupService
 *
 * Extracts an archive, asks the operator, then replaces production files
 * (mirror with delete) and the production database wholesale. The live
 * wp-config.php survives the file restore.
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import {
  ARCHIVE_DATABASE_FILE,
  ARCHIVE_FILES_DIR,
  FatalStageError,
  SECRETS_FILE,
  errorMessage,
  formatTimestamp,
  type Archiver,
  type BackupMetadata,
  type CacheCleaner,
  type CacheFlusher,
  type ConfirmFn,
  type DataLayerClient,
  type DeploymentConfig,
  type FileTransfer,
  type LoggerLike,
  type PermissionNormalizer,
  type RestoreResult,
} from '@wp-promote/shared';
import { readBackupInfo } from './backup-info.js';

export interface RestoreDeps {
  prod: DataLayerClient;
  transfer: FileTransfer;
  archiver: Archiver;
  permissions: PermissionNormalizer;
  cache: CacheCleaner;
  flusher: CacheFlusher;
  logger: LoggerLike;
  now?: () => Date;
}

/** Subject shown to the operator before anything is overwritten. */
export interface RestorePreview {
  archive: string;
  metadata: BackupMetadata | null;
}

export const PRE_RESTORE_SECRETS_FILE = `${SECRETS_FILE}.pre-restore`;

export class RestoreService {
  private readonly now: () => Date;

  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: RestoreDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async restore(archivePath: string, confirm: ConfirmFn<RestorePreview>): Promise<RestoreResult> {
    const { logger } = this.deps;
    const startTime = Date.now();
    const warnings: string[] = [];
    const workDir = join(this.config.backupDir, `restore_temp_${formatTimestamp(this.now())}`);

    try {
      await this.extract(archivePath, workDir);

      const metadata = await readBackupInfo(workDir);
      if (!(await confirm({ archive: archivePath, metadata }))) {
        logger.info('Restore cancelled by operator', { archive: archivePath });
        return {
          success: false,
          cancelled: true,
          archive: archivePath,
          warnings,
          duration: Date.now() - startTime,
        };
      }

      await this.restoreFiles(join(workDir, ARCHIVE_FILES_DIR));
      await this.restoreDatabase(join(workDir, ARCHIVE_DATABASE_FILE));

      const permissions = await this.deps.permissions.normalize(this.config.prodPath);
      for (const failure of permissions.failures) {
        warnings.push(`Permission change failed: ${failure}`);
      }

      const cache = await this.deps.cache.clear(this.config.prodPath);
      for (const failure of cache.failures) {
        warnings.push(`Cache cleanup failed: ${failure}`);
      }

      warnings.push(...(await this.deps.flusher.flushCaches()));

      logger.info('Restore completed', { archive: archivePath, warnings: warnings.length });
      return { success: true, archive: archivePath, warnings, duration: Date.now() - startTime };
    } catch (error) {
      logger.error('Restore failed', { archive: archivePath, error: errorMessage(error) });
      return {
        success: false,
        archive: archivePath,
        warnings,
        duration: Date.now() - startTime,
        error: errorMessage(error),
      };
    } finally {
      await fs.remove(workDir);
    }
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async extract(archivePath: string, workDir: string): Promise<void> {
    try {
      await fs.ensureDir(workDir);
      await this.deps.archiver.extract(archivePath, workDir);
    } catch (error) {
      throw new FatalStageError('restore-extract', `Failed to extract ${archivePath}: ${errorMessage(error)}`);
    }

    const missing = [ARCHIVE_FILES_DIR, ARCHIVE_DATABASE_FILE];
    for (const entry of missing) {
      if (!(await fs.pathExists(join(workDir, entry)))) {
        throw new FatalStageError('restore-extract', `Archive is missing ${entry}`);
      }
    }
  }

  /**
   * rsync --delete-excluded removes the live wp-config.php, so it is set
   * aside first and put back afterwards.
   */
  private async restoreFiles(filesDir: string): Promise<void> {
    const { transfer, logger } = this.deps;
    const secretsPath = join(this.config.prodPath, SECRETS_FILE);
    const savedSecrets = join(this.config.backupDir, PRE_RESTORE_SECRETS_FILE);
    const hasSecrets = await fs.pathExists(secretsPath);

    try {
      if (hasSecrets) {
        await fs.copy(secretsPath, savedSecrets, { preserveTimestamps: true });
      }
    } catch (error) {
      throw new FatalStageError('restore-files', `Could not set aside ${SECRETS_FILE}: ${errorMessage(error)}`);
    }

    try {
      await transfer.mirror(filesDir, this.config.prodPath, {
        delete: true,
        deleteExcluded: true,
        exclude: [`/${SECRETS_FILE}`],
      });
    } catch (error) {
      throw new FatalStageError('restore-files', `File restore failed: ${errorMessage(error)}`);
    } finally {
      if (hasSecrets) {
        await fs.copy(savedSecrets, secretsPath, { overwrite: true, preserveTimestamps: true });
      }
    }
    logger.info('Production files restored', { secretsPreserved: hasSecrets });
  }

  private async restoreDatabase(dumpPath: string): Promise<void> {
    const { prod, logger } = this.deps;
    try {
      await prod.resetDatabase();
      await prod.importDatabase(dumpPath);
    } catch (error) {
      throw new FatalStageError('restore-database', `Database restore failed: ${errorMessage(error)}`);
    }
    logger.info('Production database restored');
  }
}
