/**
 * BackupService - Production snapshots
 *
 * Archive layout (prod_backup_<ts>.tar.gz):
 *   files/            production tree without wp-config.php
 *   database.sql      full `wp db export`
 *   backup_info.txt   metadata
 *
 * Nothing destructive may run until create() has returned a verified archive.
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import {
  ARCHIVE_DATABASE_FILE,
  ARCHIVE_FILES_DIR,
  ARCHIVE_INFO_FILE,
  ARCHIVE_NAME_PATTERN,
  BackupFailedError,
  SECRETS_FILE,
  VERSION,
  archiveFileName,
  errorMessage,
  formatTimestamp,
  parseTimestamp,
  type ArchiveEntry,
  type Archiver,
  type BackupArchive,
  type BackupMetadata,
  type DataLayerClient,
  type DeploymentConfig,
  type FileTransfer,
  type LoggerLike,
  type PruneResult,
} from '@wp-promote/shared';
import { formatBackupInfo } from './backup-info.js';

export interface BackupDeps {
  prod: DataLayerClient;
  transfer: FileTransfer;
  archiver: Archiver;
  logger: LoggerLike;
  now?: () => Date;
}

export class BackupService {
  private readonly now: () => Date;

  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: BackupDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  // ===========================================================================
  // Create
  // ===========================================================================

  async create(): Promise<BackupArchive> {
    const { prod, transfer, archiver, logger } = this.deps;
    const createdAt = this.now();
    const id = formatTimestamp(createdAt);
    const fileName = archiveFileName(id);
    const filePath = join(this.config.backupDir, fileName);
    const workDir = join(this.config.backupDir, `temp_${id}`);

    const metadata: BackupMetadata = {
      createdAt: createdAt.toISOString(),
      prodPath: this.config.prodPath,
      stagePath: this.config.stagePath,
      prodURL: this.config.prodBaseURL,
      stageURL: this.config.stageBaseURL,
      toolVersion: VERSION,
    };

    logger.info('Creating production backup', { archive: fileName });

    try {
      await fs.ensureDir(workDir);

      await transfer.mirror(this.config.prodPath, join(workDir, ARCHIVE_FILES_DIR), {
        exclude: [`/${SECRETS_FILE}`],
      });
      logger.debug('Production files copied', { workDir });

      await prod.exportDatabase(join(workDir, ARCHIVE_DATABASE_FILE));
      logger.debug('Production database exported');

      await fs.writeFile(join(workDir, ARCHIVE_INFO_FILE), formatBackupInfo(metadata));
      await archiver.create(filePath, workDir);

      const entries = await archiver.list(filePath);
      const containedFiles = entries.some(
        entry => entry === `${ARCHIVE_FILES_DIR}/` || entry.startsWith(`${ARCHIVE_FILES_DIR}/`),
      );
      const containedDatabaseDump = entries.includes(ARCHIVE_DATABASE_FILE);

      if (!containedFiles || !containedDatabaseDump) {
        throw new BackupFailedError('Backup archive verification failed', {
          archive: fileName,
          containedFiles,
          containedDatabaseDump,
        });
      }

      const { size } = await fs.stat(filePath);
      logger.info('Backup created', { archive: filePath, sizeBytes: size });

      return { id, fileName, filePath, sizeBytes: size, containedFiles, containedDatabaseDump, metadata };
    } catch (error) {
      await fs.remove(filePath);
      if (error instanceof BackupFailedError) throw error;
      throw new BackupFailedError(`Backup failed: ${errorMessage(error)}`, { archive: fileName });
    } finally {
      await fs.remove(workDir);
    }
  }

  // ===========================================================================
  // List & Prune
  // ===========================================================================

  /**
   * Archives in the backup directory, newest first. Ordered by the
   * timestamp in the file name, then by modification time.
   */
  async list(): Promise<ArchiveEntry[]> {
    if (!(await fs.pathExists(this.config.backupDir))) {
      return [];
    }

    const entries: ArchiveEntry[] = [];
    for (const fileName of await fs.readdir(this.config.backupDir)) {
      const match = fileName.match(ARCHIVE_NAME_PATTERN);
      if (!match) continue;

      const filePath = join(this.config.backupDir, fileName);
      const stats = await fs.stat(filePath).catch((error: unknown) => {
        this.deps.logger.warn('Skipping unreadable backup entry', { archive: fileName, error: errorMessage(error) });
        return null;
      });
      if (!stats?.isFile()) continue;

      entries.push({
        id: match[1].replace('_', ''),
        fileName,
        filePath,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime,
      });
    }

    const created = (entry: ArchiveEntry): number =>
      parseTimestamp(entry.id)?.getTime() ?? entry.modifiedAt.getTime();

    return entries.sort(
      (a, b) => created(b) - created(a) || b.modifiedAt.getTime() - a.modifiedAt.getTime(),
    );
  }

  /** Keep the newest maxBackups archives. Never throws. */
  async prune(): Promise<PruneResult> {
    const { logger } = this.deps;
    let archives: ArchiveEntry[];
    try {
      archives = await this.list();
    } catch (error) {
      logger.warn('Could not list old backups', { error: errorMessage(error) });
      return { kept: [], removed: [], failed: [] };
    }
    const kept = archives.slice(0, this.config.maxBackups).map(a => a.fileName);
    const removed: string[] = [];
    const failed: string[] = [];

    for (const archive of archives.slice(this.config.maxBackups)) {
      try {
        await fs.remove(archive.filePath);
        removed.push(archive.fileName);
      } catch (error) {
        failed.push(archive.fileName);
        logger.warn('Failed to remove old backup', {
          archive: archive.fileName,
          error: errorMessage(error),
        });
      }
    }

    if (removed.length > 0) {
      logger.info(`Removed ${removed.length} old backup(s)`, { removed });
    }
    return { kept, removed, failed };
  }
}
