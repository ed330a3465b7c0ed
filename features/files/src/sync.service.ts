/**
 * SyncService - Mirror the staging tree onto production
 *
 * rsync with delete semantics, restricted by SYNC_DENYLIST. The production
 * wp-config.php is never taken from staging: it is copied aside before
 * the mirror and put back after it.
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import {
  FatalPreconditionError,
  FatalStageError,
  SECRETS_FILE,
  SYNC_DENYLIST,
  errorMessage,
  type DeploymentConfig,
  type FileTransfer,
  type LoggerLike,
  type PermissionNormalizer,
  type PermissionReport,
} from '@wp-promote/shared';

export const SECRETS_BACKUP_FILE = `${SECRETS_FILE}.backup`;

export interface SyncDeps {
  transfer: FileTransfer;
  permissions: PermissionNormalizer;
  logger: LoggerLike;
}

export interface SyncResult {
  permissions: PermissionReport;
  warnings: string[];
}

export class SyncService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: SyncDeps,
  ) {}

  async sync(): Promise<SyncResult> {
    const { transfer, permissions, logger } = this.deps;
    const secretsPath = join(this.config.prodPath, SECRETS_FILE);
    const savedSecrets = join(this.config.backupDir, SECRETS_BACKUP_FILE);

    if (!(await fs.pathExists(secretsPath))) {
      throw new FatalPreconditionError(`Production ${SECRETS_FILE} not found at ${secretsPath}`);
    }
    await fs.copy(secretsPath, savedSecrets, { preserveTimestamps: true });

    try {
      await transfer.mirror(this.config.stagePath, this.config.prodPath, {
        delete: true,
        checksum: true,
        exclude: SYNC_DENYLIST,
      });
    } catch (error) {
      throw new FatalStageError('sync', `File sync failed: ${errorMessage(error)}`);
    } finally {
      await fs.copy(savedSecrets, secretsPath, { overwrite: true, preserveTimestamps: true });
    }
    logger.info('Staging files mirrored to production');

    const report = await permissions.normalize(this.config.prodPath);
    const warnings = report.failures.map(failure => `Permission change failed: ${failure}`);
    if (warnings.length > 0) {
      logger.warn(`${warnings.length} permission change(s) failed`);
    }
    return { permissions: report, warnings };
  }
}
