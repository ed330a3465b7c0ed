/**
 * PreservationService - Keep production-only tables across the replace
 *
 * Each configured table that exists in production is dumped on its own
 * before the destructive import and re-imported afterwards. Losing a
 * preserved table never aborts the deployment; it is reported loudly.
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import {
  errorMessage,
  formatTimestamp,
  preservedDumpFileName,
  rowsDumpFileName,
  type DeploymentConfig,
  type LoggerLike,
  type PreservationOutcome,
  type PreservedTableSnapshot,
  type Site,
} from '@wp-promote/shared';
import { extractInsertStatements } from '@wp-promote/wpcli';

export interface PreservationDeps {
  prod: Site;
  logger: LoggerLike;
  now?: () => Date;
}

export interface SnapshotBatch {
  snapshots: PreservedTableSnapshot[];
  warnings: string[];
}

export class PreservationService {
  private readonly now: () => Date;

  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: PreservationDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async snapshot(): Promise<SnapshotBatch> {
    const { prod, logger } = this.deps;
    const capturedAt = this.now();
    const batch = formatTimestamp(capturedAt);
    const snapshots: PreservedTableSnapshot[] = [];
    const warnings: string[] = [];

    for (const tableName of this.config.preservedTableNames) {
      if (!(await prod.repo.tableExists(tableName))) {
        logger.info(`Preserved table ${tableName} not found in production, skipping`);
        continue;
      }

      const dumpFilePath = join(this.config.backupDir, preservedDumpFileName(tableName, batch));
      try {
        await prod.db.exportDatabase(dumpFilePath, { tables: [tableName] });
        snapshots.push({ tableName, dumpFilePath, capturedAt: capturedAt.toISOString() });
        logger.info(`Preserved table ${tableName}`, { dumpFilePath });
      } catch (error) {
        const warning = `Could not back up preserved table ${tableName}; it will be replaced: ${errorMessage(error)}`;
        warnings.push(warning);
        logger.warn(warning);
      }
    }

    return { snapshots, warnings };
  }

  /**
   * Full dump import first. When that fails (the table now exists with a
   * different structure), only the INSERT statements are applied.
   */
  async restore(snapshots: readonly PreservedTableSnapshot[]): Promise<PreservationOutcome[]> {
    const outcomes: PreservationOutcome[] = [];
    for (const snapshot of snapshots) {
      outcomes.push(await this.restoreOne(snapshot));
    }
    return outcomes;
  }

  private async restoreOne(snapshot: PreservedTableSnapshot): Promise<PreservationOutcome> {
    const { prod, logger } = this.deps;
    const { tableName, dumpFilePath } = snapshot;

    try {
      await prod.db.importDatabase(dumpFilePath);
      logger.info(`Restored preserved table ${tableName}`);
      return { tableName, status: 'imported' };
    } catch (importError) {
      logger.warn(`Full import of ${tableName} failed, retrying with data only`, {
        error: errorMessage(importError),
      });
    }

    // Statements go through a file; a large table does not fit in one argv entry
    const rowsFilePath = join(this.config.backupDir, rowsDumpFileName(tableName, formatTimestamp(this.now())));
    try {
      const inserts = extractInsertStatements(await fs.readFile(dumpFilePath, 'utf-8'));
      if (inserts.length === 0) {
        const warning = `No INSERT statements found in ${dumpFilePath}; preserved table ${tableName} is empty`;
        logger.warn(warning);
        return { tableName, status: 'data-only', warning };
      }
      await fs.writeFile(rowsFilePath, `${inserts}\n`, 'utf-8');
      await prod.db.importDatabase(rowsFilePath);
      logger.info(`Restored preserved table ${tableName} (data only)`);
      return { tableName, status: 'data-only' };
    } catch (error) {
      logger.error(`PRESERVED TABLE ${tableName} COULD NOT BE RESTORED; dump kept at ${dumpFilePath}`, {
        error: errorMessage(error),
      });
      return { tableName, status: 'failed', error: errorMessage(error) };
    } finally {
      await fs.remove(rowsFilePath);
    }
  }
}
