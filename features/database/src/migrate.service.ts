/**
 * MigrateService - Replace the production schema with staging's
 *
 * 1. Export staging
 * 2. Drop every production table that has no snapshot (or reset when
 *    nothing is preserved)
 * 3. Import the staging dump
 * 4. Re-import preserved tables
 */

import { join } from 'node:path';
import {
  FatalStageError,
  errorMessage,
  formatTimestamp,
  stageDumpFileName,
  type DeploymentConfig,
  type LoggerLike,
  type PreservationOutcome,
  type PreservedTableSnapshot,
  type Site,
} from '@wp-promote/shared';
import type { PreservationService } from './preservation.service.js';

export interface MigrateDeps {
  stage: Site;
  prod: Site;
  preservation: PreservationService;
  logger: LoggerLike;
  now?: () => Date;
}

export interface MigrationResult {
  stageDumpPath: string;
  droppedTables: string[];
  dropFailures: string[];
  resetUsed: boolean;
  preservation: PreservationOutcome[];
  warnings: string[];
}

export class MigrateService {
  private readonly now: () => Date;

  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: MigrateDeps,
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async migrate(snapshots: readonly PreservedTableSnapshot[]): Promise<MigrationResult> {
    const { stage, prod, preservation, logger } = this.deps;
    const stageDumpPath = join(this.config.backupDir, stageDumpFileName(formatTimestamp(this.now())));
    const warnings: string[] = [];

    try {
      await stage.db.exportDatabase(stageDumpPath);
    } catch (error) {
      throw new FatalStageError('migrate', `Staging database export failed: ${errorMessage(error)}`);
    }
    logger.info('Staging database exported', { stageDumpPath });

    const droppedTables: string[] = [];
    const dropFailures: string[] = [];
    const resetUsed = snapshots.length === 0;

    if (resetUsed) {
      try {
        await prod.db.resetDatabase();
      } catch (error) {
        throw new FatalStageError('migrate', `Production database reset failed: ${errorMessage(error)}`);
      }
      logger.info('Production database reset');
    } else {
      const keep = new Set(snapshots.map(s => s.tableName));
      let tables: string[];
      try {
        tables = await prod.repo.listTables();
      } catch (error) {
        throw new FatalStageError('migrate', `Could not list production tables: ${errorMessage(error)}`);
      }

      for (const table of tables.filter(name => !keep.has(name))) {
        try {
          await prod.repo.dropTable(table);
          droppedTables.push(table);
        } catch (error) {
          dropFailures.push(table);
          const warning = `Failed to drop table ${table}: ${errorMessage(error)}`;
          warnings.push(warning);
          logger.warn(warning);
        }
      }
      logger.info(`Dropped ${droppedTables.length} production table(s)`, {
        preserved: [...keep],
      });
    }

    try {
      await prod.db.importDatabase(stageDumpPath);
    } catch (error) {
      throw new FatalStageError('migrate', `Production database import failed: ${errorMessage(error)}`);
    }
    logger.info('Staging database imported into production');

    const outcomes = await preservation.restore(snapshots);
    for (const outcome of outcomes.filter(o => o.status === 'failed')) {
      warnings.push(`Preserved table ${outcome.tableName} was not restored: ${outcome.error ?? 'unknown error'}`);
    }
    for (const outcome of outcomes) {
      if (outcome.warning) warnings.push(outcome.warning);
    }

    return { stageDumpPath, droppedTables, dropFailures, resetUsed, preservation: outcomes, warnings };
  }
}
