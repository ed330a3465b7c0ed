/**
 * DeployPipeline - Stage -> production promotion
 *
 * preflight -> backup -> preserve -> sync -> migrate -> rewrite ->
 * validate -> settings -> cache -> verify
 *
 * Strictly sequential. A fatal error halts the run and the result names
 * the archive to restore from; everything else is a collected warning.
 */

import type { BackupService } from '@wp-promote/backup';
import type { MigrateService, PreservationService } from '@wp-promote/database';
import type { SyncService } from '@wp-promote/files';
import type { SettingsService, VerifyService } from '@wp-promote/settings';
import type { RewritePreview, RewriteService, ValidateService } from '@wp-promote/urls';
import {
  errorMessage,
  type BackupArchive,
  type CacheCleaner,
  type ConfirmFn,
  type DeployResult,
  type DeploymentConfig,
  type LoggerLike,
  type StepRecord,
  type ValidationReport,
} from '@wp-promote/shared';
import type { PreflightService } from './preflight.service.js';

export interface DeployConfirmations {
  /** Shown the dry-run summary before the first search-replace */
  rewrite: ConfirmFn<RewritePreview>;
  /** Shown a failed validation report before the repair pass */
  repair: ConfirmFn<ValidationReport>;
}

export interface PipelineDeps {
  preflight: PreflightService;
  backup: BackupService;
  preservation: PreservationService;
  sync: SyncService;
  migrate: MigrateService;
  rewrite: RewriteService;
  validate: ValidateService;
  settings: SettingsService;
  verify: VerifyService;
  cache: CacheCleaner;
  logger: LoggerLike;
  onStepStart?: (name: string) => void;
  onStepEnd?: (record: StepRecord) => void;
}

interface StepOutput<T> {
  value: T;
  warnings?: string[];
  output?: string;
}

export class DeployPipeline {
  private steps: StepRecord[] = [];
  private warnings: string[] = [];

  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: PipelineDeps,
  ) {}

  async run(confirm: DeployConfirmations): Promise<DeployResult> {
    const d = this.deps;
    const startTime = Date.now();
    this.steps = [];
    this.warnings = [];

    let backup: BackupArchive | undefined;
    let preservedTables: string[] = [];
    let validation: ValidationReport | undefined;
    let repairAttempted = false;

    try {
      await this.step('preflight', async () => ({ value: await d.preflight.check() }));

      backup = await this.step('backup', async () => {
        const archive = await d.backup.create();
        const pruned = await d.backup.prune();
        return {
          value: archive,
          output: archive.filePath,
          warnings: pruned.failed.map(name => `Could not remove old backup ${name}`),
        };
      });

      const batch = await this.step('preserve tables', async () => {
        const result = await d.preservation.snapshot();
        return {
          value: result.snapshots,
          warnings: result.warnings,
          output: result.snapshots.map(s => s.tableName).join(', ') || 'none',
        };
      });
      preservedTables = batch.map(s => s.tableName);

      await this.step('sync files', async () => {
        const result = await d.sync.sync();
        return { value: result, warnings: result.warnings };
      });

      await this.step('migrate database', async () => {
        const result = await d.migrate.migrate(batch);
        return {
          value: result,
          warnings: result.warnings,
          output: result.resetUsed ? 'reset + import' : `dropped ${result.droppedTables.length} table(s)`,
        };
      });

      await this.step('rewrite URLs', async () => {
        const result = await d.rewrite.rewrite(confirm.rewrite);
        return { value: result, warnings: result.warnings, output: result.method };
      });

      const outcome = await this.step('validate URLs', async () => {
        const result = await d.validate.validateWithRepair(confirm.repair);
        const report = result.final ?? result.initial;
        const warnings = [...result.warnings];
        if (!report.passed) {
          warnings.push(
            `URL validation did not pass: ${report.totalResidual} staging reference(s) remain` +
              (report.prodURLPresent ? '' : ', production URL not found'),
          );
        }
        return { value: result, warnings, output: report.passed ? 'passed' : 'failed' };
      });
      validation = outcome.final ?? outcome.initial;
      repairAttempted = outcome.repairAttempted;

      await this.step('clear caches', async () => {
        const cleared = await d.cache.clear(this.config.prodPath);
        const flushWarnings = await d.settings.flushCaches();
        return {
          value: undefined,
          warnings: [...cleared.failures.map(f => `Cache cleanup failed: ${f}`), ...flushWarnings],
          output: `${cleared.removed.length} path(s) removed`,
        };
      });

      await this.step('verify', async () => ({ value: undefined, warnings: await d.verify.verify() }));

      await this.step('production settings', async () => {
        const warnings = await d.settings.normalize();
        return { value: undefined, warnings };
      });

      d.logger.info('Deployment completed', {
        warnings: this.warnings.length,
        duration: Date.now() - startTime,
      });
      return {
        success: true,
        backup,
        preservedTables,
        validation,
        repairAttempted,
        steps: this.steps,
        warnings: this.warnings,
        duration: Date.now() - startTime,
      };
    } catch (error) {
      const message = backup
        ? `${errorMessage(error)}. Production may be partially modified; restore from ${backup.filePath}`
        : `${errorMessage(error)}. Production was not modified`;
      d.logger.error('Deployment failed', { error: errorMessage(error), backup: backup?.filePath });
      return {
        success: false,
        backup,
        preservedTables,
        validation,
        repairAttempted,
        steps: this.steps,
        warnings: this.warnings,
        duration: Date.now() - startTime,
        error: message,
      };
    }
  }

  private async step<T>(name: string, run: () => Promise<StepOutput<T>>): Promise<T> {
    const { logger, onStepStart, onStepEnd } = this.deps;
    const startTime = Date.now();
    onStepStart?.(name);
    logger.info(`Step: ${name}`);

    let record: StepRecord;
    try {
      const result = await run();
      const warnings = result.warnings ?? [];
      this.warnings.push(...warnings);
      record = {
        name,
        status: warnings.length > 0 ? 'warning' : 'success',
        duration: Date.now() - startTime,
        output: result.output,
      };
      this.steps.push(record);
      onStepEnd?.(record);
      return result.value;
    } catch (error) {
      record = { name, status: 'failed', duration: Date.now() - startTime, error: errorMessage(error) };
      this.steps.push(record);
      onStepEnd?.(record);
      throw error;
    }
  }
}
