/**
 * Service wiring for one configuration
 */

import { BackupService, RestoreService } from '@wp-promote/backup';
import { MigrateService, PreservationService } from '@wp-promote/database';
import { Rsync, Tar, PathToolProbe } from '@wp-promote/exec';
import { CacheService, PermissionService, SyncService } from '@wp-promote/files';
import { SettingsService, VerifyService } from '@wp-promote/settings';
import { RewriteService, ValidateService } from '@wp-promote/urls';
import { createSite } from '@wp-promote/wpcli';
import type {
  Archiver,
  CommandRunner,
  DeploymentConfig,
  FileTransfer,
  LoggerLike,
  Site,
  StepRecord,
  ToolProbe,
} from '@wp-promote/shared';
import { DiagnoseService } from './diagnose.service.js';
import { DeployPipeline } from './pipeline.js';
import { PreflightService } from './preflight.service.js';

export interface ServiceOptions {
  runner: CommandRunner;
  logger: LoggerLike;
  /** Overrides for tests; default to rsync, tar and a PATH lookup */
  transfer?: FileTransfer;
  archiver?: Archiver;
  probe?: ToolProbe;
  stage?: Site;
  prod?: Site;
  onStepStart?: (name: string) => void;
  onStepEnd?: (record: StepRecord) => void;
}

export interface Services {
  stage: Site;
  prod: Site;
  backup: BackupService;
  restore: RestoreService;
  validate: ValidateService;
  cache: CacheService;
  settings: SettingsService;
  diagnose: DiagnoseService;
  pipeline: DeployPipeline;
}

export function createServices(config: DeploymentConfig, options: ServiceOptions): Services {
  const { runner, logger } = options;
  const stage = options.stage ?? createSite('stage', config, runner);
  const prod = options.prod ?? createSite('production', config, runner);
  const transfer = options.transfer ?? new Rsync(runner);
  const archiver = options.archiver ?? new Tar(runner);
  const probe = options.probe ?? new PathToolProbe(runner);

  const permissions = new PermissionService(logger);
  const cache = new CacheService({ repo: prod.repo, logger });
  const settings = new SettingsService(config, { prod, logger });
  const validate = new ValidateService(config, { prod, logger });
  const backup = new BackupService(config, { prod: prod.db, transfer, archiver, logger });
  const preservation = new PreservationService(config, { prod, logger });

  const pipeline = new DeployPipeline(config, {
    preflight: new PreflightService(config, { probe, stage, prod, logger }),
    backup,
    preservation,
    sync: new SyncService(config, { transfer, permissions, logger }),
    migrate: new MigrateService(config, { stage, prod, preservation, logger }),
    rewrite: new RewriteService(config, { prod, logger }),
    validate,
    settings,
    verify: new VerifyService(config, { prod, logger }),
    cache,
    logger,
    onStepStart: options.onStepStart,
    onStepEnd: options.onStepEnd,
  });

  return {
    stage,
    prod,
    backup,
    restore: new RestoreService(config, {
      prod: prod.db,
      transfer,
      archiver,
      permissions,
      cache,
      flusher: settings,
      logger,
    }),
    validate,
    cache,
    settings,
    diagnose: new DiagnoseService(config, { probe, stage, prod, validate, logger }),
    pipeline,
  };
}
