/**
 * PreflightService - Everything that must hold before production is touched
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import {
  FatalPreconditionError,
  SECRETS_FILE,
  errorMessage,
  type DeploymentConfig,
  type LoggerLike,
  type Site,
  type ToolProbe,
} from '@wp-promote/shared';

export const REQUIRED_TOOLS = ['wp', 'rsync', 'tar'] as const;

export interface PreflightDeps {
  probe: ToolProbe;
  stage: Site;
  prod: Site;
  logger: LoggerLike;
}

export class PreflightService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: PreflightDeps,
  ) {}

  async check(): Promise<void> {
    const { probe, stage, prod, logger } = this.deps;

    const missing: string[] = [];
    for (const tool of REQUIRED_TOOLS) {
      if (!(await probe.isAvailable(tool))) missing.push(tool);
    }
    if (missing.length > 0) {
      throw new FatalPreconditionError(`Required tool(s) not found on PATH: ${missing.join(', ')}`, {
        missing,
      });
    }

    for (const site of [stage, prod]) {
      await this.checkRoot(site);
    }

    try {
      await fs.ensureDir(this.config.backupDir);
    } catch (error) {
      throw new FatalPreconditionError(
        `Backup directory ${this.config.backupDir} cannot be created: ${errorMessage(error)}`,
      );
    }

    for (const site of [stage, prod]) {
      if (!(await site.db.check())) {
        throw new FatalPreconditionError(`Cannot connect to the ${site.name} database`, { root: site.root });
      }
    }

    logger.info('Preflight checks passed');
  }

  private async checkRoot(site: Site): Promise<void> {
    const exists = await fs.pathExists(site.root);
    if (!exists || !(await fs.stat(site.root)).isDirectory()) {
      throw new FatalPreconditionError(`${site.name} directory not found: ${site.root}`);
    }
    if (!(await fs.pathExists(join(site.root, SECRETS_FILE)))) {
      throw new FatalPreconditionError(`${site.name} ${SECRETS_FILE} not found in ${site.root}`);
    }
  }
}
