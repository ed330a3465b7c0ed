/**
 * VerifyService - Post-deployment sanity checks
 */

import {
  FatalStageError,
  errorMessage,
  type DeploymentConfig,
  type LoggerLike,
  type Site,
} from '@wp-promote/shared';

/** Below this many prefixed tables an install is not assumed. */
const MIN_INSTALL_TABLES = 10;

export interface VerifyDeps {
  prod: Site;
  logger: LoggerLike;
}

export class VerifyService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: VerifyDeps,
  ) {}

  async verify(): Promise<string[]> {
    const { prod, logger } = this.deps;
    const warnings: string[] = [];
    const warn = (message: string): void => {
      warnings.push(message);
      logger.warn(message);
    };

    let reachable = false;
    try {
      reachable = await prod.db.check();
    } catch (error) {
      throw new FatalStageError('verify', `Database connection verification failed: ${errorMessage(error)}`);
    }
    if (!reachable) {
      throw new FatalStageError('verify', 'Database connection verification failed');
    }

    try {
      const installed = await this.detectInstallation();
      if (!installed) warn('WordPress installation could not be verified');
    } catch (error) {
      warn(`WordPress installation check failed: ${errorMessage(error)}`);
    }

    try {
      const siteURL = await prod.repo.getOption('siteurl');
      if (!siteURL || !siteURL.includes(this.config.prodBaseURL)) {
        warn(`siteurl is ${siteURL ?? 'missing'}, expected it to contain ${this.config.prodBaseURL}`);
      }
      const published = await prod.repo.countPublishedPosts();
      if (published === 0) {
        warn('No published posts found');
      } else {
        logger.info(`${published} published post(s) found`);
      }
    } catch (error) {
      warn(`Content check failed: ${errorMessage(error)}`);
    }

    return warnings;
  }

  /** wp core is-installed, else a siteurl row, else enough prefixed tables. */
  private async detectInstallation(): Promise<boolean> {
    const { prod, logger } = this.deps;
    if (await prod.db.isInstalled()) {
      logger.info('WordPress installation verified');
      return true;
    }
    if ((await prod.repo.getOption('siteurl')) !== null) {
      logger.info('WordPress installation verified via siteurl option');
      return true;
    }
    const tables = await prod.repo.countPrefixedTables();
    if (tables > MIN_INSTALL_TABLES) {
      logger.info(`WordPress installation assumed (${tables} tables)`);
      return true;
    }
    return false;
  }
}
