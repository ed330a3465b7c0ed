/**
 * SettingsService - Production option writes and cache flushing
 *
 * Every write is idempotent and non-fatal: failures come back as warnings.
 * Transient data-layer operations go through runWithFallback.
 */

import {
  PRODUCTION_OPTION_WRITES,
  REWRITE_RULES_OPTION,
  SEARCH_VISIBILITY_OPTION,
  errorMessage,
  escapeLike,
  runWithFallback,
  type CacheFlusher,
  type DeploymentConfig,
  type FallbackPlan,
  type LoggerLike,
  type Site,
} from '@wp-promote/shared';

export interface RetryPolicy {
  attempts?: number;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface SettingsDeps {
  prod: Site;
  logger: LoggerLike;
  retry?: RetryPolicy;
}

export class SettingsService implements CacheFlusher {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: SettingsDeps,
  ) {}

  // ===========================================================================
  // Normalize
  // ===========================================================================

  async normalize(): Promise<string[]> {
    const { prod, logger } = this.deps;
    const warnings: string[] = [];
    const warn = (message: string): void => {
      warnings.push(message);
      logger.warn(message);
    };

    await this.enableSearchVisibility(warn);

    for (const option of PRODUCTION_OPTION_WRITES) {
      try {
        await prod.repo.setOptionValue(option.name, option.value);
        logger.debug(option.description, { option: option.name });
      } catch (error) {
        warn(`Could not set ${option.name}: ${errorMessage(error)}`);
      }
    }

    const overrides: Array<[string, string | undefined]> = [
      ['timezone_string', this.config.prodTimezone],
      ['admin_email', this.config.prodAdminEmail],
    ];
    for (const [name, value] of overrides) {
      if (value === undefined) continue;
      try {
        await prod.db.updateOption(name, value);
        logger.info(`Set ${name}`, { value });
      } catch (error) {
        warn(`Could not set ${name}: ${errorMessage(error)}`);
      }
    }

    const cleanup: Array<[string, () => Promise<void>]> = [
      ['clear transients', () => prod.db.deleteTransients()],
      ['deactivate maintenance mode', () => prod.db.deactivateMaintenanceMode()],
      ['flush rewrite rules', () => prod.db.flushRewriteRules()],
    ];
    for (const [label, run] of cleanup) {
      try {
        await run();
      } catch (error) {
        warn(`Could not ${label}: ${errorMessage(error)}`);
      }
    }

    logger.info('Production settings applied', { warnings: warnings.length });
    return warnings;
  }

  /**
   * blog_public=1 by direct UPDATE, read back; when the read-back does not
   * match, `wp option update` is the fallback.
   */
  private async enableSearchVisibility(warn: (message: string) => void): Promise<void> {
    const { prod, logger } = this.deps;
    const { name, value } = SEARCH_VISIBILITY_OPTION;

    const verify = async (): Promise<void> => {
      const current = await prod.repo.getOption(name);
      if (current !== value) {
        throw new Error(`${name} is ${current ?? 'missing'}`);
      }
    };

    const outcome = await runWithFallback({
      attempts: 1,
      primary: async () => {
        await prod.repo.setOptionValue(name, value);
        await verify();
      },
      fallback: async () => {
        await prod.db.updateOption(name, value);
        await verify();
      },
    });

    if (outcome.state === 'failed') {
      warn(`Could not enable search engine indexing: ${outcome.error}`);
    } else {
      logger.info(SEARCH_VISIBILITY_OPTION.description, { via: outcome.state === 'degraded' ? 'wp option update' : 'sql' });
    }
  }

  // ===========================================================================
  // Cache flushing
  // ===========================================================================

  /**
   * Rewrite rules, object cache, core DB upgrade and transients, each with
   * retries. Rewrite-rule flushing degrades to deleting the rewrite_rules
   * row, which WordPress rebuilds on the next request.
   */
  async flushCaches(): Promise<string[]> {
    const { prod } = this.deps;
    const warnings: string[] = [];

    const operations: Array<[string, Pick<FallbackPlan<void>, 'primary' | 'fallback'>]> = [
      [
        'flush rewrite rules',
        {
          primary: () => prod.db.flushRewriteRules(),
          fallback: async () => {
            await prod.repo.deleteOptionsLike([escapeLike(REWRITE_RULES_OPTION)]);
          },
        },
      ],
      ['flush object cache', { primary: () => prod.db.flushCache() }],
      ['update core database', { primary: () => prod.db.updateCoreDatabase() }],
      ['clear transients', { primary: () => prod.db.deleteTransients() }],
    ];

    for (const [label, plan] of operations) {
      const warning = await this.retry(label, plan);
      if (warning) warnings.push(warning);
    }
    return warnings;
  }

  private async retry(
    label: string,
    plan: Pick<FallbackPlan<void>, 'primary' | 'fallback'>,
  ): Promise<string | null> {
    const { logger, retry = {} } = this.deps;
    const outcome = await runWithFallback({
      ...plan,
      attempts: retry.attempts,
      delayMs: retry.delayMs,
      sleep: retry.sleep,
      onTransition: state => {
        if (state.state === 'attempting' && state.attempt > 1) {
          logger.debug(`Retrying: ${label}`, { attempt: state.attempt });
        }
      },
    });

    switch (outcome.state) {
      case 'succeeded':
        logger.info(`Done: ${label}`);
        return null;
      case 'degraded':
        logger.warn(`${label} used fallback`, { cause: outcome.cause });
        return `${label} used fallback after ${outcome.attempts} failed attempt(s): ${outcome.cause}`;
      case 'failed':
        logger.warn(`Could not ${label}`, { error: outcome.error });
        return `Could not ${label}: ${outcome.error}`;
    }
  }
}
