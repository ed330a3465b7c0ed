/**
 * RewriteService - Staging URL -> production URL across the database
 *
 * Primary: `wp search-replace` (serialization-aware), gated by a dry run
 * and an operator decision.
 * Fallback: literal REPLACE() per RewriteTarget, scoped with LIKE.
 */

import {
  OperationCancelledError,
  REWRITE_TARGETS,
  buildReplacementPairs,
  errorMessage,
  type ConfirmFn,
  type DeploymentConfig,
  type LoggerLike,
  type ReplacementPair,
  type RewriteResult,
  type Site,
  type SiteRepo,
} from '@wp-promote/shared';

/** What the operator sees before the first destructive search-replace. */
export interface RewritePreview {
  from: string;
  to: string;
  replacements: number;
  report: string;
}

export interface RewriteDeps {
  prod: Site;
  logger: LoggerLike;
}

export interface SqlPassResult {
  /** Rows affected per target label */
  changes: Record<string, number>;
  warnings: string[];
}

/**
 * One REPLACE statement per target and pair. Unscoped passes skip the
 * LIKE filter and touch every row.
 */
export async function sqlReplacePass(
  repo: SiteRepo,
  pairs: readonly ReplacementPair[],
  options: { scoped: boolean },
  logger: LoggerLike,
): Promise<SqlPassResult> {
  const changes: Record<string, number> = {};
  const warnings: string[] = [];

  for (const target of REWRITE_TARGETS) {
    changes[target.label] = 0;
    for (const pair of pairs) {
      try {
        changes[target.label] += await repo.replaceInTarget(target, pair.from, pair.to, options);
      } catch (error) {
        const warning = `URL replace failed for ${target.label} (${pair.from}): ${errorMessage(error)}`;
        warnings.push(warning);
        logger.warn(warning);
      }
    }
  }

  return { changes, warnings };
}

export class RewriteService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: RewriteDeps,
  ) {}

  get pairs(): ReplacementPair[] {
    return buildReplacementPairs(this.config.stageBaseURL, this.config.prodBaseURL);
  }

  async rewrite(confirm: ConfirmFn<RewritePreview>): Promise<RewriteResult> {
    const { prod, logger } = this.deps;
    const pairs = this.pairs;
    const warnings: string[] = [];

    if (await prod.db.hasCommand('search-replace')) {
      const primary = await this.trySearchReplace(pairs, confirm, warnings);
      if (primary) return primary;
    } else {
      const warning = 'wp search-replace unavailable, using SQL fallback';
      warnings.push(warning);
      logger.warn(warning);
    }

    const pass = await sqlReplacePass(prod.repo, pairs, { scoped: true }, logger);
    logger.info('URL rewrite completed via SQL', { changes: pass.changes });
    return { method: 'sql', pairs, changes: pass.changes, warnings: [...warnings, ...pass.warnings] };
  }

  /**
   * Returns null when the tool fails and the SQL fallback should run.
   * A declined confirmation is not a tool failure and is thrown.
   */
  private async trySearchReplace(
    pairs: ReplacementPair[],
    confirm: ConfirmFn<RewritePreview>,
    warnings: string[],
  ): Promise<RewriteResult | null> {
    const { prod, logger } = this.deps;
    const { stageBaseURL, prodBaseURL, skipColumns } = this.config;

    try {
      const dryRun = await prod.db.searchReplace(stageBaseURL, prodBaseURL, { dryRun: true, skipColumns });
      logger.info(`Dry run: ${dryRun.replacements} replacement(s) would be made`);

      const approved = await confirm({
        from: stageBaseURL,
        to: prodBaseURL,
        replacements: dryRun.replacements,
        report: dryRun.report,
      });
      if (!approved) {
        throw new OperationCancelledError('URL rewrite declined after dry run');
      }

      const changes: Record<string, number> = {};
      for (const pair of pairs) {
        const summary = await prod.db.searchReplace(pair.from, pair.to, { skipColumns });
        changes[pair.from] = summary.replacements;
      }
      logger.info('URL rewrite completed via search-replace', { changes });
      return { method: 'search-replace', pairs, changes, warnings };
    } catch (error) {
      if (error instanceof OperationCancelledError) throw error;
      const warning = `search-replace failed, falling back to SQL: ${errorMessage(error)}`;
      warnings.push(warning);
      logger.warn(warning);
      return null;
    }
  }
}
