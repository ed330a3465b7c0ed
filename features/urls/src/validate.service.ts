/**
 * ValidateService - Residual staging URLs after the rewrite
 */

import {
  OPTIONS_TARGET,
  REWRITE_TARGETS,
  buildReplacementPairs,
  errorMessage,
  type ConfirmFn,
  type DeploymentConfig,
  type LoggerLike,
  type Site,
  type TargetResidual,
  type ValidationReport,
} from '@wp-promote/shared';
import { sqlReplacePass } from './rewrite.service.js';

export interface ValidateDeps {
  prod: Site;
  logger: LoggerLike;
}

export interface RepairOutcome {
  initial: ValidationReport;
  /** Report after the repair pass; absent when no repair ran */
  final?: ValidationReport;
  repairAttempted: boolean;
  warnings: string[];
}

export class ValidateService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: ValidateDeps,
  ) {}

  /** Read-only; two calls with no mutation in between return equal reports. */
  async validate(): Promise<ValidationReport> {
    const { repo } = this.deps.prod;
    const { stageBaseURL, prodBaseURL } = this.config;

    const perTarget: TargetResidual[] = [];
    const skippedTargets: string[] = [];
    const count = async (label: string, query: () => Promise<number>): Promise<number | null> => {
      try {
        return await query();
      } catch (error) {
        skippedTargets.push(label);
        this.deps.logger.warn(`Could not check ${label}`, { error: errorMessage(error) });
        return null;
      }
    };

    for (const target of REWRITE_TARGETS) {
      const residual = await count(target.label, () => repo.countMatches(target, stageBaseURL));
      if (residual !== null) {
        perTarget.push({ target, count: residual });
      }
    }

    const totalResidual = perTarget.reduce((sum, t) => sum + t.count, 0);
    const schemeResidual = {
      https: await count('https staging URLs', () => repo.countMatches(OPTIONS_TARGET, `https://${stageBaseURL}`)) ?? 0,
      http: await count('http staging URLs', () => repo.countMatches(OPTIONS_TARGET, `http://${stageBaseURL}`)) ?? 0,
    };
    // An unknown production URL count cannot pass validation
    const prodURLCount = await count('production URL', () => repo.countMatches(OPTIONS_TARGET, `https://${prodBaseURL}`)) ?? 0;
    const serializedAtRisk = await count('serialized values', () => repo.countSerializedMatches(stageBaseURL)) ?? 0;

    return {
      perTarget,
      totalResidual,
      schemeResidual,
      prodURLCount,
      prodURLPresent: prodURLCount > 0,
      serializedAtRisk,
      skippedTargets,
      passed: totalResidual === 0 && prodURLCount > 0,
    };
  }

  /**
   * Validate, and when residuals remain and the operator agrees, run one
   * unscoped REPLACE pass and validate exactly once more.
   */
  async validateWithRepair(confirmRepair: ConfirmFn<ValidationReport>): Promise<RepairOutcome> {
    const { prod, logger } = this.deps;
    const initial = await this.validate();
    this.logReport(initial);

    if (initial.passed || initial.totalResidual === 0) {
      return { initial, repairAttempted: false, warnings: [] };
    }
    if (!(await confirmRepair(initial))) {
      return { initial, repairAttempted: false, warnings: [] };
    }

    const pairs = buildReplacementPairs(this.config.stageBaseURL, this.config.prodBaseURL);
    const pass = await sqlReplacePass(prod.repo, pairs, { scoped: false }, logger);
    const final = await this.validate();
    this.logReport(final);

    return { initial, final, repairAttempted: true, warnings: pass.warnings };
  }

  private logReport(report: ValidationReport): void {
    const { logger } = this.deps;
    for (const { target, count } of report.perTarget) {
      if (count > 0) {
        logger.warn(`${count} staging URL reference(s) remain in ${target.label}`);
      }
    }
    if (!report.prodURLPresent) {
      logger.warn('Production URL not found in options; the rewrite may not have run');
    }
    if (report.serializedAtRisk > 0) {
      logger.warn(`${report.serializedAtRisk} serialized value(s) still reference the staging URL`);
    }
    if (report.passed) {
      logger.info('URL validation passed');
    }
  }
}
