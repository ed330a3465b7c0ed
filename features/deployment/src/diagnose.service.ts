/**
 * DiagnoseService - Read-only health report for both environments
 *
 * Never throws on a finding; a check that errors is recorded and the
 * remaining checks still run.
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import { glob } from 'glob';
import { checkSerialized, type ValidateService } from '@wp-promote/urls';
import {
  BUILDER_CACHE_DIRECTORIES,
  SECRETS_FILE,
  errorMessage,
  type DeploymentConfig,
  type LoggerLike,
  type Site,
  type ToolProbe,
} from '@wp-promote/shared';
import { REQUIRED_TOOLS } from './preflight.service.js';

/** Serialized values sampled for the integrity check. */
const SERIALIZED_SAMPLE = 200;

export interface EnvironmentDiagnostics {
  name: Site['name'];
  root: string;
  rootExists: boolean;
  secretsFile: boolean;
  databaseReachable: boolean;
  installed: boolean;
}

export interface DiagnosticReport {
  tools: Record<string, boolean>;
  environments: EnvironmentDiagnostics[];
  residualStageURLs: number | null;
  serializedAtRisk: number | null;
  /** Sampled serialized values mentioning production whose lengths no longer match */
  corruptSerialized: number | null;
  builderCache: Array<{ path: string; files: number }>;
  errors: string[];
}

export interface DiagnoseDeps {
  probe: ToolProbe;
  stage: Site;
  prod: Site;
  validate: ValidateService;
  logger: LoggerLike;
}

export class DiagnoseService {
  constructor(
    private readonly config: DeploymentConfig,
    private readonly deps: DiagnoseDeps,
  ) {}

  async run(): Promise<DiagnosticReport> {
    const { probe, stage, prod, validate, logger } = this.deps;
    const errors: string[] = [];
    const attempt = async <T>(label: string, check: () => Promise<T>, fallback: T): Promise<T> => {
      try {
        return await check();
      } catch (error) {
        errors.push(`${label}: ${errorMessage(error)}`);
        return fallback;
      }
    };

    const tools: Record<string, boolean> = {};
    for (const tool of REQUIRED_TOOLS) {
      tools[tool] = await attempt(`tool ${tool}`, () => probe.isAvailable(tool), false);
    }

    const environments: EnvironmentDiagnostics[] = [];
    for (const site of [stage, prod]) {
      const rootExists = await fs.pathExists(site.root);
      const secretsFile = rootExists && (await fs.pathExists(join(site.root, SECRETS_FILE)));
      const databaseReachable = await attempt(`${site.name} database`, () => site.db.check(), false);
      const installed = databaseReachable
        ? await attempt(`${site.name} installation`, () => site.db.isInstalled(), false)
        : false;
      environments.push({ name: site.name, root: site.root, rootExists, secretsFile, databaseReachable, installed });
    }

    const prodReachable = environments[1].databaseReachable;
    let residualStageURLs: number | null = null;
    let serializedAtRisk: number | null = null;
    let corruptSerialized: number | null = null;

    if (prodReachable) {
      const report = await attempt('URL validation', () => validate.validate(), null);
      if (report && report.skippedTargets.length > 0) {
        errors.push(`URL validation: could not check ${report.skippedTargets.join(', ')}`);
      } else if (report) {
        residualStageURLs = report.totalResidual;
        serializedAtRisk = report.serializedAtRisk;
      }
      corruptSerialized = await attempt(
        'serialized integrity',
        async () => {
          const values = await prod.repo.findSerializedValues(this.config.prodBaseURL, SERIALIZED_SAMPLE);
          return values.filter(value => !checkSerialized(value).valid).length;
        },
        null,
      );
    }

    const builderCache: DiagnosticReport['builderCache'] = [];
    for (const relPath of BUILDER_CACHE_DIRECTORIES) {
      const dir = join(this.config.prodPath, relPath);
      if (await fs.pathExists(dir)) {
        const files = await attempt(relPath, () => glob('**/*', { cwd: dir, nodir: true, dot: true }), []);
        builderCache.push({ path: relPath, files: files.length });
      }
    }

    logger.info('Diagnostics completed', { errors: errors.length });
    return { tools, environments, residualStageURLs, serializedAtRisk, corruptSerialized, builderCache, errors };
  }
}
