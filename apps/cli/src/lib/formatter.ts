/**
 * Terminal output for results and reports
 */

import chalk from 'chalk';
import {
  displayTimestamp,
  type ArchiveEntry,
  type BackupMetadata,
  type DeploymentConfig,
  type StepRecord,
  type ValidationReport,
} from '@wp-promote/shared';
import type { DiagnosticReport } from '@wp-promote/deployment';
import type { RewritePreview } from '@wp-promote/urls';

export function formatSize(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function describeArchive(archive: ArchiveEntry): string {
  return `${archive.fileName}  ${displayTimestamp(archive.id)}  ${formatSize(archive.sizeBytes)}`;
}

export function formatConfigSummary(config: DeploymentConfig): string {
  return [
    `Stage path:       ${config.stagePath}`,
    `Production path:  ${config.prodPath}`,
    `Stage URL:        ${config.stageBaseURL}`,
    `Production URL:   ${config.prodBaseURL}`,
    `Backup directory: ${config.backupDir} (keep ${config.maxBackups})`,
    `Preserved tables: ${config.preservedTableNames.join(' ') || 'none'}`,
  ].join('\n');
}

export function formatRewritePreview(preview: RewritePreview): string {
  return [
    `Replace ${preview.from} -> ${preview.to}`,
    `Dry run: ${preview.replacements} replacement(s)`,
    '',
    preview.report,
  ].join('\n');
}

export function formatBackupInfo(archive: string, metadata: BackupMetadata | null): string {
  if (!metadata) return `${archive}\n(no backup_info.txt)`;
  return [
    archive,
    `Created:          ${metadata.createdAt}`,
    `Production path:  ${metadata.prodPath}`,
    `Production URL:   ${metadata.prodURL}`,
    `Stage URL:        ${metadata.stageURL}`,
  ].join('\n');
}

export function formatValidation(report: ValidationReport): string[] {
  const lines = report.perTarget.map(({ target, count }) =>
    count === 0 ? chalk.green(`  ok  ${target.label}`) : chalk.yellow(`  ${count}  ${target.label}`),
  );
  for (const label of report.skippedTargets) {
    lines.push(chalk.gray(`  --  ${label} (not checked)`));
  }
  lines.push(
    `Scheme-qualified in options: https ${report.schemeResidual.https}, http ${report.schemeResidual.http}`,
  );
  lines.push(`Production URL references in options: ${report.prodURLCount}`);
  if (report.serializedAtRisk > 0) {
    lines.push(chalk.yellow(`Serialized values still referencing staging: ${report.serializedAtRisk}`));
  }
  lines.push(
    report.passed
      ? chalk.green('URL validation passed')
      : chalk.red(`URL validation failed: ${report.totalResidual} staging reference(s)`),
  );
  return lines;
}

export function formatStep(record: StepRecord): string {
  const seconds = (record.duration / 1000).toFixed(1);
  const detail = record.error ?? record.output;
  return `${record.name} (${seconds}s)${detail ? `: ${detail}` : ''}`;
}

export function formatDiagnostics(report: DiagnosticReport): string[] {
  const mark = (ok: boolean): string => (ok ? chalk.green('ok') : chalk.red('missing'));
  const lines: string[] = [];

  lines.push(chalk.bold('Tools'));
  for (const [tool, available] of Object.entries(report.tools)) {
    lines.push(`  ${tool}: ${mark(available)}`);
  }

  for (const env of report.environments) {
    lines.push(chalk.bold(`${env.name} (${env.root})`));
    lines.push(`  directory: ${mark(env.rootExists)}`);
    lines.push(`  wp-config.php: ${mark(env.secretsFile)}`);
    lines.push(`  database: ${env.databaseReachable ? chalk.green('reachable') : chalk.red('unreachable')}`);
    lines.push(`  installed: ${env.installed ? chalk.green('yes') : chalk.yellow('unknown')}`);
  }

  const count = (value: number | null): string => (value === null ? 'n/a' : String(value));
  lines.push(chalk.bold('Production content'));
  lines.push(`  staging URL references: ${count(report.residualStageURLs)}`);
  lines.push(`  serialized values referencing staging: ${count(report.serializedAtRisk)}`);
  lines.push(`  serialized values with broken lengths: ${count(report.corruptSerialized)}`);

  if (report.builderCache.length > 0) {
    lines.push(chalk.bold('Page-builder cache'));
    for (const dir of report.builderCache) {
      lines.push(`  ${dir.path}: ${dir.files} file(s)`);
    }
  }

  for (const error of report.errors) {
    lines.push(chalk.gray(`  ! ${error}`));
  }
  return lines;
}
