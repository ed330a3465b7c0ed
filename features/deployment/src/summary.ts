/**
 * Human-readable end-of-run summary
 */

import type { DeployResult, DeploymentConfig } from '@wp-promote/shared';

export const MANUAL_CHECKLIST = [
  'Load the production homepage and a few inner pages',
  'Log in to wp-admin and check Settings > General URLs',
  'Check Settings > Reading: search engine visibility is enabled',
  'Submit a form and confirm preserved data is still there',
  'Check images and page-builder layouts render with production URLs',
] as const;

export function formatSummary(result: DeployResult, config: DeploymentConfig): string[] {
  const lines: string[] = [];

  lines.push(result.success ? 'Deployment completed' : 'Deployment FAILED');
  if (result.error) lines.push(`Error: ${result.error}`);
  lines.push(`Backup: ${result.backup?.filePath ?? 'not created'}`);
  lines.push(`Stage URL: https://${config.stageBaseURL}`);
  lines.push(`Production URL: https://${config.prodBaseURL}`);
  lines.push(
    `Preserved tables: ${result.preservedTables.length > 0 ? result.preservedTables.join(', ') : 'none'}`,
  );

  if (result.validation) {
    const v = result.validation;
    lines.push(
      v.passed
        ? 'URL validation: passed'
        : `URL validation: ${v.totalResidual} staging reference(s) remain` +
            (v.prodURLPresent ? '' : ', production URL not found'),
    );
    for (const { target, count } of v.perTarget.filter(t => t.count > 0)) {
      lines.push(`  ${target.label}: ${count}`);
    }
    if (result.repairAttempted) lines.push('  (one repair pass was run)');
  }

  if (result.warnings.length > 0) {
    lines.push(`Warnings (${result.warnings.length}):`);
    for (const warning of result.warnings) lines.push(`  - ${warning}`);
  }

  if (result.success) {
    lines.push('Manual verification:');
    for (const item of MANUAL_CHECKLIST) lines.push(`  [ ] ${item}`);
  }
  return lines;
}
