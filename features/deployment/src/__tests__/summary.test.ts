/**
 * Deployment Summary Tests
 */

import { REWRITE_TARGETS, parseConfig, type DeployResult } from '@wp-promote/shared';
import { MANUAL_CHECKLIST, formatSummary } from '../summary.js';

const config = parseConfig({
  STAGE_PATH: '/var/www/stage',
  STAGE_URL: 'stage.example.com',
  PROD_PATH: '/var/www/prod',
  PROD_URL: 'example.com',
  BACKUP_DIR: '/var/backups/wp',
});

const base: DeployResult = {
  success: true,
  preservedTables: [],
  repairAttempted: false,
  steps: [],
  warnings: [],
  duration: 1200,
};

describe('formatSummary', () => {
  it('should describe a successful run with the checklist', () => {
    const lines = formatSummary(
      {
        ...base,
        preservedTables: ['wp_leads'],
        backup: {
          id: '20240105090307',
          fileName: 'prod_backup_20240105090307.tar.gz',
          filePath: '/var/backups/wp/prod_backup_20240105090307.tar.gz',
          sizeBytes: 1024,
          containedFiles: true,
          containedDatabaseDump: true,
        },
      },
      config,
    );

    expect(lines.slice(0, 5)).toEqual([
      'Deployment completed',
      'Backup: /var/backups/wp/prod_backup_20240105090307.tar.gz',
      'Stage URL: https://stage.example.com',
      'Production URL: https://example.com',
      'Preserved tables: wp_leads',
    ]);
    expect(lines[5]).toBe('Manual verification:');
    expect(lines).toHaveLength(6 + MANUAL_CHECKLIST.length);
    expect(lines[6]).toBe(`  [ ] ${MANUAL_CHECKLIST[0]}`);
  });

  it('should describe a failure without the checklist', () => {
    const lines = formatSummary(
      {
        ...base,
        success: false,
        error: 'Required tool(s) not found on PATH: rsync. Production was not modified',
        warnings: ['Could not remove old backup prod_backup_20240101000001.tar.gz'],
      },
      config,
    );

    expect(lines).toEqual([
      'Deployment FAILED',
      'Error: Required tool(s) not found on PATH: rsync. Production was not modified',
      'Backup: not created',
      'Stage URL: https://stage.example.com',
      'Production URL: https://example.com',
      'Preserved tables: none',
      'Warnings (1):',
      '  - Could not remove old backup prod_backup_20240101000001.tar.gz',
    ]);
  });

  it('should list residual targets of a failed validation', () => {
    const lines = formatSummary(
      {
        ...base,
        repairAttempted: true,
        validation: {
          perTarget: [
            { target: REWRITE_TARGETS[0], count: 0 },
            { target: REWRITE_TARGETS[1], count: 3 },
          ],
          totalResidual: 3,
          schemeResidual: { https: 0, http: 0 },
          prodURLCount: 0,
          prodURLPresent: false,
          serializedAtRisk: 0,
          skippedTargets: [],
          passed: false,
        },
      },
      config,
    );

    expect(lines.slice(5, 8)).toEqual([
      'URL validation: 3 staging reference(s) remain, production URL not found',
      '  post content: 3',
      '  (one repair pass was run)',
    ]);
  });
});
