/**
 * Formatter Tests
 */

import chalk from 'chalk';
import { OPTIONS_TARGET, REWRITE_TARGETS, parseConfig, type ValidationReport } from '@wp-promote/shared';
import {
  describeArchive,
  formatBackupInfo,
  formatConfigSummary,
  formatRewritePreview,
  formatSize,
  formatStep,
  formatValidation,
} from '../lib/formatter.js';

describe('Formatter', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  describe('formatSize', () => {
    it('should format bytes and binary multiples', () => {
      expect(formatSize(512)).toBe('512 B');
      expect(formatSize(1536)).toBe('1.5 KB');
      expect(formatSize(5 * 1024 * 1024)).toBe('5.0 MB');
    });
  });

  it('should describe an archive', () => {
    expect(
      describeArchive({
        id: '20240105090307',
        fileName: 'prod_backup_20240105090307.tar.gz',
        filePath: '/var/backups/wp/prod_backup_20240105090307.tar.gz',
        sizeBytes: 2048,
        modifiedAt: new Date(2024, 0, 5),
      }),
    ).toBe('prod_backup_20240105090307.tar.gz  2024-01-05 09:03:07  2.0 KB');
  });

  it('should summarize the configuration', () => {
    const config = parseConfig({
      STAGE_PATH: '/var/www/stage',
      STAGE_URL: 'stage.example.com',
      PROD_PATH: '/var/www/prod',
      PROD_URL: 'example.com',
      BACKUP_DIR: '/var/backups/wp',
    });

    expect(formatConfigSummary(config).split('\n')).toEqual([
      'Stage path:       /var/www/stage',
      'Production path:  /var/www/prod',
      'Stage URL:        stage.example.com',
      'Production URL:   example.com',
      'Backup directory: /var/backups/wp (keep 5)',
      'Preserved tables: none',
    ]);
  });

  it('should show the dry-run report', () => {
    expect(
      formatRewritePreview({
        from: 'stage.example.com',
        to: 'example.com',
        replacements: 3,
        report: 'Success: 3 replacements to be made.',
      }),
    ).toBe('Replace stage.example.com -> example.com\nDry run: 3 replacement(s)\n\nSuccess: 3 replacements to be made.');
  });

  it('should note archives without metadata', () => {
    expect(formatBackupInfo('a.tar.gz', null)).toBe('a.tar.gz\n(no backup_info.txt)');
  });

  it('should format validation results', () => {
    const report: ValidationReport = {
      perTarget: [
        { target: OPTIONS_TARGET, count: 0 },
        { target: REWRITE_TARGETS[1], count: 2 },
      ],
      totalResidual: 2,
      schemeResidual: { https: 0, http: 1 },
      prodURLCount: 2,
      prodURLPresent: true,
      serializedAtRisk: 0,
      skippedTargets: ['term meta'],
      passed: false,
    };

    expect(formatValidation(report)).toEqual([
      '  ok  options',
      '  2  post content',
      '  --  term meta (not checked)',
      'Scheme-qualified in options: https 0, http 1',
      'Production URL references in options: 2',
      'URL validation failed: 2 staging reference(s)',
    ]);
  });

  it('should format a step record', () => {
    expect(formatStep({ name: 'backup', status: 'success', duration: 1250, output: '/b/a.tar.gz' })).toBe(
      'backup (1.3s): /b/a.tar.gz',
    );
    expect(formatStep({ name: 'verify', status: 'success', duration: 40 })).toBe('verify (0.0s)');
    expect(formatStep({ name: 'sync files', status: 'failed', duration: 0, error: 'boom' })).toBe(
      'sync files (0.0s): boom',
    );
  });
});
