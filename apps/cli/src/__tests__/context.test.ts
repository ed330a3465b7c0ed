/**
 * CLI Context & Program Tests
 */

import { resolveConfigPath } from '../lib/context.js';
import { StepReporter } from '../lib/steps.js';
import { createCLI } from '../index.js';

describe('resolveConfigPath', () => {
  it('should prefer the --config option', () => {
    expect(resolveConfigPath({ config: '/etc/site.conf' }, { WP_PROMOTE_CONFIG: '/env.conf' })).toBe('/etc/site.conf');
  });

  it('should fall back to the environment, then deploy.conf', () => {
    expect(resolveConfigPath({}, { WP_PROMOTE_CONFIG: '/env.conf' })).toBe('/env.conf');
    expect(resolveConfigPath({}, {})).toBe('deploy.conf');
  });
});

describe('createCLI', () => {
  it('should register every command', () => {
    expect(createCLI().commands.map(c => c.name())).toEqual([
      'deploy',
      'restore',
      'validate',
      'diagnose',
      'backups',
      'clear-cache',
    ]);
  });

  it('should accept the deploy flags', () => {
    const deploy = createCLI().commands.find(c => c.name() === 'deploy');

    expect(deploy?.options.map(o => o.long)).toEqual(['--diagnose', '--verbose', '--yes', '--config']);
  });
});

describe('StepReporter', () => {
  it('should remember the archive once the backup step succeeds', () => {
    const reporter = new StepReporter();
    reporter.hooks.onStepStart?.('backup');
    reporter.hooks.onStepEnd?.({ name: 'backup', status: 'success', duration: 10, output: '/b/prod_backup_1.tar.gz' });

    expect(reporter.backupPath).toBe('/b/prod_backup_1.tar.gz');
  });

  it('should ignore a failed backup step', () => {
    const reporter = new StepReporter();
    reporter.hooks.onStepStart?.('backup');
    reporter.hooks.onStepEnd?.({ name: 'backup', status: 'failed', duration: 10, error: 'disk full' });

    expect(reporter.backupPath).toBeUndefined();
  });
});
