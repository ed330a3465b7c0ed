/**
 * wp-promote - Commander Program Definition
 *
 * deploy       stage -> production (backup, sync, migrate, rewrite, validate)
 * restore      put a backup back
 * validate     count staging URLs left in production
 * diagnose     read-only environment checks
 * backups      list archives
 * clear-cache  remove caches
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { VERSION } from '@wp-promote/shared';
import { createDeployCommand } from './commands/deploy.cmd.js';
import { createRestoreCommand } from './commands/restore.cmd.js';
import { createValidateCommand } from './commands/validate.cmd.js';
import { createDiagnoseCommand } from './commands/diagnose.cmd.js';
import { createBackupsCommand } from './commands/backups.cmd.js';
import { createClearCacheCommand } from './commands/clear-cache.cmd.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('wp-promote')
    .description('Promote a WordPress staging site onto production')
    .version(VERSION);

  program.addCommand(createDeployCommand());
  program.addCommand(createRestoreCommand());
  program.addCommand(createValidateCommand());
  program.addCommand(createDiagnoseCommand());
  program.addCommand(createBackupsCommand());
  program.addCommand(createClearCacheCommand());

  program.configureOutput({
    outputError: (str, write) => {
      write(chalk.red(`\nError: ${str}`));
    },
  });

  return program;
}
