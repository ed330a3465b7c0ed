/**
 * restore - Put a production backup back in place
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { EXIT_FAILURE, EXIT_OK, runAction, trapInterrupts } from '../lib/exit.js';
import { describeArchive, formatBackupInfo } from '../lib/formatter.js';
import { askYesNo, selectArchive } from '../lib/prompts.js';

interface RestoreOptions extends GlobalOptions {
  archive?: string;
  yes?: boolean;
}

export function createRestoreCommand(): Command {
  return new Command('restore')
    .description('Restore production files and database from a backup')
    .option('-a, --archive <name>', 'Archive file name or timestamp (skips the picker)')
    .option('-y, --yes', 'Skip the confirmation')
    .option('-v, --verbose', 'Show debug output')
    .option('-c, --config <file>', 'Configuration file')
    .action(async (options: RestoreOptions) => {
      await runAction(() => runRestore(options));
    });
}

async function runRestore(options: RestoreOptions): Promise<number> {
  const ctx = await createContext(options);
  try {
    const archives = await ctx.services.backup.list();
    if (archives.length === 0) {
      console.log(chalk.red(`No backups found in ${ctx.config.backupDir}`));
      return EXIT_FAILURE;
    }

    const selected = options.archive
      ? archives.find(a => a.fileName === options.archive || a.id === options.archive) ?? null
      : await selectArchive(archives, describeArchive);

    if (!selected) {
      if (options.archive) {
        console.log(chalk.red(`Backup not found: ${options.archive}`));
        return EXIT_FAILURE;
      }
      console.log(chalk.yellow('Restore cancelled'));
      return EXIT_OK;
    }

    const spinner = ora(`Extracting ${selected.fileName}...`).start();
    const release = trapInterrupts(() => selected.filePath, ctx.log);
    const result = await ctx.services.restore.restore(selected.filePath, async preview => {
      spinner.stop();
      console.log(chalk.gray(formatBackupInfo(preview.archive, preview.metadata)));
      const proceed =
        options.yes === true ||
        (await askYesNo('This will REPLACE the production site with this backup. Continue?'));
      if (proceed) spinner.start('Restoring production...');
      return proceed;
    });
    release();

    if (result.cancelled) {
      console.log(chalk.yellow('Restore cancelled'));
      return EXIT_OK;
    }
    if (!result.success) {
      spinner.fail(chalk.red(`Restore failed: ${result.error ?? 'unknown error'}`));
      return EXIT_FAILURE;
    }

    spinner.succeed(`Restored ${selected.fileName}`);
    for (const warning of result.warnings) {
      console.log(chalk.yellow(`  - ${warning}`));
    }
    return EXIT_OK;
  } finally {
    await ctx.close();
  }
}
