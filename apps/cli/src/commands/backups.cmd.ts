/**
 * backups - List production backups
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { EXIT_OK, runAction } from '../lib/exit.js';
import { describeArchive } from '../lib/formatter.js';

export function createBackupsCommand(): Command {
  return new Command('backups')
    .description('List backups, newest first')
    .option('-c, --config <file>', 'Configuration file')
    .action(async (options: GlobalOptions) => {
      await runAction(async () => {
        const ctx = await createContext(options);
        try {
          const archives = await ctx.services.backup.list();
          if (archives.length === 0) {
            console.log(chalk.gray(`No backups in ${ctx.config.backupDir}`));
          }
          archives.forEach((archive, i) => console.log(`${i + 1}) ${describeArchive(archive)}`));
          return EXIT_OK;
        } finally {
          await ctx.close();
        }
      });
    });
}
