/**
 * clear-cache - Remove production caches without deploying
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { EXIT_OK, runAction } from '../lib/exit.js';

interface ClearCacheOptions extends GlobalOptions {
  builder?: boolean;
}

export function createClearCacheCommand(): Command {
  return new Command('clear-cache')
    .description('Clear production cache directories and flush WordPress caches')
    .option('-b, --builder', 'Also clear page-builder CSS/JS caches')
    .option('-v, --verbose', 'Show debug output')
    .option('-c, --config <file>', 'Configuration file')
    .action(async (options: ClearCacheOptions) => {
      await runAction(async () => {
        const ctx = await createContext(options);
        try {
          const spinner = ora('Clearing caches...').start();
          const report = await ctx.services.cache.clear(ctx.config.prodPath, { builder: options.builder });
          const warnings = await ctx.services.settings.flushCaches();
          spinner.succeed(`Removed ${report.removed.length} cache path(s)`);

          for (const problem of [...report.failures, ...warnings]) {
            console.log(chalk.yellow(`  - ${problem}`));
          }
          return EXIT_OK;
        } finally {
          await ctx.close();
        }
      });
    });
}
