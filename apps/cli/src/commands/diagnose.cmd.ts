/**
 * diagnose - Read-only checks of both environments
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ConfigError } from '@wp-promote/shared';
import { createContext, type CommandContext, type GlobalOptions } from '../lib/context.js';
import { EXIT_OK, runAction } from '../lib/exit.js';
import { formatDiagnostics } from '../lib/formatter.js';

export function createDiagnoseCommand(): Command {
  return new Command('diagnose')
    .description('Check tools, paths and database connectivity (always exits 0)')
    .option('-v, --verbose', 'Show debug output')
    .option('-c, --config <file>', 'Configuration file')
    .action(async (options: GlobalOptions) => {
      await runAction(() => runDiagnose(options));
    });
}

/** Findings never change the exit code, a broken configuration included. */
export async function runDiagnose(options: GlobalOptions): Promise<number> {
  let ctx: CommandContext;
  try {
    ctx = await createContext(options);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    console.log(chalk.blue.bold('\n-- Diagnostics --\n'));
    console.log(chalk.red(`Configuration: ${error.message}`));
    return EXIT_OK;
  }

  try {
    const spinner = ora('Running diagnostics...').start();
    const report = await ctx.services.diagnose.run();
    spinner.stop();

    console.log(chalk.blue.bold('\n-- Diagnostics --\n'));
    for (const line of formatDiagnostics(report)) {
      console.log(line);
    }
    return EXIT_OK;
  } finally {
    await ctx.close();
  }
}
