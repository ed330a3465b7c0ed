/**
 * deploy - Promote staging onto production
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { formatSummary } from '@wp-promote/deployment';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { EXIT_FAILURE, EXIT_OK, runAction, trapInterrupts } from '../lib/exit.js';
import { formatConfigSummary, formatRewritePreview, formatValidation } from '../lib/formatter.js';
import { askYesNo, confirmWith } from '../lib/prompts.js';
import { StepReporter } from '../lib/steps.js';
import { runDiagnose } from './diagnose.cmd.js';

interface DeployOptions extends GlobalOptions {
  diagnose?: boolean;
  yes?: boolean;
}

export function createDeployCommand(): Command {
  return new Command('deploy')
    .description('Replace production with the staging site (backup first)')
    .option('-d, --diagnose', 'Run read-only diagnostics and exit')
    .option('-v, --verbose', 'Show debug output')
    .option('-y, --yes', 'Answer yes to every confirmation')
    .option('-c, --config <file>', 'Configuration file')
    .action(async (options: DeployOptions) => {
      await runAction(() => (options.diagnose ? runDiagnose(options) : runDeploy(options)));
    });
}

async function runDeploy(options: DeployOptions): Promise<number> {
  const reporter = new StepReporter();
  const ctx = await createContext(options, reporter.hooks);
  const assumeYes = options.yes === true;

  try {
    console.log(chalk.blue.bold('\n-- Stage -> Production Deployment --\n'));
    console.log(chalk.gray(formatConfigSummary(ctx.config)));
    console.log('');

    if (!assumeYes) {
      const proceed = await askYesNo('This will REPLACE the production site with staging. Continue?');
      if (!proceed) {
        console.log(chalk.yellow('Deployment cancelled'));
        return EXIT_OK;
      }
    }

    const release = trapInterrupts(() => reporter.backupPath, ctx.log);
    const result = await ctx.services.pipeline.run({
      rewrite: reporter.paused(
        confirmWith('Apply these URL replacements?', formatRewritePreview, assumeYes),
      ),
      repair: reporter.paused(
        confirmWith(
          'Attempt automatic cleanup of the remaining staging URLs?',
          report => formatValidation(report).join('\n'),
          assumeYes,
        ),
      ),
    });
    release();

    console.log('');
    for (const line of formatSummary(result, ctx.config)) {
      console.log(result.success ? line : chalk.red(line));
    }
    return result.success ? EXIT_OK : EXIT_FAILURE;
  } finally {
    await ctx.close();
  }
}
