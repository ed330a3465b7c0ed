/**
 * validate - Count staging URLs left in production
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createContext, type GlobalOptions } from '../lib/context.js';
import { EXIT_FAILURE, EXIT_OK, runAction } from '../lib/exit.js';
import { formatValidation } from '../lib/formatter.js';
import { askYesNo } from '../lib/prompts.js';

interface ValidateOptions extends GlobalOptions {
  repair?: boolean;
}

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check production for staging URL references')
    .option('-r, --repair', 'Offer one cleanup pass when references remain')
    .option('-v, --verbose', 'Show debug output')
    .option('-c, --config <file>', 'Configuration file')
    .action(async (options: ValidateOptions) => {
      await runAction(() => runValidate(options));
    });
}

async function runValidate(options: ValidateOptions): Promise<number> {
  const ctx = await createContext(options);
  try {
    const { validate } = ctx.services;
    let report = await validate.validate();

    if (options.repair && !report.passed) {
      const outcome = await validate.validateWithRepair(async initial => {
        for (const line of formatValidation(initial)) console.log(line);
        return askYesNo('Attempt automatic cleanup of the remaining staging URLs?');
      });
      report = outcome.final ?? outcome.initial;
      if (outcome.repairAttempted) console.log(chalk.gray('\nAfter cleanup:'));
    }

    for (const line of formatValidation(report)) {
      console.log(line);
    }
    return report.passed ? EXIT_OK : EXIT_FAILURE;
  } finally {
    await ctx.close();
  }
}
