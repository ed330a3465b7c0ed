/**
 * Spinner per pipeline step
 */

import chalk from 'chalk';
import ora from 'ora';
import type { ConfirmFn, StepRecord } from '@wp-promote/shared';
import type { StepHooks } from './context.js';
import { formatStep } from './formatter.js';

const clock = (): string => new Date().toTimeString().slice(0, 8);

export class StepReporter {
  private spinner: ReturnType<typeof ora> | null = null;
  /** Archive path once the backup step has succeeded */
  backupPath: string | undefined;

  readonly hooks: StepHooks = {
    onStepStart: name => {
      this.spinner = ora(`[${clock()}] ${name}`).start();
    },
    onStepEnd: record => this.finish(record),
  };

  /** Stops the spinner while the operator answers. */
  paused<T>(confirm: ConfirmFn<T>): ConfirmFn<T> {
    return async subject => {
      this.spinner?.stop();
      const answer = await confirm(subject);
      this.spinner?.start();
      return answer;
    };
  }

  private finish(record: StepRecord): void {
    const text = `[${clock()}] ${formatStep(record)}`;
    if (record.name === 'backup' && record.status !== 'failed') {
      this.backupPath = record.output;
    }
    switch (record.status) {
      case 'success':
        this.spinner?.succeed(text);
        break;
      case 'warning':
        this.spinner?.warn(chalk.yellow(text));
        break;
      case 'failed':
        this.spinner?.fail(chalk.red(text));
        break;
    }
    this.spinner = null;
  }
}
