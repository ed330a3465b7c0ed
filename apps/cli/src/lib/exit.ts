/**
 * Exit codes and interrupt handling
 *
 * 0: success or operator cancellation
 * 1: configuration error, failed precondition, failed stage
 */

import chalk from 'chalk';
import { errorMessage, OperationCancelledError, type LoggerLike } from '@wp-promote/shared';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export function exitCodeFor(error: unknown): number {
  return error instanceof OperationCancelledError ? EXIT_OK : EXIT_FAILURE;
}

export function reportError(error: unknown): void {
  if (error instanceof OperationCancelledError) {
    console.log(chalk.yellow(error.message));
    return;
  }
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
}

export function interruptMessage(archive: string | undefined): string {
  return archive
    ? `Interrupted: production may be in a partial state; restore from ${archive}`
    : 'Interrupted: production may be in a partial state';
}

/**
 * Installs SIGINT/SIGTERM handlers for the duration of a mutating command.
 * Returns a function that removes them.
 */
export function trapInterrupts(currentArchive: () => string | undefined, log: LoggerLike): () => void {
  const handler = (): void => {
    const message = interruptMessage(currentArchive());
    log.error(message);
    console.error(chalk.red(`\n${message}`));
    process.exit(EXIT_FAILURE);
  };
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

/** Runs a command body and maps its outcome onto process.exitCode. */
export async function runAction(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action();
  } catch (error) {
    reportError(error);
    process.exitCode = exitCodeFor(error);
  }
}
