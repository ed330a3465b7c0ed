#!/usr/bin/env tsx
/**
 * wp-promote - Entry Point
 */

import chalk from 'chalk';
import { createCLI } from '../src/index.js';

async function main(): Promise<void> {
  await createCLI().parseAsync(process.argv);
}

main().catch((err: Error) => {
  console.error(chalk.red('Fatal:'), err.message);
  process.exit(1);
});
