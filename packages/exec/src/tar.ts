/**
 * @wp-promote/exec - tar archiver (gzip)
 */

import type { Archiver, CommandRunner } from '@wp-promote/shared';
import { runChecked } from './local-exec.js';

export class Tar implements Archiver {
  constructor(private readonly runner: CommandRunner) {}

  async create(archivePath: string, sourceDir: string): Promise<void> {
    await runChecked(this.runner, 'tar', ['-czf', archivePath, '-C', sourceDir, '.']);
  }

  async extract(archivePath: string, destinationDir: string): Promise<void> {
    await runChecked(this.runner, 'tar', ['-xzf', archivePath, '-C', destinationDir]);
  }

  /** Entry names with the leading `./` removed. */
  async list(archivePath: string): Promise<string[]> {
    const result = await runChecked(this.runner, 'tar', ['-tzf', archivePath]);
    return result.stdout
      .split('\n')
      .map(line => line.trim().replace(/^\.\//, ''))
      .filter(line => line.length > 0);
  }
}
