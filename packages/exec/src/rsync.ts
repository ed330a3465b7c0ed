/**
 * @wp-promote/exec - rsync file transfer
 */

import type { CommandRunner, FileTransfer, MirrorOptions } from '@wp-promote/shared';
import { runChecked } from './local-exec.js';

/** Directory paths handed to rsync need a trailing slash to copy contents. */
function asContents(path: string): string {
  return path.endsWith('/') ? path : `${path}/`;
}

export function buildRsyncArgs(source: string, destination: string, options: MirrorOptions = {}): string[] {
  const args = ['--archive'];
  if (options.checksum) args.push('--checksum');
  if (options.delete) args.push('--delete');
  if (options.deleteExcluded) args.push('--delete-excluded');
  for (const pattern of options.exclude ?? []) {
    args.push(`--exclude=${pattern}`);
  }
  args.push(asContents(source), asContents(destination));
  return args;
}

export class Rsync implements FileTransfer {
  constructor(private readonly runner: CommandRunner) {}

  async mirror(source: string, destination: string, options: MirrorOptions = {}): Promise<void> {
    await runChecked(this.runner, 'rsync', buildRsyncArgs(source, destination, options));
  }
}
