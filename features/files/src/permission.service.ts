/**
 * PermissionService - Normalize modes under a site root
 *
 * directories 0755, files 0644, wp-config.php 0600, and 0775 for
 * directories inside wp-content/uploads. Symlinks are left alone.
 */

import fs from 'fs-extra';
import { glob } from 'glob';
import {
  DIR_MODE,
  FILE_MODE,
  SECRETS_FILE,
  SECRETS_MODE,
  UPLOADS_DIR,
  UPLOADS_DIR_MODE,
  errorMessage,
  type LoggerLike,
  type PermissionNormalizer,
  type PermissionReport,
} from '@wp-promote/shared';

export interface PermissionOptions {
  chunkSize?: number;
  concurrency?: number;
}

/** The part of a glob result entry this service reads. */
interface TreeEntry {
  relativePosix(): string;
  fullpath(): string;
  isDirectory(): boolean;
}

export function modeFor(relativePath: string, isDirectory: boolean): number {
  if (isDirectory) {
    const inUploads = relativePath === UPLOADS_DIR || relativePath.startsWith(`${UPLOADS_DIR}/`);
    return inUploads ? UPLOADS_DIR_MODE : DIR_MODE;
  }
  return relativePath === SECRETS_FILE ? SECRETS_MODE : FILE_MODE;
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class PermissionService implements PermissionNormalizer {
  private readonly chunkSize: number;
  private readonly concurrency: number;

  constructor(
    private readonly logger: LoggerLike,
    options: PermissionOptions = {},
  ) {
    this.chunkSize = options.chunkSize ?? 500;
    this.concurrency = options.concurrency ?? 4;
  }

  async normalize(root: string): Promise<PermissionReport> {
    const report: PermissionReport = { directories: 0, files: 0, failures: [] };

    const entries = (await glob('**', { cwd: root, dot: true, withFileTypes: true, follow: false }))
      .filter(entry => !entry.isSymbolicLink() && entry.relativePosix() !== '');

    await this.applyRoot(root, report);

    // Chunks are disjoint, so workers never touch the same path
    const chunks = chunk(entries, this.chunkSize);
    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < chunks.length) {
        const batch = chunks[next++];
        for (const entry of batch) {
          await this.applyEntry(entry, report);
        }
      }
    };
    await Promise.all(Array.from({ length: Math.min(this.concurrency, chunks.length) }, worker));

    this.logger.info('Permissions normalized', {
      directories: report.directories,
      files: report.files,
      failures: report.failures.length,
    });
    return report;
  }

  private async applyEntry(entry: TreeEntry, report: PermissionReport): Promise<void> {
    const isDirectory = entry.isDirectory();
    const mode = modeFor(entry.relativePosix(), isDirectory);
    try {
      await fs.chmod(entry.fullpath(), mode);
      if (isDirectory) report.directories++;
      else report.files++;
    } catch (error) {
      report.failures.push(`${entry.relativePosix()}: ${errorMessage(error)}`);
    }
  }

  private async applyRoot(root: string, report: PermissionReport): Promise<void> {
    try {
      await fs.chmod(root, DIR_MODE);
      report.directories++;
    } catch (error) {
      report.failures.push(`${root}: ${errorMessage(error)}`);
    }
  }
}
