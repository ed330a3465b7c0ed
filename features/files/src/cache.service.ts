/**
 * CacheService - Remove on-disk caches of known caching layers
 */

import { join } from 'node:path';
import fs from 'fs-extra';
import { glob } from 'glob';
import {
  BUILDER_CACHE_DIRECTORIES,
  BUILDER_CACHE_OPTION_PATTERNS,
  CACHE_DIRECTORIES,
  CACHE_DIR_GLOB,
  CACHE_FILES,
  CACHE_GLOB_PATTERNS,
  errorMessage,
  type CacheCleaner,
  type CacheClearOptions,
  type CacheReport,
  type LoggerLike,
  type SiteRepo,
} from '@wp-promote/shared';

export interface CacheDeps {
  repo: SiteRepo;
  logger: LoggerLike;
}

export class CacheService implements CacheCleaner {
  constructor(private readonly deps: CacheDeps) {}

  async clear(root: string, options: CacheClearOptions = {}): Promise<CacheReport> {
    const report: CacheReport = { removed: [], failures: [] };

    for (const relPath of [...CACHE_DIRECTORIES, ...CACHE_FILES]) {
      await this.removeIfPresent(root, relPath, report);
    }

    const matches = await glob([...CACHE_GLOB_PATTERNS, CACHE_DIR_GLOB], {
      cwd: root,
      dot: true,
      posix: true,
    });
    for (const relPath of matches.sort()) {
      await this.removeIfPresent(root, relPath, report);
    }

    if (options.builder) {
      await this.clearBuilderCache(root, report);
    }

    this.deps.logger.info(`Cleared ${report.removed.length} cache path(s)`, {
      failures: report.failures.length,
    });
    return report;
  }

  /** Empties generated page-builder CSS/JS and deletes their option rows. */
  private async clearBuilderCache(root: string, report: CacheReport): Promise<void> {
    for (const relPath of BUILDER_CACHE_DIRECTORIES) {
      const fullPath = join(root, relPath);
      try {
        if (await fs.pathExists(fullPath)) {
          await fs.emptyDir(fullPath);
          report.removed.push(`${relPath}/*`);
        }
      } catch (error) {
        report.failures.push(`${relPath}: ${errorMessage(error)}`);
      }
    }

    try {
      const deleted = await this.deps.repo.deleteOptionsLike(BUILDER_CACHE_OPTION_PATTERNS);
      this.deps.logger.info(`Deleted ${deleted} page-builder cache option(s)`);
    } catch (error) {
      report.failures.push(`builder cache options: ${errorMessage(error)}`);
    }
  }

  private async removeIfPresent(root: string, relPath: string, report: CacheReport): Promise<void> {
    const fullPath = join(root, relPath);
    try {
      if (await fs.pathExists(fullPath)) {
        await fs.remove(fullPath);
        report.removed.push(relPath);
      }
    } catch (error) {
      report.failures.push(`${relPath}: ${errorMessage(error)}`);
    }
  }
}
