/**
 * @wp-promote/wpcli - WP-CLI Client
 *
 * Data-layer client for one WordPress root. Every call is a `wp`
 * invocation with `--path=<root>`, plus `--allow-root` when configured.
 */

import {
  CommandError,
  type CommandRunner,
  type DataLayerClient,
  type ExecResult,
  type ExportOptions,
  type QueryResult,
  type SearchReplaceOptions,
  type SearchReplaceSummary,
} from '@wp-promote/shared';
import { parseAffectedRows, parseQueryRows, parseReplacementCount } from './output.js';

export interface WpCliOptions {
  allowRoot?: boolean;
  timeout?: number;
}

export class WpCli implements DataLayerClient {
  private readonly allowRoot: boolean;
  private readonly timeout?: number;

  constructor(
    readonly root: string,
    private readonly runner: CommandRunner,
    options: WpCliOptions = {},
  ) {
    this.allowRoot = options.allowRoot ?? true;
    this.timeout = options.timeout;
  }

  // ===========================================================================
  // Database
  // ===========================================================================

  async check(): Promise<boolean> {
    if (await this.succeeds(['db', 'check'])) return true;
    return this.succeeds(['db', 'query', 'SELECT 1;']);
  }

  async query(sql: string): Promise<QueryResult> {
    const result = await this.run(['db', 'query', sql, '--skip-column-names']);
    return {
      rows: parseQueryRows(result.stdout),
      affectedRows: parseAffectedRows(result.stdout),
      raw: result.stdout,
    };
  }

  async exportDatabase(filePath: string, options: ExportOptions = {}): Promise<void> {
    const args = ['db', 'export', filePath];
    if (options.tables && options.tables.length > 0) {
      args.push(`--tables=${options.tables.join(',')}`);
    }
    await this.run(args);
  }

  async importDatabase(filePath: string): Promise<void> {
    await this.run(['db', 'import', filePath]);
  }

  async resetDatabase(): Promise<void> {
    await this.run(['db', 'reset', '--yes']);
  }

  // ===========================================================================
  // Search & Replace
  // ===========================================================================

  async hasCommand(command: string): Promise<boolean> {
    return this.succeeds(['cli', 'has-command', command]);
  }

  async searchReplace(
    from: string,
    to: string,
    options: SearchReplaceOptions = {},
  ): Promise<SearchReplaceSummary> {
    const args = ['search-replace', from, to, '--report-changed-only'];
    if (options.dryRun) args.push('--dry-run');
    if (options.skipColumns && options.skipColumns.length > 0) {
      args.push(`--skip-columns=${options.skipColumns.join(',')}`);
    }

    const result = await this.run(args);
    return {
      replacements: parseReplacementCount(result.stdout),
      dryRun: options.dryRun === true,
      report: result.stdout.trim(),
    };
  }

  // ===========================================================================
  // Caches & Options
  // ===========================================================================

  async flushCache(): Promise<void> {
    await this.run(['cache', 'flush']);
  }

  async flushRewriteRules(): Promise<void> {
    await this.run(['rewrite', 'flush']);
  }

  async deleteTransients(): Promise<void> {
    await this.run(['transient', 'delete', '--all']);
  }

  async isInstalled(): Promise<boolean> {
    return this.succeeds(['core', 'is-installed']);
  }

  async updateOption(name: string, value: string): Promise<void> {
    await this.run(['option', 'update', name, value]);
  }

  async updateCoreDatabase(): Promise<void> {
    await this.run(['core', 'update-db']);
  }

  async deactivateMaintenanceMode(): Promise<void> {
    await this.run(['maintenance-mode', 'deactivate']);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private withGlobals(args: string[]): string[] {
    const globals = [`--path=${this.root}`];
    if (this.allowRoot) globals.push('--allow-root');
    return [...args, ...globals];
  }

  private async run(args: string[]): Promise<ExecResult> {
    const result = await this.runner.exec('wp', this.withGlobals(args), {
      cwd: this.root,
      timeout: this.timeout,
    });
    if (result.code !== 0) {
      throw new CommandError(`wp ${args.slice(0, 2).join(' ')}`, result.code, result.stderr || result.stdout);
    }
    return result;
  }

  private async succeeds(args: string[]): Promise<boolean> {
    try {
      const result = await this.runner.exec('wp', this.withGlobals(args), {
        cwd: this.root,
        timeout: this.timeout,
      });
      return result.code === 0;
    } catch {
      return false;
    }
  }
}
