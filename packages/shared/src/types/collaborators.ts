/**
 * @wp-promote/shared - Collaborator Contracts
 *
 * Narrow interfaces for the external tools the pipeline drives:
 * the data-layer client (WP-CLI), the file-transfer tool (rsync)
 * and the archiver (tar). Services depend only on these.
 */

import type { RewriteTarget } from './deployment.js';

export interface LoggerLike {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/** Decision injected by the caller; the core never prompts itself. */
export type ConfirmFn<T = string> = (subject: T) => Promise<boolean>;

// ============================================================================
// Command Execution
// ============================================================================

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  duration: number;
}

export interface ExecOptions {
  cwd?: string;
  timeout?: number;
  env?: Record<string, string>;
}

export interface CommandRunner {
  exec(file: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

export interface ToolProbe {
  isAvailable(tool: string): Promise<boolean>;
}

// ============================================================================
// Data Layer
// ============================================================================

export interface QueryResult {
  rows: string[][];
  affectedRows: number | null;
  raw: string;
}

export interface SearchReplaceOptions {
  dryRun?: boolean;
  skipColumns?: readonly string[];
}

export interface SearchReplaceSummary {
  replacements: number;
  dryRun: boolean;
  report: string;
}

export interface ExportOptions {
  tables?: readonly string[];
}

/**
 * Data-layer client for one WordPress installation.
 */
export interface DataLayerClient {
  readonly root: string;
  check(): Promise<boolean>;
  query(sql: string): Promise<QueryResult>;
  exportDatabase(filePath: string, options?: ExportOptions): Promise<void>;
  importDatabase(filePath: string): Promise<void>;
  resetDatabase(): Promise<void>;
  hasCommand(command: string): Promise<boolean>;
  searchReplace(from: string, to: string, options?: SearchReplaceOptions): Promise<SearchReplaceSummary>;
  flushCache(): Promise<void>;
  flushRewriteRules(): Promise<void>;
  deleteTransients(): Promise<void>;
  isInstalled(): Promise<boolean>;
  updateOption(name: string, value: string): Promise<void>;
  updateCoreDatabase(): Promise<void>;
  deactivateMaintenanceMode(): Promise<void>;
}

/**
 * Statement-level access to a WordPress schema.
 * Implemented over DataLayerClient.query with prefixed table names.
 */
export interface SiteRepo {
  listTables(): Promise<string[]>;
  tableExists(name: string): Promise<boolean>;
  dropTable(name: string): Promise<void>;
  countMatches(target: RewriteTarget, needle: string): Promise<number>;
  replaceInTarget(
    target: RewriteTarget,
    from: string,
    to: string,
    options?: { scoped?: boolean },
  ): Promise<number>;
  countSerializedMatches(needle: string): Promise<number>;
  /** Serialized-looking values containing the needle, decoded as UTF-8 */
  findSerializedValues(needle: string, limit: number): Promise<string[]>;
  getOption(name: string): Promise<string | null>;
  setOptionValue(name: string, value: string): Promise<number>;
  deleteOptionsLike(patterns: readonly string[]): Promise<number>;
  countPublishedPosts(): Promise<number>;
  countPrefixedTables(): Promise<number>;
}

export interface Site {
  name: 'stage' | 'production';
  root: string;
  db: DataLayerClient;
  repo: SiteRepo;
}

// ============================================================================
// Files
// ============================================================================

export interface MirrorOptions {
  delete?: boolean;
  deleteExcluded?: boolean;
  checksum?: boolean;
  exclude?: readonly string[];
}

export interface FileTransfer {
  mirror(source: string, destination: string, options?: MirrorOptions): Promise<void>;
}

export interface Archiver {
  create(archivePath: string, sourceDir: string): Promise<void>;
  extract(archivePath: string, destinationDir: string): Promise<void>;
  list(archivePath: string): Promise<string[]>;
}

// ============================================================================
// Post-sync maintenance
// ============================================================================

export interface PermissionReport {
  directories: number;
  files: number;
  failures: string[];
}

export interface PermissionNormalizer {
  normalize(root: string): Promise<PermissionReport>;
}

export interface CacheClearOptions {
  /** Also clear page-builder CSS/JS caches and their option rows */
  builder?: boolean;
}

export interface CacheReport {
  removed: string[];
  failures: string[];
}

export interface CacheCleaner {
  clear(root: string, options?: CacheClearOptions): Promise<CacheReport>;
}

/** Rewrite-rule, object-cache and transient flushing; returns warnings. */
export interface CacheFlusher {
  flushCaches(): Promise<string[]>;
}
