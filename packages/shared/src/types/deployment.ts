/**
 * @wp-promote/shared - Deployment Types
 */

// ============================================================================
// Configuration
// ============================================================================

export type EnvironmentName = 'stage' | 'production';

export interface DeploymentConfig {
  readonly stagePath: string;
  readonly stageBaseURL: string;
  readonly prodPath: string;
  readonly prodBaseURL: string;
  readonly backupDir: string;
  readonly maxBackups: number;
  readonly preservedTableNames: readonly string[];
  readonly prodTimezone?: string;
  readonly prodAdminEmail?: string;
  readonly tablePrefix: string;
  readonly allowRoot: boolean;
  readonly skipColumns: readonly string[];
}

// ============================================================================
// Backup Types
// ============================================================================

export interface BackupMetadata {
  createdAt: string;
  prodPath: string;
  stagePath: string;
  prodURL: string;
  stageURL: string;
  toolVersion: string;
}

export interface BackupArchive {
  /** 14-digit creation timestamp (YYYYMMDDHHmmss) */
  id: string;
  fileName: string;
  filePath: string;
  sizeBytes: number;
  containedFiles: boolean;
  containedDatabaseDump: boolean;
  metadata?: BackupMetadata;
}

/** An archive found in the backup directory, not yet opened. */
export interface ArchiveEntry {
  /** 14-digit creation timestamp (YYYYMMDDHHmmss) */
  id: string;
  fileName: string;
  filePath: string;
  sizeBytes: number;
  modifiedAt: Date;
}

export interface PruneResult {
  kept: string[];
  removed: string[];
  failed: string[];
}

export interface PreservedTableSnapshot {
  tableName: string;
  dumpFilePath: string;
  capturedAt: string;
}

export type PreservationStatus = 'imported' | 'data-only' | 'failed';

export interface PreservationOutcome {
  tableName: string;
  status: PreservationStatus;
  error?: string;
  /** Set when the table came back but something is worth checking */
  warning?: string;
}

// ============================================================================
// Rewrite & Validation Types
// ============================================================================

export interface RewriteTarget {
  /** Table name without the site prefix, e.g. "options" */
  table: string;
  column: string;
  label: string;
}

export interface ReplacementPair {
  from: string;
  to: string;
}

export interface TargetResidual {
  target: RewriteTarget;
  count: number;
}

export interface ValidationReport {
  perTarget: TargetResidual[];
  totalResidual: number;
  schemeResidual: { https: number; http: number };
  prodURLCount: number;
  prodURLPresent: boolean;
  serializedAtRisk: number;
  /** Labels of targets whose count query failed (e.g. table missing) */
  skippedTargets: string[];
  passed: boolean;
}

export type RewriteMethod = 'search-replace' | 'sql';

export interface RewriteResult {
  method: RewriteMethod;
  pairs: ReplacementPair[];
  /** Replacements made (search-replace) or rows affected (sql) per label */
  changes: Record<string, number>;
  warnings: string[];
}

// ============================================================================
// Pipeline Types
// ============================================================================

export type StepStatus = 'success' | 'failed' | 'warning';

export interface StepRecord {
  name: string;
  status: StepStatus;
  duration: number;
  output?: string;
  error?: string;
}

export interface DeployResult {
  success: boolean;
  cancelled?: boolean;
  backup?: BackupArchive;
  preservedTables: string[];
  validation?: ValidationReport;
  repairAttempted: boolean;
  steps: StepRecord[];
  warnings: string[];
  duration: number;
  error?: string;
}

export interface RestoreResult {
  success: boolean;
  cancelled?: boolean;
  archive: string;
  warnings: string[];
  duration: number;
  error?: string;
}
