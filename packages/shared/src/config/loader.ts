/**
 * @wp-promote/shared - Config Loader
 *
 * Reads a KEY="value" settings file, lets identically named environment
 * variables override single keys, validates, and returns a frozen config.
 */

import { readFile } from 'node:fs/promises';
import { parse } from 'dotenv';
import type { ZodIssue } from 'zod';
import { ConfigError, errorMessage } from '../errors/index.js';
import type { DeploymentConfig } from '../types/index.js';
import { rawConfigSchema, type RawConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'deploy.conf';

export const CONFIG_KEYS = [
  'STAGE_PATH',
  'STAGE_URL',
  'PROD_PATH',
  'PROD_URL',
  'BACKUP_DIR',
  'MAX_BACKUPS',
  'PRESERVE_TABLES',
  'PRESERVE_TABLE',
  'PROD_TIMEZONE',
  'PROD_ADMIN_EMAIL',
  'TABLE_PREFIX',
  'WP_CLI_ALLOW_ROOT',
  'SEARCH_REPLACE_SKIP_COLUMNS',
] as const;

function formatIssues(issues: ZodIssue[]): string {
  return issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
}

function toDeploymentConfig(raw: RawConfig): DeploymentConfig {
  const preserved = [...new Set([...raw.PRESERVE_TABLES, ...raw.PRESERVE_TABLE])];

  return Object.freeze({
    stagePath: raw.STAGE_PATH,
    stageBaseURL: raw.STAGE_URL,
    prodPath: raw.PROD_PATH,
    prodBaseURL: raw.PROD_URL,
    backupDir: raw.BACKUP_DIR,
    maxBackups: raw.MAX_BACKUPS,
    preservedTableNames: Object.freeze(preserved),
    prodTimezone: raw.PROD_TIMEZONE,
    prodAdminEmail: raw.PROD_ADMIN_EMAIL,
    tablePrefix: raw.TABLE_PREFIX,
    allowRoot: raw.WP_CLI_ALLOW_ROOT,
    skipColumns: Object.freeze(raw.SEARCH_REPLACE_SKIP_COLUMNS),
  });
}

/**
 * Build a config from key/value settings.
 * Empty strings count as unset.
 */
export function parseConfig(values: Record<string, string | undefined>): DeploymentConfig {
  const input: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = values[key];
    if (value !== undefined && value !== '') {
      input[key] = value;
    }
  }

  const result = rawConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error.issues)}`, {
      issues: result.error.issues.map(issue => issue.path.join('.')),
    });
  }
  return toDeploymentConfig(result.data);
}

export async function loadConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): Promise<DeploymentConfig> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Configuration file not found: ${filePath}. Copy deploy.conf.example to ${filePath} and configure it.`,
      { filePath, cause: errorMessage(error) },
    );
  }

  const fileValues = parse(content);
  const merged: Record<string, string | undefined> = { ...fileValues };
  for (const key of CONFIG_KEYS) {
    if (env[key]) merged[key] = env[key];
  }

  return parseConfig(merged);
}
