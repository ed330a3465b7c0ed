/**
 * @wp-promote/shared - Deployment Config Zod Schema
 *
 * Input keys mirror the legacy shell config (STAGE_PATH, PROD_URL, ...).
 */

import { z } from 'zod';
import { isValidIdentifier } from '../utils/sql.js';
import { normalizeBaseURL } from '../utils/url.js';

const absolutePath = z
  .string()
  .trim()
  .min(1)
  .refine(value => value.startsWith('/'), 'must be an absolute path')
  .transform(value => (value.length > 1 ? value.replace(/\/+$/, '') : value));

const baseURL = z
  .string()
  .trim()
  .min(1)
  .transform(normalizeBaseURL)
  .refine(value => value.length > 0 && !/\s/.test(value), 'must be a host name with optional path');

const wordList = z
  .string()
  .optional()
  .transform(value => (value ?? '').split(/\s+/).filter(Boolean));

const optionalText = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform(value => (value === undefined ? true : !/^(0|false|no|off)$/i.test(value.trim())));

export const rawConfigSchema = z
  .object({
    STAGE_PATH: absolutePath,
    STAGE_URL: baseURL,
    PROD_PATH: absolutePath,
    PROD_URL: baseURL,
    BACKUP_DIR: absolutePath,
    MAX_BACKUPS: z.coerce.number().int().positive().default(5),
    PRESERVE_TABLES: wordList,
    PRESERVE_TABLE: wordList,
    PROD_TIMEZONE: optionalText,
    PROD_ADMIN_EMAIL: optionalText.pipe(z.string().email().optional()),
    TABLE_PREFIX: z
      .string()
      .trim()
      .default('wp_')
      .refine(isValidIdentifier, 'must contain only letters, digits and underscores'),
    WP_CLI_ALLOW_ROOT: booleanFlag,
    SEARCH_REPLACE_SKIP_COLUMNS: z
      .string()
      .optional()
      .transform(value => (value === undefined ? ['guid'] : value.split(/\s+/).filter(Boolean))),
  })
  .superRefine((raw, ctx) => {
    if (raw.STAGE_URL === raw.PROD_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PROD_URL'], message: 'must differ from STAGE_URL' });
    } else if (raw.PROD_URL.includes(raw.STAGE_URL)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PROD_URL'],
        message: 'must not contain STAGE_URL (the rewrite would not be idempotent)',
      });
    }
    if (raw.STAGE_PATH === raw.PROD_PATH) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PROD_PATH'], message: 'must differ from STAGE_PATH' });
    }
    for (const table of [...raw.PRESERVE_TABLES, ...raw.PRESERVE_TABLE]) {
      if (!isValidIdentifier(table)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['PRESERVE_TABLES'],
          message: `invalid table name: ${table}`,
        });
      }
    }
  });

export type RawConfigInput = z.input<typeof rawConfigSchema>;
export type RawConfig = z.output<typeof rawConfigSchema>;
