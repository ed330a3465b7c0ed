/**
 * backup_info.txt - one `Label: value` line per metadata field
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ARCHIVE_INFO_FILE, type BackupMetadata } from '@wp-promote/shared';

const INFO_LABELS: ReadonlyArray<[keyof BackupMetadata, string]> = [
  ['createdAt', 'Backup Date'],
  ['prodPath', 'Production Path'],
  ['stagePath', 'Stage Path'],
  ['prodURL', 'Production URL'],
  ['stageURL', 'Stage URL'],
  ['toolVersion', 'Tool Version'],
];

export function formatBackupInfo(metadata: BackupMetadata): string {
  return INFO_LABELS.map(([key, label]) => `${label}: ${metadata[key]}`).join('\n') + '\n';
}

/**
 * Returns null when a field is missing; archives written by hand or by
 * older tooling may carry only some of them.
 */
export function parseBackupInfo(content: string): BackupMetadata | null {
  const values = new Map<string, string>();
  for (const line of content.split('\n')) {
    const separator = line.indexOf(': ');
    if (separator > 0) {
      values.set(line.slice(0, separator).trim(), line.slice(separator + 2).trim());
    }
  }

  const metadata: BackupMetadata = {
    createdAt: '',
    prodPath: '',
    stagePath: '',
    prodURL: '',
    stageURL: '',
    toolVersion: '',
  };
  for (const [key, label] of INFO_LABELS) {
    const value = values.get(label);
    if (value === undefined) return null;
    metadata[key] = value;
  }
  return metadata;
}

/** Reads backup_info.txt from an extracted archive directory. */
export async function readBackupInfo(extractedDir: string): Promise<BackupMetadata | null> {
  try {
    return parseBackupInfo(await readFile(join(extractedDir, ARCHIVE_INFO_FILE), 'utf-8'));
  } catch {
    return null;
  }
}
