/**
 * Interactive decisions. The services only ever see ConfirmFn values.
 */

import * as p from '@clack/prompts';
import type { ArchiveEntry, ConfirmFn } from '@wp-promote/shared';

export async function askYesNo(message: string, initialValue = false): Promise<boolean> {
  const answer = await p.confirm({ message, initialValue });
  return !p.isCancel(answer) && answer;
}

/** Shows the subject, then asks; `--yes` short-circuits to true. */
export function confirmWith<T>(
  message: string,
  describe: (subject: T) => string,
  assumeYes: boolean,
): ConfirmFn<T> {
  return async subject => {
    p.note(describe(subject));
    if (assumeYes) return true;
    return askYesNo(message);
  };
}

export async function selectArchive(
  archives: ArchiveEntry[],
  describe: (archive: ArchiveEntry) => string,
): Promise<ArchiveEntry | null> {
  const choice = await p.select({
    message: 'Select a backup to restore',
    options: archives.map(archive => ({ value: archive.fileName, label: describe(archive) })),
  });
  if (p.isCancel(choice)) return null;
  return archives.find(archive => archive.fileName === choice) ?? null;
}
