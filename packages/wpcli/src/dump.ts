/**
 * @wp-promote/wpcli - SQL dump helpers
 */

/**
 * Keep only row-insertion statements from a dump.
 * A statement starts on a line beginning with `INSERT INTO` and runs until
 * a line ending with `;`.
 */
export function extractInsertStatements(dump: string): string {
  const statements: string[] = [];
  let current: string[] | null = null;

  for (const line of dump.split('\n')) {
    if (current === null) {
      if (!line.startsWith('INSERT INTO')) continue;
      current = [];
    }
    current.push(line);
    if (line.trimEnd().endsWith(';')) {
      statements.push(current.join('\n'));
      current = null;
    }
  }

  if (current !== null && current.length > 0) {
    statements.push(current.join('\n'));
  }

  return statements.join('\n');
}
