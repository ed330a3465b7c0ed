/**
 * @wp-promote/wpcli - WP-CLI output parsing
 */

const STATUS_LINE = /^(Success|Warning|Error):/;

/**
 * Tab-separated rows from `wp db query --skip-column-names`.
 * Status lines WP-CLI appends are dropped.
 */
export function parseQueryRows(stdout: string): string[][] {
  return stdout
    .split('\n')
    .map(line => line.replace(/\r$/, ''))
    .filter(line => line.length > 0 && !STATUS_LINE.test(line))
    .map(line => line.split('\t'));
}

/** `Success: Query succeeded. Rows affected: 3` -> 3 */
export function parseAffectedRows(stdout: string): number | null {
  const match = stdout.match(/Rows affected:\s*(\d+)/i);
  return match ? Number(match[1]) : null;
}

/**
 * `Success: 12 replacements to be made.` / `Success: Made 12 replacements.`
 */
export function parseReplacementCount(stdout: string): number {
  const match = stdout.match(/(\d+)\s+replacements?\b/i);
  return match ? Number(match[1]) : 0;
}

/** First cell of the first row as an integer; 0 when absent or not numeric. */
export function firstInteger(rows: string[][]): number {
  const cell = rows[0]?.[0]?.trim() ?? '';
  return /^\d+$/.test(cell) ? Number(cell) : 0;
}
