/**
 * @wp-promote/shared - Timestamps
 */

const pad = (n: number): string => String(n).padStart(2, '0');

/** Local-time `YYYYMMDDHHmmss`, used in every file the tool writes. */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Parse `YYYYMMDDHHmmss` or legacy `YYYYMMDD_HHMMSS` into a local Date.
 * Returns null for anything else.
 */
export function parseTimestamp(value: string): Date | null {
  const digits = value.replace('_', '');
  if (!/^\d{14}$/.test(digits)) return null;

  const date = new Date(
    Number(digits.slice(0, 4)),
    Number(digits.slice(4, 6)) - 1,
    Number(digits.slice(6, 8)),
    Number(digits.slice(8, 10)),
    Number(digits.slice(10, 12)),
    Number(digits.slice(12, 14)),
  );
  return Number.isNaN(date.getTime()) ? null : date;
}

/** `YYYY-MM-DD HH:mm:ss` for display. */
export function displayTimestamp(value: string): string {
  const date = parseTimestamp(value);
  if (!date) return value;
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
