/**
 * @wp-promote/shared - MySQL literal helpers
 *
 * Statements go through `wp db query`, which has no bound parameters,
 * so every literal is escaped here.
 */

/** Quote a value as a MySQL string literal. */
export function sqlString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

/** Escape LIKE wildcards so the value matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, char => `\\${char}`);
}

/** `'%value%'` with wildcards in value escaped. */
export function containsPattern(value: string): string {
  return sqlString(`%${escapeLike(value)}%`);
}

const IDENTIFIER = /^[A-Za-z0-9_$]+$/;

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Backtick-quote an identifier; only plain identifiers are accepted. */
export function quoteIdentifier(name: string): string {
  if (!isValidIdentifier(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return `\`${name}\``;
}
