/**
 * @wp-promote/wpcli - Site Repository
 *
 * Statement-level access to one WordPress schema through `wp db query`.
 * Table names are the unprefixed WordPress names; the prefix is applied here.
 */

import {
  SERIALIZED_TARGETS,
  containsPattern,
  escapeLike,
  quoteIdentifier,
  sqlString,
  type DataLayerClient,
  type RewriteTarget,
  type SiteRepo,
} from '@wp-promote/shared';
import { firstInteger } from '../output.js';

/** Prefixes of PHP-serialized arrays, strings and objects. */
const SERIALIZED_PREFIXES = ['a:', 's:', 'O:'];

export class SqlSiteRepo implements SiteRepo {
  constructor(
    private readonly db: DataLayerClient,
    private readonly prefix: string = 'wp_',
  ) {}

  // ===========================================================================
  // Tables
  // ===========================================================================

  async listTables(): Promise<string[]> {
    const result = await this.db.query('SHOW TABLES;');
    return result.rows.map(row => row[0]).filter(name => name.length > 0);
  }

  async tableExists(name: string): Promise<boolean> {
    const result = await this.db.query(`SHOW TABLES LIKE ${sqlString(escapeLike(name))};`);
    return result.rows.some(row => row[0] === name);
  }

  /**
   * Each `wp db query` is its own connection, so the foreign key toggle
   * must travel in the same batch as the drop.
   */
  async dropTable(name: string): Promise<void> {
    await this.db.query(
      `SET FOREIGN_KEY_CHECKS = 0; DROP TABLE IF EXISTS ${quoteIdentifier(name)}; SET FOREIGN_KEY_CHECKS = 1;`,
    );
  }

  async countPrefixedTables(): Promise<number> {
    const result = await this.db.query(`SHOW TABLES LIKE ${sqlString(`${escapeLike(this.prefix)}%`)};`);
    return result.rows.length;
  }

  // ===========================================================================
  // URL-bearing columns
  // ===========================================================================

  async countMatches(target: RewriteTarget, needle: string): Promise<number> {
    const { table, column } = this.resolve(target);
    const result = await this.db.query(
      `SELECT COUNT(*) FROM ${table} WHERE ${column} LIKE ${containsPattern(needle)};`,
    );
    return firstInteger(result.rows);
  }

  async replaceInTarget(
    target: RewriteTarget,
    from: string,
    to: string,
    options: { scoped?: boolean } = {},
  ): Promise<number> {
    const { table, column } = this.resolve(target);
    const scoped = options.scoped ?? true;
    let sql = `UPDATE ${table} SET ${column} = REPLACE(${column}, ${sqlString(from)}, ${sqlString(to)})`;
    if (scoped) {
      sql += ` WHERE ${column} LIKE ${containsPattern(from)}`;
    }
    const result = await this.db.query(`${sql};`);
    return result.affectedRows ?? 0;
  }

  async countSerializedMatches(needle: string): Promise<number> {
    let total = 0;
    for (const target of SERIALIZED_TARGETS) {
      const { table, column } = this.resolve(target);
      const result = await this.db.query(
        `SELECT COUNT(*) FROM ${table} WHERE ${this.serializedFilter(column, needle)};`,
      );
      total += firstInteger(result.rows);
    }
    return total;
  }

  /**
   * Values are selected as HEX() so tabs and newlines inside them survive
   * the tab-separated query output.
   */
  async findSerializedValues(needle: string, limit: number): Promise<string[]> {
    const values: string[] = [];
    for (const target of SERIALIZED_TARGETS) {
      const remaining = limit - values.length;
      if (remaining <= 0) break;
      const { table, column } = this.resolve(target);
      const result = await this.db.query(
        `SELECT HEX(${column}) FROM ${table} WHERE ${this.serializedFilter(column, needle)} LIMIT ${Math.floor(remaining)};`,
      );
      for (const row of result.rows) {
        values.push(Buffer.from(row[0], 'hex').toString('utf-8'));
      }
    }
    return values;
  }

  // ===========================================================================
  // Options & content
  // ===========================================================================

  async getOption(name: string): Promise<string | null> {
    const result = await this.db.query(
      `SELECT option_value FROM ${this.table('options')} WHERE option_name = ${sqlString(name)} LIMIT 1;`,
    );
    const row = result.rows[0];
    return row ? row[0] : null;
  }

  async setOptionValue(name: string, value: string): Promise<number> {
    const result = await this.db.query(
      `UPDATE ${this.table('options')} SET option_value = ${sqlString(value)} WHERE option_name = ${sqlString(name)};`,
    );
    return result.affectedRows ?? 0;
  }

  /** Patterns are LIKE patterns; `%` is a wildcard. */
  async deleteOptionsLike(patterns: readonly string[]): Promise<number> {
    if (patterns.length === 0) return 0;
    const where = patterns.map(p => `option_name LIKE ${sqlString(p)}`).join(' OR ');
    const result = await this.db.query(`DELETE FROM ${this.table('options')} WHERE ${where};`);
    return result.affectedRows ?? 0;
  }

  async countPublishedPosts(): Promise<number> {
    const result = await this.db.query(
      `SELECT COUNT(*) FROM ${this.table('posts')} WHERE post_status = 'publish';`,
    );
    return firstInteger(result.rows);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private table(name: string): string {
    return quoteIdentifier(`${this.prefix}${name}`);
  }

  private serializedFilter(column: string, needle: string): string {
    const looksSerialized = SERIALIZED_PREFIXES
      .map(p => `${column} LIKE ${sqlString(`${p}%`)}`)
      .join(' OR ');
    return `(${looksSerialized}) AND ${column} LIKE ${containsPattern(needle)}`;
  }

  private resolve(target: RewriteTarget): { table: string; column: string } {
    return { table: this.table(target.table), column: quoteIdentifier(target.column) };
  }
}
