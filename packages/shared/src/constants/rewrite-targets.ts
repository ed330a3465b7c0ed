/**
 * @wp-promote/shared - URL-bearing columns
 *
 * Every (table, column) pair known to carry environment-specific URLs.
 * Table names are unprefixed; the site repository applies the prefix.
 */

import type { RewriteTarget } from '../types/index.js';

export const REWRITE_TARGETS: readonly RewriteTarget[] = [
  { table: 'options', column: 'option_value', label: 'options' },
  { table: 'posts', column: 'post_content', label: 'post content' },
  { table: 'posts', column: 'post_excerpt', label: 'post excerpts' },
  { table: 'postmeta', column: 'meta_value', label: 'post meta' },
  { table: 'termmeta', column: 'meta_value', label: 'term meta' },
  { table: 'comments', column: 'comment_content', label: 'comment content' },
  { table: 'comments', column: 'comment_author_url', label: 'comment author URLs' },
  { table: 'commentmeta', column: 'meta_value', label: 'comment meta' },
  { table: 'usermeta', column: 'meta_value', label: 'user meta' },
];

/** Targets whose values are commonly PHP-serialized. */
export const SERIALIZED_TARGETS: readonly RewriteTarget[] = REWRITE_TARGETS.filter(
  t => t.table === 'options' || t.table === 'postmeta',
);

export const OPTIONS_TARGET: RewriteTarget = REWRITE_TARGETS[0];
