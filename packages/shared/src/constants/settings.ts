/**
 * @wp-promote/shared - Production option writes
 *
 * Fixed, idempotent option rows applied after promotion.
 */

export interface OptionWrite {
  name: string;
  value: string;
  description: string;
}

export const SEARCH_VISIBILITY_OPTION: OptionWrite = {
  name: 'blog_public',
  value: '1',
  description: 'Search engine indexing enabled',
};

export const PRODUCTION_OPTION_WRITES: readonly OptionWrite[] = [
  { name: 'WP_DEBUG', value: '0', description: 'Debug mode off' },
  { name: 'WP_DEBUG_LOG', value: '0', description: 'Debug log off' },
  { name: 'WP_DEBUG_DISPLAY', value: '0', description: 'Debug display off' },
  { name: 'comment_moderation', value: '1', description: 'Comment moderation on' },
  { name: 'moderation_notify', value: '1', description: 'Moderation notifications on' },
  { name: 'disallow_file_edit', value: '0', description: 'File editing flag reset' },
  { name: 'auto_update_core_major', value: '0', description: 'Major core auto-updates off' },
  { name: 'auto_update_core_minor', value: '1', description: 'Minor core auto-updates on' },
  { name: 'blog_public_robots', value: '', description: 'robots.txt override cleared' },
];

export const REWRITE_RULES_OPTION = 'rewrite_rules';

export const RETRY_ATTEMPTS = 3;
export const RETRY_DELAY_MS = 1000;
