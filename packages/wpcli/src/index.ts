/**
 * @wp-promote/wpcli
 * WP-CLI data-layer client and SQL repository
 */

export { WpCli, type WpCliOptions } from './client.js';
export { SqlSiteRepo } from './repos/site.repo.js';
export { extractInsertStatements } from './dump.js';
export { parseQueryRows, parseAffectedRows, parseReplacementCount, firstInteger } from './output.js';
export { createSite } from './site.js';
