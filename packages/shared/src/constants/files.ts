/**
 * @wp-promote/shared - File tree constants
 */

export const SECRETS_FILE = 'wp-config.php';
export const UPLOADS_DIR = 'wp-content/uploads';

export const DIR_MODE = 0o755;
export const FILE_MODE = 0o644;
export const SECRETS_MODE = 0o600;
export const UPLOADS_DIR_MODE = 0o775;

/** Cache directories of known caching layers, relative to the site root. */
export const CACHE_DIRECTORIES = [
  'wp-content/cache',
  'wp-content/uploads/cache',
  'wp-content/w3tc-config',
  'wp-content/wp-rocket-config',
  'wp-content/litespeed',
  'wp-content/et-cache',
  'wp-content/autoptimize',
  'wp-content/wp-fastest-cache',
  'wp-content/wp-super-cache',
  'wp-content/breeze',
  'wp-content/swift-performance',
  'wp-content/hummingbird-assets',
  'wp-content/sg-cachepress',
  'wp-content/endurance-page-cache',
  'wp-content/object-cache',
  'wp-content/db-cache',
  'wp-content/advanced-cache',
] as const;

/** Drop-in and leftover cache files, relative to the site root. */
export const CACHE_FILES = [
  'wp-content/advanced-cache.php',
  'wp-content/object-cache.php',
  'wp-content/db-cache.php',
  'wp-content/wp-cache-config.php',
  '.htaccess.bak',
  'wp-content/.htaccess.bak',
] as const;

export const CACHE_GLOB_PATTERNS = [
  '**/*.cache',
  'wp-content/**/*.tmp',
  'wp-content/**/*.temp',
  'wp-content/**/*.min.css.gz',
  'wp-content/**/*.min.js.gz',
] as const;

export const CACHE_DIR_GLOB = '**/.cache/';

/** Page-builder generated assets (cleared with `clear-cache --builder`). */
export const BUILDER_CACHE_DIRECTORIES = [
  'wp-content/uploads/bricks/css',
  'wp-content/uploads/bricks/js',
  'wp-content/cache/bricks',
] as const;

export const BUILDER_CACHE_OPTION_PATTERNS = [
  'bricks_css_%',
  'bricks_js_%',
  '_transient_bricks_%',
] as const;

/** rsync exclude patterns applied when mirroring stage onto production. */
export const SYNC_DENYLIST: readonly string[] = [
  `/${SECRETS_FILE}`,
  '.git/',
  '.svn/',
  '.hg/',
  '.DS_Store',
  'Thumbs.db',
  ...CACHE_DIRECTORIES.map(dir => `/${dir}/`),
];
