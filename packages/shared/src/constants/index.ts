/**
 * @wp-promote/shared - Constants
 * Re-export all constants
 */

export { REWRITE_TARGETS, SERIALIZED_TARGETS, OPTIONS_TARGET } from './rewrite-targets.js';

export {
  SECRETS_FILE,
  UPLOADS_DIR,
  DIR_MODE,
  FILE_MODE,
  SECRETS_MODE,
  UPLOADS_DIR_MODE,
  CACHE_DIRECTORIES,
  CACHE_FILES,
  CACHE_GLOB_PATTERNS,
  CACHE_DIR_GLOB,
  BUILDER_CACHE_DIRECTORIES,
  BUILDER_CACHE_OPTION_PATTERNS,
  SYNC_DENYLIST,
} from './files.js';

export {
  ARCHIVE_PREFIX,
  ARCHIVE_SUFFIX,
  ARCHIVE_FILES_DIR,
  ARCHIVE_DATABASE_FILE,
  ARCHIVE_INFO_FILE,
  DEPLOYMENT_LOG_FILE,
  ARCHIVE_NAME_PATTERN,
  archiveFileName,
  preservedDumpFileName,
  rowsDumpFileName,
  stageDumpFileName,
} from './backup.js';

export {
  SEARCH_VISIBILITY_OPTION,
  PRODUCTION_OPTION_WRITES,
  REWRITE_RULES_OPTION,
  RETRY_ATTEMPTS,
  RETRY_DELAY_MS,
  type OptionWrite,
} from './settings.js';

export { VERSION } from './version.js';
