export { rawConfigSchema, type RawConfig, type RawConfigInput } from './schema.js';
export { parseConfig, loadConfig, CONFIG_KEYS, DEFAULT_CONFIG_FILE } from './loader.js';
