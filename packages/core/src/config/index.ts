// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG } from './defaults.js';
export { membankConfigSchema, validateConfig } from './schema.js';
export type { MembankConfigInput } from './schema.js';
export { loadConfig, deepMerge, CONFIG_FILENAME } from './loader.js';
export { createIgnoreFilter, IGNORE_FILENAME } from './ignore.js';
