// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { BuildStore } from './build-store.js';
export type { BuildLogRecord } from './build-store.js';
export { FingerprintStore, emptyIndex } from './fingerprint-store.js';
