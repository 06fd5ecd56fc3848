// packages/core/src/utils/index.ts -- barrel re-export

export { generateBuildId } from './id.js';
export {
  ConfigError,
  DatabaseError,
  ArchitectureUnresolvedError,
  IndexCorruptError,
  ManifestError,
  BuildStateError,
  OutputConflictError,
  InvalidRequestError,
} from './errors.js';
export { withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep } from './sleep.js';
export { hashContent, hashFile, isFingerprint } from './hash.js';
