// packages/core/src/changes/index.ts -- barrel re-export

export { snapshotRepository } from './repo-snapshot.js';
export type { SnapshotOptions } from './repo-snapshot.js';
export {
  computeChangeSet,
  updateIndex,
  resolveOwnership,
  selectComponents,
  componentMatches,
  emptyChangeSet,
  isEmptyChangeSet,
} from './change-tracker.js';
export { changeSetFromRange, parseUnifiedDiff, parseNameStatus } from './change-range.js';
export { gitNameStatus } from './git.js';
export type { NameStatusReader } from './git.js';
