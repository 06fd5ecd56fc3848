// packages/core/src/output/index.ts -- barrel re-export

export { MEMORY_BANK_SECTIONS, SECTION_FILES, PLACEHOLDER_PATTERNS } from './sections.js';
export type { SectionSpec } from './sections.js';
export { StagingArea, listFiles } from './staging.js';
export {
  outputLayout,
  mergeComponents,
  writeOverview,
  writeManifest,
  writeSummary,
  writeFileAtomic,
  hasCommittedOutput,
  readCommittedManifest,
} from './merge.js';
export type { OutputLayout, MergeResult } from './merge.js';
export { buildChangelogEntry, renderChangelogEntry, prependChangelog } from './changelog.js';
export type { ChangelogInput } from './changelog.js';
export { renderOverview, renderManifestMarkdown } from './templates.js';
export type { OverviewInput } from './templates.js';
