// packages/core/src/types/build.ts — Build job and incremental-state types

import type { AgentFailureKind } from './agents.js';
import type { ComponentFailureKind, FailureDetail } from './results.js';
import type { CostSnapshot, ProgressSnapshot } from './tracking.js';

export type BuildMode = 'full' | 'incremental';

export type BuildJobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export type BuildState =
  | 'pending'
  | 'architecture_done'
  | 'components_done'
  | 'validation_done'
  | 'merged'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type BuildPhase = 'architecture' | 'components' | 'validation' | 'merge';

export type BuildLogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Explicit change range supplied by source control instead of fingerprint comparison. */
export type ChangeRange =
  | { kind: 'since'; revision: string }
  | { kind: 'diff'; diff: string };

export interface BuildRequest {
  repoPath: string;
  outputPath: string;
  mode: BuildMode;
  changeRange?: ChangeRange;
}

export interface BuildJob {
  id: string;
  repoPath: string;
  outputPath: string;
  mode: BuildMode;
  status: BuildJobStatus;
  state: BuildState;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  logLines: string[];
  error: string | null;
  summary: BuildSummary | null;
}

/** Repository path -> content fingerprint, as read from disk for this build. */
export interface RepoSnapshot {
  root: string;
  files: ReadonlyMap<string, string>;
}

export interface FileFingerprintIndex {
  generation: number;
  updatedAt: number;
  entries: ReadonlyMap<string, string>;
}

export interface ChangeSet {
  added: string[];
  modified: string[];
  removed: string[];
  unchanged: string[];
}

export interface ChangelogEntry {
  timestamp: string;
  jobId: string;
  mode: BuildMode;
  added: string[];
  modified: string[];
  removed: string[];
  unchanged: string[];
  failed: Array<{ id: string; kind: ComponentFailureKind; message: string }>;
  needsReview: Array<{ id: string; confidence: number; reason: AgentFailureKind | 'LowConfidence' }>;
}

export interface BuildSummary {
  jobId: string;
  mode: BuildMode;
  state: BuildState;
  components: number;
  changeSet: { added: number; modified: number; removed: number; unchanged: number };
  changelog: ChangelogEntry | null;
  results: Array<{ componentId: string; success: boolean; failure: FailureDetail | null; attempts: number }>;
  reports: Array<{ componentId: string; confidence: number; needsReview: boolean }>;
  cost: CostSnapshot;
  durationMs: number;
  indexGeneration: number | null;
}

export interface BuildStatusUpdate {
  jobId: string;
  status: BuildJobStatus;
  state: BuildState;
  progress: ProgressSnapshot;
  cost: CostSnapshot;
  logLines: string[];
}
