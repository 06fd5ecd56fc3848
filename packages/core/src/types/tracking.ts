// packages/core/src/types/tracking.ts — Cost and progress snapshots

import type { BuildPhase } from './build.js';

export interface CostSnapshot {
  totalCost: number;
  totalTokens: number;
  inputTokens: number;
  outputTokens: number;
  invocations: number;
  phaseCosts: Record<BuildPhase, number>;
  phaseTokens: Record<BuildPhase, number>;
  componentCosts: Record<string, number>;
  componentTokens: Record<string, number>;
}

export type ComponentProgressStatus =
  | 'queued'
  | 'running'
  | 'retrying'
  | 'succeeded'
  | 'failed'
  | 'skipped';

export interface PhaseProgress {
  total: number;
  done: number;
  failed: number;
}

export interface ProgressSnapshot {
  phase: BuildPhase | null;
  phases: Record<BuildPhase, PhaseProgress>;
  components: Record<string, { generation: ComponentProgressStatus; validation: ComponentProgressStatus }>;
}
