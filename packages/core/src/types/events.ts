// packages/core/src/types/events.ts

/**
 * Build engine events, emitted by the coordinator and orchestrators.
 * Type names are dot-separated.
 */

import type { AgentFailureKind } from './agents.js';
import type { BuildMode, BuildPhase, BuildState } from './build.js';
import type { ComponentFailureKind } from './results.js';

// -- Lifecycle events --
export interface BuildStartedEvent {
  type: 'build.started';
  jobId: string;
  mode: BuildMode;
  repoPath: string;
  timestamp: string;
}

export interface BuildTransitionEvent {
  type: 'build.transition';
  jobId: string;
  from: BuildState;
  to: BuildState;
  timestamp: string;
}

export interface BuildFinishedEvent {
  type: 'build.finished';
  jobId: string;
  state: BuildState;
  totalCost: number;
  totalTokens: number;
  durationMs: number;
  error?: string;
  timestamp: string;
}

// -- Phase events --
export interface PhaseStartedEvent {
  type: 'phase.started';
  phase: BuildPhase;
  total: number;
  timestamp: string;
}

export interface PhaseCompletedEvent {
  type: 'phase.completed';
  phase: BuildPhase;
  succeeded: number;
  failed: number;
  durationMs: number;
  timestamp: string;
}

// -- Component events --
export interface ComponentStartedEvent {
  type: 'component.started';
  phase: BuildPhase;
  componentId: string;
  attempt: number;
  timestamp: string;
}

export interface ComponentCompletedEvent {
  type: 'component.completed';
  phase: BuildPhase;
  componentId: string;
  durationMs: number;
  tokenUsage: TokenUsage;
  timestamp: string;
}

export interface ComponentFailedEvent {
  type: 'component.failed';
  phase: BuildPhase;
  componentId: string;
  kind: ComponentFailureKind;
  error: string;
  retriesExhausted: boolean;
  timestamp: string;
}

export interface ValidationScoredEvent {
  type: 'validation.scored';
  componentId: string;
  confidence: number;
  issues: number;
  fixesApplied: number;
  needsReview: boolean;
  timestamp: string;
}

export interface FixAttemptedEvent {
  type: 'fix.attempted';
  componentId: string;
  section: string;
  applied: boolean;
  kind?: AgentFailureKind;
  timestamp: string;
}

// -- Cost events --
export interface CostUpdateEvent {
  type: 'cost.update';
  phase: BuildPhase;
  componentId: string | null;
  inputTokens: number;
  outputTokens: number;
  costUsd: number;
  cumulativeCost: number;
  timestamp: string;
}

// -- Token usage (shared) --
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd: number;
}

// -- Union type --
export type BuildEvent =
  | BuildStartedEvent
  | BuildTransitionEvent
  | BuildFinishedEvent
  | PhaseStartedEvent
  | PhaseCompletedEvent
  | ComponentStartedEvent
  | ComponentCompletedEvent
  | ComponentFailedEvent
  | ValidationScoredEvent
  | FixAttemptedEvent
  | CostUpdateEvent;
