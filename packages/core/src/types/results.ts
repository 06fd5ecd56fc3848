// packages/core/src/types/results.ts — Per-component phase results

import type { AgentFailureKind } from './agents.js';
import type { TokenUsage } from './events.js';

export type ComponentFailureKind = AgentFailureKind | 'OutputConflict';

export interface FailureDetail<K extends string = ComponentFailureKind> {
  kind: K;
  message: string;
}

export interface ComponentResult {
  componentId: string;
  success: boolean;
  /** Paths relative to the component subtree */
  files: string[];
  fingerprints: Record<string, string>;
  failure: FailureDetail | null;
  attempts: number;
  elapsedMs: number;
  usage: TokenUsage;
}

export type ValidationDimension = 'completeness' | 'accuracy' | 'consistency';

export type IssueSeverity = 'high' | 'medium' | 'low';

export interface ValidationIssue {
  id: string;
  dimension: ValidationDimension;
  /** Section file the issue lives in */
  section: string;
  severity: IssueSeverity;
  description: string;
}

export interface AppliedFix {
  issueId: string;
  section: string;
  applied: boolean;
  /** Hash of the staged section once the fix is written */
  fingerprint: string | null;
  failure: FailureDetail<AgentFailureKind> | null;
}

export interface ValidationReport {
  componentId: string;
  scores: Record<ValidationDimension, number>;
  issues: ValidationIssue[];
  fixes: AppliedFix[];
  confidence: number;
  needsReview: boolean;
  /** Set when the validator itself could not run */
  failure: FailureDetail<AgentFailureKind> | null;
  elapsedMs: number;
  usage: TokenUsage;
}
