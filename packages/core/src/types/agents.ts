// packages/core/src/types/agents.ts — Agent invocation contract

import type { TokenUsage } from './events.js';
import type { ComponentDescriptor } from './manifest.js';
import type { ValidationIssue } from './results.js';

export type AgentRole = 'architecture' | 'component' | 'validation' | 'fix';

interface AgentRequestBase {
  /** Short label for logs, e.g. the component id */
  label: string;
  /** Repository root the agent may read */
  cwd: string;
  /** Repository-relative paths in scope for this agent */
  readablePaths: string[];
  maxTurns: number;
}

export interface ArchitectureRequest extends AgentRequestBase {
  role: 'architecture';
  projectName: string;
}

export interface ComponentRequest extends AgentRequestBase {
  role: 'component';
  component: ComponentDescriptor;
  architectureSummary: string;
  sections: readonly string[];
}

export interface ValidationRequest extends AgentRequestBase {
  role: 'validation';
  component: ComponentDescriptor;
  documents: Record<string, string>;
  siblings: ComponentDescriptor[];
}

export interface FixRequest extends AgentRequestBase {
  role: 'fix';
  component: ComponentDescriptor;
  section: string;
  issue: ValidationIssue;
  currentContent: string | null;
}

export type AgentRequest = ArchitectureRequest | ComponentRequest | ValidationRequest | FixRequest;

export type AgentFailureKind =
  | 'BudgetExceeded'
  | 'Timeout'
  | 'Cancelled'
  | 'BackendError'
  | 'InvalidOutput';

export interface AgentOutput {
  ok: true;
  role: AgentRole;
  text: string;
  turns: number;
  usage: TokenUsage;
  durationMs: number;
}

export interface AgentFailure {
  ok: false;
  role: AgentRole;
  kind: AgentFailureKind;
  message: string;
  turns: number;
  usage: TokenUsage;
  durationMs: number;
}

export type AgentOutcome = AgentOutput | AgentFailure;

// -- External capability --

export type AgentProgress =
  | { kind: 'turn' }
  | { kind: 'activity'; detail: string };

export interface BackendCallOptions {
  signal: AbortSignal;
  onProgress: (progress: AgentProgress) => void;
}

export interface BackendResult {
  text: string;
  inputTokens?: number;
  outputTokens?: number;
  /** Billed cost when the capability reports one */
  costUsd?: number;
  turns?: number;
  /** The capability stopped because it ran out of turns */
  budgetExhausted?: boolean;
  model?: string;
}

/** The opaque analysis capability: analyze inputs, produce text. */
export interface AgentBackend {
  readonly name: string;
  run(request: AgentRequest, options: BackendCallOptions): Promise<BackendResult>;
}
