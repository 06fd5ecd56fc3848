// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';

export interface RoleTurnBudgets {
  architecture: number;
  component: number;
  validation: number;
  fix: number;
}

export interface AgentsConfig {
  /** Agentic CLI spawned per invocation */
  command: string;
  args: string[];
  model: string;
  timeoutMs: number;
  idleTimeoutMs: number;
  /** Kill dispatched invocations on cancel instead of letting them reach their own timeout */
  abortInFlightOnCancel: boolean;
  envAllowlist: string[];
  maxTurns: RoleTurnBudgets;
}

export interface ComponentsConfig {
  concurrency: number;
  retries: number;
  backoffMs: number;
}

/**
 * accept: a fixed issue is credited without another check.
 * recheck: one more check invocation after fixes decides the scores.
 */
export type FixPolicy = 'accept' | 'recheck';

export interface ValidationConfig {
  concurrency: number;
  acceptanceThreshold: number;
  minSectionChars: number;
  fixPolicy: FixPolicy;
}

export interface IncrementalConfig {
  reuseManifest: boolean;
  fallbackOnCorruptIndex: boolean;
}

export interface JobsConfig {
  maxConcurrent: number;
}

export interface MembankConfig {
  configVersion?: number;
  project: {
    name: string;
    description: string;
  };
  agents: AgentsConfig;
  components: ComponentsConfig;
  validation: ValidationConfig;
  incremental: IncrementalConfig;
  jobs: JobsConfig;
  /** Extra ignore patterns on top of .gitignore and .membankignore */
  ignore: string[];
  logLevel: LogLevel;
}
