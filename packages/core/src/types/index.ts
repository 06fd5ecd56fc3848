// packages/core/src/types/index.ts -- barrel re-export

export type {
  RoleTurnBudgets,
  AgentsConfig,
  ComponentsConfig,
  FixPolicy,
  ValidationConfig,
  IncrementalConfig,
  JobsConfig,
  MembankConfig,
} from './config.js';

export type {
  ComponentKind,
  SystemType,
  ComponentDescriptor,
  ArchitectureManifest,
  Ownership,
} from './manifest.js';

export type {
  AgentRole,
  ArchitectureRequest,
  ComponentRequest,
  ValidationRequest,
  FixRequest,
  AgentRequest,
  AgentFailureKind,
  AgentOutput,
  AgentFailure,
  AgentOutcome,
  AgentProgress,
  BackendCallOptions,
  BackendResult,
  AgentBackend,
} from './agents.js';

export type {
  ComponentFailureKind,
  FailureDetail,
  ComponentResult,
  ValidationDimension,
  IssueSeverity,
  ValidationIssue,
  AppliedFix,
  ValidationReport,
} from './results.js';

export type {
  BuildMode,
  BuildJobStatus,
  BuildState,
  BuildPhase,
  BuildLogLevel,
  ChangeRange,
  BuildRequest,
  BuildJob,
  RepoSnapshot,
  FileFingerprintIndex,
  ChangeSet,
  ChangelogEntry,
  BuildSummary,
  BuildStatusUpdate,
} from './build.js';

export type {
  CostSnapshot,
  ComponentProgressStatus,
  PhaseProgress,
  ProgressSnapshot,
} from './tracking.js';

export type {
  BuildStartedEvent,
  BuildTransitionEvent,
  BuildFinishedEvent,
  PhaseStartedEvent,
  PhaseCompletedEvent,
  ComponentStartedEvent,
  ComponentCompletedEvent,
  ComponentFailedEvent,
  ValidationScoredEvent,
  FixAttemptedEvent,
  CostUpdateEvent,
  TokenUsage,
  BuildEvent,
} from './events.js';
