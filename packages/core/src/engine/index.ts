// packages/core/src/engine -- Build coordination, bounded pools and job management

export { EventBus } from './event-bus.js';
export { CancellationToken, CancellationError } from './cancellation.js';
export { AsyncSemaphore, runPool } from './worker-pool.js';
export type { PoolOutcome } from './worker-pool.js';
export { ProgressTracker } from './progress-tracker.js';
export { ComponentOrchestrator } from './component-orchestrator.js';
export type { ComponentOrchestratorDeps, ComponentRunOptions } from './component-orchestrator.js';
export { ValidationOrchestrator } from './validation-orchestrator.js';
export type { ValidationOrchestratorDeps, ValidationRunOptions } from './validation-orchestrator.js';
export { BuildCoordinator, isTerminalState } from './build-coordinator.js';
export type { BuildCoordinatorOptions } from './build-coordinator.js';
export { JobManager } from './job-manager.js';
export type { JobManagerOptions } from './job-manager.js';
