// packages/core/src/engine/component-orchestrator.ts — Phase 2 fan-out over selected components

import type { ComponentAgent, ComponentAttempt } from '../agents/component-agent.js';
import { addUsage, emptyUsage, type CostTracker } from '../models/cost-tracker.js';
import type { StagingArea } from '../output/staging.js';
import type { TokenUsage } from '../types/events.js';
import type { ArchitectureManifest, ComponentDescriptor } from '../types/manifest.js';
import type { ComponentResult, FailureDetail } from '../types/results.js';
import type { Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { CancellationToken } from './cancellation.js';
import type { EventBus } from './event-bus.js';
import type { ProgressTracker } from './progress-tracker.js';
import { runPool } from './worker-pool.js';

export interface ComponentRunOptions {
  /** Max components in flight */
  limit: number;
  /** Attempts after the first */
  retries: number;
  backoffMs: number;
  repoRoot: string;
  ownedPaths: ReadonlyMap<string, readonly string[]>;
  staging: StagingArea;
  token: CancellationToken;
}

export interface ComponentOrchestratorDeps {
  costs?: CostTracker;
  progress?: ProgressTracker;
  events?: EventBus;
  logger?: Logger;
}

class AttemptFailedError extends Error {
  constructor(readonly failure: FailureDetail) {
    super(failure.message);
    this.name = 'AttemptFailedError';
  }
}

export class ComponentOrchestrator {
  constructor(
    private agent: ComponentAgent,
    private deps: ComponentOrchestratorDeps = {},
  ) {}

  /**
   * Generate the selected components with at most `limit` in flight.
   * One component's failure never affects another. Results follow manifest
   * order; components not started because of cancellation come back as
   * Cancelled failures with zero attempts.
   */
  async run(
    manifest: ArchitectureManifest,
    selection: readonly ComponentDescriptor[],
    options: ComponentRunOptions,
  ): Promise<ComponentResult[]> {
    const selected = new Set(selection.map((c) => c.id));
    const ordered = manifest.components.filter((c) => selected.has(c.id));

    const outcomes = await runPool(ordered, options.limit, (component) => this.runOne(manifest, component, options), {
      shouldStart: () => !options.token.isCancelled,
    });

    return outcomes.map((outcome, i): ComponentResult => {
      if (outcome.status === 'done') return outcome.value;
      const component = ordered[i];
      return {
        componentId: component?.id ?? '',
        success: false,
        files: [],
        fingerprints: {},
        failure: { kind: 'Cancelled', message: 'Not started: build cancelled' },
        attempts: 0,
        elapsedMs: 0,
        usage: emptyUsage(),
      };
    });
  }

  private async runOne(
    manifest: ArchitectureManifest,
    component: ComponentDescriptor,
    options: ComponentRunOptions,
  ): Promise<ComponentResult> {
    const { costs, progress, events, logger } = this.deps;
    const start = Date.now();
    let attempts = 0;
    let usage: TokenUsage = emptyUsage();

    const attempt = async (n: number): Promise<ComponentResult> => {
      attempts = n;
      progress?.componentStarted('components', component.id, n);
      events?.emitEvent({
        type: 'component.started',
        phase: 'components',
        componentId: component.id,
        attempt: n,
        timestamp: '',
      });
      if (n > 1) await options.staging.reset(component.id);

      let result: ComponentAttempt;
      try {
        result = await this.agent.generate(component, {
          manifest,
          ownedPaths: options.ownedPaths.get(component.id) ?? [],
          repoRoot: options.repoRoot,
          staging: options.staging,
          token: options.token,
        });
      } catch (err) {
        throw new AttemptFailedError({
          kind: 'BackendError',
          message: `Staging failed: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
      usage = addUsage(usage, result.usage);
      costs?.record('components', component.id, result.usage);
      if (!result.ok) throw new AttemptFailedError(result.failure);

      return {
        componentId: component.id,
        success: true,
        files: result.files,
        fingerprints: result.fingerprints,
        failure: null,
        attempts: n,
        elapsedMs: Date.now() - start,
        usage,
      };
    };

    try {
      const result = await withRetry(attempt, {
        attempts: options.retries + 1,
        backoff: options.backoffMs,
        signal: options.token.signal,
        retryOn: (err) =>
          err instanceof AttemptFailedError && err.failure.kind !== 'Cancelled' && !options.token.isCancelled,
        onRetry: (n, err, delayMs) => {
          logger?.warn(
            `Component "${component.id}" attempt ${n} failed: ${err instanceof Error ? err.message : String(err)}; retrying in ${delayMs}ms`,
          );
        },
      });
      progress?.componentFinished('components', component.id, true);
      events?.emitEvent({
        type: 'component.completed',
        phase: 'components',
        componentId: component.id,
        durationMs: result.elapsedMs,
        tokenUsage: usage,
        timestamp: '',
      });
      return result;
    } catch (err) {
      const failure: FailureDetail =
        err instanceof AttemptFailedError
          ? err.failure
          : { kind: 'BackendError', message: err instanceof Error ? err.message : String(err) };
      logger?.error(`Component "${component.id}" failed after ${attempts} attempt(s): ${failure.kind}: ${failure.message}`);
      progress?.componentFinished('components', component.id, false);
      events?.emitEvent({
        type: 'component.failed',
        phase: 'components',
        componentId: component.id,
        kind: failure.kind,
        error: failure.message,
        retriesExhausted: attempts >= options.retries + 1,
        timestamp: '',
      });
      return {
        componentId: component.id,
        success: false,
        files: [],
        fingerprints: {},
        failure,
        attempts,
        elapsedMs: Date.now() - start,
        usage,
      };
    }
  }
}
