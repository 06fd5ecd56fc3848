// packages/core/src/engine/validation-orchestrator.ts — Phase 3 fan-out over successful components

import type { ValidationAgent } from '../agents/validation-agent.js';
import { emptyUsage, type CostTracker } from '../models/cost-tracker.js';
import type { StagingArea } from '../output/staging.js';
import type { ArchitectureManifest } from '../types/manifest.js';
import type { ComponentResult, ValidationReport } from '../types/results.js';
import type { Logger } from '../utils/logger.js';
import type { CancellationToken } from './cancellation.js';
import type { EventBus } from './event-bus.js';
import type { ProgressTracker } from './progress-tracker.js';
import { runPool } from './worker-pool.js';

export interface ValidationRunOptions {
  /** Max validations in flight; above the component ceiling */
  limit: number;
  repoRoot: string;
  ownedPaths: ReadonlyMap<string, readonly string[]>;
  staging: StagingArea;
  token: CancellationToken;
}

export interface ValidationOrchestratorDeps {
  costs?: CostTracker;
  progress?: ProgressTracker;
  events?: EventBus;
  logger?: Logger;
}

export class ValidationOrchestrator {
  constructor(
    private agent: ValidationAgent,
    private deps: ValidationOrchestratorDeps = {},
  ) {}

  /**
   * Validate every successful component result. A validator that throws
   * yields a zero-confidence report flagged for review; it never fails the
   * phase. Reports follow the order of `results`; components not started
   * because of cancellation are left out.
   */
  async run(
    manifest: ArchitectureManifest,
    results: readonly ComponentResult[],
    options: ValidationRunOptions,
  ): Promise<ValidationReport[]> {
    const { progress } = this.deps;
    const targets = results.filter((r) => r.success);
    for (const r of results) {
      if (!r.success) progress?.componentSkipped('validation', r.componentId);
    }

    const outcomes = await runPool(targets, options.limit, (result) => this.runOne(manifest, result, options), {
      shouldStart: () => !options.token.isCancelled,
    });
    const reports: ValidationReport[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'done') reports.push(outcome.value);
    }
    return reports;
  }

  private async runOne(
    manifest: ArchitectureManifest,
    result: ComponentResult,
    options: ValidationRunOptions,
  ): Promise<ValidationReport> {
    const { costs, progress, events, logger } = this.deps;
    const start = Date.now();
    const component = manifest.components.find((c) => c.id === result.componentId);
    progress?.componentStarted('validation', result.componentId);

    let report: ValidationReport;
    if (!component) {
      report = failedReport(result.componentId, 'InvalidOutput', 'Component missing from manifest', start);
    } else {
      try {
        report = await this.agent.validate(component, {
          manifest,
          repoRoot: options.repoRoot,
          ownedPaths: options.ownedPaths.get(component.id) ?? [],
          staging: options.staging,
          token: options.token,
          onUsage: (usage) => costs?.record('validation', component.id, usage),
          onFix: (fix) =>
            events?.emitEvent({
              type: 'fix.attempted',
              componentId: component.id,
              section: fix.section,
              applied: fix.applied,
              kind: fix.failure?.kind,
              timestamp: '',
            }),
        });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger?.error(`Validation of "${result.componentId}" crashed: ${message}`);
        report = failedReport(result.componentId, 'BackendError', message, start);
      }
    }

    progress?.componentFinished('validation', result.componentId, report.failure === null);
    events?.emitEvent({
      type: 'validation.scored',
      componentId: report.componentId,
      confidence: report.confidence,
      issues: report.issues.length,
      fixesApplied: report.fixes.filter((f) => f.applied).length,
      needsReview: report.needsReview,
      timestamp: '',
    });
    return report;
  }
}

function failedReport(
  componentId: string,
  kind: 'InvalidOutput' | 'BackendError',
  message: string,
  start: number,
): ValidationReport {
  return {
    componentId,
    scores: { completeness: 0, accuracy: 0, consistency: 0 },
    issues: [],
    fixes: [],
    confidence: 0,
    needsReview: true,
    failure: { kind, message },
    elapsedMs: Date.now() - start,
    usage: emptyUsage(),
  };
}

/**
 * Fold the hashes of applied fixes back into the generation results, so each
 * result describes what merge will commit. Sections a fix created are added
 * to `files`.
 */
export function withFixedFingerprints(
  results: readonly ComponentResult[],
  reports: readonly ValidationReport[],
): ComponentResult[] {
  const byId = new Map(reports.map((r) => [r.componentId, r]));
  return results.map((result) => {
    const report = byId.get(result.componentId);
    const fixes = report?.fixes.filter((f) => f.applied && f.fingerprint !== null) ?? [];
    if (fixes.length === 0) return result;
    const fingerprints = { ...result.fingerprints };
    for (const fix of fixes) {
      if (fix.fingerprint !== null) fingerprints[fix.section] = fix.fingerprint;
    }
    return { ...result, files: Object.keys(fingerprints).sort(), fingerprints };
  });
}
