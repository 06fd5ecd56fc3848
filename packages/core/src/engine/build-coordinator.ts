// packages/core/src/engine/build-coordinator.ts — Phase 1 -> 2 -> 3 -> merge state machine for one build

import { existsSync } from 'node:fs';
import { mkdir, readdir, rename } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { ArchitectureAgent } from '../agents/architecture-agent.js';
import { ComponentAgent } from '../agents/component-agent.js';
import { AgentInvoker } from '../agents/invoker.js';
import { withImplicitRoot } from '../agents/manifest.js';
import { ValidationAgent } from '../agents/validation-agent.js';
import { changeSetFromRange } from '../changes/change-range.js';
import {
  computeChangeSet,
  emptyChangeSet,
  isEmptyChangeSet,
  resolveOwnership,
  selectComponents,
  updateIndex,
} from '../changes/change-tracker.js';
import type { NameStatusReader } from '../changes/git.js';
import { snapshotRepository } from '../changes/repo-snapshot.js';
import { openDatabase } from '../memory/database.js';
import { emptyIndex, FingerprintStore } from '../memory/fingerprint-store.js';
import { CostTracker } from '../models/cost-tracker.js';
import { buildChangelogEntry, prependChangelog } from '../output/changelog.js';
import {
  hasCommittedOutput,
  mergeComponents,
  outputLayout,
  readCommittedManifest,
  writeManifest,
  writeOverview,
  writeSummary,
} from '../output/merge.js';
import { StagingArea } from '../output/staging.js';
import { renderOverview } from '../output/templates.js';
import type { AgentBackend } from '../types/agents.js';
import type {
  BuildLogLevel,
  BuildMode,
  BuildPhase,
  BuildRequest,
  BuildState,
  BuildSummary,
  ChangeSet,
  FileFingerprintIndex,
} from '../types/build.js';
import type { MembankConfig } from '../types/config.js';
import type { ArchitectureManifest } from '../types/manifest.js';
import type { ComponentResult, ValidationReport } from '../types/results.js';
import type { CostSnapshot, ProgressSnapshot } from '../types/tracking.js';
import { CHANGELOG_FILE, STATE_DB_FILE, STATE_DIR } from '../utils/constants.js';
import { BuildStateError, DatabaseError, IndexCorruptError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { CancellationError, CancellationToken } from './cancellation.js';
import { ComponentOrchestrator } from './component-orchestrator.js';
import type { EventBus } from './event-bus.js';
import { ProgressTracker } from './progress-tracker.js';
import { ValidationOrchestrator, withFixedFingerprints } from './validation-orchestrator.js';

const TRANSITIONS: Record<BuildState, readonly BuildState[]> = {
  pending: ['architecture_done', 'failed', 'cancelled'],
  architecture_done: ['components_done', 'failed', 'cancelled'],
  components_done: ['validation_done', 'failed', 'cancelled'],
  validation_done: ['merged', 'failed', 'cancelled'],
  merged: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalState(state: BuildState): boolean {
  return TRANSITIONS[state].length === 0;
}

export interface BuildCoordinatorOptions {
  jobId: string;
  request: BuildRequest;
  config: MembankConfig;
  backend: AgentBackend;
  token?: CancellationToken;
  events?: EventBus;
  logger?: Logger;
  /** Source-control collaborator for `since` change ranges */
  readNameStatus?: NameStatusReader;
  onLog?: (level: BuildLogLevel, message: string) => void;
  onProgress?: (progress: ProgressSnapshot) => void;
  onCost?: (cost: CostSnapshot) => void;
  onState?: (state: BuildState) => void;
}

interface StateHandle {
  db: Database.Database;
  store: FingerprintStore;
  /** The previous database was unreadable and moved aside */
  recovered: boolean;
}

/**
 * Drives one build through its phases with strict barriers between them.
 * Per-component failures are values; only a missing manifest (or a corrupt
 * index with fallback disabled) fails the build.
 */
export class BuildCoordinator {
  private state: BuildState = 'pending';
  readonly token: CancellationToken;
  readonly costs: CostTracker;
  readonly progress: ProgressTracker;
  private invoker: AgentInvoker;
  private startedAt = 0;

  constructor(private options: BuildCoordinatorOptions) {
    this.token = options.token ?? new CancellationToken();
    this.costs = new CostTracker((phase, componentId, usage) => {
      const snapshot = this.costs.snapshot();
      options.events?.emitEvent({
        type: 'cost.update',
        phase,
        componentId,
        inputTokens: usage.inputTokens,
        outputTokens: usage.outputTokens,
        costUsd: usage.costUsd,
        cumulativeCost: snapshot.totalCost,
        timestamp: '',
      });
      options.onCost?.(snapshot);
    });
    this.progress = new ProgressTracker(options.onProgress);
    const agents = options.config.agents;
    this.invoker = new AgentInvoker({
      backend: options.backend,
      model: agents.model,
      timeoutMs: agents.timeoutMs,
      idleTimeoutMs: agents.idleTimeoutMs,
      abortInFlightOnCancel: agents.abortInFlightOnCancel,
      logger: options.logger,
    });
  }

  get currentState(): BuildState {
    return this.state;
  }

  /** Signal both orchestrators to stop submitting work. */
  cancel(reason?: string): void {
    this.token.cancel(reason);
  }

  transition(to: BuildState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new BuildStateError(`Illegal build transition ${from} -> ${to}`, from, to);
    }
    this.state = to;
    this.options.events?.emitEvent({
      type: 'build.transition',
      jobId: this.options.jobId,
      from,
      to,
      timestamp: '',
    });
    this.options.onState?.(to);
  }

  /**
   * Run the build to a terminal state. Resolves with the summary when the
   * build completes or is cancelled; rejects after moving to `failed`.
   */
  async run(): Promise<BuildSummary> {
    if (this.state !== 'pending') {
      throw new BuildStateError(`Build ${this.options.jobId} already ran`, this.state);
    }
    const { jobId, request, config, events } = this.options;
    this.startedAt = Date.now();
    const outputPath = resolve(request.outputPath);
    const layout = outputLayout(outputPath);
    const staging = new StagingArea(outputPath, jobId);
    let handle: StateHandle | null = null;
    let mode: BuildMode = request.mode;
    let changes: ChangeSet = emptyChangeSet();

    events?.emitEvent({
      type: 'build.started',
      jobId,
      mode,
      repoPath: request.repoPath,
      timestamp: '',
    });
    this.log('info', `Build ${jobId} started (${mode}) for ${request.repoPath}`);

    try {
      await mkdir(join(outputPath, STATE_DIR), { recursive: true });
      handle = await this.openState(outputPath);
      const prior = this.loadIndex(handle.store);
      if (prior.corrupt || handle.recovered) mode = 'full';

      const snapshot = await snapshotRepository(request.repoPath, {
        ignore: config.ignore,
        excludeDirs: [outputPath],
      });
      changes =
        request.changeRange && mode === 'incremental'
          ? await changeSetFromRange(snapshot, request.changeRange, this.options.readNameStatus)
          : computeChangeSet(snapshot, prior.index);
      this.log(
        'info',
        `${snapshot.files.size} files: ${changes.added.length} added, ${changes.modified.length} modified, ${changes.removed.length} removed`,
      );
      if (mode === 'incremental' && isEmptyChangeSet(changes)) {
        this.log('info', 'No file changes since the last build');
      }
      this.token.throwIfCancelled();

      // Phase 1
      const committed = await readCommittedManifest(layout, this.options.logger);
      const previousIds = new Set(committed?.components.map((c) => c.id) ?? (await this.existingComponentIds(layout.components)));
      const paths = [...snapshot.files.keys()];
      const manifest = await this.runPhase('architecture', 1, async () => {
        if (mode === 'incremental' && config.incremental.reuseManifest && committed) {
          this.log('info', 'Reusing committed architecture manifest');
          return withImplicitRoot(committed, paths);
        }
        const agent = new ArchitectureAgent(this.invoker, {
          projectName: config.project.name,
          maxTurns: config.agents.maxTurns.architecture,
          logger: this.options.logger,
        });
        const proposal = await agent.propose(snapshot, {
          token: this.token,
          onUsage: (usage) => this.costs.record('architecture', null, usage),
        });
        return proposal.manifest;
      });
      this.transition('architecture_done');
      this.token.throwIfCancelled();

      // Phase 2
      const ownership = resolveOwnership(manifest, paths);
      const ownedPaths = new Map<string, string[]>();
      for (const [path, owner] of ownership) {
        ownedPaths.set(owner, [...(ownedPaths.get(owner) ?? []), path]);
      }
      const selection = selectComponents(manifest, ownership, changes, mode, (id) => hasCommittedOutput(layout, id));
      this.progress.registerComponents(
        manifest.components.map((c) => c.id),
        new Set(selection.map((c) => c.id)),
      );
      this.log('info', `Selected ${selection.length}/${manifest.components.length} component(s)`);

      const componentOrchestrator = new ComponentOrchestrator(
        new ComponentAgent(this.invoker, { maxTurns: config.agents.maxTurns.component, logger: this.options.logger }),
        { costs: this.costs, progress: this.progress, events, logger: this.options.logger },
      );
      const results = await this.runPhase('components', selection.length, () =>
        componentOrchestrator.run(manifest, selection, {
          limit: config.components.concurrency,
          retries: config.components.retries,
          backoffMs: config.components.backoffMs,
          repoRoot: snapshot.root,
          ownedPaths,
          staging,
          token: this.token,
        }),
      );
      this.transition('components_done');
      this.token.throwIfCancelled();

      // Phase 3
      const validationOrchestrator = new ValidationOrchestrator(
        new ValidationAgent(this.invoker, {
          maxTurns: { validation: config.agents.maxTurns.validation, fix: config.agents.maxTurns.fix },
          minSectionChars: config.validation.minSectionChars,
          acceptanceThreshold: config.validation.acceptanceThreshold,
          fixPolicy: config.validation.fixPolicy,
          logger: this.options.logger,
        }),
        { costs: this.costs, progress: this.progress, events, logger: this.options.logger },
      );
      const reports = await this.runPhase(
        'validation',
        results.filter((r) => r.success).length,
        () =>
          validationOrchestrator.run(manifest, results, {
            limit: config.validation.concurrency,
            repoRoot: snapshot.root,
            ownedPaths,
            staging,
            token: this.token,
          }),
      );
      this.transition('validation_done');
      this.token.throwIfCancelled();

      // Merge
      const store = handle.store;
      const finalResults = withFixedFingerprints(results, reports);
      const summary = await this.runPhase('merge', 1, async () => {
        const timestamp = new Date().toISOString();
        await mergeComponents(layout, staging, manifest, finalResults);
        await writeManifest(layout, manifest);
        await writeOverview(
          layout,
          renderOverview({
            projectName: config.project.name,
            manifest,
            results: finalResults,
            reports,
            changes,
            timestamp,
          }),
        );
        const entry = buildChangelogEntry({
          jobId,
          mode,
          timestamp,
          manifest,
          previousComponentIds: previousIds,
          results: finalResults,
          reports,
        });
        await prependChangelog(join(outputPath, CHANGELOG_FILE), entry);

        const failedIds = new Set(finalResults.filter((r) => !r.success).map((r) => r.componentId));
        const next = updateIndex(prior.index, snapshot, {
          holdBack: (path) => {
            const owner = ownership.get(path);
            return owner !== undefined && failedIds.has(owner);
          },
        });
        store.save(next);
        await staging.discard();
        return this.summarize(mode, changes, manifest, finalResults, reports, entry, next, 'completed');
      });
      this.transition('merged');
      await writeSummary(layout, summary);
      this.transition('completed');
      this.finish(summary);
      return summary;
    } catch (err) {
      await this.discardStaging(staging);
      if (err instanceof CancellationError || (this.token.isCancelled && !isTerminalState(this.state))) {
        if (!isTerminalState(this.state)) this.transition('cancelled');
        this.log('warn', `Build ${jobId} cancelled: ${this.token.reason ?? 'cancelled'}`);
        const summary = this.summarize(mode, changes, null, [], [], null, null, 'cancelled');
        this.finish(summary);
        return summary;
      }
      const message = err instanceof Error ? err.message : String(err);
      if (!isTerminalState(this.state)) this.transition('failed');
      this.log('error', `Build ${jobId} failed: ${message}`);
      this.finish(this.summarize(mode, changes, null, [], [], null, null, 'failed'), message);
      throw err;
    } finally {
      handle?.db.close();
    }
  }

  private async runPhase<T>(phase: BuildPhase, total: number, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    this.progress.setPhase(phase, total);
    this.options.events?.emitEvent({ type: 'phase.started', phase, total, timestamp: '' });
    const result = await fn();
    if (phase === 'architecture' || phase === 'merge') this.progress.phaseCompleted(phase);
    const counts = this.progress.snapshot().phases[phase];
    this.options.events?.emitEvent({
      type: 'phase.completed',
      phase,
      succeeded: counts.done,
      failed: counts.failed,
      durationMs: Date.now() - start,
      timestamp: '',
    });
    this.log('info', `Phase ${phase} finished in ${Date.now() - start}ms`);
    return result;
  }

  /** Open `<output>/.membank/state.db`; an unreadable file is moved aside when fallback is on. */
  private async openState(outputPath: string): Promise<StateHandle> {
    const dbPath = join(outputPath, STATE_DIR, STATE_DB_FILE);
    try {
      const db = openDatabase(dbPath);
      return { db, store: new FingerprintStore(db), recovered: false };
    } catch (err) {
      if (!(err instanceof DatabaseError) || !existsSync(dbPath)) throw err;
      if (!this.options.config.incremental.fallbackOnCorruptIndex) {
        throw new IndexCorruptError(`State database unreadable: ${err.message}`, dbPath);
      }
      const aside = `${dbPath}.corrupt-${Date.now()}`;
      this.log('warn', `State database unreadable; moved to ${aside} and rebuilding in full`);
      await rename(dbPath, aside);
      const db = openDatabase(dbPath);
      return { db, store: new FingerprintStore(db), recovered: true };
    }
  }

  private loadIndex(store: FingerprintStore): { index: FileFingerprintIndex; corrupt: boolean } {
    try {
      return { index: store.load(), corrupt: false };
    } catch (err) {
      if (err instanceof IndexCorruptError && this.options.config.incremental.fallbackOnCorruptIndex) {
        this.log('warn', `${err.message}; falling back to a full build`);
        return { index: emptyIndex(), corrupt: true };
      }
      throw err;
    }
  }

  private async existingComponentIds(componentsDir: string): Promise<string[]> {
    if (!existsSync(componentsDir)) return [];
    const entries = await readdir(componentsDir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name);
  }

  private async discardStaging(staging: StagingArea): Promise<void> {
    try {
      await staging.discard();
    } catch (err) {
      this.log('warn', `Could not discard staging: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private summarize(
    mode: BuildMode,
    changes: ChangeSet,
    manifest: ArchitectureManifest | null,
    results: readonly ComponentResult[],
    reports: readonly ValidationReport[],
    changelog: BuildSummary['changelog'],
    index: FileFingerprintIndex | null,
    state: BuildState,
  ): BuildSummary {
    return {
      jobId: this.options.jobId,
      mode,
      state,
      components: manifest?.components.length ?? 0,
      changeSet: {
        added: changes.added.length,
        modified: changes.modified.length,
        removed: changes.removed.length,
        unchanged: changes.unchanged.length,
      },
      changelog,
      results: results.map((r) => ({ componentId: r.componentId, success: r.success, failure: r.failure, attempts: r.attempts })),
      reports: reports.map((r) => ({ componentId: r.componentId, confidence: r.confidence, needsReview: r.needsReview })),
      cost: this.costs.snapshot(),
      durationMs: Date.now() - this.startedAt,
      indexGeneration: index?.generation ?? null,
    };
  }

  private finish(summary: BuildSummary, error?: string): void {
    this.options.events?.emitEvent({
      type: 'build.finished',
      jobId: this.options.jobId,
      state: this.state,
      totalCost: summary.cost.totalCost,
      totalTokens: summary.cost.totalTokens,
      durationMs: summary.durationMs,
      error,
      timestamp: '',
    });
  }

  private log(level: BuildLogLevel, message: string): void {
    this.options.logger?.[level](message);
    this.options.onLog?.(level, message);
  }
}
