// packages/core/src/engine/progress-tracker.ts — Phase and per-component progress

import type { BuildPhase } from '../types/build.js';
import type { ComponentProgressStatus, PhaseProgress, ProgressSnapshot } from '../types/tracking.js';

type Stage = 'generation' | 'validation';

function stageOf(phase: BuildPhase): Stage | null {
  if (phase === 'components') return 'generation';
  if (phase === 'validation') return 'validation';
  return null;
}

export class ProgressTracker {
  private phase: BuildPhase | null = null;
  private phases: Record<BuildPhase, PhaseProgress> = {
    architecture: { total: 0, done: 0, failed: 0 },
    components: { total: 0, done: 0, failed: 0 },
    validation: { total: 0, done: 0, failed: 0 },
    merge: { total: 0, done: 0, failed: 0 },
  };
  private components = new Map<string, Record<Stage, ComponentProgressStatus>>();

  constructor(private onChange?: (snapshot: ProgressSnapshot) => void) {}

  setPhase(phase: BuildPhase, total: number): void {
    this.phase = phase;
    this.phases[phase] = { total, done: 0, failed: 0 };
    this.notify();
  }

  /** Register components; unselected ones are reported as skipped for generation. */
  registerComponents(all: readonly string[], selected: ReadonlySet<string>): void {
    for (const id of all) {
      this.components.set(id, {
        generation: selected.has(id) ? 'queued' : 'skipped',
        validation: selected.has(id) ? 'queued' : 'skipped',
      });
    }
    this.notify();
  }

  componentStarted(phase: BuildPhase, componentId: string, attempt = 1): void {
    this.setStatus(phase, componentId, attempt > 1 ? 'retrying' : 'running');
  }

  componentFinished(phase: BuildPhase, componentId: string, success: boolean): void {
    const progress = this.phases[phase];
    if (success) progress.done += 1;
    else progress.failed += 1;
    this.setStatus(phase, componentId, success ? 'succeeded' : 'failed', false);
    this.notify();
  }

  /** Close a phase that has no per-component units: whatever has not failed is done. */
  phaseCompleted(phase: BuildPhase): void {
    const progress = this.phases[phase];
    progress.done = progress.total - progress.failed;
    this.notify();
  }

  /** Mark a component skipped in a phase, e.g. validation after failed generation. */
  componentSkipped(phase: BuildPhase, componentId: string): void {
    this.setStatus(phase, componentId, 'skipped');
  }

  snapshot(): ProgressSnapshot {
    const components: ProgressSnapshot['components'] = {};
    for (const [id, stages] of this.components) {
      components[id] = { ...stages };
    }
    return {
      phase: this.phase,
      phases: {
        architecture: { ...this.phases.architecture },
        components: { ...this.phases.components },
        validation: { ...this.phases.validation },
        merge: { ...this.phases.merge },
      },
      components,
    };
  }

  private setStatus(phase: BuildPhase, componentId: string, status: ComponentProgressStatus, notify = true): void {
    const stage = stageOf(phase);
    if (!stage) return;
    const entry: Record<Stage, ComponentProgressStatus> = this.components.get(componentId) ?? {
      generation: 'queued',
      validation: 'queued',
    };
    entry[stage] = status;
    this.components.set(componentId, entry);
    if (notify) this.notify();
  }

  private notify(): void {
    this.onChange?.(this.snapshot());
  }
}
