// packages/core/src/models/cost-tracker.ts

import type { AgentOutcome } from '../types/agents.js';
import type { BuildPhase } from '../types/build.js';
import type { TokenUsage } from '../types/events.js';
import type { CostSnapshot } from '../types/tracking.js';

export const BUILD_PHASES: readonly BuildPhase[] = ['architecture', 'components', 'validation', 'merge'];

function phaseRecord(): Record<BuildPhase, number> {
  return { architecture: 0, components: 0, validation: 0, merge: 0 };
}

export function emptyUsage(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0, costUsd: 0 };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    costUsd: a.costUsd + b.costUsd,
  };
}

/**
 * Accumulates token and cost usage for one build, by phase and by component.
 * Created per build by the coordinator; every invocation outcome, failed or
 * not, is recorded.
 */
export class CostTracker {
  private inputTokens = 0;
  private outputTokens = 0;
  private totalTokens = 0;
  private totalCost = 0;
  private invocations = 0;
  private phaseCosts = phaseRecord();
  private phaseTokens = phaseRecord();
  private componentCosts = new Map<string, number>();
  private componentTokens = new Map<string, number>();

  constructor(private onRecord?: (phase: BuildPhase, componentId: string | null, usage: TokenUsage) => void) {}

  /**
   * Execute an agent call and record its usage.
   * Usage: `tracker.tracked('components', id, () => invoker.invoke(req, opts))`
   */
  async tracked<T extends AgentOutcome>(
    phase: BuildPhase,
    componentId: string | null,
    fn: () => Promise<T>,
  ): Promise<T> {
    const outcome = await fn();
    this.record(phase, componentId, outcome.usage);
    return outcome;
  }

  record(phase: BuildPhase, componentId: string | null, usage: TokenUsage): void {
    this.inputTokens += usage.inputTokens;
    this.outputTokens += usage.outputTokens;
    this.totalTokens += usage.totalTokens;
    this.totalCost += usage.costUsd;
    this.invocations += 1;
    this.phaseCosts[phase] += usage.costUsd;
    this.phaseTokens[phase] += usage.totalTokens;
    if (componentId !== null) {
      this.componentCosts.set(componentId, (this.componentCosts.get(componentId) ?? 0) + usage.costUsd);
      this.componentTokens.set(componentId, (this.componentTokens.get(componentId) ?? 0) + usage.totalTokens);
    }
    this.onRecord?.(phase, componentId, usage);
  }

  get total(): number {
    return this.totalCost;
  }

  /** Deep copy; later records do not affect a returned snapshot. */
  snapshot(): CostSnapshot {
    return {
      totalCost: this.totalCost,
      totalTokens: this.totalTokens,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      invocations: this.invocations,
      phaseCosts: { ...this.phaseCosts },
      phaseTokens: { ...this.phaseTokens },
      componentCosts: Object.fromEntries(this.componentCosts),
      componentTokens: Object.fromEntries(this.componentTokens),
    };
  }
}
