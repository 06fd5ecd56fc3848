// packages/core/src/agents/invoker.ts — Uniform call contract to the analysis capability

import type { CancellationToken } from '../engine/cancellation.js';
import { emptyUsage } from '../models/cost-tracker.js';
import { calculateCost } from '../models/pricing.js';
import type {
  AgentBackend,
  AgentFailure,
  AgentFailureKind,
  AgentOutcome,
  AgentProgress,
  AgentRequest,
  BackendResult,
} from '../types/agents.js';
import type { TokenUsage } from '../types/events.js';
import type { Logger } from '../utils/logger.js';

export interface AgentInvokerOptions {
  backend: AgentBackend;
  /** Model id used for pricing when the backend reports none */
  model: string;
  timeoutMs: number;
  idleTimeoutMs: number;
  /** Abort dispatched calls when the build is cancelled */
  abortInFlightOnCancel: boolean;
  logger?: Logger;
}

export interface InvokeOptions {
  token?: CancellationToken;
  onProgress?: (progress: AgentProgress) => void;
}

interface Abort {
  kind: AgentFailureKind;
  message: string;
}

/**
 * Wraps one backend call with a turn ceiling, an idle timeout, an absolute
 * timeout and optional cancellation. Never throws and never retries:
 * every problem comes back as an AgentFailure value.
 */
export class AgentInvoker {
  constructor(private options: AgentInvokerOptions) {}

  async invoke(request: AgentRequest, options?: InvokeOptions): Promise<AgentOutcome> {
    const start = Date.now();
    const { backend, timeoutMs, idleTimeoutMs } = this.options;
    const token = options?.token;
    let turns = 0;

    if (token?.isCancelled) {
      return this.failure(request, 'Cancelled', 'Build cancelled before dispatch', 0, emptyUsage(), start);
    }

    const controller = new AbortController();
    const state: { aborted: Abort | null } = { aborted: null };
    let rejectAbort: (abort: Abort) => void = () => {};
    const abortPromise = new Promise<never>((_, reject) => {
      rejectAbort = reject;
    });

    const abort = (kind: AgentFailureKind, message: string): void => {
      if (state.aborted) return;
      const reason = { kind, message };
      state.aborted = reason;
      controller.abort();
      rejectAbort(reason);
    };

    const absoluteTimer = setTimeout(
      () => abort('Timeout', `No result within ${timeoutMs}ms`),
      timeoutMs,
    );
    let idleTimer = setTimeout(
      () => abort('Timeout', `No progress for ${idleTimeoutMs}ms`),
      idleTimeoutMs,
    );

    const onProgress = (progress: AgentProgress): void => {
      if (state.aborted) return;
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => abort('Timeout', `No progress for ${idleTimeoutMs}ms`), idleTimeoutMs);
      if (progress.kind === 'turn') {
        turns += 1;
        if (turns > request.maxTurns) {
          abort('BudgetExceeded', `Exceeded ${request.maxTurns} turns`);
          return;
        }
      }
      try {
        options?.onProgress?.(progress);
      } catch {
        // callback error isolation
      }
    };

    const disposeCancel =
      token && this.options.abortInFlightOnCancel
        ? token.onCancel(() => abort('Cancelled', token.reason ?? 'Build cancelled'))
        : undefined;

    const call = backend.run(request, { signal: controller.signal, onProgress });
    // A backend that ignores the signal settles later; that late result is discarded
    void call.catch((err: unknown) => {
      if (state.aborted) {
        this.options.logger?.debug(`${request.role}:${request.label} settled after abort: ${describe(err)}`);
      }
    });

    try {
      const result = await Promise.race([call, abortPromise]);
      const usage = this.usageFrom(result);
      const reportedTurns = Math.max(turns, result.turns ?? 0);
      if (result.budgetExhausted || reportedTurns > request.maxTurns) {
        return this.failure(
          request,
          'BudgetExceeded',
          `Turn budget of ${request.maxTurns} exhausted`,
          reportedTurns,
          usage,
          start,
        );
      }
      return {
        ok: true,
        role: request.role,
        text: result.text,
        turns: reportedTurns,
        usage,
        durationMs: Date.now() - start,
      };
    } catch (err) {
      const reason = state.aborted;
      if (reason) {
        return this.failure(request, reason.kind, reason.message, turns, emptyUsage(), start);
      }
      return this.failure(request, 'BackendError', describe(err), turns, emptyUsage(), start);
    } finally {
      clearTimeout(absoluteTimer);
      clearTimeout(idleTimer);
      disposeCancel?.();
    }
  }

  private usageFrom(result: BackendResult): TokenUsage {
    const inputTokens = result.inputTokens ?? 0;
    const outputTokens = result.outputTokens ?? 0;
    const costUsd =
      result.costUsd ?? calculateCost(result.model ?? this.options.model, inputTokens, outputTokens);
    return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens, costUsd };
  }

  private failure(
    request: AgentRequest,
    kind: AgentFailureKind,
    message: string,
    turns: number,
    usage: TokenUsage,
    start: number,
  ): AgentFailure {
    this.options.logger?.warn(`${request.role}:${request.label} failed (${kind}): ${message}`);
    return { ok: false, role: request.role, kind, message, turns, usage, durationMs: Date.now() - start };
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
