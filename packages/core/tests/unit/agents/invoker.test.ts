import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AgentInvoker } from '../../../src/agents/invoker.js';
import { CancellationToken } from '../../../src/engine/cancellation.js';
import type { ArchitectureRequest, BackendResult } from '../../../src/types/agents.js';
import { fakeBackend, hangUntilAborted } from '../../helpers/fake-backend.js';

const request: ArchitectureRequest = {
  role: 'architecture',
  label: 'architecture',
  cwd: '/repo',
  readablePaths: ['a.ts'],
  maxTurns: 3,
  projectName: 'demo',
};

function invoker(backend: ReturnType<typeof fakeBackend>, overrides?: { abortInFlightOnCancel?: boolean }) {
  return new AgentInvoker({
    backend,
    model: 'claude-sonnet-4-20250514',
    timeoutMs: 10_000,
    idleTimeoutMs: 1_000,
    abortInFlightOnCancel: overrides?.abortInFlightOnCancel ?? false,
  });
}

describe('AgentInvoker', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns output with usage from the backend', async () => {
    const backend = fakeBackend(() => ({ text: 'ok', inputTokens: 10, outputTokens: 5, costUsd: 0.5, turns: 2 }));
    const outcome = await invoker(backend).invoke(request);
    expect(outcome).toMatchObject({
      ok: true,
      role: 'architecture',
      text: 'ok',
      turns: 2,
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15, costUsd: 0.5 },
    });
  });

  it('prices usage from the model when the backend reports no cost', async () => {
    const backend = fakeBackend(() => ({ text: 'ok', inputTokens: 1_000_000, outputTokens: 0 }));
    const outcome = await invoker(backend).invoke(request);
    expect(outcome.usage.costUsd).toBe(3);
  });

  it('fails with BudgetExceeded once progress passes the turn ceiling', async () => {
    const backend = fakeBackend((_, options) => {
      for (let i = 0; i < 4; i++) options.onProgress({ kind: 'turn' });
      return hangUntilAborted(options);
    });
    const outcome = await invoker(backend).invoke(request);
    expect(outcome).toMatchObject({ ok: false, kind: 'BudgetExceeded', message: 'Exceeded 3 turns' });
    expect(backend.run.mock.calls[0]?.[1].signal.aborted).toBe(true);
  });

  it('fails with BudgetExceeded when the backend reports exhaustion', async () => {
    const backend = fakeBackend(() => ({ text: 'partial', turns: 3, budgetExhausted: true, inputTokens: 4, outputTokens: 4 }));
    const outcome = await invoker(backend).invoke(request);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.kind).toBe('BudgetExceeded');
      // usage of the exhausted call still counts
      expect(outcome.usage.totalTokens).toBe(8);
    }
  });

  it('fails with Timeout after the idle window without progress', async () => {
    const backend = fakeBackend((_, options) => hangUntilAborted(options));
    const pending = invoker(backend).invoke(request);
    await vi.advanceTimersByTimeAsync(1_000);
    const outcome = await pending;
    expect(outcome).toMatchObject({ ok: false, kind: 'Timeout', message: 'No progress for 1000ms' });
  });

  it('progress keeps the call alive until the absolute timeout', async () => {
    const backend = fakeBackend((_, options) => {
      const timer = setInterval(() => options.onProgress({ kind: 'activity', detail: 'Read' }), 500);
      options.signal.addEventListener('abort', () => clearInterval(timer), { once: true });
      return hangUntilAborted(options);
    });
    const pending = invoker(backend).invoke(request);
    await vi.advanceTimersByTimeAsync(10_000);
    const outcome = await pending;
    expect(outcome).toMatchObject({ ok: false, kind: 'Timeout', message: 'No result within 10000ms' });
  });

  it('turns thrown backend errors into BackendError', async () => {
    const backend = fakeBackend(() => {
      throw new Error('spawn claude ENOENT');
    });
    const outcome = await invoker(backend).invoke(request);
    expect(outcome).toMatchObject({ ok: false, kind: 'BackendError', message: 'spawn claude ENOENT' });
  });

  it('does not dispatch when the token is already cancelled', async () => {
    const backend = fakeBackend(() => ({ text: 'ok' }));
    const token = new CancellationToken();
    token.cancel();
    const outcome = await invoker(backend).invoke(request, { token });
    expect(outcome).toMatchObject({ ok: false, kind: 'Cancelled' });
    expect(backend.run).not.toHaveBeenCalled();
  });

  it('lets an in-flight call finish after cancel by default', async () => {
    let finish: (text: string) => void = () => {};
    const backend = fakeBackend(
      () =>
        new Promise<BackendResult>((resolve) => {
          finish = (text) => resolve({ text });
        }),
    );
    const token = new CancellationToken();
    const pending = invoker(backend).invoke(request, { token });
    token.cancel();
    finish('late but complete');
    const outcome = await pending;
    expect(outcome).toMatchObject({ ok: true, text: 'late but complete' });
  });

  it('aborts an in-flight call on cancel when configured to', async () => {
    const backend = fakeBackend((_, options) => hangUntilAborted(options));
    const token = new CancellationToken();
    const pending = invoker(backend, { abortInFlightOnCancel: true }).invoke(request, { token });
    token.cancel('stop now');
    const outcome = await pending;
    expect(outcome).toMatchObject({ ok: false, kind: 'Cancelled', message: 'stop now' });
  });

  it('isolates errors thrown by the progress callback', async () => {
    const backend = fakeBackend((_, options) => {
      options.onProgress({ kind: 'turn' });
      return { text: 'ok', turns: 1 };
    });
    const outcome = await invoker(backend).invoke(request, {
      onProgress: () => {
        throw new Error('listener bug');
      },
    });
    expect(outcome.ok).toBe(true);
  });
});
