import { describe, expect, it } from 'vitest';
import { ArchitectureAgent } from '../../../src/agents/architecture-agent.js';
import { AgentInvoker } from '../../../src/agents/invoker.js';
import type { RepoSnapshot } from '../../../src/types/build.js';
import type { TokenUsage } from '../../../src/types/events.js';
import { ArchitectureUnresolvedError } from '../../../src/utils/errors.js';
import { component, fakeBackend, manifestJson, type Responder } from '../../helpers/fake-backend.js';

const snapshot: RepoSnapshot = {
  root: '/repo',
  files: new Map([
    ['services/api/main.ts', 'h1'],
    ['services/web/app.tsx', 'h2'],
    ['README.md', 'h3'],
  ]),
};

function agent(responder: Responder) {
  const backend = fakeBackend(responder);
  const invoker = new AgentInvoker({
    backend,
    model: 'sonnet',
    timeoutMs: 5_000,
    idleTimeoutMs: 5_000,
    abortInFlightOnCancel: false,
  });
  return { backend, agent: new ArchitectureAgent(invoker, { projectName: 'shop', maxTurns: 200 }) };
}

describe('ArchitectureAgent', () => {
  it('proposes a manifest and adds root for unclaimed files', async () => {
    const { backend, agent: architecture } = agent(() => ({
      text: manifestJson([component('api', ['services/api/**']), component('web', ['services/web/**'], ['api'])]),
      inputTokens: 10,
      outputTokens: 20,
      costUsd: 0.01,
    }));
    const usages: TokenUsage[] = [];
    const { manifest, usage } = await architecture.propose(snapshot, { onUsage: (u) => usages.push(u) });

    expect(manifest.systemType).toBe('microservices');
    expect(manifest.components.map((c) => c.id)).toEqual(['api', 'web', 'root']);
    expect(manifest.components[1]?.relationships).toEqual(['api']);
    expect(usage.totalTokens).toBe(30);
    expect(usages).toEqual([usage]);

    const request = backend.run.mock.calls[0]?.[0];
    expect(request?.role).toBe('architecture');
    expect(request?.readablePaths).toEqual(['services/api/main.ts', 'services/web/app.tsx', 'README.md']);
  });

  it('throws ArchitectureUnresolvedError when the call fails', async () => {
    const { agent: architecture } = agent(() => {
      throw new Error('offline');
    });
    await expect(architecture.propose(snapshot)).rejects.toThrow(
      new ArchitectureUnresolvedError('Architecture analysis failed (BackendError): offline'),
    );
  });

  it('throws ArchitectureUnresolvedError when no JSON is returned', async () => {
    const { agent: architecture } = agent(() => ({ text: 'I could not decide.' }));
    await expect(architecture.propose(snapshot)).rejects.toThrow(ArchitectureUnresolvedError);
  });

  it('reports duplicate ids as an unresolved architecture', async () => {
    const { agent: architecture } = agent(() => ({
      text: manifestJson([component('api', ['a/**']), component('API', ['b/**'])]),
    }));
    const err: unknown = await architecture.propose(snapshot).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ArchitectureUnresolvedError);
    expect(err).toHaveProperty('message', 'Architecture manifest rejected: Duplicate component id "API"');
    expect(err).toHaveProperty('cause.name', 'ManifestError');
    expect(err).toHaveProperty('cause.componentId', 'API');
  });
});
