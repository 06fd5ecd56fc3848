import { mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ComponentAgent } from '../../../src/agents/component-agent.js';
import { AgentInvoker } from '../../../src/agents/invoker.js';
import { StagingArea } from '../../../src/output/staging.js';
import type { ArchitectureManifest } from '../../../src/types/manifest.js';
import { hashContent } from '../../../src/utils/hash.js';
import { component, fakeBackend, fileBlocks, type Responder } from '../../helpers/fake-backend.js';

const TEST_DIR = join(tmpdir(), `membank-component-${process.pid}-${Date.now()}`);

const api = component('api', ['services/api/**']);
const manifest: ArchitectureManifest = {
  systemType: 'microservices',
  summary: 'an api',
  components: [api],
  generatedAt: '2026-01-01T00:00:00.000Z',
};

let staging: StagingArea;

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
  staging = new StagingArea(TEST_DIR, 'bld_test');
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function agent(responder: Responder) {
  const backend = fakeBackend(responder);
  const invoker = new AgentInvoker({
    backend,
    model: 'sonnet',
    timeoutMs: 5_000,
    idleTimeoutMs: 5_000,
    abortInFlightOnCancel: false,
  });
  return { backend, agent: new ComponentAgent(invoker, { maxTurns: 100 }) };
}

const ctx = () => ({ manifest, ownedPaths: ['services/api/main.ts'], repoRoot: '/repo', staging });

describe('ComponentAgent', () => {
  it('stages every returned document and reports fingerprints', async () => {
    const { backend, agent: generator } = agent(() => ({
      text: fileBlocks({ 'projectbrief.md': '# Brief', 'memory-bank/components/api/tasks/_index.md': '# Tasks' }),
    }));
    const attempt = await generator.generate(api, ctx());

    expect(attempt.ok).toBe(true);
    if (attempt.ok) {
      expect(attempt.files).toEqual(['projectbrief.md', 'tasks/_index.md']);
      expect(attempt.fingerprints['projectbrief.md']).toBe(hashContent('# Brief\n'));
    }
    expect(await staging.read('api', 'tasks/_index.md')).toBe('# Tasks\n');

    const request = backend.run.mock.calls[0]?.[0];
    expect(request?.readablePaths).toEqual(['services/api/main.ts']);
    expect(request?.maxTurns).toBe(100);
  });

  it('fails with InvalidOutput when no documents come back', async () => {
    const { agent: generator } = agent(() => ({ text: 'Nothing to say.' }));
    const attempt = await generator.generate(api, ctx());
    expect(attempt).toMatchObject({ ok: false, failure: { kind: 'InvalidOutput' } });
  });

  it('fails with OutputConflict when a path is written twice', async () => {
    const { agent: generator } = agent(() => ({
      text: fileBlocks({ 'progress.md': 'one' }) + '\n' + fileBlocks({ './progress.md': 'two' }),
    }));
    const attempt = await generator.generate(api, ctx());
    expect(attempt).toMatchObject({ ok: false, failure: { kind: 'OutputConflict' } });
  });

  it('passes invocation failures through with their usage', async () => {
    const { agent: generator } = agent((_, options) => {
      for (let i = 0; i < 101; i++) options.onProgress({ kind: 'turn' });
      return { text: '' };
    });
    const attempt = await generator.generate(api, ctx());
    expect(attempt).toMatchObject({ ok: false, failure: { kind: 'BudgetExceeded' } });
  });
});
