import { mkdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AgentInvoker } from '../../../src/agents/invoker.js';
import {
  checkCompleteness,
  creditFixes,
  meanConfidence,
  ValidationAgent,
  type ValidationAgentOptions,
} from '../../../src/agents/validation-agent.js';
import { StagingArea } from '../../../src/output/staging.js';
import type { AppliedFix } from '../../../src/types/results.js';
import type { ArchitectureManifest } from '../../../src/types/manifest.js';
import { hashContent } from '../../../src/utils/hash.js';
import {
  checkJson,
  completeSections,
  component,
  fakeBackend,
  fileBlocks,
  type Responder,
} from '../../helpers/fake-backend.js';

const TEST_DIR = join(tmpdir(), `membank-validation-${process.pid}-${Date.now()}`);
const MIN_CHARS = 40;
const FIXED_PATTERNS = 'Corrected system patterns describing the framework actually in use.';

const api = component('api', ['services/api/**'], ['web']);
const web = component('web', ['services/web/**']);
const manifest: ArchitectureManifest = {
  systemType: 'microservices',
  summary: 'two services',
  components: [api, web],
  generatedAt: '2026-01-01T00:00:00.000Z',
};

let staging: StagingArea;

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
  staging = new StagingArea(TEST_DIR, 'bld_val');
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

async function stage(docs: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(docs)) {
    await staging.write('api', path, content);
  }
}

function agent(responder: Responder, overrides?: Partial<ValidationAgentOptions>) {
  const backend = fakeBackend(responder);
  const invoker = new AgentInvoker({
    backend,
    model: 'sonnet',
    timeoutMs: 5_000,
    idleTimeoutMs: 5_000,
    abortInFlightOnCancel: false,
  });
  const validator = new ValidationAgent(invoker, {
    maxTurns: { validation: 50, fix: 25 },
    minSectionChars: MIN_CHARS,
    acceptanceThreshold: 0.7,
    fixPolicy: 'accept',
    ...overrides,
  });
  return { backend, validator };
}

const ctx = (onFix?: (fix: AppliedFix) => void) => ({
  manifest,
  repoRoot: '/repo',
  ownedPaths: ['services/api/main.ts'],
  staging,
  onFix,
});

describe('checkCompleteness', () => {
  it('scores the share of sections that pass', () => {
    const docs = completeSections('api', MIN_CHARS);
    docs['progress.md'] = 'short';
    docs['techContext.md'] = `${docs['techContext.md'] ?? ''}\nTBD`;
    delete docs['tasks/_index.md'];

    const { score, issues } = checkCompleteness(docs, MIN_CHARS);
    expect(score).toBeCloseTo(4 / 7, 10);
    expect(issues.map((i) => [i.id, i.section, i.severity])).toEqual([
      ['completeness-1', 'techContext.md', 'medium'],
      ['completeness-2', 'progress.md', 'medium'],
      ['completeness-3', 'tasks/_index.md', 'high'],
    ]);
    expect(issues[1]?.description).toBe('Section progress.md has 5 characters; at least 40 required');
  });
});

describe('creditFixes / meanConfidence', () => {
  it('credits fixed issues toward a full score', () => {
    expect(creditFixes(0.5, 2, 1)).toBeCloseTo(0.75, 10);
    expect(creditFixes(0.5, 0, 0)).toBe(0.5);
  });

  it('averages the three dimensions', () => {
    expect(meanConfidence({ completeness: 1, accuracy: 0.5, consistency: 0.6 })).toBeCloseTo(0.7, 10);
  });
});

describe('ValidationAgent', () => {
  it('fixes reported issues and credits them under the accept policy', async () => {
    await stage(completeSections('api', MIN_CHARS));
    const { backend, validator } = agent((request) => {
      if (request.role === 'validation') {
        return {
          text: checkJson(0.6, 0.8, [
            { dimension: 'accuracy', section: 'systemPatterns.md', severity: 'high', description: 'wrong framework' },
          ]),
        };
      }
      return { text: fileBlocks({ 'systemPatterns.md': FIXED_PATTERNS }) };
    });
    const fixes: AppliedFix[] = [];
    const report = await validator.validate(api, ctx((f) => fixes.push(f)));

    expect(report.issues.map((i) => i.id)).toEqual(['accuracy-1']);
    expect(report.fixes).toEqual([
      {
        issueId: 'accuracy-1',
        section: 'systemPatterns.md',
        applied: true,
        fingerprint: hashContent(`${FIXED_PATTERNS}\n`),
        failure: null,
      },
    ]);
    expect(fixes).toEqual(report.fixes);
    expect(report.scores.completeness).toBe(1);
    expect(report.scores.accuracy).toBeCloseTo(1, 10);
    expect(report.scores.consistency).toBe(0.8);
    expect(report.confidence).toBeCloseTo(2.8 / 3, 10);
    expect(report.needsReview).toBe(false);
    expect(await staging.read('api', 'systemPatterns.md')).toBe(`${FIXED_PATTERNS}\n`);
    // one check plus one fix
    expect(backend.run).toHaveBeenCalledTimes(2);
  });

  it('passes siblings as read-only context to the check', async () => {
    await stage(completeSections('api', MIN_CHARS));
    const { backend, validator } = agent(() => ({ text: checkJson(1, 1) }));
    await validator.validate(api, ctx());
    const request = backend.run.mock.calls[0]?.[0];
    expect(request?.role).toBe('validation');
    if (request?.role === 'validation') {
      expect(request.siblings.map((c) => c.id)).toEqual(['web']);
      expect(Object.keys(request.documents)).toHaveLength(7);
    }
  });

  it('writes a missing section through a fix', async () => {
    const docs = completeSections('api', MIN_CHARS);
    const progress = docs['progress.md'] ?? '';
    delete docs['progress.md'];
    await stage(docs);

    const { backend, validator } = agent((request) =>
      request.role === 'validation' ? { text: checkJson(1, 1) } : { text: fileBlocks({ 'progress.md': progress }) },
    );
    const report = await validator.validate(api, ctx());

    expect(report.issues.map((i) => [i.id, i.section, i.severity])).toEqual([['completeness-1', 'progress.md', 'high']]);
    expect(report.fixes[0]?.applied).toBe(true);
    expect(report.scores.completeness).toBe(1);
    expect(report.confidence).toBe(1);
    const fixRequest = backend.run.mock.calls[1]?.[0];
    expect(fixRequest?.role === 'fix' ? fixRequest.currentContent : 'not a fix').toBeNull();
  });

  it('keeps the original score for an issue whose fix fails', async () => {
    await stage(completeSections('api', MIN_CHARS));
    const { validator } = agent((request) => {
      if (request.role === 'fix') throw new Error('fix crashed');
      return { text: checkJson(0.5, 0.5, [{ dimension: 'consistency', section: 'progress.md' }]) };
    });
    const report = await validator.validate(api, ctx());

    expect(report.fixes).toEqual([
      {
        issueId: 'consistency-1',
        section: 'progress.md',
        applied: false,
        fingerprint: null,
        failure: { kind: 'BackendError', message: 'fix crashed' },
      },
    ]);
    expect(report.scores.consistency).toBe(0.5);
    expect(report.confidence).toBeCloseTo(2 / 3, 10);
    expect(report.needsReview).toBe(true);
  });

  it('re-checks after fixes under the recheck policy', async () => {
    await stage(completeSections('api', MIN_CHARS));
    let checks = 0;
    const { backend, validator } = agent(
      (request) => {
        if (request.role === 'fix') return { text: fileBlocks({ 'systemPatterns.md': FIXED_PATTERNS }) };
        checks += 1;
        return checks === 1
          ? { text: checkJson(0.5, 0.9, [{ dimension: 'accuracy', section: 'systemPatterns.md' }]) }
          : { text: checkJson(0.8, 0.7) };
      },
      { fixPolicy: 'recheck' },
    );
    const report = await validator.validate(api, ctx());

    expect(backend.run).toHaveBeenCalledTimes(3);
    expect(report.scores.accuracy).toBe(0.8);
    expect(report.scores.consistency).toBe(0.7);
    expect(report.confidence).toBeCloseTo(2.5 / 3, 10);
  });

  it('returns a zero-confidence report when the validator output is unusable', async () => {
    await stage(completeSections('api', MIN_CHARS));
    const { validator } = agent(() => ({ text: 'Looks fine to me.' }));
    const report = await validator.validate(api, ctx());

    expect(report.confidence).toBe(0);
    expect(report.needsReview).toBe(true);
    expect(report.failure).toEqual({
      kind: 'InvalidOutput',
      message: 'Validation output did not match the expected JSON',
    });
    expect(report.fixes).toEqual([]);
  });
});
