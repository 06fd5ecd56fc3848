import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { emptyUsage } from '../../../src/models/cost-tracker.js';
import {
  hasCommittedOutput,
  mergeComponents,
  outputLayout,
  readCommittedManifest,
  writeManifest,
  writeOverview,
} from '../../../src/output/merge.js';
import { StagingArea } from '../../../src/output/staging.js';
import { renderOverview } from '../../../src/output/templates.js';
import type { ArchitectureManifest } from '../../../src/types/manifest.js';
import type { ComponentResult } from '../../../src/types/results.js';
import { component } from '../../helpers/fake-backend.js';

const TEST_DIR = join(tmpdir(), `membank-merge-${process.pid}-${Date.now()}`);

function result(componentId: string, success: boolean): ComponentResult {
  return {
    componentId,
    success,
    files: [],
    fingerprints: {},
    failure: success ? null : { kind: 'BackendError', message: 'boom' },
    attempts: 1,
    elapsedMs: 0,
    usage: emptyUsage(),
  };
}

const manifest: ArchitectureManifest = {
  systemType: 'monolith',
  summary: 'A shop',
  generatedAt: '2026-01-01T00:00:00.000Z',
  components: [component('api', ['api/**'], ['web']), component('web', ['web/**'])],
};

describe('merge', () => {
  const layout = outputLayout(TEST_DIR);
  let staging: StagingArea;

  beforeEach(() => {
    mkdirSync(TEST_DIR, { recursive: true });
    staging = new StagingArea(TEST_DIR, 'bld_m');
  });

  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('replaces successful subtrees, keeps failed ones and removes stale ones', async () => {
    for (const id of ['api', 'web', 'legacy']) {
      mkdirSync(join(layout.components, id), { recursive: true });
      writeFileSync(join(layout.components, id, 'progress.md'), `old ${id}`);
    }
    writeFileSync(join(layout.components, 'api', 'stale.md'), 'stale');
    await staging.write('api', 'progress.md', 'new api');

    const merged = await mergeComponents(layout, staging, manifest, [result('api', true), result('web', false)]);

    expect(merged).toEqual({ replaced: ['api'], kept: ['web'], removed: ['legacy'] });
    expect(readFileSync(join(layout.components, 'api', 'progress.md'), 'utf-8')).toBe('new api');
    expect(existsSync(join(layout.components, 'api', 'stale.md'))).toBe(false);
    expect(readFileSync(join(layout.components, 'web', 'progress.md'), 'utf-8')).toBe('old web');
    expect(hasCommittedOutput(layout, 'legacy')).toBe(false);
  });

  it('writes and reads back the manifest', async () => {
    await writeManifest(layout, manifest);
    expect(await readCommittedManifest(layout)).toEqual(manifest);
    expect(readFileSync(layout.manifestMd, 'utf-8')).toContain('### api (`api`)');
  });

  it('treats an unreadable manifest as absent', async () => {
    writeFileSync(layout.manifestJson, '{ not json');
    expect(await readCommittedManifest(layout)).toBeNull();
  });

  it('writes the top-level sections', async () => {
    const docs = renderOverview({
      projectName: 'Shop',
      manifest,
      results: [result('api', true), result('web', false)],
      reports: [],
      changes: { added: ['a'], modified: [], removed: [], unchanged: ['b', 'c'] },
      timestamp: '2026-03-01T00:00:00.000Z',
    });
    await writeOverview(layout, docs);

    expect(Object.keys(docs).sort()).toEqual([
      'activeContext.md',
      'productContext.md',
      'progress.md',
      'projectbrief.md',
      'systemPatterns.md',
      'tasks/_index.md',
      'techContext.md',
    ]);
    expect(readFileSync(join(layout.memoryBank, 'tasks', '_index.md'), 'utf-8')).toBe(
      '# Tasks\n\n- [ ] Regenerate web (BackendError)\n',
    );
    expect(docs['progress.md']).toBe('# Progress\n\n- api: unchanged\n- web: failed (BackendError)\n');
    expect(docs['systemPatterns.md']).toContain('- api -> web');
  });
});
