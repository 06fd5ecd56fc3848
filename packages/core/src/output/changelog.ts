// packages/core/src/output/changelog.ts — Newest-first build changelog

import { existsSync } from 'node:fs';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { BuildMode, ChangelogEntry } from '../types/build.js';
import type { ArchitectureManifest } from '../types/manifest.js';
import type { ComponentResult, ValidationReport } from '../types/results.js';

const HEADER = '# Changelog\n';

export interface ChangelogInput {
  jobId: string;
  mode: BuildMode;
  timestamp: string;
  manifest: ArchitectureManifest;
  /** Component ids of the previously committed manifest */
  previousComponentIds: ReadonlySet<string>;
  results: readonly ComponentResult[];
  reports: readonly ValidationReport[];
}

/**
 * Classify components for one build. Added and removed compare the manifests;
 * modified means an existing component was regenerated; failed components
 * appear only under failed.
 */
export function buildChangelogEntry(input: ChangelogInput): ChangelogEntry {
  const byId = new Map(input.results.map((r) => [r.componentId, r]));
  const added: string[] = [];
  const modified: string[] = [];
  const unchanged: string[] = [];
  const failed: ChangelogEntry['failed'] = [];

  for (const c of input.manifest.components) {
    const result = byId.get(c.id);
    if (result && !result.success) {
      failed.push({
        id: c.id,
        kind: result.failure?.kind ?? 'BackendError',
        message: result.failure?.message ?? 'unknown failure',
      });
    } else if (!input.previousComponentIds.has(c.id)) {
      added.push(c.id);
    } else if (result) {
      modified.push(c.id);
    } else {
      unchanged.push(c.id);
    }
  }

  const current = new Set(input.manifest.components.map((c) => c.id));
  const removed = [...input.previousComponentIds].filter((id) => !current.has(id)).sort();

  const needsReview = input.reports
    .filter((r) => r.needsReview)
    .map((r) => ({
      id: r.componentId,
      confidence: r.confidence,
      reason: r.failure?.kind ?? ('LowConfidence' as const),
    }));

  return {
    timestamp: input.timestamp,
    jobId: input.jobId,
    mode: input.mode,
    added,
    modified,
    removed,
    unchanged,
    failed,
    needsReview,
  };
}

function list(ids: readonly string[]): string {
  return ids.length > 0 ? ids.join(', ') : 'none';
}

export function renderChangelogEntry(entry: ChangelogEntry): string {
  const lines = [
    `## ${entry.timestamp} (${entry.jobId}, ${entry.mode})`,
    '',
    `- Added: ${list(entry.added)}`,
    `- Modified: ${list(entry.modified)}`,
    `- Removed: ${list(entry.removed)}`,
    `- Unchanged: ${list(entry.unchanged)}`,
  ];
  if (entry.failed.length > 0) {
    lines.push('- Failed:');
    for (const f of entry.failed) lines.push(`  - ${f.id} (${f.kind}): ${f.message}`);
  }
  if (entry.needsReview.length > 0) {
    lines.push('- Needs review:');
    for (const r of entry.needsReview) {
      lines.push(`  - ${r.id} (confidence ${r.confidence.toFixed(2)}, ${r.reason})`);
    }
  }
  return `${lines.join('\n')}\n`;
}

/** Insert an entry directly under the header, above older entries. */
export async function prependChangelog(path: string, entry: ChangelogEntry): Promise<void> {
  const existing = existsSync(path) ? await readFile(path, 'utf-8') : '';
  const body = existing.startsWith(HEADER) ? existing.slice(HEADER.length).replace(/^\n+/, '') : existing;
  await mkdir(dirname(path), { recursive: true });
  const rest = body.length > 0 ? `\n${body}` : '';
  await writeFile(path, `${HEADER}\n${renderChangelogEntry(entry)}${rest}`, 'utf-8');
}
