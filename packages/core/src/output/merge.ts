// packages/core/src/output/merge.ts — Commit staged output into the memory-bank tree

import { existsSync } from 'node:fs';
import { cp, mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { validateManifest } from '../agents/manifest.js';
import type { BuildSummary } from '../types/build.js';
import type { ArchitectureManifest } from '../types/manifest.js';
import type { ComponentResult } from '../types/results.js';
import {
  BUILD_SUMMARY_FILE,
  COMPONENTS_DIR,
  MANIFEST_JSON_FILE,
  MANIFEST_MD_FILE,
  MEMORY_BANK_DIR,
} from '../utils/constants.js';
import type { Logger } from '../utils/logger.js';
import type { StagingArea } from './staging.js';
import { renderManifestMarkdown } from './templates.js';

export interface OutputLayout {
  root: string;
  memoryBank: string;
  components: string;
  manifestJson: string;
  manifestMd: string;
  summary: string;
}

export function outputLayout(outputPath: string): OutputLayout {
  const memoryBank = join(outputPath, MEMORY_BANK_DIR);
  return {
    root: outputPath,
    memoryBank,
    components: join(memoryBank, COMPONENTS_DIR),
    manifestJson: join(outputPath, MANIFEST_JSON_FILE),
    manifestMd: join(outputPath, MANIFEST_MD_FILE),
    summary: join(outputPath, BUILD_SUMMARY_FILE),
  };
}

export interface MergeResult {
  replaced: string[];
  kept: string[];
  removed: string[];
}

/** Write through a sibling temp file and rename over the target. */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp-${process.pid}`;
  await writeFile(tmp, content, 'utf-8');
  await rename(tmp, path);
}

export function hasCommittedOutput(layout: OutputLayout, componentId: string): boolean {
  return existsSync(join(layout.components, componentId));
}

/**
 * Read the committed manifest. Returns null when absent or invalid, so the
 * caller falls back to running the architecture phase.
 */
export async function readCommittedManifest(
  layout: OutputLayout,
  logger?: Logger,
): Promise<ArchitectureManifest | null> {
  if (!existsSync(layout.manifestJson)) return null;
  try {
    const raw: unknown = JSON.parse(await readFile(layout.manifestJson, 'utf-8'));
    return validateManifest(raw, logger);
  } catch (err) {
    logger?.warn(`Committed manifest unusable: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Replace each successful component's subtree with its staged files, leave
 * failed components' last committed subtree alone and delete subtrees of
 * components no longer in the manifest.
 */
export async function mergeComponents(
  layout: OutputLayout,
  staging: StagingArea,
  manifest: ArchitectureManifest,
  results: readonly ComponentResult[],
): Promise<MergeResult> {
  await mkdir(layout.components, { recursive: true });
  const replaced: string[] = [];
  const kept: string[] = [];

  for (const result of results) {
    if (!result.success) {
      kept.push(result.componentId);
      continue;
    }
    const target = join(layout.components, result.componentId);
    await rm(target, { recursive: true, force: true });
    const source = staging.componentDir(result.componentId);
    try {
      await rename(source, target);
    } catch {
      // Cross-device staging falls back to a copy
      await cp(source, target, { recursive: true });
    }
    replaced.push(result.componentId);
  }

  const current = new Set(manifest.components.map((c) => c.id));
  const removed: string[] = [];
  for (const entry of await readdir(layout.components, { withFileTypes: true })) {
    if (entry.isDirectory() && !current.has(entry.name)) {
      await rm(join(layout.components, entry.name), { recursive: true, force: true });
      removed.push(entry.name);
    }
  }
  return { replaced, kept, removed: removed.sort() };
}

/** Write the top-level memory-bank documents. */
export async function writeOverview(layout: OutputLayout, documents: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(documents)) {
    await writeFileAtomic(join(layout.memoryBank, ...path.split('/')), content);
  }
}

export async function writeManifest(layout: OutputLayout, manifest: ArchitectureManifest): Promise<void> {
  await writeFileAtomic(layout.manifestJson, `${JSON.stringify(manifest, null, 2)}\n`);
  await writeFileAtomic(layout.manifestMd, renderManifestMarkdown(manifest));
}

export async function writeSummary(layout: OutputLayout, summary: BuildSummary): Promise<void> {
  await writeFileAtomic(layout.summary, `${JSON.stringify(summary, null, 2)}\n`);
}
