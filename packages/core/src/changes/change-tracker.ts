// packages/core/src/changes/change-tracker.ts — Fingerprint diffing, ownership and component selection

import { minimatch } from 'minimatch';
import type {
  BuildMode,
  ChangeSet,
  FileFingerprintIndex,
  RepoSnapshot,
} from '../types/build.js';
import type { ArchitectureManifest, ComponentDescriptor, Ownership } from '../types/manifest.js';

function sorted(paths: Iterable<string>): string[] {
  return [...paths].sort();
}

export function emptyChangeSet(): ChangeSet {
  return { added: [], modified: [], removed: [], unchanged: [] };
}

export function isEmptyChangeSet(changes: ChangeSet): boolean {
  return changes.added.length === 0 && changes.modified.length === 0 && changes.removed.length === 0;
}

/**
 * Diff a snapshot against the prior index.
 * modified: fingerprint differs. added: absent from the index. removed: absent from the snapshot.
 */
export function computeChangeSet(snapshot: RepoSnapshot, prior: FileFingerprintIndex): ChangeSet {
  const added: string[] = [];
  const modified: string[] = [];
  const unchanged: string[] = [];
  for (const [path, fingerprint] of snapshot.files) {
    const previous = prior.entries.get(path);
    if (previous === undefined) added.push(path);
    else if (previous !== fingerprint) modified.push(path);
    else unchanged.push(path);
  }
  const removed: string[] = [];
  for (const path of prior.entries.keys()) {
    if (!snapshot.files.has(path)) removed.push(path);
  }
  return {
    added: added.sort(),
    modified: modified.sort(),
    removed: removed.sort(),
    unchanged: unchanged.sort(),
  };
}

/**
 * Produce the next index generation from a snapshot.
 * Deleted paths are pruned. Paths for which `holdBack` returns true keep their
 * prior entry (or stay absent), so the next incremental run still sees them as changed.
 */
export function updateIndex(
  prior: FileFingerprintIndex,
  snapshot: RepoSnapshot,
  options?: { holdBack?: (path: string) => boolean; now?: number },
): FileFingerprintIndex {
  const holdBack = options?.holdBack;
  const entries = new Map<string, string>();
  for (const path of sorted(snapshot.files.keys())) {
    const current = snapshot.files.get(path);
    if (current === undefined) continue;
    if (holdBack?.(path)) {
      const previous = prior.entries.get(path);
      if (previous !== undefined) entries.set(path, previous);
      continue;
    }
    entries.set(path, current);
  }
  return {
    generation: prior.generation + 1,
    updatedAt: options?.now ?? Date.now(),
    entries,
  };
}

export function componentMatches(component: ComponentDescriptor, path: string): boolean {
  return component.globs.some((glob) => minimatch(path, glob, { dot: true }));
}

/**
 * Assign each path to the first component in manifest order whose globs match.
 * Unmatched paths are left out of the map.
 */
export function resolveOwnership(
  manifest: Pick<ArchitectureManifest, 'components'>,
  paths: Iterable<string>,
): Map<string, string> {
  const ownership = new Map<string, string>();
  for (const path of paths) {
    const owner = manifest.components.find((c) => componentMatches(c, path));
    if (owner) ownership.set(path, owner.id);
  }
  return ownership;
}

/**
 * Decide which components to regenerate. Full mode selects all of them.
 * Incremental mode selects components without committed output, plus every
 * component owning an added or modified path. Removed paths alone do not
 * select a component. Result follows manifest order.
 */
export function selectComponents(
  manifest: ArchitectureManifest,
  ownership: Ownership,
  changes: ChangeSet,
  mode: BuildMode,
  hasCommittedOutput: (componentId: string) => boolean = () => true,
): ComponentDescriptor[] {
  if (mode === 'full') return [...manifest.components];

  const touched = new Set<string>();
  for (const path of [...changes.added, ...changes.modified]) {
    const owner = ownership.get(path);
    if (owner !== undefined) touched.add(owner);
  }
  return manifest.components.filter((c) => touched.has(c.id) || !hasCommittedOutput(c.id));
}
