// packages/core/src/changes/repo-snapshot.ts — Fingerprint every tracked file under a repository root

import { readdir, realpath } from 'node:fs/promises';
import { join, relative, resolve, sep } from 'node:path';
import type { Ignore } from 'ignore';
import { createIgnoreFilter } from '../config/ignore.js';
import type { RepoSnapshot } from '../types/build.js';
import { hashFile } from '../utils/hash.js';

export interface SnapshotOptions {
  /** Extra ignore patterns (config `ignore`) */
  ignore?: readonly string[];
  /** Absolute directories to leave out, e.g. the build output when it lives inside the repo */
  excludeDirs?: readonly string[];
}

function toPosix(filePath: string): string {
  return filePath.split(sep).join('/');
}

async function walk(
  root: string,
  dir: string,
  ig: Ignore,
  excluded: ReadonlySet<string>,
  out: Map<string, string>,
): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = join(dir, entry.name);
    const rel = toPosix(relative(root, full));
    if (entry.isDirectory()) {
      if (excluded.has(full) || ig.ignores(`${rel}/`)) continue;
      await walk(root, full, ig, excluded, out);
    } else if (entry.isFile()) {
      if (ig.ignores(rel)) continue;
      out.set(rel, await hashFile(full));
    }
    // Symlinks and special files are not followed
  }
}

/**
 * Walk the repository honoring builtin ignores, .gitignore and .membankignore,
 * and fingerprint each file with sha256. Paths are repository-relative with
 * forward slashes.
 */
export async function snapshotRepository(repoPath: string, options?: SnapshotOptions): Promise<RepoSnapshot> {
  const root = await realpath(resolve(repoPath));
  const ig = createIgnoreFilter(root, { extra: options?.ignore });
  const excluded = new Set<string>();
  for (const dir of options?.excludeDirs ?? []) {
    excluded.add(resolve(dir));
    try {
      excluded.add(await realpath(resolve(dir)));
    } catch {
      // Output directory may not exist yet
    }
  }
  const files = new Map<string, string>();
  await walk(root, root, ig, excluded, files);
  return { root, files };
}
