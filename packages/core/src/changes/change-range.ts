// packages/core/src/changes/change-range.ts — ChangeSet from an explicit source-control range

import type { ChangeRange, ChangeSet, RepoSnapshot } from '../types/build.js';
import { gitNameStatus, type NameStatusReader } from './git.js';

interface PathChanges {
  added: Set<string>;
  modified: Set<string>;
  removed: Set<string>;
}

function newChanges(): PathChanges {
  return { added: new Set(), modified: new Set(), removed: new Set() };
}

function unquote(path: string): string {
  const trimmed = path.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/\\"/g, '"').replace(/\\\\/g, '\\');
  }
  return trimmed;
}

/**
 * Parse a literal unified diff (git flavour). Each `diff --git a/x b/y`
 * header starts a file; `new file mode`, `deleted file mode` and
 * `rename from`/`rename to` lines refine what happened to it.
 */
export function parseUnifiedDiff(diff: string): PathChanges {
  const changes = newChanges();
  let current: { oldPath: string; newPath: string; kind: 'added' | 'modified' | 'removed' | 'renamed' } | null =
    null;
  let renameFrom: string | null = null;
  let renameTo: string | null = null;

  const flush = (): void => {
    if (!current) return;
    switch (current.kind) {
      case 'added':
        changes.added.add(current.newPath);
        break;
      case 'removed':
        changes.removed.add(current.oldPath);
        break;
      case 'renamed':
        changes.removed.add(renameFrom ?? current.oldPath);
        changes.added.add(renameTo ?? current.newPath);
        break;
      default:
        changes.modified.add(current.newPath);
    }
    current = null;
    renameFrom = null;
    renameTo = null;
  };

  for (const line of diff.split(/\r?\n/)) {
    const header = /^diff --git (?:"?a\/)(.+?)"? (?:"?b\/)(.+?)"?$/.exec(line);
    if (header) {
      flush();
      current = { oldPath: unquote(header[1] ?? ''), newPath: unquote(header[2] ?? ''), kind: 'modified' };
      continue;
    }
    if (!current) continue;
    if (line.startsWith('new file mode')) {
      current.kind = 'added';
    } else if (line.startsWith('deleted file mode')) {
      current.kind = 'removed';
    } else if (line.startsWith('rename from ')) {
      current.kind = 'renamed';
      renameFrom = unquote(line.slice('rename from '.length));
    } else if (line.startsWith('rename to ')) {
      current.kind = 'renamed';
      renameTo = unquote(line.slice('rename to '.length));
    }
  }
  flush();
  return changes;
}

/**
 * Parse `git diff --name-status` output. A, M, D and R (old then new path)
 * are understood; C counts as an addition, T as a modification.
 */
export function parseNameStatus(output: string): PathChanges {
  const changes = newChanges();
  for (const raw of output.split(/\r?\n/)) {
    if (raw.trim().length === 0) continue;
    const fields = raw.split('\t');
    const status = fields[0]?.trim() ?? '';
    const first = fields[1] !== undefined ? unquote(fields[1]) : '';
    const second = fields[2] !== undefined ? unquote(fields[2]) : '';
    if (!first) continue;
    switch (status.charAt(0)) {
      case 'A':
        changes.added.add(first);
        break;
      case 'D':
        changes.removed.add(first);
        break;
      case 'R':
        changes.removed.add(first);
        if (second) changes.added.add(second);
        break;
      case 'C':
        changes.added.add(second || first);
        break;
      case 'M':
      case 'T':
        changes.modified.add(first);
        break;
      default:
        break;
    }
  }
  return changes;
}

/**
 * Build a ChangeSet from an explicit range. Added and modified paths are kept
 * only when the snapshot tracks them (ignored files drop out). Every other
 * snapshot path counts as unchanged.
 */
export async function changeSetFromRange(
  snapshot: RepoSnapshot,
  range: ChangeRange,
  readNameStatus: NameStatusReader = gitNameStatus,
): Promise<ChangeSet> {
  const parsed =
    range.kind === 'diff'
      ? parseUnifiedDiff(range.diff)
      : parseNameStatus(await readNameStatus(snapshot.root, range.revision));

  const added = new Set<string>();
  const modified = new Set<string>();
  const removed = new Set<string>();
  for (const path of parsed.added) {
    if (snapshot.files.has(path)) added.add(path);
  }
  for (const path of parsed.modified) {
    if (snapshot.files.has(path) && !added.has(path)) modified.add(path);
  }
  for (const path of parsed.removed) {
    if (!snapshot.files.has(path)) {
      removed.add(path);
    } else {
      // Removed in the range but present on disk again
      added.delete(path);
      modified.add(path);
    }
  }

  const unchanged: string[] = [];
  for (const path of snapshot.files.keys()) {
    if (!added.has(path) && !modified.has(path)) unchanged.push(path);
  }
  return {
    added: [...added].sort(),
    modified: [...modified].sort(),
    removed: [...removed].sort(),
    unchanged: unchanged.sort(),
  };
}
