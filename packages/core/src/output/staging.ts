// packages/core/src/output/staging.ts — Per-build staging area for component documents

import { existsSync } from 'node:fs';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { dirname, join, relative, sep } from 'node:path';
import { normalizeDocumentPath } from '../agents/documents.js';
import { COMPONENTS_DIR, STAGING_DIR, STATE_DIR } from '../utils/constants.js';
import { OutputConflictError } from '../utils/errors.js';
import { hashContent } from '../utils/hash.js';

/**
 * Staged files live under `<output>/.membank/staging/<jobId>/components/<id>/`.
 * A path can be written once per build; a retry must `reset` the component
 * first, and validation fixes go through `replace`.
 */
export class StagingArea {
  readonly root: string;
  private claimed = new Map<string, Set<string>>();

  constructor(outputPath: string, jobId: string) {
    this.root = join(outputPath, STATE_DIR, STAGING_DIR, jobId);
  }

  componentDir(componentId: string): string {
    return join(this.root, COMPONENTS_DIR, componentId);
  }

  async write(componentId: string, path: string, content: string): Promise<string> {
    const safe = this.safePath(path);
    const claimed = this.claimed.get(componentId) ?? new Set<string>();
    if (claimed.has(safe)) {
      throw new OutputConflictError(`Output path "${componentId}/${safe}" already written in this build`, safe);
    }
    claimed.add(safe);
    this.claimed.set(componentId, claimed);
    await this.put(componentId, safe, content);
    return hashContent(content);
  }

  /** Overwrite a path this component already staged. */
  async replace(componentId: string, path: string, content: string): Promise<string> {
    const safe = this.safePath(path);
    const claimed = this.claimed.get(componentId) ?? new Set<string>();
    claimed.add(safe);
    this.claimed.set(componentId, claimed);
    await this.put(componentId, safe, content);
    return hashContent(content);
  }

  async read(componentId: string, path: string): Promise<string | null> {
    const full = join(this.componentDir(componentId), this.safePath(path));
    if (!existsSync(full)) return null;
    return readFile(full, 'utf-8');
  }

  /** Staged documents of a component, keyed by relative path. */
  async readAll(componentId: string): Promise<Record<string, string>> {
    const dir = this.componentDir(componentId);
    const docs: Record<string, string> = {};
    for (const file of await listFiles(dir)) {
      docs[file] = await readFile(join(dir, ...file.split('/')), 'utf-8');
    }
    return docs;
  }

  /** Drop everything staged for a component, e.g. before a retry. */
  async reset(componentId: string): Promise<void> {
    this.claimed.delete(componentId);
    await rm(this.componentDir(componentId), { recursive: true, force: true });
  }

  /** Remove the whole staging area. */
  async discard(): Promise<void> {
    this.claimed.clear();
    await rm(this.root, { recursive: true, force: true });
  }

  private safePath(path: string): string {
    const safe = normalizeDocumentPath(path);
    if (safe === null) {
      throw new OutputConflictError(`Output path "${path}" escapes the component directory`, path);
    }
    return safe;
  }

  private async put(componentId: string, path: string, content: string): Promise<void> {
    const full = join(this.componentDir(componentId), ...path.split('/'));
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, content, 'utf-8');
  }
}

/** Recursively list files under `dir` as sorted POSIX paths relative to it. */
export async function listFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];
  const out: string[] = [];
  const walk = async (current: string): Promise<void> => {
    for (const entry of await readdir(current, { withFileTypes: true })) {
      const full = join(current, entry.name);
      if (entry.isDirectory()) await walk(full);
      else if (entry.isFile()) out.push(relative(dir, full).split(sep).join('/'));
    }
  };
  await walk(dir);
  return out.sort();
}
