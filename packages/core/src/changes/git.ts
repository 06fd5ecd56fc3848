// packages/core/src/changes/git.ts — Source-control collaborator for explicit change ranges

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const GIT_TIMEOUT_MS = 30_000;
const GIT_MAX_BUFFER = 16 * 1024 * 1024;

/** Returns `git diff --name-status` output for the working tree against a revision. */
export type NameStatusReader = (repoPath: string, revision: string) => Promise<string>;

export const gitNameStatus: NameStatusReader = async (repoPath, revision) => {
  if (revision.length === 0 || revision.startsWith('-')) {
    throw new Error(`Invalid revision: "${revision}"`);
  }
  const { stdout } = await execFileAsync(
    'git',
    ['diff', '--name-status', '--no-renames', revision, '--'],
    { cwd: repoPath, timeout: GIT_TIMEOUT_MS, maxBuffer: GIT_MAX_BUFFER },
  );
  return stdout;
};
