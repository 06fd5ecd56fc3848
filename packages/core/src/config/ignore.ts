// packages/core/src/config/ignore.ts — .gitignore + .membankignore aware file filtering

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { STATE_DIR } from '../utils/constants.js';

export const IGNORE_FILENAME = '.membankignore';

const BUILTIN_IGNORES = [
  'node_modules',
  '.git',
  'dist',
  'build',
  'target',
  'out',
  STATE_DIR,
  '.cache',
  '.turbo',
  '.next',
  '__pycache__',
  '.venv',
  'vendor',
  'coverage',
  '*.db',
  '*.db-journal',
  '*.db-wal',
  '*.db-shm',
  '.env',
  '.env.*',
];

/**
 * Load and compile all ignore patterns into a single matcher.
 * Precedence: builtins -> config patterns -> .gitignore -> .membankignore
 */
export function createIgnoreFilter(
  projectDir: string,
  options?: { extra?: readonly string[]; skipGitignore?: boolean },
): Ignore {
  const ig = ignore();

  ig.add(BUILTIN_IGNORES);

  if (options?.extra && options.extra.length > 0) {
    ig.add([...options.extra]);
  }

  // .gitignore (root only)
  if (!options?.skipGitignore) {
    const gitignorePath = join(projectDir, '.gitignore');
    if (existsSync(gitignorePath)) {
      ig.add(readFileSync(gitignorePath, 'utf-8'));
    }
  }

  // .membankignore can re-include with ! patterns
  const customPath = join(projectDir, IGNORE_FILENAME);
  if (existsSync(customPath)) {
    ig.add(readFileSync(customPath, 'utf-8'));
  }

  return ig;
}
