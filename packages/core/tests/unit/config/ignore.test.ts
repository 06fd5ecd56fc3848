import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createIgnoreFilter, IGNORE_FILENAME } from '../../../src/config/ignore.js';

const TEST_DIR = join(tmpdir(), `membank-ignore-${process.pid}-${Date.now()}`);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('createIgnoreFilter', () => {
  it('ignores builtin directories and files', () => {
    const ig = createIgnoreFilter(TEST_DIR);
    expect(ig.ignores('node_modules/')).toBe(true);
    expect(ig.ignores('.git/')).toBe(true);
    expect(ig.ignores('.membank/')).toBe(true);
    expect(ig.ignores('data/state.db')).toBe(true);
    expect(ig.ignores('.env.local')).toBe(true);
  });

  it('does not ignore regular source files', () => {
    const ig = createIgnoreFilter(TEST_DIR);
    expect(ig.ignores('src/index.ts')).toBe(false);
    expect(ig.ignores('src/distribution/file.ts')).toBe(false);
  });

  it('reads .gitignore unless skipped', () => {
    writeFileSync(join(TEST_DIR, '.gitignore'), 'secret.txt\n');
    expect(createIgnoreFilter(TEST_DIR).ignores('secret.txt')).toBe(true);
    expect(createIgnoreFilter(TEST_DIR, { skipGitignore: true }).ignores('secret.txt')).toBe(false);
  });

  it('lets the custom ignore file re-include paths', () => {
    writeFileSync(join(TEST_DIR, '.gitignore'), '*.gen.ts\n');
    writeFileSync(join(TEST_DIR, IGNORE_FILENAME), '!keep.gen.ts\n');
    const ig = createIgnoreFilter(TEST_DIR);
    expect(ig.ignores('other.gen.ts')).toBe(true);
    expect(ig.ignores('keep.gen.ts')).toBe(false);
  });

  it('adds extra patterns from configuration', () => {
    const ig = createIgnoreFilter(TEST_DIR, { extra: ['fixtures/'] });
    expect(ig.ignores('fixtures/a.json')).toBe(true);
  });
});
