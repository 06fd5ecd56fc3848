import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/memory/database.js';
import { FingerprintStore } from '../../../src/memory/fingerprint-store.js';
import { IndexCorruptError } from '../../../src/utils/errors.js';
import { hashContent } from '../../../src/utils/hash.js';

describe('FingerprintStore', () => {
  let db: Database.Database;
  let store: FingerprintStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new FingerprintStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('loads an empty generation-0 index when nothing was saved', () => {
    const index = store.load();
    expect(index.generation).toBe(0);
    expect(index.entries.size).toBe(0);
  });

  it('round-trips a saved index', () => {
    const a = hashContent('a');
    store.save({ generation: 3, updatedAt: 99, entries: new Map([['src/a.ts', a]]) });
    const index = store.load();
    expect(index.generation).toBe(3);
    expect(index.updatedAt).toBe(99);
    expect([...index.entries]).toEqual([['src/a.ts', a]]);
  });

  it('replaces earlier entries on save', () => {
    store.save({ generation: 1, updatedAt: 1, entries: new Map([['gone.ts', hashContent('x')]]) });
    store.save({ generation: 2, updatedAt: 2, entries: new Map([['kept.ts', hashContent('y')]]) });
    expect([...store.load().entries.keys()]).toEqual(['kept.ts']);
  });

  it('throws IndexCorruptError for entries without metadata', () => {
    db.prepare('INSERT INTO fingerprints (path, fingerprint) VALUES (?, ?)').run('a.ts', hashContent('a'));
    expect(() => store.load()).toThrow(IndexCorruptError);
  });

  it('throws IndexCorruptError for a malformed fingerprint', () => {
    store.save({ generation: 1, updatedAt: 1, entries: new Map([['a.ts', 'not-a-hash']]) });
    expect(() => store.load()).toThrow('Invalid fingerprint entry for "a.ts"');
  });
});
