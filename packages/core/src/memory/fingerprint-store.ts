// packages/core/src/memory/fingerprint-store.ts — Persistent path -> fingerprint index

import type Database from 'better-sqlite3';
import type { FileFingerprintIndex } from '../types/build.js';
import { IndexCorruptError } from '../utils/errors.js';
import { isFingerprint } from '../utils/hash.js';

interface MetaRow {
  generation: number;
  updated_at: number;
}

interface EntryRow {
  path: string;
  fingerprint: string;
}

export function emptyIndex(): FileFingerprintIndex {
  return { generation: 0, updatedAt: 0, entries: new Map() };
}

export class FingerprintStore {
  constructor(private db: Database.Database) {}

  /**
   * Read the committed index. A store that was never written yields the
   * empty generation-0 index. Throws IndexCorruptError when stored rows do
   * not form a valid index.
   */
  load(): FileFingerprintIndex {
    let meta: MetaRow | undefined;
    let rows: EntryRow[];
    try {
      meta = this.db
        .prepare<[], MetaRow>('SELECT generation, updated_at FROM fingerprint_meta WHERE id = 1')
        .get();
      rows = this.db
        .prepare<[], EntryRow>('SELECT path, fingerprint FROM fingerprints ORDER BY path')
        .all();
    } catch (err) {
      throw new IndexCorruptError(
        `Failed to read fingerprint index: ${err instanceof Error ? err.message : String(err)}`,
        'fingerprints',
      );
    }

    if (!meta) {
      if (rows.length > 0) {
        throw new IndexCorruptError('Fingerprint entries exist without index metadata', 'fingerprint_meta');
      }
      return emptyIndex();
    }
    if (!Number.isInteger(meta.generation) || meta.generation < 0) {
      throw new IndexCorruptError(`Invalid index generation: ${String(meta.generation)}`, 'fingerprint_meta');
    }

    const entries = new Map<string, string>();
    for (const row of rows) {
      if (typeof row.path !== 'string' || row.path.length === 0 || !isFingerprint(row.fingerprint)) {
        throw new IndexCorruptError(`Invalid fingerprint entry for "${String(row.path)}"`, row.path);
      }
      entries.set(row.path, row.fingerprint);
    }
    return { generation: meta.generation, updatedAt: meta.updated_at, entries };
  }

  /** Replace the stored index in one transaction. */
  save(index: FileFingerprintIndex): void {
    const insert = this.db.prepare('INSERT INTO fingerprints (path, fingerprint) VALUES (?, ?)');
    this.db.transaction(() => {
      this.db.prepare('DELETE FROM fingerprints').run();
      for (const [path, fingerprint] of index.entries) {
        insert.run(path, fingerprint);
      }
      this.db
        .prepare(
          `INSERT INTO fingerprint_meta (id, generation, updated_at) VALUES (1, ?, ?)
           ON CONFLICT(id) DO UPDATE SET generation = excluded.generation, updated_at = excluded.updated_at`,
        )
        .run(index.generation, index.updatedAt);
    })();
  }
}
