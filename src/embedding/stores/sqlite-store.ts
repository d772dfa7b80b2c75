/**
 * SQLite Vector Store
 *
 * Persists embedding records in a single table, vectors as Float32
 * BLOBs, so embeddings survive across sessions and only new or changed
 * catalog entries are re-embedded.
 *
 * @module agent-orchestrator/embedding/stores/sqlite-store
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { EmbeddingRecord, VectorStore } from '../types.js';
import { VectorStoreError } from '../errors.js';

interface EmbeddingRow {
  id: string;
  name: string;
  text: string;
  vector: Buffer;
  model: string;
}

/**
 * Encode a vector as a little-endian Float32 BLOB
 */
export function encodeVector(vector: readonly number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

/**
 * Decode a Float32 BLOB. Copies first, since the buffer may not be
 * 4-byte aligned.
 */
export function decodeVector(blob: Buffer): number[] {
  const bytes = new Uint8Array(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4)));
}

function toRecord(row: EmbeddingRow): EmbeddingRecord {
  return { id: row.id, name: row.name, text: row.text, vector: decodeVector(row.vector), model: row.model };
}

/**
 * @example
 * ```typescript
 * const store = new SqliteVectorStore('./data/embeddings.db');
 * await store.upsert({ id: 'Summarization', name: 'Summarization', text, vector, model: 'keyword/fnv1a-256' });
 * ```
 */
export class SqliteVectorStore implements VectorStore {
  private db: Database.Database;

  /**
   * @param dbPath - Database file, or ':memory:'
   */
  constructor(dbPath: string) {
    try {
      if (dbPath !== ':memory:') {
        const dir = path.dirname(dbPath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }
      this.db = new Database(dbPath);
      this.initSchema();
    } catch (error) {
      throw VectorStoreError.failure('open', error);
    }
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS embeddings (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        text TEXT NOT NULL,
        vector BLOB NOT NULL,
        model TEXT NOT NULL DEFAULT ''
      );
    `);

    // Tables created before records carried their model; rows get '' and are re-embedded
    const columns = this.db.prepare<[], { name: string }>('PRAGMA table_info(embeddings)').all();
    if (!columns.some((column) => column.name === 'model')) {
      this.db.exec(`ALTER TABLE embeddings ADD COLUMN model TEXT NOT NULL DEFAULT ''`);
    }
  }

  async upsert(record: EmbeddingRecord): Promise<void> {
    const expected = await this.dimension();
    if (expected !== undefined && record.vector.length !== expected) {
      throw VectorStoreError.dimensionMismatch(record.id, expected, record.vector.length);
    }

    this.run('upsert', () =>
      this.db
        .prepare<[string, string, string, Buffer, string]>(
          `INSERT INTO embeddings (id, name, text, vector, model)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             name = excluded.name,
             text = excluded.text,
             vector = excluded.vector,
             model = excluded.model
           WHERE name IS NOT excluded.name
              OR text IS NOT excluded.text
              OR vector IS NOT excluded.vector
              OR model IS NOT excluded.model`,
        )
        .run(record.id, record.name, record.text, encodeVector(record.vector), record.model),
    );
  }

  async get(id: string): Promise<EmbeddingRecord | undefined> {
    const row = this.run('get', () =>
      this.db
        .prepare<[string], EmbeddingRow>('SELECT id, name, text, vector, model FROM embeddings WHERE id = ?')
        .get(id),
    );
    return row ? toRecord(row) : undefined;
  }

  async *scanAll(): AsyncIterable<EmbeddingRecord> {
    const rows = this.run('scan', () =>
      this.db
        .prepare<[], EmbeddingRow>('SELECT id, name, text, vector, model FROM embeddings ORDER BY rowid')
        .all(),
    );
    for (const row of rows) {
      yield toRecord(row);
    }
  }

  async delete(id: string): Promise<boolean> {
    const result = this.run('delete', () =>
      this.db.prepare<[string]>('DELETE FROM embeddings WHERE id = ?').run(id),
    );
    return result.changes > 0;
  }

  async count(): Promise<number> {
    const row = this.run('count', () =>
      this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM embeddings').get(),
    );
    return row?.total ?? 0;
  }

  async dimension(): Promise<number | undefined> {
    const row = this.run('dimension', () =>
      this.db
        .prepare<[], { bytes: number }>('SELECT length(vector) AS bytes FROM embeddings LIMIT 1')
        .get(),
    );
    return row ? row.bytes / 4 : undefined;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw VectorStoreError.failure(operation, error);
    }
  }
}
