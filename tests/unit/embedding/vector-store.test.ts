/**
 * Tests for Vector Stores
 *
 * Both stores honour the same contract; SQLite runs in memory here.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import Database from 'better-sqlite3';
import { InMemoryVectorStore } from '@/embedding/stores/memory-store.js';
import { SqliteVectorStore, encodeVector, decodeVector } from '@/embedding/stores/sqlite-store.js';
import { VectorStoreError } from '@/embedding/errors.js';
import type { EmbeddingRecord, VectorStore } from '@/embedding/types.js';

function record(id: string, vector: number[], text = `${id} text`): EmbeddingRecord {
  return { id, name: id, text, vector, model: 'test/model' };
}

async function collect(store: VectorStore): Promise<EmbeddingRecord[]> {
  const records: EmbeddingRecord[] = [];
  for await (const entry of store.scanAll()) {
    records.push(entry);
  }
  return records;
}

describe.each([
  { kind: 'InMemoryVectorStore', create: (): VectorStore => new InMemoryVectorStore() },
  { kind: 'SqliteVectorStore', create: (): VectorStore => new SqliteVectorStore(':memory:') },
])('$kind', ({ create }) => {
  let store: VectorStore;

  beforeEach(() => {
    store = create();
  });

  afterEach(async () => {
    await store.close();
  });

  it('starts empty', async () => {
    expect(await store.count()).toBe(0);
    expect(await store.dimension()).toBeUndefined();
    expect(await store.get('missing')).toBeUndefined();
  });

  it('stores and retrieves a record', async () => {
    await store.upsert(record('a', [1, 0.5, -2]));

    expect(await store.get('a')).toEqual(record('a', [1, 0.5, -2]));
    expect(await store.count()).toBe(1);
    expect(await store.dimension()).toBe(3);
  });

  it('replaces a record with the same id', async () => {
    await store.upsert(record('a', [1, 0, 0], 'old'));
    await store.upsert(record('a', [0, 1, 0], 'new'));

    expect(await store.get('a')).toEqual(record('a', [0, 1, 0], 'new'));
    expect(await store.count()).toBe(1);
  });

  it('scans records in insertion order, replaced records keeping their place', async () => {
    await store.upsert(record('b', [1, 0]));
    await store.upsert(record('a', [0, 1]));
    await store.upsert(record('b', [0.5, 0.5]));

    expect((await collect(store)).map((r) => r.id)).toEqual(['b', 'a']);
  });

  it('rejects vectors of a different length', async () => {
    await store.upsert(record('a', [1, 0, 0]));

    const failure = store.upsert(record('b', [1, 0]));
    await expect(failure).rejects.toBeInstanceOf(VectorStoreError);
    await expect(failure).rejects.toMatchObject({
      code: 'DIMENSION_MISMATCH',
      message: "Vector for 'b' has length 2, store holds vectors of length 3",
    });
  });

  it('deletes records and forgets the dimension once empty', async () => {
    await store.upsert(record('a', [1, 0, 0]));

    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
    expect(await store.count()).toBe(0);
    expect(await store.dimension()).toBeUndefined();

    await store.upsert(record('b', [1, 0]));
    expect(await store.dimension()).toBe(2);
  });

  it('returns copies that do not alias stored vectors', async () => {
    const vector = [1, 0];
    await store.upsert(record('a', vector));
    vector[0] = 9;

    const first = await store.get('a');
    first?.vector.push(7);

    expect((await store.get('a'))?.vector).toEqual([1, 0]);
  });
});

describe('SqliteVectorStore persistence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'vector-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps records across instances and creates missing directories', async () => {
    const dbPath = path.join(dir, 'nested', 'embeddings.db');

    const first = new SqliteVectorStore(dbPath);
    await first.upsert(record('Speech Translator', [0.25, 0.5, 1]));
    await first.close();

    const second = new SqliteVectorStore(dbPath);
    expect(await second.get('Speech Translator')).toEqual(record('Speech Translator', [0.25, 0.5, 1]));
    await second.close();
  });

  it('adds the model column to a table created without it', async () => {
    const dbPath = path.join(dir, 'legacy.db');
    const legacy = new Database(dbPath);
    legacy.exec('CREATE TABLE embeddings (id TEXT PRIMARY KEY, name TEXT NOT NULL, text TEXT NOT NULL, vector BLOB NOT NULL)');
    legacy.prepare('INSERT INTO embeddings (id, name, text, vector) VALUES (?, ?, ?, ?)').run('a', 'a', 'a text', encodeVector([1, 0]));
    legacy.close();

    const store = new SqliteVectorStore(dbPath);
    expect(await store.get('a')).toEqual({ id: 'a', name: 'a', text: 'a text', vector: [1, 0], model: '' });
    await store.upsert(record('a', [0, 1]));
    expect((await store.get('a'))?.model).toBe('test/model');
    await store.close();
  });

  it('wraps failures after close in a store error', async () => {
    const store = new SqliteVectorStore(':memory:');
    await store.close();

    await expect(store.count()).rejects.toMatchObject({ code: 'STORE_FAILURE' });
  });
});

describe('vector encoding', () => {
  it('round-trips exactly representable values', () => {
    expect(decodeVector(encodeVector([1, -0.5, 0.125]))).toEqual([1, -0.5, 0.125]);
  });

  it('stores four bytes per component', () => {
    expect(encodeVector([1, 2, 3]).byteLength).toBe(12);
  });

  it('decodes an unaligned buffer', () => {
    const padded = Buffer.concat([Buffer.from([0]), encodeVector([2, 4])]);
    expect(decodeVector(padded.subarray(1))).toEqual([2, 4]);
  });
});
