/**
 * In-memory vector store. Contents live as long as the process.
 *
 * @module agent-orchestrator/embedding/stores/memory-store
 */

import type { EmbeddingRecord, VectorStore } from '../types.js';
import { VectorStoreError } from '../errors.js';

function copyRecord(record: EmbeddingRecord): EmbeddingRecord {
  return { ...record, vector: [...record.vector] };
}

export class InMemoryVectorStore implements VectorStore {
  private records = new Map<string, EmbeddingRecord>();
  private vectorLength: number | undefined;

  async upsert(record: EmbeddingRecord): Promise<void> {
    if (this.vectorLength !== undefined && record.vector.length !== this.vectorLength) {
      throw VectorStoreError.dimensionMismatch(record.id, this.vectorLength, record.vector.length);
    }
    this.vectorLength = record.vector.length;
    // Map.set keeps the original insertion position on replace
    this.records.set(record.id, copyRecord(record));
  }

  async get(id: string): Promise<EmbeddingRecord | undefined> {
    const record = this.records.get(id);
    return record ? copyRecord(record) : undefined;
  }

  async *scanAll(): AsyncIterable<EmbeddingRecord> {
    for (const record of Array.from(this.records.values())) {
      yield copyRecord(record);
    }
  }

  async delete(id: string): Promise<boolean> {
    const deleted = this.records.delete(id);
    if (this.records.size === 0) {
      this.vectorLength = undefined;
    }
    return deleted;
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async dimension(): Promise<number | undefined> {
    return this.vectorLength;
  }

  async close(): Promise<void> {
    this.records.clear();
    this.vectorLength = undefined;
  }
}
