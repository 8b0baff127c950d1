import type { Clock, MemoryFilter, MemoryRecord, VectorMemoryStore } from '@session-governor/core';

interface StoredMemory {
  userId: string;
  role: string;
  content: string;
  createdAt: number;
}

/**
 * Chronological conversation store used in place of a vector database during
 * local development. `queryAll` returns the newest `limit` records, oldest
 * first.
 */
export class InMemoryVectorMemoryStore implements VectorMemoryStore {
  private readonly records: StoredMemory[] = [];

  constructor(private readonly clock: Clock = () => Date.now()) {}

  async queryAll(filter: MemoryFilter, limit: number): Promise<MemoryRecord[]> {
    if (limit <= 0) {
      return [];
    }

    return this.records
      .filter((record) => record.userId === filter.userId)
      .slice(-limit)
      .map((record) => ({ ...record }));
  }

  async add(userId: string, records: ReadonlyArray<{ role: string; content: string }>): Promise<void> {
    const createdAt = this.clock();
    for (const record of records) {
      this.records.push({ userId, role: record.role, content: record.content, createdAt });
    }
  }
}
