import type { IdempotencyRecord, IdempotencyStorePort } from '../IdempotencyStorePort';

/**
 * Simple in-memory idempotency store for tests.
 */
export class InMemoryIdempotencyStore implements IdempotencyStorePort {
  private readonly records = new Map<string, IdempotencyRecord>();

  async get(key: string): Promise<IdempotencyRecord | null> {
    return this.records.get(key) ?? null;
  }

  async claim(record: IdempotencyRecord): Promise<IdempotencyRecord> {
    const existing = this.records.get(record.key);
    if (existing) return existing;
    this.records.set(record.key, record);
    return record;
  }

  async release(key: string, aggregateId: string): Promise<void> {
    if (this.records.get(key)?.aggregateId === aggregateId) {
      this.records.delete(key);
    }
  }
}
