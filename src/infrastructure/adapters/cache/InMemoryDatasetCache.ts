import type { DatasetCachePort } from '../../../application/ports/DatasetCachePort.js';
import type { TransactionRecord } from '../../../domain/entities/TransactionRecord.js';

export class InMemoryDatasetCache implements DatasetCachePort {
  private readonly entries = new Map<string, readonly TransactionRecord[]>();

  constructor(private readonly maxEntries = 16) {}

  async get(cacheKey: string): Promise<readonly TransactionRecord[] | null> {
    const records = this.entries.get(cacheKey);
    if (!records) {
      return null;
    }

    // Re-insert so the oldest untouched entry is evicted first.
    this.entries.delete(cacheKey);
    this.entries.set(cacheKey, records);
    return records;
  }

  async set(cacheKey: string, records: readonly TransactionRecord[]): Promise<void> {
    this.entries.delete(cacheKey);
    this.entries.set(cacheKey, records);

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }

  async invalidate(cacheKey: string): Promise<void> {
    if (this.entries.delete(cacheKey)) {
      console.log(`🗑️ Dropped cached dataset ${cacheKey.slice(0, 12)}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
