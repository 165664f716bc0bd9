import type { TransactionRecord } from '../../domain/entities/TransactionRecord.js';

export interface DatasetCachePort {
  get(cacheKey: string): Promise<readonly TransactionRecord[] | null>;
  set(cacheKey: string, records: readonly TransactionRecord[]): Promise<void>;
  invalidate(cacheKey: string): Promise<void>;
}
