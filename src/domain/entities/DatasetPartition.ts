import type { TransactionRecord } from './TransactionRecord.js';

export interface DatasetPartition {
  records: readonly TransactionRecord[];
  income: readonly TransactionRecord[];
  expense: readonly TransactionRecord[];
  allYears: readonly number[];
  latestYear: number;
}
