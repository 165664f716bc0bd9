import { type GroupingColumn, type TransactionRecord, groupKeyOf } from '../entities/TransactionRecord.js';

export interface AggregationEntry {
  key: string;
  sum: number;
}

export type AggregationResult = AggregationEntry[];

export interface MonthlyTotal {
  monthBucket: string;
  sum: number;
}

// Keys keep the order in which they first appear in the input.
export const groupAndSum = (records: readonly TransactionRecord[], keyColumn: GroupingColumn): AggregationResult => {
  const totals = new Map<string, number>();

  for (const record of records) {
    const key = groupKeyOf(record, keyColumn);
    totals.set(key, (totals.get(key) ?? 0) + record.amountAbs);
  }

  return Array.from(totals.entries()).map(([key, sum]) => ({ key, sum }));
};

export const groupByMonth = (
  records: readonly TransactionRecord[],
  keyColumn: GroupingColumn,
  keyValue: string,
): MonthlyTotal[] => {
  const buckets = new Map<string, number>();

  for (const record of records) {
    if (groupKeyOf(record, keyColumn) !== keyValue) {
      continue;
    }

    buckets.set(record.monthBucket, (buckets.get(record.monthBucket) ?? 0) + record.amountAbs);
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([monthBucket, sum]) => ({ monthBucket, sum }));
};

export const sumAmountAbs = (records: readonly TransactionRecord[]): number =>
  records.reduce((total, record) => total + record.amountAbs, 0);

export const distinctKeys = (records: readonly TransactionRecord[], keyColumn: GroupingColumn): string[] =>
  Array.from(new Set(records.map((record) => groupKeyOf(record, keyColumn))));
