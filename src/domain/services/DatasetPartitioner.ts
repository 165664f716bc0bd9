import type { DatasetPartition } from '../entities/DatasetPartition.js';
import type { TransactionRecord } from '../entities/TransactionRecord.js';
import { EmptyDatasetError } from '../errors/DashboardErrors.js';

export const partitionDataset = (records: readonly TransactionRecord[]): DatasetPartition => {
  if (records.length === 0) {
    throw new EmptyDatasetError();
  }

  const income: TransactionRecord[] = [];
  const expense: TransactionRecord[] = [];
  const years = new Set<number>();

  for (const record of records) {
    if (record.flowType === 'INCOME') {
      income.push(record);
    } else {
      expense.push(record);
    }

    years.add(record.year);
  }

  const allYears = Array.from(years).sort((a, b) => a - b);

  return Object.freeze({
    records: Object.freeze([...records]),
    income: Object.freeze(income),
    expense: Object.freeze(expense),
    allYears: Object.freeze(allYears),
    latestYear: allYears[allYears.length - 1],
  });
};

export const flowSubset = (partition: DatasetPartition, flowType: TransactionRecord['flowType']) =>
  flowType === 'INCOME' ? partition.income : partition.expense;
