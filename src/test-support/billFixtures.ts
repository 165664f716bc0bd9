import type { ColumnMapping, RawBillRow } from '../domain/entities/ColumnMapping.js';
import type { DatasetPartition } from '../domain/entities/DatasetPartition.js';
import type { TransactionRecord } from '../domain/entities/TransactionRecord.js';
import { partitionDataset } from '../domain/services/DatasetPartitioner.js';
import { buildTransactionRecord } from '../domain/services/TransactionNormalizer.js';

export const columns: ColumnMapping = {
  dateColumn: 'Date',
  amountColumn: 'Amount',
  flowTypeColumn: 'Type',
  incomeLiteral: 'Income',
  expenseLiteral: 'Expense',
  categoryColumn: 'Category',
  subCategoryColumn: 'Sub-category',
  tagColumn: 'Tag',
};

export const billColumns = ['Date', 'Amount', 'Type', 'Category', 'Sub-category', 'Tag'];

export const rawRow = (
  date: unknown,
  amount: unknown,
  type: string,
  category: string,
  subCategory: string | null = null,
  tag: string | null = null,
): RawBillRow => ({
  Date: date,
  Amount: amount,
  Type: type,
  Category: category,
  'Sub-category': subCategory,
  Tag: tag,
});

export const sampleRows: RawBillRow[] = [
  rawRow('2022-05-01', 100, 'Income', 'Salary'),
  rawRow('2023-02-10', -30, 'Expense', 'Food', 'Groceries', 'Home'),
  rawRow('2024-03-15', -12, 'Expense', 'Food', 'Lunch', 'Work'),
  rawRow('2024-04-01', -50, 'Expense', 'Transport', 'Taxi', 'Work'),
  rawRow('2024-04-02', 2000, 'Income', 'Salary', 'Bonus'),
  rawRow('2024-05-09', -8, 'Expense', 'Food'),
];

export const rows2025: RawBillRow[] = [
  rawRow('2025-01-10', -40, 'Expense', 'Rent', 'Flat', 'Home'),
  rawRow('2025-01-31', 3000, 'Income', 'Salary'),
];

export const toRecords = (rows: RawBillRow[]): TransactionRecord[] =>
  rows.map((row, index) => buildTransactionRecord(row, columns, index + 2));

export const samplePartition = (): DatasetPartition => partitionDataset(toRecords(sampleRows));
