export type FlowType = 'INCOME' | 'EXPENSE';

export type GroupingColumn = 'category' | 'subCategory' | 'tag';

// Rows without a sub-category or tag are grouped under this label.
export const UNLABELED_KEY = 'Uncategorized';

export interface TransactionRecord {
  rowNumber: number;
  date: string; // ISO date
  amount: number;
  amountAbs: number;
  flowType: FlowType;
  category: string;
  subCategory?: string;
  tag?: string;
  year: number;
  monthBucket: string; // YYYY-MM
}

export const groupKeyOf = (record: TransactionRecord, column: GroupingColumn): string => {
  return record[column] ?? UNLABELED_KEY;
};
