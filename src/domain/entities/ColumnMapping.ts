export interface ColumnMapping {
  dateColumn: string;
  amountColumn: string;
  flowTypeColumn: string;
  incomeLiteral: string;
  expenseLiteral: string;
  categoryColumn: string;
  subCategoryColumn: string;
  tagColumn: string;
}

export type RawBillRow = Record<string, unknown>;
