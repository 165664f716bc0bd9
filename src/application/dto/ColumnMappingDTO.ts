import { z } from 'zod';

const columnName = z.string().trim().min(1);

export const ColumnMappingSchema = z.object({
  dateColumn: columnName.default('Date'),
  amountColumn: columnName.default('Amount'),
  flowTypeColumn: columnName.default('Type'),
  incomeLiteral: columnName.default('Income'),
  expenseLiteral: columnName.default('Expense'),
  categoryColumn: columnName.default('Category'),
  subCategoryColumn: columnName.default('Sub-category'),
  tagColumn: columnName.default('Tag'),
});
