import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import { sumAmountAbs } from '../../domain/services/Aggregator.js';

export interface YearSummary {
  year: number;
  income: number;
  expense: number;
  net: number;
  transactionCount: number;
}

export const buildYearSummary = (partition: DatasetPartition, year: number): YearSummary => {
  const income = partition.income.filter((record) => record.year === year);
  const expense = partition.expense.filter((record) => record.year === year);
  const incomeTotal = sumAmountAbs(income);
  const expenseTotal = sumAmountAbs(expense);

  return {
    year,
    income: incomeTotal,
    expense: expenseTotal,
    net: incomeTotal - expenseTotal,
    transactionCount: income.length + expense.length,
  };
};
