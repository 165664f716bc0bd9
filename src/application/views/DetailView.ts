import type { DetailSpec, NoDataSpec } from '../../domain/entities/ChartSpec.js';
import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import { groupKeyOf } from '../../domain/entities/TransactionRecord.js';
import { groupAndSum } from '../../domain/services/Aggregator.js';
import type { SelectionSnapshot } from '../state/SelectionState.js';
import { formatSlices } from './SliceFormatter.js';

export const buildDetailView = (partition: DatasetPartition, selection: SelectionSnapshot): DetailSpec | NoDataSpec => {
  const { category } = selection;

  if (category === null) {
    return {
      kind: 'NO_DATA',
      chartType: 'PLACEHOLDER',
      chartId: selection.chartId,
      title: 'Expense detail',
      message: 'No expense records in this file',
    };
  }

  if (selection.subCategories.length === 0) {
    return {
      kind: 'NO_DATA',
      chartType: 'PLACEHOLDER',
      chartId: selection.chartId,
      title: `[${category}] expense detail`,
      message: 'Select at least one sub-category',
    };
  }

  const chosen = new Set(selection.subCategories);
  const matching = partition.expense.filter(
    (record) => record.category === category && chosen.has(groupKeyOf(record, 'subCategory')),
  );
  const { total, points } = formatSlices(groupAndSum(matching, 'subCategory'), selection.displayMode);

  return {
    kind: 'DETAIL',
    chartType: 'DONUT',
    chartId: selection.chartId,
    title: `[${category}] expense detail`,
    category,
    subCategories: [...selection.subCategories],
    displayMode: selection.displayMode,
    total,
    points,
  };
};
