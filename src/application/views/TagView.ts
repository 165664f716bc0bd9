import type { TagSpec } from '../../domain/entities/ChartSpec.js';
import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import { groupAndSum } from '../../domain/services/Aggregator.js';
import type { SelectionSnapshot } from '../state/SelectionState.js';
import { formatSlices } from './SliceFormatter.js';

export const buildTagView = (partition: DatasetPartition, selection: SelectionSnapshot): TagSpec => {
  const inYear = partition.expense.filter((record) => record.year === selection.year);
  const { total, points } = formatSlices(groupAndSum(inYear, 'tag'), selection.displayMode);

  return {
    kind: 'TAG',
    chartType: 'DONUT',
    chartId: selection.chartId,
    title: `${selection.year} expense tags`,
    year: selection.year,
    displayMode: selection.displayMode,
    total,
    points,
  };
};
