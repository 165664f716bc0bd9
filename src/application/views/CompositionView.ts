import type { CompositionSpec } from '../../domain/entities/ChartSpec.js';
import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import { groupAndSum } from '../../domain/services/Aggregator.js';
import { flowSubset } from '../../domain/services/DatasetPartitioner.js';
import type { SelectionSnapshot } from '../state/SelectionState.js';
import { formatSlices } from './SliceFormatter.js';

const flowLabels = {
  INCOME: 'income',
  EXPENSE: 'expense',
} as const;

export const buildCompositionView = (partition: DatasetPartition, selection: SelectionSnapshot): CompositionSpec => {
  const inYear = flowSubset(partition, selection.flowType).filter((record) => record.year === selection.year);
  const { total, points } = formatSlices(groupAndSum(inYear, 'category'), selection.displayMode);

  return {
    kind: 'COMPOSITION',
    chartType: 'DONUT',
    chartId: selection.chartId,
    title: `${selection.year} ${flowLabels[selection.flowType]} composition`,
    flowType: selection.flowType,
    year: selection.year,
    displayMode: selection.displayMode,
    total,
    points,
  };
};
