import type { DisplayMode, SliceDataPoint } from '../../domain/entities/ChartSpec.js';
import type { AggregationResult } from '../../domain/services/Aggregator.js';

export interface FormattedSlices {
  total: number;
  points: SliceDataPoint[];
}

/**
 * Turns an aggregation into donut slices. Percentages are relative to this
 * aggregation's own total, never to the whole dataset.
 */
export const formatSlices = (result: AggregationResult, displayMode: DisplayMode): FormattedSlices => {
  const total = result.reduce((sum, entry) => sum + entry.sum, 0);

  const points = result.map(({ key, sum }) => {
    const percent = total > 0 ? (sum / total) * 100 : 0;
    const text = displayMode === 'PERCENT' ? `${key}: ${percent.toFixed(1)}%` : `${key}: ${Math.round(sum)}`;

    return { label: key, value: sum, percent, text };
  });

  return { total, points };
};
