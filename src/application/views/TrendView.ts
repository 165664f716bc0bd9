import type { NoDataSpec, TrendSpec } from '../../domain/entities/ChartSpec.js';
import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import { groupByMonth } from '../../domain/services/Aggregator.js';

export const trendChartId = (category: string): string => `trend:${category}`;

export const buildTrendView = (partition: DatasetPartition, category: string): TrendSpec | NoDataSpec => {
  const monthly = groupByMonth(partition.expense, 'category', category);

  if (monthly.length === 0) {
    return {
      kind: 'NO_DATA',
      chartType: 'PLACEHOLDER',
      chartId: trendChartId(category),
      title: category,
      message: 'No data for this category',
    };
  }

  return {
    kind: 'TREND',
    chartType: 'LINE',
    chartId: trendChartId(category),
    title: category,
    category,
    xAxisTitle: 'Month',
    yAxisTitle: 'Amount',
    points: monthly.map(({ monthBucket, sum }) => ({ monthBucket, value: sum })),
  };
};

/** One trend chart per configured category, in configured order; duplicates in the order list are ignored. */
export const buildTrendViews = (
  partition: DatasetPartition,
  categoryOrder: readonly string[],
): Array<TrendSpec | NoDataSpec> => {
  return Array.from(new Set(categoryOrder)).map((category) => buildTrendView(partition, category));
};
