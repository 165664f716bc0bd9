import type { FlowType } from './TransactionRecord.js';

export type DisplayMode = 'ABSOLUTE' | 'PERCENT';

export type ChartType = 'DONUT' | 'LINE' | 'PLACEHOLDER';

export interface SliceDataPoint {
  label: string;
  value: number;
  percent: number;
  text: string;
}

export interface TrendDataPoint {
  monthBucket: string;
  value: number;
}

interface ChartSpecBase {
  chartId: string;
  title: string;
}

export interface CompositionSpec extends ChartSpecBase {
  kind: 'COMPOSITION';
  chartType: 'DONUT';
  flowType: FlowType;
  year: number;
  displayMode: DisplayMode;
  total: number;
  points: SliceDataPoint[];
}

export interface DetailSpec extends ChartSpecBase {
  kind: 'DETAIL';
  chartType: 'DONUT';
  category: string;
  subCategories: string[];
  displayMode: DisplayMode;
  total: number;
  points: SliceDataPoint[];
}

export interface TagSpec extends ChartSpecBase {
  kind: 'TAG';
  chartType: 'DONUT';
  year: number;
  displayMode: DisplayMode;
  total: number;
  points: SliceDataPoint[];
}

export interface TrendSpec extends ChartSpecBase {
  kind: 'TREND';
  chartType: 'LINE';
  category: string;
  xAxisTitle: string;
  yAxisTitle: string;
  points: TrendDataPoint[];
}

export interface NoDataSpec extends ChartSpecBase {
  kind: 'NO_DATA';
  chartType: 'PLACEHOLDER';
  message: string;
}

export type ChartSpec = CompositionSpec | DetailSpec | TagSpec | TrendSpec | NoDataSpec;
