import type { ChartSpec } from '../../domain/entities/ChartSpec.js';
import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import type { FlowType } from '../../domain/entities/TransactionRecord.js';
import { EmptyDatasetError, UnknownChartError } from '../../domain/errors/DashboardErrors.js';
import { partitionDataset } from '../../domain/services/DatasetPartitioner.js';
import type { SelectionPatchDTO } from '../dto/SelectionPatchDTO.js';
import type { ChartRendererPort } from '../ports/ChartRendererPort.js';
import { type SelectionSnapshot, SelectionState } from '../state/SelectionState.js';
import { buildCompositionView } from '../views/CompositionView.js';
import { buildDetailView } from '../views/DetailView.js';
import { buildTagView } from '../views/TagView.js';
import { buildTrendViews } from '../views/TrendView.js';
import { type YearSummary, buildYearSummary } from '../views/YearSummary.js';
import type { BillIngestionService, BillUpload } from './BillIngestionService.js';

export const SELECTABLE_CHART_IDS = [
  'income-composition',
  'expense-composition',
  'expense-detail',
  'expense-tags',
] as const;

export type SelectableChartId = (typeof SELECTABLE_CHART_IDS)[number];

interface SelectableChart {
  flowType: FlowType;
  build: (partition: DatasetPartition, selection: SelectionSnapshot) => ChartSpec;
}

const selectableCharts: Record<SelectableChartId, SelectableChart> = {
  'income-composition': { flowType: 'INCOME', build: buildCompositionView },
  'expense-composition': { flowType: 'EXPENSE', build: buildCompositionView },
  'expense-detail': { flowType: 'EXPENSE', build: buildDetailView },
  'expense-tags': { flowType: 'EXPENSE', build: buildTagView },
};

export const isSelectableChartId = (chartId: string): chartId is SelectableChartId =>
  SELECTABLE_CHART_IDS.some((id) => id === chartId);

export interface DashboardSessionOptions {
  ingestion: BillIngestionService;
  renderer: ChartRendererPort;
  trendCategoryOrder: readonly string[];
}

export interface DashboardLoadResult {
  fileName: string;
  fromCache: boolean;
  transactionCount: number;
  years: number[];
  latestYear: number;
}

interface LoadedDataset {
  partition: DatasetPartition;
  cacheKey: string;
}

/**
 * Everything one dashboard user works with: the current dataset snapshot,
 * the selection state of each selectable chart and the last spec built for
 * every chart. Nothing here is shared between sessions.
 */
export class DashboardSession {
  private dataset: LoadedDataset | null = null;
  private readonly selections = new Map<SelectableChartId, SelectionState>();
  private readonly unsubscribers: Array<() => void> = [];
  private charts = new Map<string, ChartSpec>();

  constructor(
    readonly id: string,
    private readonly options: DashboardSessionOptions,
  ) {}

  async load(upload: BillUpload): Promise<DashboardLoadResult> {
    const ingested = await this.options.ingestion.ingest(upload);
    // Throws before anything is swapped, so a failed upload keeps the previous dataset.
    const partition = partitionDataset(ingested.records);
    const previous = this.dataset;

    this.dataset = { partition, cacheKey: ingested.cacheKey };
    this.charts = new Map();

    for (const chartId of SELECTABLE_CHART_IDS) {
      const existing = this.selections.get(chartId);

      if (existing) {
        existing.reset(partition);
      } else {
        const selection = new SelectionState(chartId, selectableCharts[chartId].flowType, partition);
        this.selections.set(chartId, selection);
        this.unsubscribers.push(selection.subscribe((snapshot) => this.renderSelectable(chartId, snapshot)));
        this.renderSelectable(chartId, selection.snapshot());
      }
    }

    for (const spec of buildTrendViews(partition, this.options.trendCategoryOrder)) {
      this.publish(spec);
    }

    console.log(`📊 Session ${this.id} loaded ${upload.fileName}:`, {
      transactions: partition.records.length,
      income: partition.income.length,
      expense: partition.expense.length,
      years: partition.allYears,
      fromCache: ingested.fromCache,
    });

    if (previous && previous.cacheKey !== ingested.cacheKey) {
      await this.options.ingestion.invalidate(previous.cacheKey);
    }

    return {
      fileName: upload.fileName,
      fromCache: ingested.fromCache,
      transactionCount: partition.records.length,
      years: [...partition.allYears],
      latestYear: partition.latestYear,
    };
  }

  select(chartId: string, patch: SelectionPatchDTO): { chart: ChartSpec; selection: SelectionSnapshot } {
    const selection = this.selectionFor(chartId);
    selection.update(patch);

    return { chart: this.chart(chartId), selection: selection.snapshot() };
  }

  chart(chartId: string): ChartSpec {
    const spec = this.charts.get(chartId);
    if (!spec) {
      throw new UnknownChartError(chartId);
    }
    return spec;
  }

  listCharts(): ChartSpec[] {
    return Array.from(this.charts.values());
  }

  listSelections(): SelectionSnapshot[] {
    return Array.from(this.selections.values()).map((selection) => selection.snapshot());
  }

  summary(year?: number): YearSummary {
    const partition = this.requirePartition();
    return buildYearSummary(partition, year ?? partition.latestYear);
  }

  async dispose(): Promise<void> {
    this.unsubscribers.splice(0).forEach((unsubscribe) => unsubscribe());
    this.selections.clear();
    this.charts = new Map();

    const dataset = this.dataset;
    this.dataset = null;

    if (dataset) {
      await this.options.ingestion.invalidate(dataset.cacheKey);
    }
  }

  private selectionFor(chartId: string): SelectionState {
    if (!isSelectableChartId(chartId)) {
      throw new UnknownChartError(chartId);
    }

    this.requirePartition();
    const selection = this.selections.get(chartId);
    if (!selection) {
      throw new UnknownChartError(chartId);
    }
    return selection;
  }

  private requirePartition(): DatasetPartition {
    if (!this.dataset) {
      throw new EmptyDatasetError(`Session ${this.id} has no bill loaded`);
    }
    return this.dataset.partition;
  }

  // Only the chart whose selection changed is rebuilt.
  private renderSelectable(chartId: SelectableChartId, snapshot: SelectionSnapshot): void {
    this.publish(selectableCharts[chartId].build(this.requirePartition(), snapshot));
  }

  private publish(spec: ChartSpec): void {
    this.charts.set(spec.chartId, spec);
    this.options.renderer.render(spec);
  }
}
