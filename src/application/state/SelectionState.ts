import type { DisplayMode } from '../../domain/entities/ChartSpec.js';
import type { DatasetPartition } from '../../domain/entities/DatasetPartition.js';
import type { FlowType } from '../../domain/entities/TransactionRecord.js';
import { InvalidSelectionError } from '../../domain/errors/DashboardErrors.js';
import { distinctKeys } from '../../domain/services/Aggregator.js';
import { flowSubset } from '../../domain/services/DatasetPartitioner.js';
import type { SelectionPatchDTO } from '../dto/SelectionPatchDTO.js';

export interface SelectionOptions {
  years: number[];
  categories: string[];
  subCategories: string[];
}

export interface SelectionSnapshot {
  chartId: string;
  flowType: FlowType;
  year: number;
  /** null only when the chart's flow subset has no rows at all. */
  category: string | null;
  subCategories: string[];
  displayMode: DisplayMode;
  options: SelectionOptions;
}

export type SelectionListener = (snapshot: SelectionSnapshot) => void;

interface SelectionDefaults {
  year: number;
  category: string | null;
  subCategories: string[];
}

/**
 * Selections of one chart. Every value is checked against the current
 * partition; an unknown value never sticks, it is replaced by the default
 * and a warning is logged.
 */
export class SelectionState {
  private readonly listeners = new Set<SelectionListener>();
  private partition: DatasetPartition;
  private year: number;
  private category: string | null;
  private subCategories: string[];
  private displayMode: DisplayMode = 'ABSOLUTE';

  constructor(
    readonly chartId: string,
    readonly flowType: FlowType,
    partition: DatasetPartition,
  ) {
    const defaults = SelectionState.defaultsFor(flowType, partition);
    this.partition = partition;
    this.year = defaults.year;
    this.category = defaults.category;
    this.subCategories = defaults.subCategories;
  }

  subscribe(listener: SelectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setYear(year: number): void {
    this.mutate(() => this.applyYear(year));
  }

  setCategory(category: string): void {
    this.mutate(() => this.applyCategory(category));
  }

  setSubCategorySelection(subCategories: string[]): void {
    this.mutate(() => this.applySubCategories(subCategories));
  }

  setDisplayMode(displayMode: DisplayMode): void {
    this.mutate(() => {
      this.displayMode = displayMode;
    });
  }

  /** Applies several fields with a single change notification. Category goes first so a new sub-category list is checked against it. */
  update(patch: SelectionPatchDTO): void {
    this.mutate(() => {
      if (patch.category !== undefined) {
        this.applyCategory(patch.category);
      }
      if (patch.subCategories !== undefined) {
        this.applySubCategories(patch.subCategories);
      }
      if (patch.year !== undefined) {
        this.applyYear(patch.year);
      }
      if (patch.displayMode !== undefined) {
        this.displayMode = patch.displayMode;
      }
    });
  }

  /** Re-runs default construction against a replaced dataset. Always notifies. */
  reset(partition: DatasetPartition): void {
    const defaults = SelectionState.defaultsFor(this.flowType, partition);
    this.partition = partition;
    this.year = defaults.year;
    this.category = defaults.category;
    this.subCategories = defaults.subCategories;
    this.displayMode = 'ABSOLUTE';
    this.emit();
  }

  snapshot(): SelectionSnapshot {
    return {
      chartId: this.chartId,
      flowType: this.flowType,
      year: this.year,
      category: this.category,
      subCategories: [...this.subCategories],
      displayMode: this.displayMode,
      options: {
        years: [...this.partition.allYears],
        categories: SelectionState.categoriesOf(this.flowType, this.partition),
        subCategories: SelectionState.subCategoriesOf(this.flowType, this.partition, this.category),
      },
    };
  }

  private applyYear(year: number): void {
    try {
      this.year = this.validateYear(year);
    } catch (error) {
      if (!(error instanceof InvalidSelectionError)) {
        throw error;
      }
      console.warn(`⚠️ ${this.chartId}: ${error.message}, using ${this.partition.latestYear}`);
      this.year = this.partition.latestYear;
    }
  }

  private applyCategory(category: string): void {
    let next: string | null;

    try {
      next = this.validateCategory(category);
    } catch (error) {
      if (!(error instanceof InvalidSelectionError)) {
        throw error;
      }
      next = SelectionState.categoriesOf(this.flowType, this.partition)[0] ?? null;
      console.warn(`⚠️ ${this.chartId}: ${error.message}, using ${JSON.stringify(next)}`);
    }

    if (next !== this.category) {
      this.category = next;
      this.subCategories = SelectionState.subCategoriesOf(this.flowType, this.partition, next);
    }
  }

  private applySubCategories(subCategories: string[]): void {
    const available = SelectionState.subCategoriesOf(this.flowType, this.partition, this.category);

    try {
      this.subCategories = this.validateSubCategories(subCategories, available);
    } catch (error) {
      if (!(error instanceof InvalidSelectionError)) {
        throw error;
      }
      const requested = new Set(subCategories);
      this.subCategories = available.filter((subCategory) => requested.has(subCategory));
      console.warn(`⚠️ ${this.chartId}: ${error.message}, keeping ${JSON.stringify(this.subCategories)}`);
    }
  }

  private validateYear(year: number): number {
    if (!this.partition.allYears.includes(year)) {
      throw new InvalidSelectionError('year', year);
    }
    return year;
  }

  private validateCategory(category: string): string {
    if (!SelectionState.categoriesOf(this.flowType, this.partition).includes(category)) {
      throw new InvalidSelectionError('category', category);
    }
    return category;
  }

  private validateSubCategories(subCategories: string[], available: string[]): string[] {
    const unknown = subCategories.filter((subCategory) => !available.includes(subCategory));
    if (unknown.length > 0) {
      throw new InvalidSelectionError('subCategories', unknown);
    }

    // Kept in availability order, duplicates dropped.
    const requested = new Set(subCategories);
    return available.filter((subCategory) => requested.has(subCategory));
  }

  private mutate(change: () => void): void {
    const before = this.fingerprint();
    change();

    if (this.fingerprint() !== before) {
      this.emit();
    }
  }

  private fingerprint(): string {
    return JSON.stringify([this.year, this.category, this.subCategories, this.displayMode]);
  }

  private emit(): void {
    const snapshot = this.snapshot();
    this.listeners.forEach((listener) => listener(snapshot));
  }

  private static defaultsFor(flowType: FlowType, partition: DatasetPartition): SelectionDefaults {
    const category = SelectionState.categoriesOf(flowType, partition)[0] ?? null;

    return {
      year: partition.latestYear,
      category,
      subCategories: SelectionState.subCategoriesOf(flowType, partition, category),
    };
  }

  private static categoriesOf(flowType: FlowType, partition: DatasetPartition): string[] {
    return distinctKeys(flowSubset(partition, flowType), 'category');
  }

  private static subCategoriesOf(flowType: FlowType, partition: DatasetPartition, category: string | null): string[] {
    if (category === null) {
      return [];
    }

    const inCategory = flowSubset(partition, flowType).filter((record) => record.category === category);
    return distinctKeys(inCategory, 'subCategory');
  }
}
