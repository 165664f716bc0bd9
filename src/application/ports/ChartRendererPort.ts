import type { ChartSpec } from '../../domain/entities/ChartSpec.js';

export interface ChartRendererPort {
  render(spec: ChartSpec): void;
}
