import type { ChartRendererPort } from '../../../application/ports/ChartRendererPort.js';
import type { ChartSpec } from '../../../domain/entities/ChartSpec.js';

// The HTTP layer serves specs from the session; rendering itself happens in the client.
export class LoggingChartRenderer implements ChartRendererPort {
  constructor(private readonly enabled = process.env.NODE_ENV !== 'test') {}

  render(spec: ChartSpec): void {
    if (!this.enabled) {
      return;
    }

    const points = spec.kind === 'NO_DATA' ? 0 : spec.points.length;
    console.log(`🖼️ ${spec.chartId} → ${spec.kind} "${spec.title}" (${points} points)`);
  }
}
