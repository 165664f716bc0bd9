import { BillIngestionService } from '../../application/services/BillIngestionService.js';
import { DashboardSession } from '../../application/services/DashboardSession.js';
import { DashboardSessionRegistry } from '../../application/services/DashboardSessionRegistry.js';
import type { BillParserPort } from '../../application/ports/BillParserPort.js';
import type { ChartRendererPort } from '../../application/ports/ChartRendererPort.js';
import type { DatasetCachePort } from '../../application/ports/DatasetCachePort.js';
import { InMemoryDatasetCache } from '../adapters/cache/InMemoryDatasetCache.js';
import { XlsxBillParser } from '../adapters/parser/XlsxBillParser.js';
import { LoggingChartRenderer } from '../adapters/renderer/LoggingChartRenderer.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  parser?: BillParserPort;
  cache?: DatasetCachePort;
  renderer?: ChartRendererPort;
  generateSessionId?: () => string;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly parser: BillParserPort;
  readonly cache: DatasetCachePort;
  readonly renderer: ChartRendererPort;
  readonly ingestionService: BillIngestionService;
  readonly sessions: DashboardSessionRegistry;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.parser = overrides.parser ?? new XlsxBillParser();
    this.cache = overrides.cache ?? new InMemoryDatasetCache(this.config.cache.maxEntries);
    this.renderer = overrides.renderer ?? new LoggingChartRenderer();

    this.ingestionService = new BillIngestionService(this.parser, this.cache, this.config.bill.columns);

    this.sessions = new DashboardSessionRegistry(
      (sessionId) =>
        new DashboardSession(sessionId, {
          ingestion: this.ingestionService,
          renderer: this.renderer,
          trendCategoryOrder: this.config.bill.trendCategoryOrder,
        }),
      {
        generateId: overrides.generateSessionId,
        maxSessions: this.config.sessions.maxCount,
        idleTtlMs: this.config.sessions.idleTtlMs,
      },
    );
  }
}
