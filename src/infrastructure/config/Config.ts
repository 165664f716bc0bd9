import type { ColumnMapping } from '../../domain/entities/ColumnMapping.js';
import { ColumnMappingSchema } from '../../application/dto/ColumnMappingDTO.js';

export interface AppConfig {
  server: {
    port: number;
  };
  bill: {
    columns: ColumnMapping;
    trendCategoryOrder: string[];
  };
  upload: {
    maxBytes: number;
  };
  cache: {
    maxEntries: number;
  };
  sessions: {
    maxCount: number;
    idleTtlMs: number;
  };
}

export const DEFAULT_TREND_CATEGORY_ORDER = [
  'Entertainment',
  'Gifts',
  'Household',
  'Clothing & Beauty',
  'Education',
  'Partner',
  'Travel',
  'Dining',
  'Fixed Costs',
  'Transport',
  'Other',
];

const parseList = (value: string | undefined): string[] | undefined => {
  if (value === undefined) {
    return undefined;
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  return {
    server: {
      port: parsePositiveInt(env.PORT, 4000),
    },
    bill: {
      columns: ColumnMappingSchema.parse({
        dateColumn: env.BILL_DATE_COLUMN,
        amountColumn: env.BILL_AMOUNT_COLUMN,
        flowTypeColumn: env.BILL_FLOW_TYPE_COLUMN,
        incomeLiteral: env.BILL_INCOME_LITERAL,
        expenseLiteral: env.BILL_EXPENSE_LITERAL,
        categoryColumn: env.BILL_CATEGORY_COLUMN,
        subCategoryColumn: env.BILL_SUB_CATEGORY_COLUMN,
        tagColumn: env.BILL_TAG_COLUMN,
      }),
      trendCategoryOrder: parseList(env.TREND_CATEGORY_ORDER) ?? DEFAULT_TREND_CATEGORY_ORDER,
    },
    upload: {
      maxBytes: parsePositiveInt(env.UPLOAD_MAX_BYTES, 10 * 1024 * 1024), // 10MB
    },
    cache: {
      maxEntries: parsePositiveInt(env.DATASET_CACHE_SIZE, 16),
    },
    sessions: {
      maxCount: parsePositiveInt(env.SESSION_MAX_COUNT, 50),
      idleTtlMs: parsePositiveInt(env.SESSION_IDLE_TTL_MS, 30 * 60 * 1000), // 30 minutes
    },
  };
};
