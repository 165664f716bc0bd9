import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_TREND_CATEGORY_ORDER, loadConfig } from './Config.js';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      server: { port: 4000 },
      bill: {
        columns: {
          dateColumn: 'Date',
          amountColumn: 'Amount',
          flowTypeColumn: 'Type',
          incomeLiteral: 'Income',
          expenseLiteral: 'Expense',
          categoryColumn: 'Category',
          subCategoryColumn: 'Sub-category',
          tagColumn: 'Tag',
        },
        trendCategoryOrder: DEFAULT_TREND_CATEGORY_ORDER,
      },
      upload: { maxBytes: 10 * 1024 * 1024 },
      cache: { maxEntries: 16 },
      sessions: { maxCount: 50, idleTtlMs: 30 * 60 * 1000 },
    });
  });

  it('reads column names, literals and trend order from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      BILL_DATE_COLUMN: '日期',
      BILL_INCOME_LITERAL: '收入',
      BILL_EXPENSE_LITERAL: '支出',
      TREND_CATEGORY_ORDER: 'Food, Rent,,Travel ',
      DATASET_CACHE_SIZE: '4',
      SESSION_MAX_COUNT: '3',
      SESSION_IDLE_TTL_MS: '60000',
    });

    expect(config.server.port).toBe(8080);
    expect(config.bill.columns).toMatchObject({ dateColumn: '日期', incomeLiteral: '收入', expenseLiteral: '支出' });
    expect(config.bill.trendCategoryOrder).toEqual(['Food', 'Rent', 'Travel']);
    expect(config.cache.maxEntries).toBe(4);
    expect(config.sessions).toEqual({ maxCount: 3, idleTtlMs: 60000 });
  });

  it('ignores numbers that are not positive integers', () => {
    const config = loadConfig({ PORT: 'abc', UPLOAD_MAX_BYTES: '-5', DATASET_CACHE_SIZE: '1.5' });

    expect(config.server.port).toBe(4000);
    expect(config.upload.maxBytes).toBe(10 * 1024 * 1024);
    expect(config.cache.maxEntries).toBe(16);
  });

  it('rejects a blank column name', () => {
    expect(() => loadConfig({ BILL_AMOUNT_COLUMN: '   ' })).toThrow(ZodError);
  });
});
