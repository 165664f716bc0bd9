import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { type CellObject, utils, write } from 'xlsx';
import { buildTransactionRecord } from '../../../domain/services/TransactionNormalizer.js';
import { billColumns, columns } from '../../../test-support/billFixtures.js';
import { XlsxBillParser } from './XlsxBillParser.js';

const workbookBuffer = (rows: unknown[][], sheetName = 'Bills', cells: Record<string, CellObject> = {}): Buffer => {
  const sheet = utils.aoa_to_sheet(rows);
  Object.entries(cells).forEach(([address, cell]) => {
    sheet[address] = cell;
  });

  const workbook = utils.book_new();
  utils.book_append_sheet(workbook, sheet, sheetName);
  return write(workbook, { type: 'buffer', bookType: 'xlsx' });
};

describe('XlsxBillParser', () => {
  const parser = new XlsxBillParser();
  const originalTz = process.env.TZ;

  // Far from UTC, so any instant-based date handling would shift the calendar day.
  beforeAll(() => {
    process.env.TZ = 'Asia/Shanghai';
  });

  afterAll(() => {
    if (originalTz === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = originalTz;
    }
  });

  it('reads the header and rows of the first worksheet', async () => {
    const content = workbookBuffer([
      billColumns,
      ['2024-01-15', -12.5, 'Expense', 'Dining', 'Lunch', null],
      ['2024-01-31', 3000, 'Income', 'Salary', null, 'Job'],
    ]);

    const parsed = await parser.parse(content, { fileName: 'bills.xlsx' });

    expect(parsed.sheetName).toBe('Bills');
    expect(parsed.columns).toEqual(billColumns);
    expect(parsed.rows).toEqual([
      {
        rowNumber: 2,
        cells: { Date: '2024-01-15', Amount: -12.5, Type: 'Expense', Category: 'Dining', 'Sub-category': 'Lunch', Tag: null },
      },
      {
        rowNumber: 3,
        cells: { Date: '2024-01-31', Amount: 3000, Type: 'Income', Category: 'Salary', 'Sub-category': null, Tag: 'Job' },
      },
    ]);
  });

  it('produces rows the normalizer accepts', async () => {
    const content = workbookBuffer([billColumns, ['2024-02-03', -8, 'Expense', 'Food', 'Snacks', 'Home']]);

    const parsed = await parser.parse(content, { fileName: 'bills.xlsx' });

    expect(buildTransactionRecord(parsed.rows[0].cells, columns, parsed.rows[0].rowNumber)).toMatchObject({
      rowNumber: 2,
      amountAbs: 8,
      flowType: 'EXPENSE',
      monthBucket: '2024-02',
      subCategory: 'Snacks',
      tag: 'Home',
    });
  });

  it('turns date-formatted serial cells into calendar dates', async () => {
    const content = workbookBuffer(
      [billColumns, [null, -20, 'Expense', 'Gifts', 'Flowers', null], [null, -7, 'Expense', 'Food', 'Snacks', null]],
      'Bills',
      {
        A2: { t: 'n', v: 45292, z: 'yyyy-mm-dd' },
        A3: { t: 'n', v: 45351, z: 'm/d/yy' },
      },
    );

    const parsed = await parser.parse(content, { fileName: 'bills.xlsx' });
    const records = parsed.rows.map((row) => buildTransactionRecord(row.cells, columns, row.rowNumber));

    expect(parsed.rows.map((row) => row.cells.Date)).toEqual(['2024-01-01', '2024-02-29']);
    expect(records.map((record) => [record.year, record.monthBucket])).toEqual([
      [2024, '2024-01'],
      [2024, '2024-02'],
    ]);
  });

  it('leaves plain numbers without a date format alone', async () => {
    const content = workbookBuffer([billColumns, ['2024-03-01', 45292, 'Income', 'Salary', null, null]]);

    const parsed = await parser.parse(content, { fileName: 'bills.xlsx' });

    expect(parsed.rows[0].cells.Amount).toBe(45292);
  });

  it('numbers rows by their sheet line when blank lines are skipped', async () => {
    const content = workbookBuffer([
      billColumns,
      ['2024-01-15', -12.5, 'Expense', 'Dining', null, null],
      [],
      ['2024-01-16', -3, 'Expense', 'Dining', null, null],
    ]);

    const parsed = await parser.parse(content, { fileName: 'bills.xlsx' });

    expect(parsed.rows.map((row) => row.rowNumber)).toEqual([2, 4]);
  });

  it('reads a UTF-8 CSV with non-ASCII headers and keeps values as text', async () => {
    const csv = ['日期,金额,收支类型,类别,二级分类,标签', '2024-02-01,-12,支出,餐饮,午餐,', '2024-02-29,5000,收入,工资,,'].join('\n');

    const parsed = await parser.parse(Buffer.from(`\uFEFF${csv}`, 'utf8'), { fileName: 'bills.csv' });

    expect(parsed.columns).toEqual(['日期', '金额', '收支类型', '类别', '二级分类', '标签']);
    expect(parsed.rows).toEqual([
      { rowNumber: 2, cells: { 日期: '2024-02-01', 金额: '-12', 收支类型: '支出', 类别: '餐饮', 二级分类: '午餐', 标签: null } },
      { rowNumber: 3, cells: { 日期: '2024-02-29', 金额: '5000', 收支类型: '收入', 类别: '工资', 二级分类: null, 标签: null } },
    ]);
  });

  it('returns no rows for a header-only sheet', async () => {
    const parsed = await parser.parse(workbookBuffer([billColumns], 'Empty'), { fileName: 'empty.xlsx' });

    expect(parsed).toEqual({ sheetName: 'Empty', columns: billColumns, rows: [] });
  });
});
