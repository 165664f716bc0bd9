import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat.js';
import type { ColumnMapping, RawBillRow } from '../entities/ColumnMapping.js';
import { type FlowType, type TransactionRecord, UNLABELED_KEY } from '../entities/TransactionRecord.js';
import { MalformedRowError } from '../errors/DashboardErrors.js';

dayjs.extend(customParseFormat);

// Strict: a calendar date that does not exist (2024-02-30) is rejected, not rolled over.
const DATE_FORMATS = [
  'YYYY-MM-DD',
  'YYYY-M-D',
  'YYYY/MM/DD',
  'YYYY/M/D',
  'YYYY-MM-DD HH:mm',
  'YYYY-MM-DD HH:mm:ss',
  'YYYY/M/D H:mm',
  'YYYY/M/D H:mm:ss',
  'YYYY/MM/DD HH:mm',
  'YYYY/MM/DD HH:mm:ss',
];

const toLabel = (value: unknown): string | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }

  const text = String(value).trim();
  return text.length > 0 ? text : undefined;
};

const parseDate = (value: unknown): dayjs.Dayjs | null => {
  let parsed: dayjs.Dayjs | null = null;

  if (value instanceof Date) {
    parsed = dayjs(value);
  } else if (typeof value === 'string' && value.trim().length > 0) {
    parsed = dayjs(value.trim(), DATE_FORMATS, true);
  }

  return parsed && parsed.isValid() ? parsed : null;
};

const parseAmount = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string') {
    const cleaned = value.replace(/,/g, '').trim();
    if (!cleaned) {
      return null;
    }

    const amount = Number(cleaned);
    return Number.isFinite(amount) ? amount : null;
  }

  return null;
};

const resolveFlowType = (value: unknown, mapping: ColumnMapping): FlowType | null => {
  const literal = toLabel(value);

  if (literal === mapping.incomeLiteral) {
    return 'INCOME';
  }

  if (literal === mapping.expenseLiteral) {
    return 'EXPENSE';
  }

  return null;
};

/**
 * Builds one frozen record from a parsed spreadsheet row. Derived fields
 * (amountAbs, year, monthBucket) are filled here so every consumer sees the
 * same normalized values.
 */
export const buildTransactionRecord = (
  row: RawBillRow,
  mapping: ColumnMapping,
  rowNumber: number,
): TransactionRecord => {
  const date = parseDate(row[mapping.dateColumn]);
  if (!date) {
    throw new MalformedRowError(rowNumber, mapping.dateColumn, `unparseable date ${JSON.stringify(row[mapping.dateColumn])}`);
  }

  const amount = parseAmount(row[mapping.amountColumn]);
  if (amount === null) {
    throw new MalformedRowError(rowNumber, mapping.amountColumn, `non-numeric amount ${JSON.stringify(row[mapping.amountColumn])}`);
  }

  const flowType = resolveFlowType(row[mapping.flowTypeColumn], mapping);
  if (!flowType) {
    throw new MalformedRowError(
      rowNumber,
      mapping.flowTypeColumn,
      `expected "${mapping.incomeLiteral}" or "${mapping.expenseLiteral}", got ${JSON.stringify(row[mapping.flowTypeColumn])}`,
    );
  }

  return Object.freeze({
    rowNumber,
    date: date.format('YYYY-MM-DD'),
    amount,
    amountAbs: Math.abs(amount),
    flowType,
    category: toLabel(row[mapping.categoryColumn]) ?? UNLABELED_KEY,
    subCategory: toLabel(row[mapping.subCategoryColumn]),
    tag: toLabel(row[mapping.tagColumn]),
    year: date.year(),
    monthBucket: date.format('YYYY-MM'),
  });
};

export const requiredColumns = (mapping: ColumnMapping): string[] => [
  mapping.dateColumn,
  mapping.amountColumn,
  mapping.flowTypeColumn,
  mapping.categoryColumn,
  mapping.subCategoryColumn,
  mapping.tagColumn,
];
