import { type CellObject, type WorkBook, type WorkSheet, SSF, read, utils } from 'xlsx';
import { type ParsedBillDTO, ParsedBillSchema } from '../../../application/dto/ParsedBillDTO.js';
import type { BillParserPort } from '../../../application/ports/BillParserPort.js';

const csvFilePattern = /\.csv$/i;

const pad = (value: number): string => String(value).padStart(2, '0');

// Sheet rows are 0-based; sheet_to_json tags each row object with its index.
const sheetLineOf = (row: Record<string, unknown>, fallback: number): number =>
  typeof row.__rowNum__ === 'number' ? row.__rowNum__ + 1 : fallback;

/**
 * Date cells are stored as serial day numbers with a date number format.
 * They are rewritten as calendar strings so no timezone is ever applied.
 */
const rewriteDateCells = (sheet: WorkSheet, date1904: boolean): void => {
  const ref = sheet['!ref'];
  if (!ref) {
    return;
  }

  const range = utils.decode_range(ref);

  for (let r = range.s.r; r <= range.e.r; r++) {
    for (let c = range.s.c; c <= range.e.c; c++) {
      const address = utils.encode_cell({ r, c });
      const cell: CellObject | undefined = sheet[address];

      if (!cell || cell.t !== 'n' || typeof cell.v !== 'number' || typeof cell.z !== 'string' || !SSF.is_date(cell.z)) {
        continue;
      }

      const parts: { y: number; m: number; d: number } = SSF.parse_date_code(cell.v, { date1904 });
      sheet[address] = { t: 's', v: `${parts.y}-${pad(parts.m)}-${pad(parts.d)}` };
    }
  }
};

const readWorkbook = (content: Buffer, fileName: string): WorkBook => {
  // raw keeps CSV values as text, so dates reach the normalizer unparsed.
  if (csvFilePattern.test(fileName)) {
    return read(content.toString('utf8').replace(/^\uFEFF/, ''), { type: 'string', raw: true });
  }

  return read(content, { type: 'buffer', cellNF: true });
};

/**
 * Reads the first worksheet of an .xlsx, .xls or .csv bill export. The
 * header row becomes the column list; CSV files are read as UTF-8.
 */
export class XlsxBillParser implements BillParserPort {
  async parse(content: Buffer, options: { fileName: string }): Promise<ParsedBillDTO> {
    const workbook = readWorkbook(content, options.fileName);

    if (workbook.SheetNames.length === 0) {
      throw new Error(`Bill file ${options.fileName} has no worksheets`);
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = workbook.Sheets[sheetName];
    rewriteDateCells(sheet, Boolean(workbook.Workbook?.WBProps?.date1904));

    const [header = []] = utils.sheet_to_json<unknown[]>(sheet, { header: 1, blankrows: false });
    const rows = utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: null, blankrows: false });

    return ParsedBillSchema.parse({
      sheetName,
      columns: header.filter((cell) => cell !== null && cell !== undefined).map((cell) => String(cell)),
      rows: rows.map((row, index) => ({ rowNumber: sheetLineOf(row, index + 2), cells: { ...row } })),
    });
  }
}
