import type { ParsedBillDTO } from '../application/dto/ParsedBillDTO.js';
import type { BillParserPort } from '../application/ports/BillParserPort.js';
import type { ChartRendererPort } from '../application/ports/ChartRendererPort.js';
import type { ChartSpec } from '../domain/entities/ChartSpec.js';
import type { RawBillRow } from '../domain/entities/ColumnMapping.js';
import { billColumns } from './billFixtures.js';

/** Returns the rows registered under the file's text content, numbered from line 2. */
export class StubBillParser implements BillParserPort {
  readonly parsedFiles: string[] = [];

  constructor(
    private readonly bills: Record<string, RawBillRow[]>,
    private readonly columns: string[] = billColumns,
  ) {}

  async parse(content: Buffer, options: { fileName: string }): Promise<ParsedBillDTO> {
    this.parsedFiles.push(options.fileName);
    const rows = this.bills[content.toString('utf8')];

    if (!rows) {
      throw new Error(`No stub bill registered for ${options.fileName}`);
    }

    return {
      sheetName: 'Bills',
      columns: this.columns,
      rows: rows.map((cells, index) => ({ rowNumber: index + 2, cells })),
    };
  }
}

export class RecordingRenderer implements ChartRendererPort {
  readonly rendered: ChartSpec[] = [];

  render(spec: ChartSpec): void {
    this.rendered.push(spec);
  }

  renderedIds(): string[] {
    return this.rendered.map((spec) => spec.chartId);
  }

  clear(): void {
    this.rendered.length = 0;
  }
}

export const upload = (content: string, fileName = `${content}.xlsx`) => ({
  content: Buffer.from(content, 'utf8'),
  fileName,
});
