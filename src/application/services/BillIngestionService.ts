import type { ColumnMapping } from '../../domain/entities/ColumnMapping.js';
import type { TransactionRecord } from '../../domain/entities/TransactionRecord.js';
import { MalformedRowError } from '../../domain/errors/DashboardErrors.js';
import { buildFileFingerprint } from '../../domain/services/FileFingerprint.js';
import { buildTransactionRecord, requiredColumns } from '../../domain/services/TransactionNormalizer.js';
import type { ParsedBillDTO } from '../dto/ParsedBillDTO.js';
import type { BillParserPort } from '../ports/BillParserPort.js';
import type { DatasetCachePort } from '../ports/DatasetCachePort.js';

export interface BillUpload {
  content: Buffer;
  fileName: string;
}

export interface IngestedBill {
  cacheKey: string;
  records: readonly TransactionRecord[];
  fromCache: boolean;
}

export class BillIngestionService {
  constructor(
    private readonly parser: BillParserPort,
    private readonly cache: DatasetCachePort,
    private readonly mapping: ColumnMapping,
  ) {}

  async ingest(upload: BillUpload): Promise<IngestedBill> {
    const cacheKey = buildFileFingerprint(upload.content, this.mapping);
    const cached = await this.cache.get(cacheKey);

    if (cached) {
      return { cacheKey, records: cached, fromCache: true };
    }

    const parsed = await this.parser.parse(upload.content, { fileName: upload.fileName });
    const records = this.mapRecords(parsed);

    await this.cache.set(cacheKey, records);

    console.log('📄 Bill parsed:', {
      fileName: upload.fileName,
      sheetName: parsed.sheetName,
      rows: records.length,
    });

    return { cacheKey, records, fromCache: false };
  }

  async invalidate(cacheKey: string): Promise<void> {
    await this.cache.invalidate(cacheKey);
  }

  private mapRecords(parsed: ParsedBillDTO): readonly TransactionRecord[] {
    const missing = requiredColumns(this.mapping).filter((column) => !parsed.columns.includes(column));

    if (missing.length > 0) {
      throw new MalformedRowError(1, missing[0], `required column is missing (missing: ${missing.join(', ')})`);
    }

    return Object.freeze(
      parsed.rows.map((row) => buildTransactionRecord(row.cells, this.mapping, row.rowNumber)),
    );
  }
}
