import type { ParsedBillDTO } from '../dto/ParsedBillDTO.js';

export interface BillParserPort {
  parse(content: Buffer, options: { fileName: string }): Promise<ParsedBillDTO>;
}
