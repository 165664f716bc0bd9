import { z } from 'zod';

export const ParsedBillRowSchema = z.object({
  /** Line of the row in the sheet, counting the header as line 1. */
  rowNumber: z.number().int().positive(),
  cells: z.record(z.unknown()),
});

export const ParsedBillSchema = z.object({
  sheetName: z.string(),
  columns: z.array(z.string()),
  rows: z.array(ParsedBillRowSchema),
});

export type ParsedBillRowDTO = z.infer<typeof ParsedBillRowSchema>;
export type ParsedBillDTO = z.infer<typeof ParsedBillSchema>;
