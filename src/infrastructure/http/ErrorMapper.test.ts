import multer from 'multer';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  EmptyDatasetError,
  MalformedRowError,
  UnknownChartError,
  UnknownSessionError,
} from '../../domain/errors/DashboardErrors.js';
import { UnsupportedUploadError, toHttpError } from './ErrorMapper.js';

describe('toHttpError', () => {
  it('reports malformed rows as an unprocessable file', () => {
    expect(toHttpError(new MalformedRowError(5, 'Amount', 'non-numeric amount "x"'))).toEqual({
      status: 422,
      body: {
        error: 'Cannot process file',
        details: { row: 5, column: 'Amount', reason: 'Row 5, column "Amount": non-numeric amount "x"' },
      },
    });
  });

  it('reports an empty dataset as nothing to display', () => {
    expect(toHttpError(new EmptyDatasetError())).toEqual({
      status: 422,
      body: { error: 'No data to display', details: 'Bill file contains no transactions' },
    });
  });

  it('maps unknown sessions and charts to 404', () => {
    expect(toHttpError(new UnknownSessionError('s-1'))).toEqual({
      status: 404,
      body: { error: 'Dashboard session s-1 does not exist' },
    });
    expect(toHttpError(new UnknownChartError('pie')).status).toBe(404);
  });

  it('maps rejected uploads and invalid input to client errors', () => {
    expect(toHttpError(new UnsupportedUploadError('bills.pdf')).status).toBe(415);
    expect(toHttpError(new multer.MulterError('LIMIT_FILE_SIZE')).status).toBe(400);

    const parsed = z.object({ year: z.number() }).safeParse({ year: 'x' });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(toHttpError(parsed.error)).toMatchObject({ status: 400, body: { error: 'Invalid request' } });
    }
  });

  it('falls back to 500', () => {
    expect(toHttpError(new Error('boom'))).toEqual({ status: 500, body: { error: 'boom' } });
    expect(toHttpError('boom')).toEqual({ status: 500, body: { error: 'Unexpected error' } });
  });
});
