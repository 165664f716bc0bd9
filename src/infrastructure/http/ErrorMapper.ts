import multer from 'multer';
import { ZodError } from 'zod';
import {
  EmptyDatasetError,
  MalformedRowError,
  UnknownChartError,
  UnknownSessionError,
} from '../../domain/errors/DashboardErrors.js';

export class UnsupportedUploadError extends Error {
  constructor(readonly fileName: string) {
    super(`Unsupported bill file ${fileName}; upload an .xlsx, .xls or .csv export`);
    this.name = 'UnsupportedUploadError';
  }
}

export interface HttpErrorResponse {
  status: number;
  body: {
    error: string;
    details?: unknown;
  };
}

export const toHttpError = (error: unknown): HttpErrorResponse => {
  if (error instanceof MalformedRowError) {
    return {
      status: 422,
      body: {
        error: 'Cannot process file',
        details: { row: error.rowNumber, column: error.column, reason: error.message },
      },
    };
  }

  if (error instanceof EmptyDatasetError) {
    return { status: 422, body: { error: 'No data to display', details: error.message } };
  }

  if (error instanceof UnknownSessionError || error instanceof UnknownChartError) {
    return { status: 404, body: { error: error.message } };
  }

  if (error instanceof UnsupportedUploadError) {
    return { status: 415, body: { error: error.message } };
  }

  if (error instanceof ZodError) {
    return { status: 400, body: { error: 'Invalid request', details: error.flatten() } };
  }

  if (error instanceof multer.MulterError) {
    return { status: 400, body: { error: error.message } };
  }

  return {
    status: 500,
    body: { error: error instanceof Error ? error.message : 'Unexpected error' },
  };
};
