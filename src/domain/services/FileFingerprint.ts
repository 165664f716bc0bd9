import crypto from 'node:crypto';
import type { ColumnMapping } from '../entities/ColumnMapping.js';

// The mapping is part of the key: the same bytes read with other columns yield other records.
export const buildFileFingerprint = (content: Buffer, mapping: ColumnMapping): string => {
  return crypto
    .createHash('sha256')
    .update(content)
    .update('|')
    .update(JSON.stringify(mapping))
    .digest('hex');
};
