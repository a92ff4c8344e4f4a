/**
 * Validation of persisted ledger data shared by the stores
 */

import type { ResultRecord, RunManifest } from '../types/index.js';
import { ResultRecordSchema, RunManifestSchema } from '../types/schemas.js';
import { StorageError } from '../errors/index.js';
import { formatZodIssues } from '../utils/validation.js';
import type { StoredManifest } from './index.js';

/**
 * @throws StorageError INVALID_RECORD_DATA
 */
export function parseStoredRecord(value: unknown, location: string): ResultRecord {
  const result = ResultRecordSchema.safeParse(value);
  if (!result.success) {
    throw new StorageError(
      `Invalid record data at ${location}: ${formatZodIssues(result.error).join('; ')}`,
      { code: 'INVALID_RECORD_DATA', cause: result.error }
    );
  }
  return result.data;
}

/**
 * @throws StorageError INVALID_MANIFEST_DATA
 */
export function parseStoredManifest(value: unknown, location: string): RunManifest {
  const result = RunManifestSchema.safeParse(value);
  if (!result.success) {
    throw new StorageError(
      `Invalid manifest data at ${location}: ${formatZodIssues(result.error).join('; ')}`,
      { code: 'INVALID_MANIFEST_DATA', cause: result.error }
    );
  }
  return result.data;
}

/**
 * JSON.parse that reports failures as StorageError
 */
export function parseStoredJson(text: string, location: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new StorageError(`Invalid JSON at ${location}`, {
      code: 'INVALID_JSON',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export function checkManifestConflict(
  existing: StoredManifest | null | undefined,
  runId: string,
  fingerprint: string
): boolean {
  if (!existing) {
    return false;
  }
  if (existing.fingerprint !== fingerprint) {
    throw new StorageError(
      `Run "${runId}" is already stored with a different manifest (${existing.fingerprint})`,
      { code: 'MANIFEST_CONFLICT' }
    );
  }
  return true;
}

export function duplicateRecordError(record: ResultRecord): StorageError {
  return new StorageError(
    `Cell "${record.cellId}" is already recorded for run "${record.runId}"`,
    { code: 'DUPLICATE_RECORD' }
  );
}
