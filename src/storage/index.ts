/**
 * Storage module exports
 */

import { extname } from 'node:path';
import type { ResultRecord, RunManifest } from '../types/index.js';
import { ConfigurationError } from '../errors/index.js';
import { MemoryLedgerStore } from './memory.js';
import { SQLiteLedgerStore } from './sqlite.js';
import { JsonlLedgerStore } from './jsonl.js';

export interface StoredManifest {
  manifest: RunManifest;
  fingerprint: string;
  createdAt: Date;
}

/**
 * Persistence for run ledgers
 *
 * Implement this interface to create custom storage backends.
 * Records are append-only: a (runId, cellId) pair is written at most once.
 */
export interface LedgerStore {
  /**
   * Register a run. Saving the same manifest again is a no-op.
   * @throws StorageError MANIFEST_CONFLICT when the run exists with another fingerprint
   */
  saveManifest(manifest: RunManifest, fingerprint: string): Promise<void>;

  loadManifest(runId: string): Promise<StoredManifest | null>;

  /**
   * @throws StorageError DUPLICATE_RECORD when the cell is already recorded
   */
  append(record: ResultRecord): Promise<void>;

  /** Records of a run in append order */
  load(runId: string): Promise<ResultRecord[]>;

  /** Close the storage connection */
  close(): void;
}

const SQLITE_EXTENSIONS = new Set(['.db', '.sqlite', '.sqlite3']);

/**
 * Pick a store from the ledger path: SQLite for .db/.sqlite, JSON lines for
 * .jsonl, memory when no path is given
 */
export function openLedgerStore(path?: string): LedgerStore {
  if (path === undefined || path === '' || path === ':memory:') {
    return new MemoryLedgerStore();
  }

  const extension = extname(path).toLowerCase();
  if (SQLITE_EXTENSIONS.has(extension)) {
    return new SQLiteLedgerStore({ filename: path });
  }
  if (extension === '.jsonl') {
    return new JsonlLedgerStore(path);
  }

  throw new ConfigurationError(
    `Unsupported ledger file "${path}": use .db, .sqlite or .jsonl`,
    { code: 'UNSUPPORTED_LEDGER' }
  );
}

export { MemoryLedgerStore } from './memory.js';
export { SQLiteLedgerStore } from './sqlite.js';
export type { SQLiteLedgerStoreOptions } from './sqlite.js';
export { JsonlLedgerStore } from './jsonl.js';
export { parseStoredRecord, parseStoredManifest } from './records.js';
