/**
 * SQLite ledger store
 * Uses sql.js (pure JavaScript/WebAssembly) for cross-platform compatibility
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import initSqlJs from 'sql.js';
import type { SqlJsStatic, Database as SqlJsDatabase } from 'sql.js';
import { StorageError } from '../errors/index.js';
import { LedgerRecordRowSchema, LedgerRunRowSchema } from '../types/schemas.js';
import type { ResultRecord, RunManifest } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { formatZodIssues } from '../utils/validation.js';
import type { LedgerStore, StoredManifest } from './index.js';
import {
  checkManifestConflict,
  duplicateRecordError,
  parseStoredJson,
  parseStoredManifest,
  parseStoredRecord,
} from './records.js';

const logger = createLogger('SQLiteLedgerStore');

export interface SQLiteLedgerStoreOptions {
  /**
   * Database file, loaded on open and rewritten after every write.
   * Use ':memory:' (or omit) for an in-memory database.
   */
  filename?: string;
}

// Global SQL.js instance (initialized once)
let sqlJsInstance: SqlJsStatic | null = null;

async function getSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsInstance) {
    sqlJsInstance = await initSqlJs();
  }
  return sqlJsInstance;
}

async function readDatabaseFile(filename: string): Promise<Buffer | null> {
  try {
    return await readFile(filename);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new StorageError(`Cannot read ledger database ${filename}`, {
      code: 'LEDGER_READ_FAILED',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export class SQLiteLedgerStore implements LedgerStore {
  private readonly filename?: string;
  private db: SqlJsDatabase | null = null;
  private initPromise: Promise<void> | null = null;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: SQLiteLedgerStoreOptions = {}) {
    this.filename = options.filename === ':memory:' ? undefined : options.filename;
    // Initialize asynchronously; failures surface through ensureInitialized
    this.initPromise = this.initialize();
    this.initPromise.catch(() => undefined);
  }

  private async initialize(): Promise<void> {
    const SQL = await getSqlJs();
    const existing = this.filename ? await readDatabaseFile(this.filename) : null;
    try {
      this.db = new SQL.Database(existing);
      this.initializeSchema();
    } catch (error) {
      this.close();
      throw new StorageError(`Invalid ledger database ${this.filename ?? ':memory:'}`, {
        code: 'INVALID_LEDGER_DATABASE',
        cause: error instanceof Error ? error : undefined,
      });
    }
    logger.debug(
      { filename: this.filename ?? ':memory:', loaded: existing !== null },
      'Ledger database opened'
    );
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initPromise) {
      await this.initPromise;
      this.initPromise = null;
    }
  }

  private getDb(): SqlJsDatabase {
    if (!this.db) {
      throw new StorageError('Database not initialized or already closed', {
        code: 'DB_NOT_INITIALIZED',
      });
    }
    return this.db;
  }

  private initializeSchema(): void {
    const db = this.getDb();

    db.run(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        fingerprint TEXT NOT NULL,
        manifest TEXT NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS records (
        run_id TEXT NOT NULL,
        cell_id TEXT NOT NULL,
        framework TEXT NOT NULL,
        use_case TEXT NOT NULL,
        repetition_index INTEGER NOT NULL,
        outcome TEXT NOT NULL,
        payload TEXT NOT NULL,
        recorded_at INTEGER NOT NULL,
        PRIMARY KEY (run_id, cell_id)
      )
    `);

    db.run(`CREATE INDEX IF NOT EXISTS idx_records_run_outcome ON records(run_id, outcome)`);
  }

  private persist(): Promise<void> {
    const filename = this.filename;
    if (!filename) {
      return Promise.resolve();
    }
    const data = this.getDb().export();
    const write = this.writeQueue.then(() => this.writeDatabaseFile(filename, data));
    // Failures reach the caller through `write`; the queue keeps going
    this.writeQueue = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async writeDatabaseFile(filename: string, data: Uint8Array): Promise<void> {
    try {
      await mkdir(dirname(filename), { recursive: true });
      await writeFile(filename, data);
    } catch (error) {
      throw new StorageError(`Cannot write ledger database ${filename}`, {
        code: 'LEDGER_WRITE_FAILED',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async saveManifest(manifest: RunManifest, fingerprint: string): Promise<void> {
    await this.ensureInitialized();
    const existing = await this.loadManifest(manifest.runId);
    if (checkManifestConflict(existing, manifest.runId, fingerprint)) {
      return;
    }

    this.getDb().run(
      'INSERT INTO runs (run_id, fingerprint, manifest, created_at) VALUES (?, ?, ?, ?)',
      [manifest.runId, fingerprint, JSON.stringify(manifest), Date.now()]
    );
    try {
      await this.persist();
    } catch (error) {
      this.db?.run('DELETE FROM runs WHERE run_id = ?', [manifest.runId]);
      throw error;
    }

    logger.debug({ runId: manifest.runId, fingerprint }, 'Run manifest saved');
  }

  async loadManifest(runId: string): Promise<StoredManifest | null> {
    await this.ensureInitialized();
    const db = this.getDb();

    const stmt = db.prepare('SELECT * FROM runs WHERE run_id = ?');
    stmt.bind([runId]);

    if (!stmt.step()) {
      stmt.free();
      return null;
    }

    const rawRow = stmt.getAsObject();
    stmt.free();

    const row = LedgerRunRowSchema.safeParse(rawRow);
    if (!row.success) {
      logger.error({ runId, error: row.error.issues }, 'Invalid run row in database');
      throw new StorageError(
        `Invalid run data for ${runId}: ${formatZodIssues(row.error).join('; ')}`,
        { code: 'INVALID_MANIFEST_DATA', cause: row.error }
      );
    }

    const location = `runs/${runId}`;
    return {
      manifest: parseStoredManifest(parseStoredJson(row.data.manifest, location), location),
      fingerprint: row.data.fingerprint,
      createdAt: new Date(row.data.created_at),
    };
  }

  async append(record: ResultRecord): Promise<void> {
    await this.ensureInitialized();
    const db = this.getDb();

    const stmt = db.prepare('SELECT 1 FROM records WHERE run_id = ? AND cell_id = ?');
    stmt.bind([record.runId, record.cellId]);
    const exists = stmt.step();
    stmt.free();
    if (exists) {
      throw duplicateRecordError(record);
    }

    db.run(
      `INSERT INTO records
         (run_id, cell_id, framework, use_case, repetition_index, outcome, payload, recorded_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        record.runId,
        record.cellId,
        record.framework,
        record.useCase,
        record.repetitionIndex,
        record.outcome,
        JSON.stringify(record),
        Date.now(),
      ]
    );
    try {
      await this.persist();
    } catch (error) {
      // Only durable records stay visible to load()
      this.db?.run('DELETE FROM records WHERE run_id = ? AND cell_id = ?', [
        record.runId,
        record.cellId,
      ]);
      throw error;
    }

    logger.debug({ runId: record.runId, cellId: record.cellId }, 'Record appended');
  }

  async load(runId: string): Promise<ResultRecord[]> {
    await this.ensureInitialized();
    const db = this.getDb();

    const results: ResultRecord[] = [];
    const stmt = db.prepare('SELECT cell_id, payload FROM records WHERE run_id = ? ORDER BY rowid');
    stmt.bind([runId]);

    try {
      while (stmt.step()) {
        const row = LedgerRecordRowSchema.safeParse(stmt.getAsObject());
        if (!row.success) {
          throw new StorageError(
            `Invalid record row for run ${runId}: ${formatZodIssues(row.error).join('; ')}`,
            { code: 'INVALID_RECORD_DATA', cause: row.error }
          );
        }
        const location = `records/${runId}/${row.data.cell_id}`;
        results.push(parseStoredRecord(parseStoredJson(row.data.payload, location), location));
      }
    } finally {
      stmt.free();
    }

    return results;
  }

  /**
   * Close the database connection
   */
  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
