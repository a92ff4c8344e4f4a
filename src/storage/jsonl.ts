/**
 * Append-only JSON-lines ledger
 *
 * Every line is either a run manifest or a result record. A trailing line cut
 * short by an interrupted write is dropped on open and cut off before the
 * next append.
 */

import { appendFile, mkdir, readFile, truncate } from 'node:fs/promises';
import { dirname } from 'node:path';
import { StorageError } from '../errors/index.js';
import { LedgerLineSchema } from '../types/schemas.js';
import type { ResultRecord, RunManifest } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { LedgerStore, StoredManifest } from './index.js';
import {
  checkManifestConflict,
  duplicateRecordError,
  parseStoredManifest,
  parseStoredRecord,
} from './records.js';

const logger = createLogger('JsonlLedgerStore');

type ParsedLine =
  | { type: 'manifest'; runId: string; stored: StoredManifest }
  | { type: 'record'; record: ResultRecord };

export class JsonlLedgerStore implements LedgerStore {
  private readonly path: string;
  private readonly manifests = new Map<string, StoredManifest>();
  private readonly records = new Map<string, Map<string, ResultRecord>>();
  private initPromise: Promise<void> | null;
  /** Byte length to cut the file back to before the next append */
  private truncateTo?: number;
  private needsNewline = false;
  private closed = false;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
    this.initPromise = this.initialize();
    // Surfaced by ensureInitialized; the store may be opened long before first use
    this.initPromise.catch(() => undefined);
  }

  private async initialize(): Promise<void> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw new StorageError(`Cannot read ledger ${this.path}`, {
        code: 'LEDGER_READ_FAILED',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const lastNewline = content.lastIndexOf('\n');
    const complete = content.slice(0, lastNewline + 1);
    const tail = content.slice(lastNewline + 1);

    complete.split('\n').forEach((line, index) => {
      if (line.trim() !== '') {
        this.index(this.parseLine(line, index + 1));
      }
    });

    if (tail.trim() !== '') {
      const lineNumber = complete.split('\n').length;
      const parsed = this.tryParseLine(tail, lineNumber);
      if (parsed) {
        this.index(parsed);
        this.needsNewline = true;
      } else {
        logger.warn(
          { path: this.path, line: lineNumber },
          'Ignoring truncated trailing line in ledger'
        );
        this.truncateTo = Buffer.byteLength(complete, 'utf8');
      }
    }

    logger.debug({ path: this.path, runs: this.manifests.size }, 'Ledger loaded');
  }

  private async ensureInitialized(): Promise<void> {
    if (this.closed) {
      throw new StorageError('Ledger store is closed', { code: 'STORE_CLOSED' });
    }
    if (this.initPromise) {
      await this.initPromise;
      this.initPromise = null;
    }
  }

  private parseLine(line: string, lineNumber: number): ParsedLine {
    const location = `${this.path}:${lineNumber}`;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new StorageError(`Invalid JSON at ${location}`, {
        code: 'INVALID_JSON',
        cause: error instanceof Error ? error : undefined,
      });
    }

    const result = LedgerLineSchema.safeParse(json);
    if (!result.success) {
      throw new StorageError(`Unknown ledger line at ${location}`, {
        code: 'INVALID_LEDGER_LINE',
        cause: result.error,
      });
    }

    const entry = result.data;
    if (entry.type === 'manifest') {
      return {
        type: 'manifest',
        runId: entry.runId,
        stored: {
          manifest: parseStoredManifest(entry.manifest, location),
          fingerprint: entry.fingerprint,
          createdAt: new Date(entry.createdAt),
        },
      };
    }
    return { type: 'record', record: parseStoredRecord(entry.record, location) };
  }

  private tryParseLine(line: string, lineNumber: number): ParsedLine | null {
    try {
      return this.parseLine(line, lineNumber);
    } catch (error) {
      if (error instanceof StorageError) {
        return null;
      }
      throw error;
    }
  }

  private index(parsed: ParsedLine): void {
    if (parsed.type === 'manifest') {
      this.manifests.set(parsed.runId, parsed.stored);
      return;
    }
    const { record } = parsed;
    let run = this.records.get(record.runId);
    if (!run) {
      run = new Map();
      this.records.set(record.runId, run);
    }
    if (run.has(record.cellId)) {
      throw duplicateRecordError(record);
    }
    run.set(record.cellId, record);
  }

  private writeLine(value: Record<string, unknown>): Promise<void> {
    const write = this.writeQueue.then(() => this.write(value));
    // Failures reach the caller through `write`; the queue keeps going
    this.writeQueue = write.then(
      () => undefined,
      () => undefined
    );
    return write;
  }

  private async write(value: Record<string, unknown>): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      if (this.truncateTo !== undefined) {
        await truncate(this.path, this.truncateTo);
        this.truncateTo = undefined;
      }
      const prefix = this.needsNewline ? '\n' : '';
      await appendFile(this.path, `${prefix}${JSON.stringify(value)}\n`, 'utf8');
      this.needsNewline = false;
    } catch (error) {
      throw new StorageError(`Cannot append to ledger ${this.path}`, {
        code: 'LEDGER_WRITE_FAILED',
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  async saveManifest(manifest: RunManifest, fingerprint: string): Promise<void> {
    await this.ensureInitialized();
    if (checkManifestConflict(this.manifests.get(manifest.runId), manifest.runId, fingerprint)) {
      return;
    }

    const stored: StoredManifest = { manifest, fingerprint, createdAt: new Date() };
    this.manifests.set(manifest.runId, stored);
    try {
      await this.writeLine({
        type: 'manifest',
        runId: manifest.runId,
        fingerprint,
        createdAt: stored.createdAt.toISOString(),
        manifest,
      });
    } catch (error) {
      this.manifests.delete(manifest.runId);
      throw error;
    }
  }

  async loadManifest(runId: string): Promise<StoredManifest | null> {
    await this.ensureInitialized();
    return this.manifests.get(runId) ?? null;
  }

  async append(record: ResultRecord): Promise<void> {
    await this.ensureInitialized();
    // Indexed before the write so concurrent appends of one cell are rejected
    this.index({ type: 'record', record });
    try {
      await this.writeLine({ type: 'record', record });
    } catch (error) {
      // Only durable records stay visible to load()
      this.records.get(record.runId)?.delete(record.cellId);
      throw error;
    }
  }

  async load(runId: string): Promise<ResultRecord[]> {
    await this.ensureInitialized();
    return [...(this.records.get(runId)?.values() ?? [])];
  }

  close(): void {
    this.closed = true;
  }
}
