/**
 * Run ledger: write-once records of one run, backed by a LedgerStore
 */

import type { ResultRecord } from '../types/index.js';
import type { LedgerStore } from '../storage/index.js';
import { StorageError } from '../errors/index.js';
import { deepFreeze } from '../utils/freeze.js';

export class RunLedger {
  private readonly records = new Map<string, ResultRecord>();

  constructor(
    readonly runId: string,
    private readonly store: LedgerStore
  ) {}

  /**
   * Adopt records already persisted for this run
   */
  seed(records: readonly ResultRecord[]): void {
    for (const record of records) {
      if (record.runId !== this.runId || this.records.has(record.cellId)) {
        continue;
      }
      this.records.set(record.cellId, deepFreeze(record));
    }
  }

  has(cellId: string): boolean {
    return this.records.has(cellId);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Freeze and persist a record
   *
   * @throws StorageError DUPLICATE_RECORD if the cell already has one
   */
  async record(record: ResultRecord): Promise<ResultRecord> {
    if (record.runId !== this.runId) {
      throw new StorageError(
        `Record for run "${record.runId}" does not belong to run "${this.runId}"`,
        { code: 'FOREIGN_RECORD' }
      );
    }
    if (this.records.has(record.cellId)) {
      throw new StorageError(`Cell "${record.cellId}" is already recorded`, {
        code: 'DUPLICATE_RECORD',
      });
    }

    const frozen = deepFreeze(record);
    // Claimed before the write so a concurrent duplicate fails here
    this.records.set(frozen.cellId, frozen);
    try {
      await this.store.append(frozen);
    } catch (error) {
      this.records.delete(frozen.cellId);
      throw error;
    }
    return frozen;
  }

  /**
   * Immutable view of the records so far, in recording order
   */
  snapshot(): readonly ResultRecord[] {
    return Object.freeze([...this.records.values()]);
  }
}
