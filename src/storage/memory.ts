/**
 * In-process ledger store, the default when no ledger file is configured
 */

import type { ResultRecord, RunManifest } from '../types/index.js';
import type { LedgerStore, StoredManifest } from './index.js';
import { checkManifestConflict, duplicateRecordError } from './records.js';

export class MemoryLedgerStore implements LedgerStore {
  private readonly manifests = new Map<string, StoredManifest>();
  private readonly records = new Map<string, Map<string, ResultRecord>>();

  async saveManifest(manifest: RunManifest, fingerprint: string): Promise<void> {
    const existing = this.manifests.get(manifest.runId);
    if (checkManifestConflict(existing, manifest.runId, fingerprint)) {
      return;
    }
    this.manifests.set(manifest.runId, { manifest, fingerprint, createdAt: new Date() });
  }

  async loadManifest(runId: string): Promise<StoredManifest | null> {
    return this.manifests.get(runId) ?? null;
  }

  async append(record: ResultRecord): Promise<void> {
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

  async load(runId: string): Promise<ResultRecord[]> {
    return [...(this.records.get(runId)?.values() ?? [])];
  }

  close(): void {
    this.manifests.clear();
    this.records.clear();
  }
}
