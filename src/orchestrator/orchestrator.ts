/**
 * Benchmark Orchestrator - runs every cell of a manifest and aggregates the results
 */

import type { Cell, DatasetSample, ResultRecord, RunManifest } from '../types/index.js';
import type { RateCard } from '../config/rate-card.js';
import type { DatasetProvider } from '../datasets/index.js';
import type { EvaluatorOptions } from '../evaluation/index.js';
import type { UnitRegistry } from '../units/registry.js';
import { MemoryLedgerStore, type LedgerStore } from '../storage/index.js';
import { FatalOrchestrationError } from '../errors/index.js';
import {
  expandCells,
  laneKeyOf,
  manifestFingerprint,
  validateManifest,
} from '../manifest/index.js';
import { toPricedRate } from '../cost/cost-tracker.js';
import { aggregate, type AggregateReport } from '../report/index.js';
import { createLogger } from '../utils/logger.js';
import { CellRunner, type CellRunnerOptions } from './cell-runner.js';
import { RunLedger } from './ledger.js';
import { runLanes } from './pool.js';

const logger = createLogger('Orchestrator');

export interface BenchmarkOrchestratorOptions {
  units: UnitRegistry;
  datasets: DatasetProvider;
  rateCard: RateCard;
  /** Defaults to an in-memory store, which cannot resume across processes */
  store?: LedgerStore;
  evaluatorOptions?: EvaluatorOptions;
  monitor?: CellRunnerOptions['monitor'];
  random?: () => number;
  now?: () => Date;
}

export interface RunOptions {
  /** Stops scheduling new cells and cancels the running ones */
  signal?: AbortSignal;
}

export interface RunResult {
  runId: string;
  /** Every record of the run, resumed ones first */
  records: readonly ResultRecord[];
  report: AggregateReport;
  executedCount: number;
  skippedCount: number;
  /** True when the signal fired before every cell was recorded */
  aborted: boolean;
}

/**
 * BenchmarkOrchestrator
 *
 * - Validates the manifest and checks units and datasets before any cell runs
 * - Skips cells already recorded for the same run id
 * - Runs the remaining cells on a bounded pool, one lane per (framework, use case)
 * - Aggregates the ledger snapshot into a report
 */
export class BenchmarkOrchestrator {
  private readonly units: UnitRegistry;
  private readonly datasets: DatasetProvider;
  private readonly rateCard: RateCard;
  private readonly store: LedgerStore;
  private readonly runnerOptions: Omit<CellRunnerOptions, 'manifest' | 'rateCard' | 'ledger'>;

  constructor(options: BenchmarkOrchestratorOptions) {
    this.units = options.units;
    this.datasets = options.datasets;
    // Every rate must price exactly before any cell runs
    options.rateCard.rates.forEach(toPricedRate);
    this.rateCard = options.rateCard;
    this.store = options.store ?? new MemoryLedgerStore();
    this.runnerOptions = {
      evaluatorOptions: options.evaluatorOptions,
      monitor: options.monitor,
      random: options.random,
      now: options.now,
    };
  }

  /**
   * Run (or resume) a manifest
   *
   * @throws FatalOrchestrationError for an invalid manifest, a missing unit or
   * dataset, or a run id already used by a different manifest
   * @throws StorageError when a record cannot be persisted
   */
  async run(input: RunManifest, options: RunOptions = {}): Promise<RunResult> {
    const manifest = validateManifest(input);
    const fingerprint = manifestFingerprint(manifest);
    const samples = await this.preflight(manifest);

    await this.claimRun(manifest, fingerprint);

    const ledger = new RunLedger(manifest.runId, this.store);
    ledger.seed(await this.store.load(manifest.runId));

    const cells = expandCells(manifest);
    const pending = cells.filter((cell) => !ledger.has(cell.cellId));
    const skippedCount = cells.length - pending.length;

    logger.info(
      {
        runId: manifest.runId,
        totalCells: cells.length,
        pendingCells: pending.length,
        skippedCells: skippedCount,
        concurrency: manifest.concurrency,
      },
      skippedCount > 0 ? 'Resuming run' : 'Starting run'
    );

    const runner = new CellRunner({
      ...this.runnerOptions,
      manifest,
      rateCard: this.rateCard,
      ledger,
    });
    const now = this.runnerOptions.now ?? (() => new Date());
    let executedCount = 0;

    await runLanes(
      groupLanes(pending),
      { concurrency: manifest.concurrency, signal: options.signal },
      async (cell) => {
        logger.debug({ runId: manifest.runId, cellId: cell.cellId }, 'Cell scheduled');
        await runner.run(
          {
            cell,
            unit: this.units.get(cell.framework, cell.useCase),
            samples: samples.get(cell.useCase) ?? [],
            scheduledAt: now(),
          },
          options.signal
        );
        executedCount++;
      }
    );

    const records = ledger.snapshot();
    const aborted = records.length < cells.length && options.signal?.aborted === true;
    const report = aggregate(records, manifest);

    logger.info(
      {
        runId: manifest.runId,
        executed: executedCount,
        skipped: skippedCount,
        unscheduled: cells.length - records.length,
        failureRate: report.totals.failureRate,
        totalCost: report.totals.totalCost,
      },
      aborted ? 'Run aborted' : 'Run completed'
    );

    return {
      runId: manifest.runId,
      records,
      report,
      executedCount,
      skippedCount,
      aborted,
    };
  }

  /**
   * Check every unit and dataset the manifest needs
   *
   * @returns Samples per use case
   */
  private async preflight(manifest: RunManifest): Promise<Map<string, readonly DatasetSample[]>> {
    const issues: string[] = [];

    for (const entry of manifest.entries) {
      if (!this.units.has(entry.framework, entry.useCase)) {
        issues.push(
          `No execution unit for framework "${entry.framework}" (use case "${entry.useCase}")`
        );
      }
    }

    const samples = new Map<string, readonly DatasetSample[]>();
    for (const useCase of new Set(manifest.entries.map((e) => e.useCase))) {
      try {
        samples.set(useCase, await this.datasets.getSamples(useCase));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        issues.push(`Dataset for use case "${useCase}" unavailable: ${message}`);
      }
    }

    if (issues.length > 0) {
      logger.error({ runId: manifest.runId, issues }, 'Preflight failed');
      throw new FatalOrchestrationError(`Run "${manifest.runId}" cannot start`, {
        code: 'PREFLIGHT_FAILED',
        issues,
      });
    }
    return samples;
  }

  /**
   * Bind the run id to this manifest, or confirm a resumed run matches it
   */
  private async claimRun(manifest: RunManifest, fingerprint: string): Promise<void> {
    const stored = await this.store.loadManifest(manifest.runId);
    if (stored && stored.fingerprint !== fingerprint) {
      throw new FatalOrchestrationError(
        `Run "${manifest.runId}" was started with a different manifest`,
        {
          code: 'MANIFEST_MISMATCH',
          issues: [`stored fingerprint ${stored.fingerprint}, got ${fingerprint}`],
        }
      );
    }
    if (!stored) {
      await this.store.saveManifest(manifest, fingerprint);
    }
  }
}

/**
 * Split cells into lanes in manifest order; repetitions stay ascending
 */
function groupLanes(cells: readonly Cell[]): Cell[][] {
  const lanes = new Map<string, Cell[]>();
  for (const cell of cells) {
    const key = laneKeyOf(cell);
    const lane = lanes.get(key) ?? [];
    lane.push(cell);
    lanes.set(key, lane);
  }
  return [...lanes.values()];
}
