/**
 * Cell Runner
 *
 * Executes one cell: every dataset sample through the framework's unit, under
 * the cell's wall-clock budget, with the monitor, the cost tracker and the
 * family evaluator wrapped around it. Produces exactly one ResultRecord.
 */

import type pino from 'pino';
import type {
  Cell,
  CellError,
  CellOutcome,
  CellWarning,
  DatasetSample,
  QualityMetrics,
  ResultRecord,
  RunManifest,
  SampleOutput,
  TaskExecutionResult,
  TaskExecutionUnit,
  TaskInput,
} from '../types/index.js';
import type { RateCard } from '../config/rate-card.js';
import {
  ExecutionTimeoutError,
  FatalExecutionError,
  TransientExecutionError,
  ValidationError,
  toCellError,
} from '../errors/index.js';
import { CostTracker } from '../cost/index.js';
import { PerformanceMonitor, type PerformanceMonitorOptions } from '../monitor/index.js';
import {
  MALFORMED_OUTPUT_PREFIX,
  createEvaluator,
  type EvaluationContext,
  type EvaluationResult,
  type EvaluatorOptions,
  type QualityEvaluator,
} from '../evaluation/index.js';
import { withRetry } from '../utils/retry.js';
import { createCellLogger, createLogger } from '../utils/logger.js';
import { CellState } from './cell-state.js';
import type { RunLedger } from './ledger.js';

const logger = createLogger('CellRunner');

export interface CellRunnerOptions {
  manifest: RunManifest;
  rateCard: RateCard;
  ledger: RunLedger;
  evaluatorOptions?: EvaluatorOptions;
  monitor?: Pick<PerformanceMonitorOptions, 'sampleIntervalMs' | 'probe'>;
  /** Jitter source for retry backoff */
  random?: () => number;
  now?: () => Date;
}

export interface CellJob {
  cell: Cell;
  unit: TaskExecutionUnit;
  samples: readonly DatasetSample[];
  scheduledAt: Date;
}

/**
 * What the unit produced before the cell was finalized
 */
interface CellProgress {
  attempts: number;
  retries: number;
  outputs: SampleOutput[];
  evaluations: EvaluationResult[];
  diagnostics: Record<string, string[]>;
  malformedSamples: string[];
}

type Settlement =
  | { status: 'fulfilled' }
  | { status: 'rejected'; reason: unknown }
  | { status: 'aborted'; reason: unknown };

/**
 * Turn an error result reported by a unit into the matching error
 */
function errorFromResult(result: Extract<TaskExecutionResult, { status: 'error' }>): Error {
  switch (result.errorKind) {
    case 'transient':
      return new TransientExecutionError(result.message);
    case 'validation':
      return new ValidationError(result.message);
    case 'fatal':
      return new FatalExecutionError(result.message);
  }
}

/**
 * Mean of each metric over the samples that report it, in first-seen order
 */
export function meanScores(evaluations: readonly EvaluationResult[]): QualityMetrics {
  const sums = new Map<string, { total: number; count: number }>();
  for (const { scores } of evaluations) {
    for (const [metric, score] of Object.entries(scores)) {
      const entry = sums.get(metric) ?? { total: 0, count: 0 };
      entry.total += score;
      entry.count++;
      sums.set(metric, entry);
    }
  }
  const means: QualityMetrics = {};
  for (const [metric, { total, count }] of sums) {
    means[metric] = total / count;
  }
  return means;
}

function evaluationContext(sample: DatasetSample): EvaluationContext {
  return {
    ...(typeof sample.input === 'string' ? { query: sample.input } : {}),
    ...sample.context,
  };
}

export class CellRunner {
  private readonly manifest: RunManifest;
  private readonly rateCard: RateCard;
  private readonly ledger: RunLedger;
  private readonly evaluatorOptions: EvaluatorOptions;
  private readonly monitorOptions: CellRunnerOptions['monitor'];
  private readonly random?: () => number;
  private readonly now: () => Date;
  private readonly evaluators = new Map<string, QualityEvaluator>();

  constructor(options: CellRunnerOptions) {
    this.manifest = options.manifest;
    this.rateCard = options.rateCard;
    this.ledger = options.ledger;
    this.evaluatorOptions = options.evaluatorOptions ?? {};
    this.monitorOptions = options.monitor;
    this.random = options.random;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the cell to its terminal outcome and record it
   *
   * Per-cell failures end up in the record. Only a ledger write failure rejects.
   */
  async run(job: CellJob, runSignal?: AbortSignal): Promise<ResultRecord> {
    const { cell } = job;
    const log = createCellLogger(logger, this.manifest.runId, cell);
    const state = new CellState(cell.cellId);

    state.transition('RUNNING');
    const startedAt = this.now();
    log.debug({ sampleCount: job.samples.length }, 'Cell started');

    const controller = new AbortController();
    const { cellTimeoutMs } = this.manifest;
    const timer = setTimeout(
      () => controller.abort(new ExecutionTimeoutError(cellTimeoutMs)),
      cellTimeoutMs
    );
    const onRunAbort = (): void => {
      controller.abort(
        new FatalExecutionError('Run aborted before the cell finished', { code: 'RUN_ABORTED' })
      );
    };
    if (runSignal?.aborted) {
      onRunAbort();
    } else {
      runSignal?.addEventListener('abort', onRunAbort, { once: true });
    }

    const tracker = new CostTracker(this.rateCard);
    const progress: CellProgress = {
      attempts: 0,
      retries: 0,
      outputs: [],
      evaluations: [],
      diagnostics: {},
      malformedSamples: [],
    };

    const monitor = new PerformanceMonitor(this.monitorOptions);
    monitor.start();
    let settlement: Settlement;
    try {
      settlement = await this.settle(
        this.executeSamples(job, tracker, progress, controller.signal, log),
        controller.signal,
        log
      );
    } finally {
      clearTimeout(timer);
      runSignal?.removeEventListener('abort', onRunAbort);
    }
    const measurement = monitor.stop();
    const finishedAt = this.now();

    const costBreakdown = tracker.toBreakdown();
    const warnings: CellWarning[] = [];
    if (measurement.degraded) {
      warnings.push({
        code: 'MONITORING_DEGRADED',
        message: measurement.degradedReason ?? 'Resource sampling unavailable',
      });
    }
    if (costBreakdown.unpricedEventCount > 0) {
      warnings.push({
        code: 'UNPRICED_USAGE',
        message: `${costBreakdown.unpricedEventCount} usage event(s) have no rate-card entry`,
      });
    }
    if (progress.malformedSamples.length > 0) {
      warnings.push({
        code: 'MALFORMED_OUTPUT',
        message: `Malformed output for sample(s): ${progress.malformedSamples.join(', ')}`,
      });
    }

    const base = {
      ...cell,
      runId: this.manifest.runId,
      status: 'RECORDED' as const,
      executionTimeMs: measurement.durationMs,
      ...(measurement.resourceUsage ? { resourceUsage: measurement.resourceUsage } : {}),
      costBreakdown,
      attempts: progress.attempts,
      warnings,
      metadata: {
        scheduledAt: job.scheduledAt.toISOString(),
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        sampleCount: job.samples.length,
        completedSamples: progress.outputs.length,
        ...(Object.keys(progress.diagnostics).length > 0
          ? { diagnostics: { ...progress.diagnostics } }
          : {}),
      },
    };

    let record: ResultRecord;
    if (settlement.status === 'fulfilled') {
      record = {
        ...base,
        outcome: 'SUCCEEDED',
        qualityMetrics: meanScores(progress.evaluations),
        rawOutput: [...progress.outputs],
      };
    } else {
      const error = toCellError(settlement.reason);
      record = { ...base, outcome: outcomeOf(error), qualityMetrics: {}, error };
    }

    state.transition(record.outcome);
    const recorded = await this.ledger.record(record);
    state.transition('RECORDED');

    log.info(
      {
        outcome: recorded.outcome,
        durationMs: Math.round(recorded.executionTimeMs),
        attempts: recorded.attempts,
        errorCode: recorded.error?.code,
      },
      'Cell recorded'
    );
    return recorded;
  }

  private evaluatorFor(cell: Cell): QualityEvaluator {
    let evaluator = this.evaluators.get(cell.family);
    if (!evaluator) {
      evaluator = createEvaluator(cell.family, this.evaluatorOptions);
      this.evaluators.set(cell.family, evaluator);
    }
    return evaluator;
  }

  private async executeSamples(
    job: CellJob,
    tracker: CostTracker,
    progress: CellProgress,
    signal: AbortSignal,
    log: pino.Logger
  ): Promise<void> {
    const { cell, unit } = job;
    const { retry } = this.manifest;
    const evaluator = this.evaluatorFor(cell);

    for (const sample of job.samples) {
      signal.throwIfAborted();
      const input: TaskInput = {
        framework: cell.framework,
        useCase: cell.useCase,
        family: cell.family,
        repetitionIndex: cell.repetitionIndex,
        sample,
      };

      const output = await withRetry(
        async () => {
          progress.attempts++;
          const result = await unit.execute(input, signal);
          tracker.recordAll(result.usageEvents);
          if (result.status === 'error') {
            throw errorFromResult(result);
          }
          return result.output;
        },
        {
          // The budget is shared by all samples of the cell
          maxRetries: retry.maxRetries - progress.retries,
          baseDelayMs: retry.baseDelayMs,
          maxDelayMs: retry.maxDelayMs,
          backoffFactor: retry.backoffFactor,
          signal,
          random: this.random,
          onRetry: ({ attempt, delayMs, error }) => {
            progress.retries++;
            log.info(
              {
                sampleId: sample.id,
                attempt,
                delayMs: Math.round(delayMs),
                error: error instanceof Error ? error.message : String(error),
              },
              'Retrying after transient failure'
            );
          },
        }
      );

      progress.outputs.push({ sampleId: sample.id, output });
      const evaluation = evaluator.evaluate(sample.expected, output, evaluationContext(sample));
      progress.evaluations.push(evaluation);
      if (evaluation.diagnostics.length > 0) {
        progress.diagnostics[sample.id] = evaluation.diagnostics;
      }
      if (evaluation.diagnostics.some((d) => d.startsWith(MALFORMED_OUTPUT_PREFIX))) {
        progress.malformedSamples.push(sample.id);
      }
    }
  }

  /**
   * Wait for the work, or once the signal aborts, for at most graceMs more
   *
   * An aborted cell is finalized with the abort reason even if the unit
   * completes during the grace period.
   */
  private settle(work: Promise<void>, signal: AbortSignal, log: pino.Logger): Promise<Settlement> {
    const { graceMs } = this.manifest;

    return new Promise((resolve) => {
      let graceTimer: NodeJS.Timeout | undefined;
      let done = false;

      const finish = (settlement: Settlement): void => {
        if (done) {
          return;
        }
        done = true;
        clearTimeout(graceTimer);
        signal.removeEventListener('abort', onAbort);
        resolve(settlement);
      };

      const onAbort = (): void => {
        log.warn({ reason: reasonText(signal.reason), graceMs }, 'Cancelling cell');
        graceTimer = setTimeout(() => {
          log.warn({ graceMs }, 'Unit did not stop within the grace period');
          finish({ status: 'aborted', reason: signal.reason });
        }, graceMs);
      };

      const aborted = (): Settlement => ({ status: 'aborted', reason: signal.reason });
      void work.then(
        () => finish(signal.aborted ? aborted() : { status: 'fulfilled' }),
        (error: unknown) =>
          finish(signal.aborted ? aborted() : { status: 'rejected', reason: error })
      );

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    });
  }
}

function outcomeOf(error: CellError): Exclude<CellOutcome, 'SUCCEEDED'> {
  return error.kind === 'timeout' ? 'TIMED_OUT' : 'FAILED';
}

function reasonText(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
