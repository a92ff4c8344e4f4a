/**
 * Core type definitions for framework-bench
 */

// ============================================
// Cell Types
// ============================================

/**
 * Lifecycle status of a benchmark cell
 *
 * PENDING -> RUNNING -> {SUCCEEDED | FAILED | TIMED_OUT} -> RECORDED
 */
export type CellStatus = 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT' | 'RECORDED';

/**
 * Terminal outcome carried by a RECORDED cell
 */
export type CellOutcome = 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT';

/**
 * How a failure is treated by the orchestrator
 * - transient: retried while the cell's retry budget lasts
 * - validation: malformed input/output, never retried
 * - fatal: unrecoverable, never retried
 * - timeout: wall-clock budget exceeded
 */
export type ErrorKind = 'transient' | 'validation' | 'fatal' | 'timeout';

/**
 * Use-case families, each scored by its own evaluator
 */
export type UseCaseFamily = 'qa' | 'rag' | 'search';

/**
 * One scheduled (framework, use case, repetition) unit of work
 */
export interface Cell {
  cellId: string;
  framework: string;
  useCase: string;
  family: UseCaseFamily;
  repetitionIndex: number;
}

// ============================================
// Manifest Types
// ============================================

export interface ManifestEntry {
  framework: string;
  useCase: string;
  family: UseCaseFamily;
  /** Number of repetitions of this (framework, use case) pair */
  repetitions: number;
}

export interface RetryPolicy {
  /** Retries AFTER the initial attempt, per cell */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

/**
 * The full set of cells for one run. Frozen once created.
 */
export interface RunManifest {
  runId: string;
  entries: ManifestEntry[];
  /** Worker pool size */
  concurrency: number;
  /** Wall-clock budget per cell */
  cellTimeoutMs: number;
  /** How long to wait for a cancelled unit before finalizing the record */
  graceMs: number;
  retry: RetryPolicy;
}

// ============================================
// Usage & Cost Types
// ============================================

/**
 * A single metered call made by a framework (e.g. one LLM request)
 */
export interface UsageEvent {
  provider: string;
  model: string;
  inputUnits: number;
  outputUnits: number;
  timestamp: Date;
  requestId?: string;
}

/**
 * Cost of one cell. Amounts are exact decimal strings.
 */
export interface CostBreakdown {
  currency: string;
  rateCardVersion: string;
  byProvider: Record<string, string>;
  /** Sum of priced events only */
  total: string;
  pricedEventCount: number;
  unpricedEventCount: number;
  /** Events with no rate-card entry, kept for audit */
  unpricedEvents: UsageEvent[];
}

// ============================================
// Measurement Types
// ============================================

export interface ResourceUsage {
  peakMemoryBytes: number;
  averageCpuPercent: number;
  sampleCount: number;
}

export type QualityMetrics = Record<string, number>;

export interface CellError {
  kind: ErrorKind;
  code: string;
  message: string;
}

export type CellWarningCode = 'MONITORING_DEGRADED' | 'UNPRICED_USAGE' | 'MALFORMED_OUTPUT';

export interface CellWarning {
  code: CellWarningCode;
  message: string;
}

export interface SampleOutput {
  sampleId: string;
  output: unknown;
}

export interface RecordMetadata {
  scheduledAt: string;
  startedAt?: string;
  finishedAt?: string;
  sampleCount: number;
  [key: string]: unknown;
}

// ============================================
// Result Record Types
// ============================================

interface ResultRecordBase extends Cell {
  runId: string;
  status: 'RECORDED';
  executionTimeMs: number;
  resourceUsage?: ResourceUsage;
  costBreakdown: CostBreakdown;
  qualityMetrics: QualityMetrics;
  attempts: number;
  warnings: CellWarning[];
  metadata: RecordMetadata;
}

export interface SucceededRecord extends ResultRecordBase {
  outcome: 'SUCCEEDED';
  rawOutput: SampleOutput[];
  error?: undefined;
}

export interface FailedRecord extends ResultRecordBase {
  outcome: 'FAILED' | 'TIMED_OUT';
  error: CellError;
  rawOutput?: undefined;
}

/**
 * The terminal, immutable measurement of one cell.
 * Exactly one of rawOutput / error is populated.
 */
export type ResultRecord = SucceededRecord | FailedRecord;

// ============================================
// Execution Unit Types
// ============================================

/**
 * One dataset item: stable id, task input and expected output
 */
export interface DatasetSample {
  id: string;
  input: unknown;
  expected: unknown;
  /** Evaluation context (query text, reference date, ...) */
  context?: Record<string, unknown>;
}

export interface TaskInput {
  framework: string;
  useCase: string;
  family: UseCaseFamily;
  repetitionIndex: number;
  sample: DatasetSample;
}

export type TaskExecutionResult =
  | {
      status: 'ok';
      output: unknown;
      usageEvents: UsageEvent[];
    }
  | {
      status: 'error';
      errorKind: Exclude<ErrorKind, 'timeout'>;
      message: string;
      usageEvents: UsageEvent[];
    };

/**
 * Opaque adapter executing one framework's implementation of a use case.
 * Must return promptly once `signal` is aborted.
 */
export interface TaskExecutionUnit {
  readonly framework: string;
  execute(input: TaskInput, signal: AbortSignal): Promise<TaskExecutionResult>;
}
