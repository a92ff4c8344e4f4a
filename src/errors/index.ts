/**
 * Custom Error classes for framework-bench
 */

import type { CellError, ErrorKind } from '../types/index.js';

export interface ErrorOptions {
  code: string;
  /** How the orchestrator treats this error when a cell raises it */
  kind?: ErrorKind;
  retryable?: boolean;
  cause?: Error;
}

type SubclassOptions = Omit<ErrorOptions, 'code' | 'kind'> & Partial<Pick<ErrorOptions, 'code'>>;

/**
 * Base error class for all benchmark errors
 */
export class BenchError extends Error {
  public readonly code: string;
  public readonly kind?: ErrorKind;
  public readonly retryable: boolean;
  public override readonly cause?: Error;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.kind = options.kind;
    this.retryable = options.retryable ?? options.kind === 'transient';
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      kind: this.kind,
      retryable: this.retryable,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

// ============================================
// Per-cell execution errors
// ============================================

/**
 * Recoverable failure (network blip, rate limit). Consumes retry budget.
 */
export class TransientExecutionError extends BenchError {
  constructor(message: string = 'Transient execution failure', options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'TRANSIENT_EXECUTION',
      kind: 'transient',
      retryable: true,
      cause: options.cause,
    });
  }
}

/**
 * Malformed input or output. Never retried.
 */
export class ValidationError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'VALIDATION_FAILED',
      kind: 'validation',
      retryable: false,
      cause: options.cause,
    });
  }
}

/**
 * Unrecoverable execution failure. Never retried.
 */
export class FatalExecutionError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'FATAL_EXECUTION',
      kind: 'fatal',
      retryable: false,
      cause: options.cause,
    });
  }
}

/**
 * Cell wall-clock budget exceeded
 */
export class ExecutionTimeoutError extends BenchError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, options: SubclassOptions = {}) {
    super(`Cell exceeded its ${timeoutMs}ms budget`, {
      code: options.code ?? 'CELL_TIMEOUT',
      kind: 'timeout',
      retryable: false,
      cause: options.cause,
    });
    this.timeoutMs = timeoutMs;
  }
}

// ============================================
// Run-level errors
// ============================================

/**
 * Malformed run manifest. Raised during pre-flight validation, before any cell executes.
 */
export class FatalOrchestrationError extends BenchError {
  public readonly issues: string[];

  constructor(message: string, options: SubclassOptions & { issues?: string[] } = {}) {
    super(message, {
      code: options.code ?? 'INVALID_MANIFEST',
      cause: options.cause,
    });
    this.issues = options.issues ?? [];
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}

/**
 * PerformanceMonitor used out of order (stop before start, double start)
 */
export class MonitorStateError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'MONITOR_STATE',
      cause: options.cause,
    });
  }
}

/**
 * A cell was moved along an edge its lifecycle does not have
 */
export class CellStateError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'ILLEGAL_TRANSITION',
      cause: options.cause,
    });
  }
}

/**
 * Storage-related error (ledger persistence, data validation)
 */
export class StorageError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'STORAGE_ERROR',
      cause: options.cause,
    });
  }
}

/**
 * Configuration/initialization error (rate card, unit config, environment)
 */
export class ConfigurationError extends BenchError {
  constructor(message: string, options: SubclassOptions = {}) {
    super(message, {
      code: options.code ?? 'CONFIGURATION_ERROR',
      cause: options.cause,
    });
  }
}

// ============================================
// Classification helpers
// ============================================

/**
 * Classify an arbitrary thrown value.
 * Errors that do not declare a kind are fatal: an adapter must opt in to retries.
 */
export function classifyError(error: unknown): ErrorKind {
  if (error instanceof BenchError && error.kind) {
    return error.kind;
  }
  return 'fatal';
}

/**
 * Convert a thrown value into the error shape stored on a ResultRecord
 */
export function toCellError(error: unknown): CellError {
  if (error instanceof BenchError) {
    return {
      kind: classifyError(error),
      code: error.code,
      message: error.message,
    };
  }
  return {
    kind: 'fatal',
    code: 'UNCAUGHT_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
