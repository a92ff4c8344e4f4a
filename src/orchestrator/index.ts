/**
 * Orchestrator module exports
 */

export {
  BenchmarkOrchestrator,
  type BenchmarkOrchestratorOptions,
  type RunOptions,
  type RunResult,
} from './orchestrator.js';
export { CellRunner, meanScores, type CellJob, type CellRunnerOptions } from './cell-runner.js';
export { CellState, isOutcome } from './cell-state.js';
export { RunLedger } from './ledger.js';
export { runLanes, type LanePoolOptions } from './pool.js';
