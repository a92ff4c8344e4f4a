/**
 * framework-bench
 *
 * Benchmark orchestration and metrics aggregation for comparing
 * interchangeable task frameworks on QA, RAG and search use cases.
 */

export * from './types/index.js';
export * from './errors/index.js';

export * from './config/index.js';
export * from './manifest/index.js';
export * from './datasets/index.js';
export * from './monitor/index.js';
export * from './cost/index.js';
export * from './evaluation/index.js';
export * from './storage/index.js';
export * from './units/index.js';
export * from './orchestrator/index.js';
export * from './report/index.js';

export * from './utils/index.js';
