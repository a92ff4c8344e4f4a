/**
 * Configuration Module
 *
 * Environment-based settings and file loaders.
 */

export {
  type OrchestratorDefaults,
  OrchestratorDefaultsSchema,
  ORCHESTRATOR_DEFAULTS,
  loadOrchestratorDefaults,
} from './orchestrator.js';

export {
  type RateCard,
  type Rate,
  parseRateCard,
  loadRateCard,
  emptyRateCard,
} from './rate-card.js';

export { parseBenchmarkFile, loadBenchmarkFile } from './benchmark-file.js';

export { readStructuredFile } from './loader.js';
