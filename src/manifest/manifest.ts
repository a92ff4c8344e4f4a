/**
 * Run manifest construction, cell expansion and fingerprinting
 */

import { createHash, randomUUID } from 'node:crypto';
import type { Cell, RunManifest } from '../types/index.js';
import { ManifestInputSchema, RunManifestSchema } from '../types/schemas.js';
import { FatalOrchestrationError } from '../errors/index.js';
import { ORCHESTRATOR_DEFAULTS, type OrchestratorDefaults } from '../config/orchestrator.js';
import { formatZodIssues } from '../utils/validation.js';
import { deepFreeze } from '../utils/freeze.js';

export const CELL_ID_SEPARATOR = '::';

/**
 * Stable identifier of a cell: `<framework>::<useCase>::<repetitionIndex>`
 */
export function cellIdOf(framework: string, useCase: string, repetitionIndex: number): string {
  return [framework, useCase, String(repetitionIndex)].join(CELL_ID_SEPARATOR);
}

/**
 * Identifier of a (framework, useCase) lane
 */
export function laneKeyOf(cell: Pick<Cell, 'framework' | 'useCase'>): string {
  return `${cell.framework}${CELL_ID_SEPARATOR}${cell.useCase}`;
}

export function generateRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[:.]/g, '-');
  return `run-${stamp}-${randomUUID().slice(0, 8)}`;
}

/**
 * Build a frozen RunManifest from partial input, filling gaps from defaults
 *
 * @throws FatalOrchestrationError with one issue per schema violation
 */
export function createManifest(
  input: unknown,
  defaults: OrchestratorDefaults = ORCHESTRATOR_DEFAULTS
): RunManifest {
  const shape = ManifestInputSchema.safeParse(input);
  if (!shape.success) {
    throw invalidManifest(formatZodIssues(shape.error));
  }

  const raw = shape.data;
  const candidate = {
    runId: raw.runId ?? generateRunId(),
    entries: raw.entries,
    concurrency: raw.concurrency ?? defaults.concurrency,
    cellTimeoutMs: raw.cellTimeoutMs ?? defaults.cellTimeoutMs,
    graceMs: raw.graceMs ?? defaults.graceMs,
    retry: {
      maxRetries: defaults.maxRetries,
      baseDelayMs: defaults.retryBaseDelayMs,
      maxDelayMs: defaults.retryMaxDelayMs,
      backoffFactor: defaults.retryBackoffFactor,
      ...raw.retry,
    },
  };

  return validateManifest(candidate);
}

/**
 * Validate a complete manifest and freeze it
 */
export function validateManifest(input: unknown): RunManifest {
  const result = RunManifestSchema.safeParse(input);
  if (!result.success) {
    throw invalidManifest(formatZodIssues(result.error));
  }
  return deepFreeze(result.data);
}

function invalidManifest(issues: string[]): FatalOrchestrationError {
  return new FatalOrchestrationError(`Invalid manifest: ${issues.join('; ')}`, { issues });
}

/**
 * Expand a manifest into its cells
 *
 * Order is deterministic: manifest entry order, then repetition index.
 */
export function expandCells(manifest: RunManifest): Cell[] {
  const cells: Cell[] = [];
  for (const entry of manifest.entries) {
    for (let repetitionIndex = 0; repetitionIndex < entry.repetitions; repetitionIndex++) {
      cells.push({
        cellId: cellIdOf(entry.framework, entry.useCase, repetitionIndex),
        framework: entry.framework,
        useCase: entry.useCase,
        family: entry.family,
        repetitionIndex,
      });
    }
  }
  return cells;
}

/**
 * JSON with object keys sorted at every level
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, nested: unknown) => {
    if (nested !== null && typeof nested === 'object' && !Array.isArray(nested)) {
      return Object.fromEntries(
        Object.entries(nested).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return nested;
  });
}

/**
 * SHA-256 of the manifest's canonical JSON
 *
 * A resumed run compares this against the fingerprint stored with the ledger.
 */
export function manifestFingerprint(manifest: RunManifest): string {
  return createHash('sha256').update(canonicalJson(manifest)).digest('hex');
}
