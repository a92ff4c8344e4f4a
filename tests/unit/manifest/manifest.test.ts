import { describe, it, expect } from 'vitest';
import {
  canonicalJson,
  cellIdOf,
  createManifest,
  expandCells,
  generateRunId,
  laneKeyOf,
  manifestFingerprint,
  validateManifest,
} from '../../../src/manifest/index.js';
import { ORCHESTRATOR_DEFAULTS } from '../../../src/config/index.js';
import { FatalOrchestrationError } from '../../../src/errors/index.js';
import { createTestManifest } from '../../utils/fixtures.js';

describe('cell identifiers', () => {
  it('should join framework, use case and repetition', () => {
    expect(cellIdOf('alpha', 'capitals', 2)).toBe('alpha::capitals::2');
    expect(laneKeyOf({ framework: 'alpha', useCase: 'capitals' })).toBe('alpha::capitals');
  });

  it('should generate sortable run ids', () => {
    const runId = generateRunId(new Date('2024-05-01T10:20:30.456Z'));

    expect(runId).toMatch(/^run-2024-05-01T10-20-30-456Z-[0-9a-f]{8}$/);
  });
});

describe('createManifest', () => {
  it('should fill missing fields from the defaults', () => {
    const manifest = createManifest({
      runId: 'run-1',
      entries: [{ framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 2 }],
    });

    expect(manifest).toEqual({
      runId: 'run-1',
      entries: [{ framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 2 }],
      concurrency: ORCHESTRATOR_DEFAULTS.concurrency,
      cellTimeoutMs: ORCHESTRATOR_DEFAULTS.cellTimeoutMs,
      graceMs: ORCHESTRATOR_DEFAULTS.graceMs,
      retry: {
        maxRetries: ORCHESTRATOR_DEFAULTS.maxRetries,
        baseDelayMs: ORCHESTRATOR_DEFAULTS.retryBaseDelayMs,
        maxDelayMs: ORCHESTRATOR_DEFAULTS.retryMaxDelayMs,
        backoffFactor: ORCHESTRATOR_DEFAULTS.retryBackoffFactor,
      },
    });
  });

  it('should merge a partial retry policy over the defaults', () => {
    const manifest = createManifest({
      runId: 'run-1',
      entries: [{ framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 1 }],
      retry: { maxRetries: 5 },
    });

    expect(manifest.retry.maxRetries).toBe(5);
    expect(manifest.retry.baseDelayMs).toBe(ORCHESTRATOR_DEFAULTS.retryBaseDelayMs);
  });

  it('should generate a run id when none is given', () => {
    const manifest = createManifest({
      entries: [{ framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 1 }],
    });

    expect(manifest.runId).toMatch(/^run-/);
  });

  it('should trim framework and use case names', () => {
    const manifest = createManifest({
      runId: 'run-1',
      entries: [{ framework: ' alpha ', useCase: 'capitals ', family: 'qa', repetitions: 1 }],
    });

    expect(manifest.entries[0]).toMatchObject({ framework: 'alpha', useCase: 'capitals' });
  });

  it('should return a frozen manifest', () => {
    const manifest = createManifest({
      runId: 'run-1',
      entries: [{ framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 1 }],
    });

    expect(Object.isFrozen(manifest)).toBe(true);
    expect(Object.isFrozen(manifest.entries[0])).toBe(true);
  });

  it('should reject input without entries', () => {
    expect(() => createManifest({ runId: 'run-1' })).toThrow(FatalOrchestrationError);
  });
});

describe('validateManifest', () => {
  function issuesOf(input: unknown): string[] {
    try {
      validateManifest(input);
    } catch (error) {
      if (error instanceof FatalOrchestrationError) {
        return error.issues;
      }
      throw error;
    }
    return [];
  }

  it('should accept a complete manifest', () => {
    expect(validateManifest(createTestManifest())).toEqual(createTestManifest());
  });

  it('should reject an empty matrix', () => {
    expect(issuesOf(createTestManifest({ entries: [] }))).toEqual([
      'entries: Array must contain at least 1 element(s)',
    ]);
  });

  it('should reject zero repetitions', () => {
    const manifest = createTestManifest({
      entries: [{ framework: 'alpha', useCase: 'capitals', family: 'qa', repetitions: 0 }],
    });

    expect(issuesOf(manifest)).toEqual([
      'entries.0.repetitions: Number must be greater than or equal to 1',
    ]);
  });

  it('should reject names containing the cell id separator', () => {
    const manifest = createTestManifest({
      entries: [{ framework: 'a::b', useCase: 'capitals', family: 'qa', repetitions: 1 }],
    });

    expect(issuesOf(manifest)).toEqual(['entries.0.framework: Must not contain "::"']);
  });

  it('should reject duplicate entries', () => {
    const entry = {
      framework: 'alpha',
      useCase: 'capitals',
      family: 'qa' as const,
      repetitions: 1,
    };

    expect(issuesOf(createTestManifest({ entries: [entry, entry] }))).toEqual([
      'entries.1: Duplicate entry for framework "alpha" and use case "capitals"',
    ]);
  });

  it('should reject a retry cap below the base delay', () => {
    const manifest = createTestManifest({
      retry: { maxRetries: 1, baseDelayMs: 500, maxDelayMs: 100, backoffFactor: 2 },
    });

    expect(issuesOf(manifest)).toEqual([
      'retry.maxDelayMs: Must be greater than or equal to baseDelayMs',
    ]);
  });

  it('should reject a run id unsafe for file names', () => {
    expect(issuesOf(createTestManifest({ runId: 'run/1' }))).toEqual([
      'runId: Only letters, digits, ".", "_" and "-" are allowed',
    ]);
  });
});

describe('expandCells', () => {
  it('should expand entries in order, then by repetition', () => {
    const cells = expandCells(createTestManifest());

    expect(cells.map((cell) => cell.cellId)).toEqual([
      'alpha::capitals::0',
      'alpha::capitals::1',
      'alpha::capitals::2',
      'beta::capitals::0',
      'beta::capitals::1',
      'beta::capitals::2',
    ]);
    expect(cells[4]).toEqual({
      cellId: 'beta::capitals::1',
      framework: 'beta',
      useCase: 'capitals',
      family: 'qa',
      repetitionIndex: 1,
    });
  });
});

describe('manifest fingerprint', () => {
  it('should serialize object keys in sorted order', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { f: 1, e: 0 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[2,{"e":0,"f":1}]},"b":1}'
    );
  });

  it('should not depend on key order', () => {
    const manifest = createTestManifest();
    const reordered = {
      retry: manifest.retry,
      graceMs: manifest.graceMs,
      cellTimeoutMs: manifest.cellTimeoutMs,
      concurrency: manifest.concurrency,
      entries: manifest.entries,
      runId: manifest.runId,
    };

    expect(manifestFingerprint(reordered)).toBe(manifestFingerprint(manifest));
    expect(manifestFingerprint(manifest)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should change when the matrix changes', () => {
    const base = createTestManifest();
    const changed = createTestManifest({ concurrency: 3 });

    expect(manifestFingerprint(changed)).not.toBe(manifestFingerprint(base));
  });
});
