/**
 * Zod schemas for runtime validation
 */

import { z } from 'zod';

// ============================================
// Shared Schemas
// ============================================

export const UseCaseFamilySchema = z.enum(['qa', 'rag', 'search']);

export const ErrorKindSchema = z.enum(['transient', 'validation', 'fatal', 'timeout']);

/**
 * Framework and use-case names end up inside cell ids, so the separator is reserved
 */
const NameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !value.includes('::'), { message: 'Must not contain "::"' });

/**
 * Non-negative decimal amount, as a string ("0.0025") or a JSON number
 */
export const DecimalSchema = z.union([
  z.string().regex(/^\d+(\.\d+)?([eE][-+]?\d+)?$/, 'Must be a non-negative decimal'),
  z.number().finite().nonnegative(),
]);

function isPowerOfTen(value: number): boolean {
  let n = value;
  while (n >= 10 && n % 10 === 0) {
    n /= 10;
  }
  return n === 1;
}

// ============================================
// Manifest Schemas
// ============================================

export const ManifestEntrySchema = z.object({
  framework: NameSchema,
  useCase: NameSchema,
  family: UseCaseFamilySchema,
  repetitions: z.number().int().min(1).max(1000),
});

export const RetryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
  backoffFactor: z.number().min(1),
});

export const RunManifestSchema = z
  .object({
    runId: z
      .string()
      .min(1)
      .max(128)
      .regex(/^[A-Za-z0-9._-]+$/, 'Only letters, digits, ".", "_" and "-" are allowed'),
    entries: z.array(ManifestEntrySchema).min(1),
    concurrency: z.number().int().min(1).max(32),
    cellTimeoutMs: z.number().int().positive(),
    graceMs: z.number().int().min(0),
    retry: RetryPolicySchema,
  })
  .superRefine((manifest, ctx) => {
    const seen = new Set<string>();
    manifest.entries.forEach((entry, index) => {
      const key = `${entry.framework}::${entry.useCase}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index],
          message:
            `Duplicate entry for framework "${entry.framework}" ` +
            `and use case "${entry.useCase}"`,
        });
      }
      seen.add(key);
    });

    if (manifest.retry.maxDelayMs < manifest.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: 'Must be greater than or equal to baseDelayMs',
      });
    }
  });

/**
 * Manifest as written in a file: everything but the entries may come from defaults
 */
export const ManifestInputSchema = z.object({
  runId: z.string().optional(),
  entries: z.array(z.unknown()),
  concurrency: z.number().optional(),
  cellTimeoutMs: z.number().optional(),
  graceMs: z.number().optional(),
  retry: z.record(z.unknown()).optional(),
});

// ============================================
// Usage & Rate Card Schemas
// ============================================

export const UsageEventSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  inputUnits: z.number().int().nonnegative(),
  outputUnits: z.number().int().nonnegative(),
  timestamp: z.coerce.date(),
  requestId: z.string().optional(),
});

export const RateSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  inputRate: DecimalSchema,
  outputRate: DecimalSchema,
  /** Number of units the rates apply to (1, 1000, 1000000, ...) */
  per: z
    .number()
    .int()
    .positive()
    .max(1_000_000)
    .refine(isPowerOfTen, { message: 'Must be a power of ten' })
    .default(1),
});

export const RateCardSchema = z
  .object({
    version: z.string().min(1),
    currency: z.string().min(1).default('USD'),
    rates: z.array(RateSchema),
  })
  .superRefine((card, ctx) => {
    const seen = new Set<string>();
    card.rates.forEach((rate, index) => {
      const key = `${rate.provider.toLowerCase()}/${rate.model}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rates', index],
          message: `Duplicate rate for ${rate.provider}/${rate.model}`,
        });
      }
      seen.add(key);
    });
  });

// ============================================
// Dataset Schemas
// ============================================

export const DatasetSampleSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]).transform(String),
    input: z.unknown(),
    expected: z.unknown(),
    context: z.record(z.unknown()).optional(),
  })
  .transform((sample) => ({
    id: sample.id,
    input: sample.input,
    expected: sample.expected,
    ...(sample.context ? { context: sample.context } : {}),
  }));

export const DatasetFileSchema = z.union([
  z.array(DatasetSampleSchema),
  z.object({ samples: z.array(DatasetSampleSchema) }).transform((file) => file.samples),
]);

// ============================================
// Result Record Schemas
// ============================================

const ResourceUsageSchema = z.object({
  peakMemoryBytes: z.number().nonnegative(),
  averageCpuPercent: z.number().nonnegative(),
  sampleCount: z.number().int().nonnegative(),
});

const CostBreakdownSchema = z.object({
  currency: z.string(),
  rateCardVersion: z.string(),
  byProvider: z.record(z.string()),
  total: z.string(),
  pricedEventCount: z.number().int().nonnegative(),
  unpricedEventCount: z.number().int().nonnegative(),
  unpricedEvents: z.array(UsageEventSchema),
});

const CellErrorSchema = z.object({
  kind: ErrorKindSchema,
  code: z.string(),
  message: z.string(),
});

const CellWarningSchema = z.object({
  code: z.enum(['MONITORING_DEGRADED', 'UNPRICED_USAGE', 'MALFORMED_OUTPUT']),
  message: z.string(),
});

const SampleOutputSchema = z
  .object({ sampleId: z.string(), output: z.unknown() })
  .transform((sample) => ({ sampleId: sample.sampleId, output: sample.output }));

const RecordMetadataSchema = z
  .object({
    scheduledAt: z.string(),
    startedAt: z.string().optional(),
    finishedAt: z.string().optional(),
    sampleCount: z.number().int().nonnegative(),
  })
  .passthrough();

const ResultRecordBaseSchema = z.object({
  cellId: z.string().min(1),
  runId: z.string().min(1),
  framework: z.string().min(1),
  useCase: z.string().min(1),
  family: UseCaseFamilySchema,
  repetitionIndex: z.number().int().nonnegative(),
  status: z.literal('RECORDED'),
  executionTimeMs: z.number().nonnegative(),
  resourceUsage: ResourceUsageSchema.optional(),
  costBreakdown: CostBreakdownSchema,
  qualityMetrics: z.record(z.number().min(0).max(1)),
  attempts: z.number().int().min(0),
  warnings: z.array(CellWarningSchema),
  metadata: RecordMetadataSchema,
});

/**
 * Ledger row. rawOutput and error are mutually exclusive.
 */
export const ResultRecordSchema = z.union([
  ResultRecordBaseSchema.extend({
    outcome: z.literal('SUCCEEDED'),
    rawOutput: z.array(SampleOutputSchema),
    error: z.undefined(),
  }),
  ResultRecordBaseSchema.extend({
    outcome: z.enum(['FAILED', 'TIMED_OUT']),
    error: CellErrorSchema,
    rawOutput: z.undefined(),
  }),
]);

// ============================================
// Ledger Storage Schemas
// ============================================

export const LedgerRunRowSchema = z.object({
  run_id: z.string(),
  fingerprint: z.string(),
  manifest: z.string(),
  created_at: z.number(),
});

export const LedgerRecordRowSchema = z.object({
  cell_id: z.string(),
  payload: z.string(),
});

/**
 * One line of a JSON-lines ledger
 */
export const LedgerLineSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('manifest'),
    runId: z.string(),
    fingerprint: z.string(),
    createdAt: z.string(),
    manifest: z.unknown(),
  }),
  z.object({
    type: z.literal('record'),
    record: z.unknown(),
  }),
]);

// ============================================
// Unit Configuration Schemas
// ============================================

export const ProcessUnitConfigSchema = z.object({
  type: z.literal('process'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  /** Delay between SIGTERM and SIGKILL once aborted */
  killDelayMs: z.number().int().min(0).default(2000),
});

export const OpenAIUnitConfigSchema = z.object({
  type: z.literal('openai'),
  model: z.string().min(1),
  systemPrompt: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  baseURL: z.string().url().optional(),
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  /** Provider name recorded on usage events (for OpenAI-compatible endpoints) */
  provider: z.string().default('openai'),
});

export const AnthropicUnitConfigSchema = z.object({
  type: z.literal('anthropic'),
  model: z.string().min(1),
  systemPrompt: z.string().optional(),
  temperature: z.number().min(0).max(1).optional(),
  maxTokens: z.number().int().positive().default(1024),
  apiKeyEnv: z.string().default('ANTHROPIC_API_KEY'),
});

/**
 * What a process unit prints on stdout for one sample
 */
export const ProcessUnitOutputSchema = z.object({
  output: z.unknown(),
  usage: z
    .array(UsageEventSchema.extend({ timestamp: z.coerce.date().optional() }))
    .default([]),
  error: z
    .object({
      kind: z.enum(['transient', 'validation', 'fatal']).default('fatal'),
      message: z.string().min(1),
    })
    .optional(),
});

export const UnitConfigSchema = z.discriminatedUnion('type', [
  ProcessUnitConfigSchema,
  OpenAIUnitConfigSchema,
  AnthropicUnitConfigSchema,
]);

export const FrameworkConfigSchema = z.object({
  unit: UnitConfigSchema,
  /** Use-case specific units that take precedence over `unit` */
  useCases: z.record(UnitConfigSchema).optional(),
});

/**
 * A benchmark file: manifest fields plus the unit configuration of each framework
 */
export const BenchmarkFileSchema = ManifestInputSchema.extend({
  frameworks: z.record(FrameworkConfigSchema),
});

// ============================================
// Type Exports
// ============================================

export type RateInput = z.input<typeof RateSchema>;
export type RateCardInput = z.input<typeof RateCardSchema>;
export type ProcessUnitConfig = z.infer<typeof ProcessUnitConfigSchema>;
export type OpenAIUnitConfig = z.infer<typeof OpenAIUnitConfigSchema>;
export type AnthropicUnitConfig = z.infer<typeof AnthropicUnitConfigSchema>;
export type UnitConfig = z.infer<typeof UnitConfigSchema>;
export type FrameworkConfig = z.infer<typeof FrameworkConfigSchema>;
export type BenchmarkFile = z.infer<typeof BenchmarkFileSchema>;
export type ProcessUnitConfigInput = z.input<typeof ProcessUnitConfigSchema>;
export type ProcessUnitOutput = z.infer<typeof ProcessUnitOutputSchema>;
