/**
 * Benchmark file loading
 *
 * A benchmark file holds the manifest fields plus a `frameworks` map of unit
 * configurations. Manifest fields are validated later by createManifest.
 */

import { BenchmarkFileSchema, type BenchmarkFile } from '../types/schemas.js';
import { ConfigurationError } from '../errors/index.js';
import { formatZodIssues } from '../utils/validation.js';
import { readStructuredFile } from './loader.js';

/**
 * @throws ConfigurationError listing every schema issue
 */
export function parseBenchmarkFile(input: unknown): BenchmarkFile {
  const result = BenchmarkFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid benchmark file: ${formatZodIssues(result.error).join('; ')}`,
      { code: 'INVALID_BENCHMARK_FILE', cause: result.error }
    );
  }
  return result.data;
}

export async function loadBenchmarkFile(filePath: string): Promise<BenchmarkFile> {
  return parseBenchmarkFile(await readStructuredFile(filePath));
}
