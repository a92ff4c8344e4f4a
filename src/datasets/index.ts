/**
 * Dataset providers
 *
 * Samples are read-only and stable for the life of a provider.
 */

import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { DatasetSample } from '../types/index.js';
import { DatasetFileSchema } from '../types/schemas.js';
import { ConfigurationError } from '../errors/index.js';
import { readStructuredFile } from '../config/loader.js';
import { createLogger } from '../utils/logger.js';
import { formatZodIssues } from '../utils/validation.js';

const logger = createLogger('Datasets');

const DATASET_EXTENSIONS = ['.json', '.yaml', '.yml'];

export interface DatasetProvider {
  /**
   * @throws ConfigurationError when the use case has no dataset
   */
  getSamples(useCase: string): Promise<readonly DatasetSample[]>;
}

function checkSamples(useCase: string, samples: readonly DatasetSample[]): void {
  if (samples.length === 0) {
    throw new ConfigurationError(`Dataset for use case "${useCase}" is empty`, {
      code: 'DATASET_EMPTY',
    });
  }
  const ids = new Set<string>();
  for (const sample of samples) {
    if (ids.has(sample.id)) {
      throw new ConfigurationError(
        `Dataset for use case "${useCase}" repeats sample id "${sample.id}"`,
        { code: 'DATASET_INVALID' }
      );
    }
    ids.add(sample.id);
  }
}

/**
 * Samples supplied in code, keyed by use case
 */
export class InMemoryDatasetProvider implements DatasetProvider {
  private readonly datasets: Map<string, readonly DatasetSample[]>;

  constructor(datasets: Record<string, DatasetSample[]>) {
    this.datasets = new Map(
      Object.entries(datasets).map(([useCase, samples]) => [useCase, Object.freeze([...samples])])
    );
  }

  async getSamples(useCase: string): Promise<readonly DatasetSample[]> {
    const samples = this.datasets.get(useCase);
    if (!samples) {
      throw new ConfigurationError(`No dataset for use case "${useCase}"`, {
        code: 'DATASET_NOT_FOUND',
      });
    }
    checkSamples(useCase, samples);
    return samples;
  }
}

/**
 * Reads `<useCase>.json`, `<useCase>.yaml` or `<useCase>.yml` from a directory
 *
 * A file holds either an array of samples or `{ samples: [...] }`.
 */
export class FileDatasetProvider implements DatasetProvider {
  private readonly directory: string;
  private readonly cache = new Map<string, Promise<readonly DatasetSample[]>>();

  constructor(directory: string) {
    this.directory = resolve(process.cwd(), directory);
  }

  getSamples(useCase: string): Promise<readonly DatasetSample[]> {
    let pending = this.cache.get(useCase);
    if (!pending) {
      pending = this.load(useCase);
      this.cache.set(useCase, pending);
      // A failed load is not cached
      pending.catch(() => this.cache.delete(useCase));
    }
    return pending;
  }

  private async load(useCase: string): Promise<readonly DatasetSample[]> {
    const filePath = await this.findFile(useCase);
    const result = DatasetFileSchema.safeParse(await readStructuredFile(filePath));
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid dataset ${filePath}: ${formatZodIssues(result.error).join('; ')}`,
        { code: 'DATASET_INVALID', cause: result.error }
      );
    }

    const samples = Object.freeze(result.data);
    checkSamples(useCase, samples);
    logger.debug({ useCase, filePath, sampleCount: samples.length }, 'Dataset loaded');
    return samples;
  }

  private async findFile(useCase: string): Promise<string> {
    for (const extension of DATASET_EXTENSIONS) {
      const candidate = join(this.directory, `${useCase}${extension}`);
      try {
        await access(candidate);
        return candidate;
      } catch {
        continue;
      }
    }
    throw new ConfigurationError(`No dataset file for use case "${useCase}" in ${this.directory}`, {
      code: 'DATASET_NOT_FOUND',
    });
  }
}
