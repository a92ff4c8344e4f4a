import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileDatasetProvider, InMemoryDatasetProvider } from '../../../src/datasets/index.js';
import { ConfigurationError } from '../../../src/errors/index.js';

describe('InMemoryDatasetProvider', () => {
  it('should return samples for a known use case', async () => {
    const provider = new InMemoryDatasetProvider({
      qa: [{ id: 's1', input: 'Q?', expected: 'A' }],
    });

    const samples = await provider.getSamples('qa');

    expect(samples).toEqual([{ id: 's1', input: 'Q?', expected: 'A' }]);
    expect(Object.isFrozen(samples)).toBe(true);
  });

  it('should reject an unknown use case', async () => {
    const provider = new InMemoryDatasetProvider({});

    await expect(provider.getSamples('qa')).rejects.toMatchObject({ code: 'DATASET_NOT_FOUND' });
  });

  it('should reject an empty dataset', async () => {
    const provider = new InMemoryDatasetProvider({ qa: [] });

    await expect(provider.getSamples('qa')).rejects.toMatchObject({ code: 'DATASET_EMPTY' });
  });

  it('should reject repeated sample ids', async () => {
    const provider = new InMemoryDatasetProvider({
      qa: [
        { id: 's1', input: 'a', expected: 'x' },
        { id: 's1', input: 'b', expected: 'y' },
      ],
    });

    await expect(provider.getSamples('qa')).rejects.toMatchObject({ code: 'DATASET_INVALID' });
  });
});

describe('FileDatasetProvider', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'datasets-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a JSON array of samples', async () => {
    await writeFile(
      join(dir, 'qa.json'),
      JSON.stringify([{ id: 1, input: 'What is 2 + 2?', expected: '4' }])
    );

    const samples = await new FileDatasetProvider(dir).getSamples('qa');

    expect(samples).toEqual([{ id: '1', input: 'What is 2 + 2?', expected: '4' }]);
  });

  it('should load a YAML file with a samples key', async () => {
    await writeFile(
      join(dir, 'rag.yaml'),
      ['samples:', '  - id: r1', '    input: Where is Paris?', '    expected: [d1]', ''].join('\n')
    );

    const samples = await new FileDatasetProvider(dir).getSamples('rag');

    expect(samples).toEqual([{ id: 'r1', input: 'Where is Paris?', expected: ['d1'] }]);
  });

  it('should cache loaded datasets', async () => {
    const file = join(dir, 'qa.json');
    await writeFile(file, JSON.stringify([{ id: 'a', input: 'first' }]));
    const provider = new FileDatasetProvider(dir);

    const first = await provider.getSamples('qa');
    await writeFile(file, JSON.stringify([{ id: 'b', input: 'second' }]));
    const second = await provider.getSamples('qa');

    expect(second).toBe(first);
  });

  it('should report a missing dataset file', async () => {
    const error = await new FileDatasetProvider(dir).getSamples('search').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: 'DATASET_NOT_FOUND' });
  });

  it('should report an invalid dataset file', async () => {
    await writeFile(join(dir, 'qa.json'), JSON.stringify([{ input: 'no id' }]));

    await expect(new FileDatasetProvider(dir).getSamples('qa')).rejects.toMatchObject({
      code: 'DATASET_INVALID',
    });
  });
});
