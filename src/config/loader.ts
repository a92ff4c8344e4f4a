/**
 * Structured file loading (YAML or JSON)
 */

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError } from '../errors/index.js';

/**
 * Read a `.json`, `.yaml` or `.yml` file relative to the working directory
 *
 * @throws ConfigurationError when the file is missing or cannot be parsed
 */
export async function readStructuredFile(filePath: string): Promise<unknown> {
  const absolutePath = resolve(process.cwd(), filePath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`, {
      code: 'CONFIG_NOT_FOUND',
      cause: error instanceof Error ? error : undefined,
    });
  }

  try {
    return extname(absolutePath).toLowerCase() === '.json'
      ? JSON.parse(content)
      : parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${absolutePath}`, {
      code: 'CONFIG_PARSE_ERROR',
      cause: error instanceof Error ? error : undefined,
    });
  }
}
