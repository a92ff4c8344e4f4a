#!/usr/bin/env node
/**
 * framework-bench CLI entry point
 */

// Load environment variables (API keys, BENCH_* settings) from .env
import * as dotenv from 'dotenv';
dotenv.config();

import { CommanderError } from 'commander';
import { createLogger } from '../utils/logger.js';
import { createProgram } from './program.js';

const logger = createLogger('CLI');

const controller = new AbortController();
process.once('SIGINT', () => {
  logger.warn('Interrupt received, cancelling running cells');
  controller.abort(new Error('Interrupted'));
});

async function main(): Promise<void> {
  const program = createProgram({ signal: controller.signal });
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'CLI crashed');
  process.exitCode = 1;
});
