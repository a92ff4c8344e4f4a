/**
 * Structured logging using Pino
 *
 * Logs go to stderr so that reports printed on stdout stay machine-readable.
 */

import pino from 'pino';
import { createRequire } from 'module';
import type { Cell } from '../types/index.js';

// Create require for ESM compatibility
const require = createRequire(import.meta.url);

/**
 * Pretty printing is for interactive use only (not production, tests or CI)
 */
function shouldUsePrettyPrint(): boolean {
  const env = process.env.NODE_ENV || '';
  return env !== 'production' && env !== 'test' && !process.env.CI;
}

/**
 * pino-pretty is a dev dependency and may be missing from an installed CLI
 */
function isPinoPrettyAvailable(): boolean {
  try {
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

function resolveLevel(): string {
  return process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info');
}

function createRootLogger(): pino.Logger {
  const options: pino.LoggerOptions = {
    level: resolveLevel(),
    base: { service: 'framework-bench' },
  };

  if (shouldUsePrettyPrint() && isPinoPrettyAvailable()) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Main logger instance
 */
export const logger = createRootLogger();

/**
 * Create a child logger with specific context
 *
 * @param context - Context identifier (e.g., 'Orchestrator', 'CostTracker')
 *
 * @example
 * const log = createLogger('Orchestrator');
 * log.info({ runId: 'run-1' }, 'Run started');
 */
export function createLogger(context: string): pino.Logger {
  return logger.child({ context });
}

/**
 * Bind a cell's identity to every line logged by a worker
 */
export function createCellLogger(parent: pino.Logger, runId: string, cell: Cell): pino.Logger {
  return parent.child({
    runId,
    cellId: cell.cellId,
    framework: cell.framework,
    useCase: cell.useCase,
    repetition: cell.repetitionIndex,
  });
}
