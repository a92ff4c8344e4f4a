/**
 * Process Unit - runs an external program once per sample
 *
 * Protocol: the TaskInput is written to stdin as JSON; the program prints
 * `{ "output": ..., "usage"?: [...], "error"?: { "kind", "message" } }` on
 * stdout and exits. Exit codes: 0 success, 75 transient, 65 validation,
 * anything else fatal.
 */

import { spawn } from 'node:child_process';
import type {
  TaskExecutionResult,
  TaskExecutionUnit,
  TaskInput,
  UsageEvent,
} from '../types/index.js';
import {
  ProcessUnitConfigSchema,
  ProcessUnitOutputSchema,
  type ProcessUnitConfig,
  type ProcessUnitConfigInput,
} from '../types/schemas.js';
import { FatalExecutionError, TransientExecutionError, ValidationError } from '../errors/index.js';
import { createLogger } from '../utils/logger.js';
import { parseJsonLenient } from '../utils/json-parser.js';
import { formatZodIssues } from '../utils/validation.js';
import { parseUnitConfig } from './types.js';

const logger = createLogger('ProcessUnit');

/** EX_TEMPFAIL */
export const EXIT_TRANSIENT = 75;
/** EX_DATAERR */
export const EXIT_VALIDATION = 65;

const STDERR_TAIL_CHARS = 500;

interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}

export class ProcessUnit implements TaskExecutionUnit {
  private readonly config: ProcessUnitConfig;

  constructor(
    readonly framework: string,
    config: Omit<ProcessUnitConfigInput, 'type'>
  ) {
    this.config = parseUnitConfig(
      ProcessUnitConfigSchema,
      { ...config, type: 'process' },
      framework
    );
  }

  async execute(input: TaskInput, signal: AbortSignal): Promise<TaskExecutionResult> {
    const exit = await this.spawnOnce(JSON.stringify(input), signal);

    if (exit.code !== 0) {
      throw exitError(this.config.command, exit);
    }

    let parsed: unknown;
    try {
      parsed = parseJsonLenient(exit.stdout);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return invalidOutput(`${this.config.command} printed no JSON result: ${message}`);
    }

    const result = ProcessUnitOutputSchema.safeParse(parsed);
    if (!result.success) {
      return invalidOutput(
        `${this.config.command} printed an invalid result: ` +
          formatZodIssues(result.error).join('; ')
      );
    }

    const { output, usage, error } = result.data;
    const usageEvents: UsageEvent[] = usage.map((event) => ({
      ...event,
      timestamp: event.timestamp ?? new Date(),
    }));
    if (error) {
      return { status: 'error', errorKind: error.kind, message: error.message, usageEvents };
    }
    return { status: 'ok', output, usageEvents };
  }

  /**
   * Run the program to completion; on abort, SIGTERM then SIGKILL after killDelayMs
   */
  private spawnOnce(stdin: string, signal: AbortSignal): Promise<ProcessExit> {
    const { command, args, cwd, env, killDelayMs } = this.config;
    signal.throwIfAborted();

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd,
        env: { ...process.env, ...env },
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let killTimer: NodeJS.Timeout | undefined;

      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      const onAbort = (): void => {
        logger.debug({ framework: this.framework, pid: child.pid }, 'Terminating unit process');
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            logger.warn(
              { framework: this.framework, pid: child.pid, killDelayMs },
              'Unit process ignored SIGTERM, killing'
            );
            child.kill('SIGKILL');
          }
        }, killDelayMs);
        killTimer.unref();
      };
      signal.addEventListener('abort', onAbort, { once: true });

      const cleanup = (): void => {
        signal.removeEventListener('abort', onAbort);
        clearTimeout(killTimer);
      };

      child.on('error', (error) => {
        cleanup();
        reject(
          new FatalExecutionError(`Failed to start "${command}": ${error.message}`, {
            code: 'SPAWN_FAILED',
            cause: error,
          })
        );
      });

      child.on('close', (code, exitSignal) => {
        cleanup();
        if (signal.aborted) {
          reject(signal.reason);
          return;
        }
        resolve({ code, signal: exitSignal, stdout, stderr });
      });

      // The program may exit without reading its input
      child.stdin.on('error', (error) => {
        logger.debug({ framework: this.framework, err: error }, 'Unit process stdin closed early');
      });
      child.stdin.end(stdin);
    });
  }
}

function invalidOutput(message: string): TaskExecutionResult {
  return { status: 'error', errorKind: 'validation', message, usageEvents: [] };
}

function exitError(command: string, exit: ProcessExit): Error {
  const tail = exit.stderr.trim().slice(-STDERR_TAIL_CHARS);
  const how =
    exit.code === null ? `was killed by ${exit.signal ?? 'a signal'}` : `exited ${exit.code}`;
  const message = tail.length > 0 ? `"${command}" ${how}: ${tail}` : `"${command}" ${how}`;

  switch (exit.code) {
    case EXIT_TRANSIENT:
      return new TransientExecutionError(message);
    case EXIT_VALIDATION:
      return new ValidationError(message);
    default:
      return new FatalExecutionError(message, { code: 'PROCESS_FAILED' });
  }
}
