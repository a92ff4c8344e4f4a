/**
 * framework-bench command line
 *
 * Commands:
 * - run <config>     Run (or resume) a benchmark file and print its report
 * - matrix <config>  Print the expanded cell matrix without running anything
 * - report <ledger>  Recompute the report of a persisted run
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { RunManifest } from '../types/index.js';
import { BenchError, FatalOrchestrationError } from '../errors/index.js';
import {
  emptyRateCard,
  loadBenchmarkFile,
  loadOrchestratorDefaults,
  loadRateCard,
} from '../config/index.js';
import { FileDatasetProvider } from '../datasets/index.js';
import { createManifest, expandCells } from '../manifest/index.js';
import { BenchmarkOrchestrator } from '../orchestrator/index.js';
import {
  aggregate,
  formatReportCsv,
  formatReportJson,
  formatReportTable,
  type AggregateReport,
} from '../report/index.js';
import { openLedgerStore, type LedgerStore } from '../storage/index.js';
import { UnitRegistry, registerFrameworks } from '../units/index.js';
import { getEnvOptional, getEnvWithDefault } from '../utils/env.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('CLI');

export const CLI_VERSION = '0.1.0';

const REPORT_FORMATS = ['table', 'csv', 'json'] as const;
type ReportFormat = (typeof REPORT_FORMATS)[number];

/** Exit code of a run interrupted by SIGINT */
export const EXIT_INTERRUPTED = 130;

export interface CliIO {
  write(text: string): void;
  error(text: string): void;
  setExitCode(code: number): void;
}

export interface CliOptions {
  io?: CliIO;
  /** Aborts a `run` in progress */
  signal?: AbortSignal;
}

interface RunCommandOptions {
  rateCard?: string;
  datasets: string;
  ledger?: string;
  concurrency?: number;
  runId?: string;
  format: ReportFormat;
}

interface ReportCommandOptions {
  runId: string;
  format: ReportFormat;
}

const processIO: CliIO = {
  write: (text) => {
    process.stdout.write(text);
  },
  error: (text) => {
    process.stderr.write(text);
  },
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function formatOption(): Option {
  return new Option('-f, --format <format>', 'Report format')
    .choices(REPORT_FORMATS)
    .default('table');
}

export function formatReport(report: AggregateReport, format: ReportFormat): string {
  switch (format) {
    case 'csv':
      return formatReportCsv(report);
    case 'json':
      return `${formatReportJson(report)}\n`;
    case 'table':
      return `${formatReportTable(report)}\n`;
  }
}

/**
 * Build the manifest of a benchmark file, applying command line overrides
 */
async function loadManifest(
  configPath: string,
  overrides: { concurrency?: number; runId?: string } = {}
): Promise<{ manifest: RunManifest; registry: UnitRegistry }> {
  const file = await loadBenchmarkFile(configPath);
  const manifest = createManifest(
    {
      ...file,
      ...(overrides.concurrency !== undefined && { concurrency: overrides.concurrency }),
      ...(overrides.runId !== undefined && { runId: overrides.runId }),
    },
    loadOrchestratorDefaults()
  );

  const registry = new UnitRegistry();
  registerFrameworks(registry, file.frameworks);
  return { manifest, registry };
}

export function createProgram(options: CliOptions = {}): Command {
  const io = options.io ?? processIO;

  const fail = (error: unknown): void => {
    if (error instanceof FatalOrchestrationError) {
      io.error(`Error: ${error.message}\n`);
      for (const issue of error.issues) {
        io.error(`  - ${issue}\n`);
      }
    } else if (error instanceof BenchError) {
      io.error(`Error: ${error.message}\n`);
    } else {
      logger.error({ err: error }, 'Unexpected failure');
      io.error(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    }
    io.setExitCode(1);
  };

  const program = new Command();

  program
    .name('framework-bench')
    .description('Run benchmark matrices across interchangeable task frameworks')
    .version(CLI_VERSION)
    .configureOutput({ writeOut: io.write, writeErr: io.error })
    .exitOverride();

  program
    .command('run <config>')
    .description('Run or resume a benchmark file')
    .option(
      '--rate-card <file>',
      'Rate card (YAML or JSON); usage is unpriced without one',
      getEnvOptional('BENCH_RATE_CARD')
    )
    .option(
      '--datasets <dir>',
      'Directory of <useCase>.json|yaml datasets',
      getEnvWithDefault('BENCH_DATASETS_DIR', 'datasets')
    )
    .option(
      '--ledger <file>',
      'Ledger file (.db, .sqlite or .jsonl) for resumable runs',
      getEnvOptional('BENCH_LEDGER_PATH')
    )
    .option('--concurrency <n>', 'Worker pool size', parsePositiveInteger)
    .option('--run-id <id>', 'Run id (reuse one to resume)')
    .addOption(formatOption())
    .action(async (configPath: string, opts: RunCommandOptions) => {
      let store: LedgerStore | undefined;
      try {
        const { manifest, registry } = await loadManifest(configPath, opts);
        const rateCard = opts.rateCard ? await loadRateCard(opts.rateCard) : emptyRateCard();
        store = openLedgerStore(opts.ledger);

        const orchestrator = new BenchmarkOrchestrator({
          units: registry,
          datasets: new FileDatasetProvider(opts.datasets),
          rateCard,
          store,
        });
        const result = await orchestrator.run(manifest, { signal: options.signal });

        io.write(formatReport(result.report, opts.format));
        if (result.aborted) {
          io.error(
            `Run ${result.runId} interrupted; rerun with --run-id ${result.runId} to resume\n`
          );
          io.setExitCode(EXIT_INTERRUPTED);
        }
      } catch (error) {
        fail(error);
      } finally {
        store?.close();
      }
    });

  program
    .command('matrix <config>')
    .description('Print the cell matrix of a benchmark file without running it')
    .action(async (configPath: string) => {
      try {
        const { manifest } = await loadManifest(configPath);
        const cells = expandCells(manifest);
        io.write(
          `Run ${manifest.runId}: ${cells.length} cells, concurrency ${manifest.concurrency}\n`
        );
        for (const cell of cells) {
          io.write(`  ${cell.cellId}\n`);
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('report <ledger>')
    .description('Recompute the report of a persisted run')
    .requiredOption('--run-id <id>', 'Run id to report on')
    .addOption(formatOption())
    .action(async (ledgerPath: string, opts: ReportCommandOptions) => {
      let store: LedgerStore | undefined;
      try {
        store = openLedgerStore(ledgerPath);
        const stored = await store.loadManifest(opts.runId);
        const records = await store.load(opts.runId);
        if (!stored && records.length === 0) {
          io.error(`Error: No run "${opts.runId}" in ${ledgerPath}\n`);
          io.setExitCode(1);
          return;
        }
        io.write(formatReport(aggregate(records, stored?.manifest), opts.format));
      } catch (error) {
        fail(error);
      } finally {
        store?.close();
      }
    });

  return program;
}
