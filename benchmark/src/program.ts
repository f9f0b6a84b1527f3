/**
 * @cohort/benchmark - Command-line Program
 *
 * Commands:
 *   cohort-bench run [options]   Generate a seeded dataset and time every operation
 *   cohort-bench list            Print the operation ids
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import {
  assertValidConfig,
  createConfig,
  getOverridesFromEnv,
  mergeConfigs,
  type CohortConfig,
  type ConfigOverrides,
  type ConfigValidationWarning,
  type ObservabilityConfig,
} from '@cohort/config';
import {
  LogLevels,
  createConsoleLogger,
  withContext,
  wrapError,
  type CohortError,
  type LogLevel,
  type Logger,
} from '@cohort/core';
import { QUERY_OPERATIONS, getOperation, type QueryOperation } from '@cohort/query';
import { generatePeople } from './generators/person-generator.js';
import { BenchmarkRunner } from './runner.js';
import type { ReportFormat } from './types.js';

/**
 * Flags accepted by `run`, already parsed
 */
export interface RunFlags {
  size?: number;
  seed?: number;
  iterations?: number;
  warmup?: number;
  only?: string[];
  format: ReportFormat;
  logLevel?: LogLevel;
}

/**
 * Process-level collaborators, replaceable in tests
 */
export interface ProgramIO {
  env?: Record<string, string | undefined>;
  /** Sink for report and list output (default: console.log) */
  write?: (line: string) => void;
  createLogger?: (config: ObservabilityConfig) => Logger;
  /** Evaluation time for the dataset and the operations (default: now) */
  now?: () => Date;
}

export function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseLogLevelOption(value: string): LogLevel {
  const level = value.toLowerCase();
  if (!LogLevels.isLogLevel(level)) {
    throw new InvalidArgumentError('Expected one of: debug, info, warn, error.');
  }
  return level;
}

export function parseFormatOption(value: string): ReportFormat {
  if (value !== 'table' && value !== 'json') {
    throw new InvalidArgumentError('Expected one of: table, json.');
  }
  return value;
}

export interface ResolvedRunConfig {
  config: CohortConfig;
  warnings: ConfigValidationWarning[];
}

/**
 * Layer defaults <- environment <- flags.
 *
 * @throws ValidationError when the combined configuration is invalid
 */
export function resolveRunConfig(
  flags: RunFlags,
  env: Record<string, string | undefined> = process.env
): ResolvedRunConfig {
  const fromFlags: ConfigOverrides = {
    dataset: { size: flags.size, seed: flags.seed },
    benchmark: { measurementIterations: flags.iterations, warmupIterations: flags.warmup },
    observability: { logLevel: flags.logLevel },
  };
  const config = createConfig(mergeConfigs(getOverridesFromEnv({ env }), fromFlags));
  const { warnings } = assertValidConfig(config);
  return { config, warnings };
}

/**
 * Operations named by `--only`, in the order given, or all of them.
 *
 * @throws QueryError for an unknown id
 */
export function selectOperations(only: readonly string[] | undefined): readonly QueryOperation[] {
  if (!only || only.length === 0) {
    return QUERY_OPERATIONS;
  }
  return only.map(id => getOperation(id));
}

/**
 * Log an error that escaped the program, with its code, details and
 * suggestion as context.
 */
export function reportFailure(error: unknown, logger: Logger): CohortError {
  const failure = wrapError(error, 'cohort-bench');
  logger.error(failure.message, failure, failure.toLogContext());
  return failure;
}

async function runCommand(flags: RunFlags, io: Required<ProgramIO>): Promise<void> {
  const { config, warnings } = resolveRunConfig(flags, io.env);
  const logger = withContext(io.createLogger(config.observability), { service: 'benchmark' });

  for (const warning of warnings) {
    logger.warn(warning.message, { path: warning.path });
  }

  const operations = selectOperations(flags.only);
  const now = io.now();

  const generationStart = performance.now();
  const dataset = generatePeople(config.dataset, { now });
  logger.info('Dataset generated', {
    rowsProcessed: dataset.length,
    seed: config.dataset.seed,
    durationMs: performance.now() - generationStart,
  });

  const runner = new BenchmarkRunner({
    settings: config.benchmark,
    logger,
    now,
    write: io.write,
  });
  const report = await runner.runAll(dataset, operations);

  if (flags.format === 'json') {
    io.write(JSON.stringify(report, null, 2));
  } else {
    runner.printReport(report);
  }
}

function listCommand(io: Required<ProgramIO>): void {
  const width = Math.max(...QUERY_OPERATIONS.map(op => op.id.length));
  for (const operation of QUERY_OPERATIONS) {
    io.write(`${operation.id.padEnd(width)}  ${operation.name}`);
  }
}

/**
 * Build the `cohort-bench` program.
 *
 * @example
 * ```typescript
 * await createProgram().parseAsync(process.argv);
 * ```
 */
export function createProgram(options: ProgramIO = {}): Command {
  const io: Required<ProgramIO> = {
    env: options.env ?? process.env,
    write: options.write ?? ((line: string) => console.log(line)),
    createLogger: options.createLogger ??
      ((config: ObservabilityConfig) =>
        createConsoleLogger({ minLevel: config.logLevel, format: config.logFormat })),
    now: options.now ?? (() => new Date()),
  };

  const program = new Command();

  program
    .name('cohort-bench')
    .description('Benchmark the in-memory query operations over a seeded dataset')
    .version('0.1.0');

  program
    .command('run', { isDefault: true })
    .description('Generate a seeded dataset and time every query operation')
    .option('--size <count>', 'Number of records to generate', parseIntegerOption)
    .option('--seed <seed>', 'Seed for the dataset generator', parseIntegerOption)
    .option('--iterations <count>', 'Timed runs per operation', parseIntegerOption)
    .option('--warmup <count>', 'Untimed runs per operation', parseIntegerOption)
    .option('--only <ids...>', 'Run only these operations')
    .addOption(
      new Option('--format <format>', 'Report format: table or json')
        .argParser(parseFormatOption)
        .default('table')
    )
    .option('--log-level <level>', 'Minimum log level', parseLogLevelOption)
    .action(async (flags: RunFlags) => {
      await runCommand(flags, io);
    });

  program
    .command('list')
    .description('List the benchmarked operations')
    .action(() => {
      listCommand(io);
    });

  return program;
}
