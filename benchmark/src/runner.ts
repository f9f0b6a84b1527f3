/**
 * @cohort/benchmark - Benchmark Runner
 *
 * Times repeated runs of the query operations and reports avg/min/max per
 * operation.
 */

import { cpus } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { resolveBenchmarkSettings, type BenchmarkSettings } from '@cohort/config';
import { createNoopLogger, type Dataset, type Logger } from '@cohort/core';
import { QUERY_OPERATIONS, type QueryOperation, type QueryOptions } from '@cohort/query';
import type {
  BenchmarkReport,
  BenchmarkResult,
  BenchmarkRunnerOptions,
  RuntimeInfo,
} from './types.js';
import { computeLatencyMetrics, formatDuration, formatNumber } from './utils/metrics.js';

/**
 * The collector exposed by `node --expose-gc`, if any
 */
export function exposedGc(): (() => void) | undefined {
  const candidate: unknown = Reflect.get(globalThis, 'gc');
  if (typeof candidate !== 'function') {
    return undefined;
  }
  return () => {
    candidate();
  };
}

/**
 * Describe the host the benchmark runs on
 */
export function getRuntimeInfo(): RuntimeInfo {
  return {
    nodeVersion: process.version,
    platform: process.platform,
    arch: process.arch,
    cpuCount: cpus().length,
    gcExposed: exposedGc() !== undefined,
  };
}

/**
 * Render a report as table lines: a header, then one aligned
 * `<name>: Avg: x ms, Min: y ms, Max: z ms` line per operation.
 */
export function formatReport(report: BenchmarkReport): string[] {
  const { runtime, settings } = report;
  const width = Math.max(0, ...report.results.map(r => r.name.length + 1));

  const lines = [
    '='.repeat(60),
    'Query Benchmark',
    '='.repeat(60),
    `Records: ${formatNumber(report.datasetSize)}, ` +
      `Warm-up: ${settings.warmupIterations}, Iterations: ${settings.measurementIterations}`,
    `Runtime: Node ${runtime.nodeVersion} on ${runtime.platform}/${runtime.arch} (${runtime.cpuCount} CPUs)`,
    '',
  ];

  for (const result of report.results) {
    const { mean, min, max } = result.latency;
    lines.push(
      `${`${result.name}:`.padEnd(width)} ` +
        `Avg: ${mean.toFixed(2)} ms, Min: ${min.toFixed(2)} ms, Max: ${max.toFixed(2)} ms`
    );
  }

  lines.push('', `Total: ${formatDuration(report.totalDurationMs)}`);
  return lines;
}

/**
 * Benchmark Runner
 *
 * @example
 * ```typescript
 * const runner = new BenchmarkRunner({ settings: config.benchmark, logger });
 * const report = await runner.runAll(people);
 * runner.printReport(report);
 * ```
 */
export class BenchmarkRunner {
  private readonly settings: BenchmarkSettings;
  private readonly logger: Logger;
  private readonly queryOptions: QueryOptions;
  private readonly clock: () => number;
  private readonly gc: (() => void) | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly write: (line: string) => void;

  constructor(options: BenchmarkRunnerOptions = {}) {
    this.settings = resolveBenchmarkSettings(options.settings);
    this.logger = options.logger ?? createNoopLogger();
    this.queryOptions = { now: options.now ?? new Date() };
    this.clock = options.clock ?? (() => performance.now());
    this.gc = options.gc ?? exposedGc();
    this.sleep = options.sleep ?? (async (ms: number) => {
      await delay(ms);
    });
    this.write = options.write ?? ((line: string) => console.log(line));
  }

  /**
   * Run every operation once over the first `warmupSampleSize` records so
   * the first timed operation does not pay for JIT compilation alone.
   *
   * @returns Elapsed milliseconds
   */
  warmUp(dataset: Dataset, operations: readonly QueryOperation[] = QUERY_OPERATIONS): number {
    const sample = dataset.slice(0, this.settings.warmupSampleSize);
    const start = this.clock();
    for (const operation of operations) {
      operation.run(sample, this.queryOptions);
    }
    const elapsed = this.clock() - start;
    this.logger.debug('Engine warmed up', { rowsProcessed: sample.length, durationMs: elapsed });
    return elapsed;
  }

  /**
   * Time one operation: untimed warm-up runs, then one timed call per
   * measured iteration, each preceded by an optional forced collection.
   */
  async measure(operation: QueryOperation, dataset: Dataset): Promise<BenchmarkResult> {
    const log = this.logger;

    for (let i = 0; i < this.settings.warmupIterations; i++) {
      operation.run(dataset, this.queryOptions);
    }

    const samples: number[] = [];
    let resultSize = 0;

    for (let i = 0; i < this.settings.measurementIterations; i++) {
      await this.settle();

      const start = this.clock();
      const result = operation.run(dataset, this.queryOptions);
      const elapsed = this.clock() - start;

      samples.push(elapsed);
      resultSize = result.length;
      log.debug('Iteration timed', {
        operation: operation.id,
        iteration: i + 1,
        durationMs: elapsed,
      });
    }

    const latency = computeLatencyMetrics(samples);
    log.info('Operation measured', {
      operation: operation.id,
      durationMs: latency.mean,
      rowsProcessed: dataset.length,
      resultSize,
    });

    return {
      operationId: operation.id,
      name: operation.name,
      warmupIterations: this.settings.warmupIterations,
      samples,
      latency,
      rowsIn: dataset.length,
      resultSize,
    };
  }

  /**
   * Warm the engine up once, then measure each operation in order.
   */
  async runAll(
    dataset: Dataset,
    operations: readonly QueryOperation[] = QUERY_OPERATIONS
  ): Promise<BenchmarkReport> {
    const startedAt = new Date().toISOString();
    const start = this.clock();

    this.logger.info('Benchmark started', {
      rowsProcessed: dataset.length,
      operations: operations.map(op => op.id),
    });

    const warmupMs = this.warmUp(dataset, operations);

    const results: BenchmarkResult[] = [];
    for (const operation of operations) {
      results.push(await this.measure(operation, dataset));
    }

    const totalDurationMs = this.clock() - start;
    this.logger.info('Benchmark finished', { durationMs: totalDurationMs });

    return {
      startedAt,
      datasetSize: dataset.length,
      settings: this.settings,
      runtime: getRuntimeInfo(),
      warmupMs,
      results,
      totalDurationMs,
    };
  }

  /**
   * Print the report table
   */
  printReport(report: BenchmarkReport): void {
    for (const line of formatReport(report)) {
      this.write(line);
    }
  }

  private async settle(): Promise<void> {
    if (!this.settings.forceGc || this.gc === undefined) {
      return;
    }
    this.gc();
    if (this.settings.gcSettleMs > 0) {
      await this.sleep(this.settings.gcSettleMs);
    }
  }
}

/**
 * Create a benchmark runner
 */
export function createBenchmarkRunner(options: BenchmarkRunnerOptions = {}): BenchmarkRunner {
  return new BenchmarkRunner(options);
}
