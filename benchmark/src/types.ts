/**
 * @cohort/benchmark - Core Types
 *
 * Type definitions for the query benchmark harness.
 */

import type { BenchmarkSettings } from '@cohort/config';
import type { Logger } from '@cohort/core';

// =============================================================================
// Metrics & Results
// =============================================================================

/**
 * Latency metrics with percentiles, all in milliseconds
 */
export interface LatencyMetrics {
  min: number;
  max: number;
  mean: number;
  /** Median */
  p50: number;
  p95: number;
  p99: number;
  /** Population standard deviation */
  stdDev: number;
}

/**
 * Timing of one query operation
 */
export interface BenchmarkResult {
  /** Operation id from the registry */
  operationId: string;
  /** Display name used in the report */
  name: string;
  /** Untimed runs before measuring */
  warmupIterations: number;
  /** Per-iteration wall-clock durations */
  samples: number[];
  latency: LatencyMetrics;
  /** Records in the dataset the operation ran against */
  rowsIn: number;
  /** Length of the result of the last timed run */
  resultSize: number;
}

/**
 * Host the benchmark ran on
 */
export interface RuntimeInfo {
  nodeVersion: string;
  platform: string;
  arch: string;
  cpuCount: number;
  /** Whether `global.gc` was exposed (node --expose-gc) */
  gcExposed: boolean;
}

/**
 * Complete benchmark report
 */
export interface BenchmarkReport {
  /** ISO timestamp of the start of the run */
  startedAt: string;
  datasetSize: number;
  settings: BenchmarkSettings;
  runtime: RuntimeInfo;
  /** Duration of the one-off engine warm-up */
  warmupMs: number;
  results: BenchmarkResult[];
  totalDurationMs: number;
}

export type ReportFormat = 'table' | 'json';

// =============================================================================
// Runner Options
// =============================================================================

/**
 * Options for {@link BenchmarkRunner}. Everything but `settings` exists so
 * tests can replace the clock, the collector and the pause.
 */
export interface BenchmarkRunnerOptions {
  settings?: Partial<BenchmarkSettings>;
  logger?: Logger;
  /** Evaluation time handed to every operation (default: construction time) */
  now?: Date;
  /** Monotonic clock in milliseconds (default: performance.now) */
  clock?: () => number;
  /** Garbage collector hook (default: global.gc when exposed) */
  gc?: () => void;
  /** Pause used to let a forced collection settle */
  sleep?: (ms: number) => Promise<void>;
  /** Sink for report lines (default: console.log) */
  write?: (line: string) => void;
}
