/**
 * @cohort/config - Default Configuration Values
 *
 * @packageDocumentation
 */

import type {
  BenchmarkSettings,
  CohortConfig,
  DatasetConfig,
  ObservabilityConfig,
} from './types.js';

export const DEFAULT_DATASET_CONFIG: DatasetConfig = Object.freeze({
  size: 1_000_000,
  seed: 42,
  departments: Object.freeze(['Engineering', 'Sales', 'Marketing', 'HR', 'Finance']),
  firstNames: Object.freeze(['John', 'Jane', 'Bob', 'Alice', 'Charlie', 'Diana', 'Eve', 'Frank']),
  minAge: 22,
  maxAge: 64,
  minSalary: 30_000,
  maxSalary: 150_000,
  maxTenureDays: 3650,
});

export const DEFAULT_BENCHMARK_SETTINGS: BenchmarkSettings = Object.freeze({
  warmupIterations: 1,
  measurementIterations: 5,
  warmupSampleSize: 1000,
  forceGc: true,
  gcSettleMs: 100,
});

export const DEFAULT_OBSERVABILITY_CONFIG: ObservabilityConfig = Object.freeze({
  logLevel: 'info',
  logFormat: 'pretty',
});

/**
 * Complete default configuration.
 *
 * @example
 * ```typescript
 * import { DEFAULT_CONFIG } from '@cohort/config';
 *
 * console.log(DEFAULT_CONFIG.dataset.size); // 1000000
 * ```
 */
export const DEFAULT_CONFIG: CohortConfig = Object.freeze({
  dataset: DEFAULT_DATASET_CONFIG,
  benchmark: DEFAULT_BENCHMARK_SETTINGS,
  observability: DEFAULT_OBSERVABILITY_CONFIG,
});
