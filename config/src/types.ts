/**
 * @cohort/config - Configuration Types
 *
 * Every tunable of the dataset generator and benchmark harness, grouped by
 * section.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '@cohort/core';

// =============================================================================
// Dataset Configuration
// =============================================================================

/**
 * Synthetic dataset shape.
 *
 * @example
 * ```typescript
 * const dataset: DatasetConfig = {
 *   ...DEFAULT_DATASET_CONFIG,
 *   size: 100_000,
 *   departments: ['Engineering', 'Sales'],
 * };
 * ```
 */
export interface DatasetConfig {
  /** Number of records to generate */
  readonly size: number;

  /** Seed for the deterministic generator */
  readonly seed: number;

  /** Department labels, picked uniformly */
  readonly departments: readonly string[];

  /** First names; each record's name is `<firstName><id>` */
  readonly firstNames: readonly string[];

  /** Inclusive age range */
  readonly minAge: number;
  readonly maxAge: number;

  /** Salary range, `[minSalary, maxSalary)` */
  readonly minSalary: number;
  readonly maxSalary: number;

  /** Hire dates fall 1..maxTenureDays days before `now` */
  readonly maxTenureDays: number;
}

// =============================================================================
// Benchmark Configuration
// =============================================================================

/**
 * Timing harness settings.
 */
export interface BenchmarkSettings {
  /** Untimed runs of each operation before measuring */
  readonly warmupIterations: number;

  /** Timed runs of each operation */
  readonly measurementIterations: number;

  /** Records used for the one-off engine warm-up before any operation */
  readonly warmupSampleSize: number;

  /** Request a collection between timed runs when `global.gc` is exposed */
  readonly forceGc: boolean;

  /** Pause after each forced collection */
  readonly gcSettleMs: number;
}

// =============================================================================
// Observability Configuration
// =============================================================================

export type LogFormat = 'json' | 'pretty';

export interface ObservabilityConfig {
  /** Minimum log level */
  readonly logLevel: LogLevel;

  /** Log line format */
  readonly logFormat: LogFormat;
}

// =============================================================================
// Complete Configuration
// =============================================================================

export interface CohortConfig {
  readonly dataset: DatasetConfig;
  readonly benchmark: BenchmarkSettings;
  readonly observability: ObservabilityConfig;
}

/**
 * Per-section partial overrides. Lists replace the default list wholesale.
 */
export type ConfigOverrides = {
  [S in keyof CohortConfig]?: Partial<CohortConfig[S]>;
};

// =============================================================================
// Validation Types
// =============================================================================

/**
 * Validation error details.
 */
export interface ConfigValidationError {
  /** Path to the invalid field (e.g., 'dataset.size') */
  path: string;

  /** Human-readable error message */
  message: string;

  /** The invalid value */
  value: unknown;

  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Validation warning details.
 */
export interface ConfigValidationWarning {
  path: string;
  message: string;
  value: unknown;
  recommendation?: string;
}

export interface ValidationResult {
  /** Whether the configuration is valid */
  valid: boolean;
  errors: ConfigValidationError[];
  warnings: ConfigValidationWarning[];
}

// =============================================================================
// Environment Configuration Types
// =============================================================================

/**
 * Options for loading configuration from environment variables.
 */
export interface EnvConfigOptions {
  /** Environment variable prefix (default: 'COHORT') */
  prefix?: string;

  /** Custom environment object (default: process.env) */
  env?: Record<string, string | undefined>;
}
