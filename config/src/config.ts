/**
 * @cohort/config - Configuration Factory Functions
 *
 * Provides functions to create, merge, and manage configurations.
 *
 * @packageDocumentation
 */

import { LogLevels } from '@cohort/core';
import { DEFAULT_BENCHMARK_SETTINGS, DEFAULT_CONFIG } from './defaults.js';
import type {
  BenchmarkSettings,
  CohortConfig,
  ConfigOverrides,
  DatasetConfig,
  EnvConfigOptions,
  LogFormat,
  ObservabilityConfig,
} from './types.js';

/**
 * Shallow-merge one section, with override values taking precedence.
 * Undefined override values do not replace the base value.
 */
function mergeSection<T extends object>(base: T, override: Partial<T> | undefined): T {
  const result: T = { ...base };
  if (!override) {
    return result;
  }

  for (const key in override) {
    const value = override[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}

function freezeDataset(dataset: DatasetConfig): DatasetConfig {
  return Object.freeze({
    ...dataset,
    departments: Object.freeze([...dataset.departments]),
    firstNames: Object.freeze([...dataset.firstNames]),
  });
}

/**
 * Create a complete CohortConfig with optional overrides.
 *
 * @param overrides - Partial configuration to merge with defaults
 * @param base - Optional base configuration (defaults to DEFAULT_CONFIG)
 * @returns Frozen CohortConfig with all values filled in
 *
 * @example
 * ```typescript
 * // Use all defaults
 * const config1 = createConfig();
 *
 * // Override specific values
 * const config2 = createConfig({
 *   dataset: { size: 100_000 },
 *   benchmark: { measurementIterations: 10 },
 * });
 *
 * // Build on another config
 * const config3 = createConfig({ dataset: { seed: 7 } }, config2);
 * ```
 */
export function createConfig(
  overrides: ConfigOverrides = {},
  base: CohortConfig = DEFAULT_CONFIG
): CohortConfig {
  return Object.freeze({
    dataset: freezeDataset(mergeSection(base.dataset, overrides.dataset)),
    benchmark: Object.freeze(mergeSection(base.benchmark, overrides.benchmark)),
    observability: Object.freeze(mergeSection(base.observability, overrides.observability)),
  });
}

/**
 * Complete benchmark settings from a partial override. Undefined values
 * keep the default.
 */
export function resolveBenchmarkSettings(
  overrides: Partial<BenchmarkSettings> = {},
  base: BenchmarkSettings = DEFAULT_BENCHMARK_SETTINGS
): BenchmarkSettings {
  return Object.freeze(mergeSection(base, overrides));
}

/**
 * Merge multiple partial configurations.
 *
 * Later configurations take precedence over earlier ones.
 *
 * @example
 * ```typescript
 * const fromEnv = { dataset: { size: 10_000 } };
 * const fromFlags = { dataset: { seed: 7 } };
 * const merged = mergeConfigs(fromEnv, fromFlags);
 * // merged.dataset => { size: 10_000, seed: 7 }
 * ```
 */
export function mergeConfigs(
  ...configs: Array<ConfigOverrides | null | undefined>
): ConfigOverrides {
  const result: { -readonly [S in keyof ConfigOverrides]: ConfigOverrides[S] } = {};

  for (const config of configs) {
    if (!config) continue;
    if (config.dataset) {
      result.dataset = mergeSection<Partial<DatasetConfig>>(result.dataset ?? {}, config.dataset);
    }
    if (config.benchmark) {
      result.benchmark = mergeSection<Partial<BenchmarkSettings>>(result.benchmark ?? {}, config.benchmark);
    }
    if (config.observability) {
      result.observability = mergeSection<Partial<ObservabilityConfig>>(
        result.observability ?? {},
        config.observability
      );
    }
  }

  return result;
}

// =============================================================================
// Environment
// =============================================================================

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : undefined;
}

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

/**
 * Get environment variable with prefix.
 */
function getEnvVar(
  env: Record<string, string | undefined>,
  prefix: string,
  ...parts: string[]
): string | undefined {
  const key = [prefix, ...parts].join('_').toUpperCase();
  return env[key];
}

/**
 * Read overrides from environment variables without applying them.
 *
 * Variables follow the pattern `<PREFIX>_<SECTION>_<FIELD>`; values that do
 * not parse are ignored.
 */
export function getOverridesFromEnv(options: EnvConfigOptions = {}): ConfigOverrides {
  const prefix = options.prefix ?? 'COHORT';
  const env = options.env ?? (typeof process !== 'undefined' ? process.env : {});
  const overrides: { -readonly [S in keyof ConfigOverrides]: ConfigOverrides[S] } = {};

  // Dataset configuration
  const size = parseNumber(getEnvVar(env, prefix, 'DATASET', 'SIZE'));
  const seed = parseNumber(getEnvVar(env, prefix, 'DATASET', 'SEED'));
  const departments = parseList(getEnvVar(env, prefix, 'DATASET', 'DEPARTMENTS'));
  const firstNames = parseList(getEnvVar(env, prefix, 'DATASET', 'FIRST', 'NAMES'));
  const minAge = parseNumber(getEnvVar(env, prefix, 'DATASET', 'MIN', 'AGE'));
  const maxAge = parseNumber(getEnvVar(env, prefix, 'DATASET', 'MAX', 'AGE'));
  const minSalary = parseNumber(getEnvVar(env, prefix, 'DATASET', 'MIN', 'SALARY'));
  const maxSalary = parseNumber(getEnvVar(env, prefix, 'DATASET', 'MAX', 'SALARY'));
  const maxTenureDays = parseNumber(getEnvVar(env, prefix, 'DATASET', 'MAX', 'TENURE', 'DAYS'));

  const dataset: Partial<DatasetConfig> = {
    ...(size !== undefined && { size }),
    ...(seed !== undefined && { seed }),
    ...(departments !== undefined && { departments }),
    ...(firstNames !== undefined && { firstNames }),
    ...(minAge !== undefined && { minAge }),
    ...(maxAge !== undefined && { maxAge }),
    ...(minSalary !== undefined && { minSalary }),
    ...(maxSalary !== undefined && { maxSalary }),
    ...(maxTenureDays !== undefined && { maxTenureDays }),
  };
  if (Object.keys(dataset).length > 0) {
    overrides.dataset = dataset;
  }

  // Benchmark configuration
  const warmupIterations = parseNumber(getEnvVar(env, prefix, 'BENCHMARK', 'WARMUP', 'ITERATIONS'));
  const measurementIterations = parseNumber(
    getEnvVar(env, prefix, 'BENCHMARK', 'MEASUREMENT', 'ITERATIONS')
  );
  const warmupSampleSize = parseNumber(getEnvVar(env, prefix, 'BENCHMARK', 'WARMUP', 'SAMPLE', 'SIZE'));
  const forceGc = parseBoolean(getEnvVar(env, prefix, 'BENCHMARK', 'FORCE', 'GC'));
  const gcSettleMs = parseNumber(getEnvVar(env, prefix, 'BENCHMARK', 'GC', 'SETTLE', 'MS'));

  const benchmark: Partial<BenchmarkSettings> = {
    ...(warmupIterations !== undefined && { warmupIterations }),
    ...(measurementIterations !== undefined && { measurementIterations }),
    ...(warmupSampleSize !== undefined && { warmupSampleSize }),
    ...(forceGc !== undefined && { forceGc }),
    ...(gcSettleMs !== undefined && { gcSettleMs }),
  };
  if (Object.keys(benchmark).length > 0) {
    overrides.benchmark = benchmark;
  }

  // Observability configuration
  const logLevel = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'LEVEL')?.toLowerCase();
  const logFormat = getEnvVar(env, prefix, 'OBSERVABILITY', 'LOG', 'FORMAT')?.toLowerCase();

  const observability: Partial<ObservabilityConfig> = {
    ...(logLevel !== undefined && LogLevels.isLogLevel(logLevel) && { logLevel }),
    ...(logFormat !== undefined && isLogFormat(logFormat) && { logFormat }),
  };
  if (Object.keys(observability).length > 0) {
    overrides.observability = observability;
  }

  return overrides;
}

/**
 * Create configuration from environment variables.
 *
 * Environment variables follow the pattern: COHORT_<SECTION>_<FIELD>
 * For example:
 * - COHORT_DATASET_SIZE=100000
 * - COHORT_DATASET_DEPARTMENTS=Engineering,Sales
 * - COHORT_BENCHMARK_FORCE_GC=false
 * - COHORT_OBSERVABILITY_LOG_LEVEL=debug
 *
 * @example
 * ```typescript
 * // Basic usage
 * const config = getConfigFromEnv();
 *
 * // Custom environment object
 * const config = getConfigFromEnv({ env: { COHORT_DATASET_SIZE: '1000' } });
 * ```
 */
export function getConfigFromEnv(options: EnvConfigOptions = {}): CohortConfig {
  return createConfig(getOverridesFromEnv(options));
}
