/**
 * @cohort/config - Configuration for the benchmark harness
 *
 * Typed configuration for the dataset generator, timing harness and
 * logging, with environment overrides and validation.
 *
 * @example
 * ```typescript
 * import { createConfig, getOverridesFromEnv, mergeConfigs, assertValidConfig } from '@cohort/config';
 *
 * const config = createConfig(mergeConfigs(getOverridesFromEnv(), { dataset: { size: 10_000 } }));
 * assertValidConfig(config);
 * ```
 *
 * @packageDocumentation
 * @module @cohort/config
 */

// =============================================================================
// Types
// =============================================================================

export type {
  BenchmarkSettings,
  CohortConfig,
  ConfigOverrides,
  ConfigValidationError,
  ConfigValidationWarning,
  DatasetConfig,
  EnvConfigOptions,
  LogFormat,
  ObservabilityConfig,
  ValidationResult,
} from './types.js';

// =============================================================================
// Defaults
// =============================================================================

export {
  DEFAULT_BENCHMARK_SETTINGS,
  DEFAULT_CONFIG,
  DEFAULT_DATASET_CONFIG,
  DEFAULT_OBSERVABILITY_CONFIG,
} from './defaults.js';

// =============================================================================
// Factory Functions
// =============================================================================

export {
  createConfig,
  getConfigFromEnv,
  getOverridesFromEnv,
  mergeConfigs,
  resolveBenchmarkSettings,
} from './config.js';

// =============================================================================
// Validation
// =============================================================================

export { assertValidConfig, validateConfig } from './validation.js';
