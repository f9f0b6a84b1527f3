/**
 * @cohort/config - Configuration Validation
 *
 * Validates configuration values and provides clear error messages.
 *
 * @packageDocumentation
 */

import { ErrorCode, LogLevels, ValidationError } from '@cohort/core';
import type {
  CohortConfig,
  ConfigValidationError,
  ConfigValidationWarning,
  ValidationResult,
} from './types.js';

/** Above this, a pause between timed runs dominates the wall-clock time */
const MAX_SENSIBLE_GC_SETTLE_MS = 5000;

/**
 * Validate a complete CohortConfig.
 *
 * @example
 * ```typescript
 * const result = validateConfig(myConfig);
 * if (!result.valid) {
 *   console.error('Config errors:', result.errors);
 * }
 * ```
 */
export function validateConfig(config: CohortConfig): ValidationResult {
  const errors: ConfigValidationError[] = [];
  const warnings: ConfigValidationWarning[] = [];

  validateDatasetConfig(config.dataset, errors, warnings);
  validateBenchmarkSettings(config, errors, warnings);
  validateObservabilityConfig(config.observability, errors);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate, throwing when any error is found. Warnings are returned.
 *
 * @throws ValidationError with code INVALID_CONFIG and every failing path in `details.paths`
 */
export function assertValidConfig(config: CohortConfig): ValidationResult {
  const result = validateConfig(config);
  if (!result.valid) {
    const summary = result.errors.map(e => `${e.path}: ${e.message}`).join('; ');
    throw new ValidationError(
      `Invalid configuration: ${summary}`,
      ErrorCode.INVALID_CONFIG,
      { paths: result.errors.map(e => e.path) },
      result.errors[0].suggestion
    );
  }
  return result;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function hasDuplicates(values: readonly string[]): boolean {
  return new Set(values).size !== values.length;
}

/**
 * Validate dataset configuration.
 */
function validateDatasetConfig(
  dataset: CohortConfig['dataset'],
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  if (!isPositiveInteger(dataset.size)) {
    errors.push({
      path: 'dataset.size',
      message: 'Dataset size must be a positive integer',
      value: dataset.size,
      suggestion: 'Use a record count such as 1000000',
    });
  }

  if (!Number.isSafeInteger(dataset.seed)) {
    errors.push({
      path: 'dataset.seed',
      message: 'Seed must be a safe integer',
      value: dataset.seed,
    });
  }

  if (dataset.departments.length === 0) {
    errors.push({
      path: 'dataset.departments',
      message: 'At least one department is required',
      value: dataset.departments,
    });
  } else if (hasDuplicates(dataset.departments)) {
    warnings.push({
      path: 'dataset.departments',
      message: 'Duplicate departments skew the distribution',
      value: dataset.departments,
      recommendation: 'List each department once',
    });
  }

  if (dataset.firstNames.length === 0) {
    errors.push({
      path: 'dataset.firstNames',
      message: 'At least one first name is required',
      value: dataset.firstNames,
    });
  }

  if (!Number.isInteger(dataset.minAge) || !Number.isInteger(dataset.maxAge)) {
    errors.push({
      path: 'dataset.minAge',
      message: 'Age bounds must be integers',
      value: [dataset.minAge, dataset.maxAge],
    });
  } else if (dataset.minAge > dataset.maxAge) {
    errors.push({
      path: 'dataset.minAge',
      message: 'minAge must not exceed maxAge',
      value: dataset.minAge,
      suggestion: `Use a value <= ${dataset.maxAge}`,
    });
  }

  if (!(dataset.minSalary > 0)) {
    errors.push({
      path: 'dataset.minSalary',
      message: 'minSalary must be positive',
      value: dataset.minSalary,
    });
  }

  if (!(dataset.maxSalary > dataset.minSalary)) {
    errors.push({
      path: 'dataset.maxSalary',
      message: 'maxSalary must be greater than minSalary',
      value: dataset.maxSalary,
      suggestion: `Use a value > ${dataset.minSalary}`,
    });
  }

  if (!isPositiveInteger(dataset.maxTenureDays)) {
    errors.push({
      path: 'dataset.maxTenureDays',
      message: 'maxTenureDays must be a positive integer',
      value: dataset.maxTenureDays,
    });
  }
}

/**
 * Validate benchmark settings.
 */
function validateBenchmarkSettings(
  config: CohortConfig,
  errors: ConfigValidationError[],
  warnings: ConfigValidationWarning[]
): void {
  const { benchmark } = config;

  if (!isNonNegativeInteger(benchmark.warmupIterations)) {
    errors.push({
      path: 'benchmark.warmupIterations',
      message: 'warmupIterations must be a non-negative integer',
      value: benchmark.warmupIterations,
    });
  }

  if (!isPositiveInteger(benchmark.measurementIterations)) {
    errors.push({
      path: 'benchmark.measurementIterations',
      message: 'measurementIterations must be a positive integer',
      value: benchmark.measurementIterations,
      suggestion: 'Use at least 1; 5 is the default',
    });
  } else if (benchmark.measurementIterations < 3) {
    warnings.push({
      path: 'benchmark.measurementIterations',
      message: 'Fewer than 3 timed runs give unstable min/max figures',
      value: benchmark.measurementIterations,
      recommendation: 'Use 5 or more iterations',
    });
  }

  if (!isNonNegativeInteger(benchmark.warmupSampleSize)) {
    errors.push({
      path: 'benchmark.warmupSampleSize',
      message: 'warmupSampleSize must be a non-negative integer',
      value: benchmark.warmupSampleSize,
    });
  } else if (benchmark.warmupSampleSize > config.dataset.size) {
    warnings.push({
      path: 'benchmark.warmupSampleSize',
      message: 'Warm-up sample is larger than the dataset; the whole dataset is used',
      value: benchmark.warmupSampleSize,
    });
  }

  if (!(benchmark.gcSettleMs >= 0)) {
    errors.push({
      path: 'benchmark.gcSettleMs',
      message: 'gcSettleMs must be non-negative',
      value: benchmark.gcSettleMs,
    });
  } else if (benchmark.gcSettleMs > MAX_SENSIBLE_GC_SETTLE_MS) {
    warnings.push({
      path: 'benchmark.gcSettleMs',
      message: 'Very long pause between timed runs',
      value: benchmark.gcSettleMs,
      recommendation: `Use ${MAX_SENSIBLE_GC_SETTLE_MS}ms or less`,
    });
  }
}

/**
 * Validate observability configuration.
 */
function validateObservabilityConfig(
  observability: CohortConfig['observability'],
  errors: ConfigValidationError[]
): void {
  if (!LogLevels.isLogLevel(observability.logLevel)) {
    errors.push({
      path: 'observability.logLevel',
      message: 'Invalid log level',
      value: observability.logLevel,
      suggestion: 'Use one of: debug, info, warn, error',
    });
  }

  if (observability.logFormat !== 'json' && observability.logFormat !== 'pretty') {
    errors.push({
      path: 'observability.logFormat',
      message: 'Invalid log format',
      value: observability.logFormat,
      suggestion: 'Use one of: json, pretty',
    });
  }
}
