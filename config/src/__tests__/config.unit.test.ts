/**
 * @cohort/config - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { CohortError, ErrorCode } from '@cohort/core';
import {
  assertValidConfig,
  createConfig,
  getConfigFromEnv,
  getOverridesFromEnv,
  mergeConfigs,
  resolveBenchmarkSettings,
  validateConfig,
  DEFAULT_BENCHMARK_SETTINGS,
  DEFAULT_CONFIG,
  type CohortConfig,
} from '../index.js';

describe('@cohort/config', () => {
  // =============================================================================
  // DEFAULT_CONFIG Tests
  // =============================================================================

  describe('DEFAULT_CONFIG', () => {
    it('should describe the one-million-record benchmark', () => {
      expect(DEFAULT_CONFIG.dataset.size).toBe(1_000_000);
      expect(DEFAULT_CONFIG.dataset.seed).toBe(42);
      expect(DEFAULT_CONFIG.dataset.departments).toEqual([
        'Engineering',
        'Sales',
        'Marketing',
        'HR',
        'Finance',
      ]);
      expect(DEFAULT_CONFIG.dataset.minAge).toBe(22);
      expect(DEFAULT_CONFIG.dataset.maxAge).toBe(64);
    });

    it('should time five iterations after one warm-up', () => {
      expect(DEFAULT_CONFIG.benchmark.warmupIterations).toBe(1);
      expect(DEFAULT_CONFIG.benchmark.measurementIterations).toBe(5);
      expect(DEFAULT_CONFIG.benchmark.warmupSampleSize).toBe(1000);
    });

    it('should be valid', () => {
      const result = validateConfig(DEFAULT_CONFIG);
      expect(result.valid).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });
  });

  // =============================================================================
  // createConfig Tests
  // =============================================================================

  describe('createConfig', () => {
    it('should return defaults when called without overrides', () => {
      expect(createConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge overrides section by section', () => {
      const config = createConfig({
        dataset: { size: 500 },
        benchmark: { measurementIterations: 10 },
      });

      expect(config.dataset.size).toBe(500);
      expect(config.dataset.seed).toBe(42);
      expect(config.benchmark.measurementIterations).toBe(10);
      expect(config.benchmark.warmupIterations).toBe(1);
      expect(config.observability).toEqual(DEFAULT_CONFIG.observability);
    });

    it('should not let undefined override values replace defaults', () => {
      const config = createConfig({ dataset: { size: undefined, seed: 7 } });
      expect(config.dataset.size).toBe(1_000_000);
      expect(config.dataset.seed).toBe(7);
    });

    it('should replace lists wholesale', () => {
      const config = createConfig({ dataset: { departments: ['Ops'] } });
      expect(config.dataset.departments).toEqual(['Ops']);
    });

    it('should build on a given base configuration', () => {
      const base = createConfig({ dataset: { size: 100 } });
      const config = createConfig({ dataset: { seed: 1 } }, base);
      expect(config.dataset.size).toBe(100);
      expect(config.dataset.seed).toBe(1);
    });

    it('should return a deeply frozen configuration', () => {
      const config = createConfig({ dataset: { departments: ['Ops', 'Legal'] } });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.dataset)).toBe(true);
      expect(Object.isFrozen(config.dataset.departments)).toBe(true);
      expect(Object.isFrozen(config.benchmark)).toBe(true);
      expect(Object.isFrozen(config.observability)).toBe(true);
    });

    it('should not share the caller override list', () => {
      const departments = ['Ops'];
      const config = createConfig({ dataset: { departments } });
      departments.push('Legal');
      expect(config.dataset.departments).toEqual(['Ops']);
    });
  });

  // =============================================================================
  // mergeConfigs Tests
  // =============================================================================

  describe('resolveBenchmarkSettings', () => {
    it('should fill missing settings from the defaults', () => {
      expect(resolveBenchmarkSettings({ measurementIterations: 9 })).toEqual({
        ...DEFAULT_BENCHMARK_SETTINGS,
        measurementIterations: 9,
      });
    });

    it('should keep the default for an explicit undefined', () => {
      const settings = resolveBenchmarkSettings({ measurementIterations: undefined, forceGc: undefined });
      expect(settings.measurementIterations).toBe(DEFAULT_BENCHMARK_SETTINGS.measurementIterations);
      expect(settings.forceGc).toBe(true);
    });

    it('should return frozen settings', () => {
      expect(Object.isFrozen(resolveBenchmarkSettings())).toBe(true);
    });
  });

  describe('mergeConfigs', () => {
    it('should let later configurations win', () => {
      const merged = mergeConfigs(
        { dataset: { size: 10, seed: 1 } },
        { dataset: { seed: 2 }, observability: { logLevel: 'debug' } }
      );

      expect(merged).toEqual({
        dataset: { size: 10, seed: 2 },
        observability: { logLevel: 'debug' },
      });
    });

    it('should skip null and undefined entries', () => {
      expect(mergeConfigs(null, { benchmark: { forceGc: false } }, undefined)).toEqual({
        benchmark: { forceGc: false },
      });
    });

    it('should return an empty object for no input', () => {
      expect(mergeConfigs()).toEqual({});
    });
  });

  // =============================================================================
  // Environment Tests
  // =============================================================================

  describe('getOverridesFromEnv', () => {
    it('should read COHORT_<SECTION>_<FIELD> variables', () => {
      const overrides = getOverridesFromEnv({
        env: {
          COHORT_DATASET_SIZE: '2500',
          COHORT_DATASET_DEPARTMENTS: 'Ops, Legal ,',
          COHORT_DATASET_FIRST_NAMES: 'Ann',
          COHORT_BENCHMARK_FORCE_GC: 'false',
          COHORT_BENCHMARK_MEASUREMENT_ITERATIONS: '3',
          COHORT_OBSERVABILITY_LOG_LEVEL: 'DEBUG',
          COHORT_OBSERVABILITY_LOG_FORMAT: 'json',
        },
      });

      expect(overrides).toEqual({
        dataset: { size: 2500, departments: ['Ops', 'Legal'], firstNames: ['Ann'] },
        benchmark: { measurementIterations: 3, forceGc: false },
        observability: { logLevel: 'debug', logFormat: 'json' },
      });
    });

    it('should ignore values that do not parse', () => {
      const overrides = getOverridesFromEnv({
        env: {
          COHORT_DATASET_SIZE: 'lots',
          COHORT_DATASET_SEED: '',
          COHORT_OBSERVABILITY_LOG_LEVEL: 'verbose',
          COHORT_OBSERVABILITY_LOG_FORMAT: 'xml',
        },
      });

      expect(overrides).toEqual({});
    });

    it('should honour a custom prefix', () => {
      const overrides = getOverridesFromEnv({
        prefix: 'BENCH',
        env: { BENCH_DATASET_SEED: '9', COHORT_DATASET_SEED: '1' },
      });
      expect(overrides).toEqual({ dataset: { seed: 9 } });
    });

    it('should accept 1 as true for booleans', () => {
      expect(getOverridesFromEnv({ env: { COHORT_BENCHMARK_FORCE_GC: '1' } })).toEqual({
        benchmark: { forceGc: true },
      });
    });
  });

  describe('getConfigFromEnv', () => {
    it('should apply environment overrides on top of defaults', () => {
      const config = getConfigFromEnv({ env: { COHORT_BENCHMARK_GC_SETTLE_MS: '0' } });
      expect(config.benchmark.gcSettleMs).toBe(0);
      expect(config.dataset).toEqual(DEFAULT_CONFIG.dataset);
    });
  });

  // =============================================================================
  // Validation Tests
  // =============================================================================

  describe('validateConfig', () => {
    const withDataset = (dataset: Partial<CohortConfig['dataset']>): CohortConfig =>
      createConfig({ dataset });

    it('should reject a non-positive dataset size', () => {
      const result = validateConfig(withDataset({ size: 0 }));
      expect(result.valid).toBe(false);
      expect(result.errors.map(e => e.path)).toEqual(['dataset.size']);
    });

    it('should reject a fractional dataset size', () => {
      const result = validateConfig(withDataset({ size: 10.5 }));
      expect(result.errors[0]).toMatchObject({ path: 'dataset.size', value: 10.5 });
    });

    it('should reject an empty department list', () => {
      const result = validateConfig(withDataset({ departments: [] }));
      expect(result.errors.map(e => e.path)).toEqual(['dataset.departments']);
    });

    it('should warn about duplicate departments', () => {
      const result = validateConfig(withDataset({ departments: ['HR', 'HR'] }));
      expect(result.valid).toBe(true);
      expect(result.warnings.map(w => w.path)).toEqual(['dataset.departments']);
    });

    it('should reject inverted age and salary ranges', () => {
      const result = validateConfig(withDataset({ minAge: 70, maxSalary: 10_000 }));
      expect(result.errors.map(e => e.path)).toEqual(['dataset.minAge', 'dataset.maxSalary']);
    });

    it('should require at least one measured iteration', () => {
      const result = validateConfig(createConfig({ benchmark: { measurementIterations: 0 } }));
      expect(result.errors.map(e => e.path)).toEqual(['benchmark.measurementIterations']);
    });

    it('should warn about too few measured iterations', () => {
      const result = validateConfig(createConfig({ benchmark: { measurementIterations: 2 } }));
      expect(result.valid).toBe(true);
      expect(result.warnings.map(w => w.path)).toEqual(['benchmark.measurementIterations']);
    });

    it('should warn when the warm-up sample exceeds the dataset', () => {
      const result = validateConfig(createConfig({ dataset: { size: 10 } }));
      expect(result.warnings.map(w => w.path)).toEqual(['benchmark.warmupSampleSize']);
    });

    it('should reject a negative GC settle pause', () => {
      const result = validateConfig(createConfig({ benchmark: { gcSettleMs: -1 } }));
      expect(result.errors.map(e => e.path)).toEqual(['benchmark.gcSettleMs']);
    });
  });

  describe('assertValidConfig', () => {
    it('should return the result for a valid configuration', () => {
      expect(assertValidConfig(DEFAULT_CONFIG).valid).toBe(true);
    });

    it('should throw a ValidationError naming every failing path', () => {
      const config = createConfig({ dataset: { size: -1, firstNames: [] } });

      let caught: unknown;
      try {
        assertValidConfig(config);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CohortError);
      expect(caught).toMatchObject({
        name: 'ValidationError',
        code: ErrorCode.INVALID_CONFIG,
        details: { paths: ['dataset.size', 'dataset.firstNames'] },
        suggestion: 'Use a record count such as 1000000',
      });
    });
  });
});
