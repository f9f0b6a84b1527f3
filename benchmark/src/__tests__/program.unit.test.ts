/**
 * @cohort/benchmark - Command-line Program Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { ErrorCode, QueryError, ValidationError, createNoopLogger, createTestLogger } from '@cohort/core';
import {
  createProgram,
  parseFormatOption,
  parseIntegerOption,
  parseLogLevelOption,
  reportFailure,
  resolveRunConfig,
  selectOperations,
} from '../program.js';

const NOW = new Date('2024-06-01T00:00:00.000Z');

const quietEnv = { COHORT_BENCHMARK_FORCE_GC: 'false' };

function capture() {
  const lines: string[] = [];
  return { lines, write: (line: string) => { lines.push(line); } };
}

describe('option parsers', () => {
  it('should parse integers and reject anything else', () => {
    expect(parseIntegerOption('200')).toBe(200);
    expect(parseIntegerOption('-3')).toBe(-3);
    expect(() => parseIntegerOption('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseIntegerOption('abc')).toThrow(InvalidArgumentError);
    expect(() => parseIntegerOption(' ')).toThrow(InvalidArgumentError);
  });

  it('should accept log levels in any case', () => {
    expect(parseLogLevelOption('WARN')).toBe('warn');
    expect(() => parseLogLevelOption('verbose')).toThrow(InvalidArgumentError);
  });

  it('should accept the two report formats', () => {
    expect(parseFormatOption('json')).toBe('json');
    expect(parseFormatOption('table')).toBe('table');
    expect(() => parseFormatOption('xml')).toThrow(InvalidArgumentError);
  });
});

describe('resolveRunConfig', () => {
  it('should let flags win over the environment', () => {
    const { config } = resolveRunConfig(
      { format: 'table', size: 10 },
      { COHORT_DATASET_SIZE: '500', COHORT_DATASET_SEED: '7' }
    );

    expect(config.dataset.size).toBe(10);
    expect(config.dataset.seed).toBe(7);
    expect(config.benchmark.measurementIterations).toBe(5);
  });

  it('should return validation warnings', () => {
    const { warnings } = resolveRunConfig({ format: 'table', iterations: 1 }, {});
    expect(warnings.map(w => w.path)).toEqual(['benchmark.measurementIterations']);
  });

  it('should throw a ValidationError for an invalid combination', () => {
    let caught: unknown;
    try {
      resolveRunConfig({ format: 'table', size: 0 }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.code).toBe(ErrorCode.INVALID_CONFIG);
    }
  });
});

describe('selectOperations', () => {
  it('should return every operation when nothing is selected', () => {
    expect(selectOperations(undefined)).toHaveLength(5);
    expect(selectOperations([])).toHaveLength(5);
  });

  it('should keep the order given', () => {
    expect(selectOperations(['bounded-projection', 'complex-chain']).map(op => op.id)).toEqual([
      'bounded-projection',
      'complex-chain',
    ]);
  });

  it('should reject an unknown id', () => {
    expect(() => selectOperations(['nope'])).toThrow(QueryError);
  });
});

describe('reportFailure', () => {
  it('should log a plain error as an internal error of the program', () => {
    const logger = createTestLogger();

    const failure = reportFailure(new Error('boom'), logger);

    const [entry] = logger.getLogsByLevel('error');
    expect(entry.message).toBe('boom');
    expect(entry.error).toBe(failure);
    expect(entry.context).toEqual({
      errorCode: ErrorCode.INTERNAL_ERROR,
      errorName: 'CohortError',
      timestamp: failure.timestamp,
      details: { operation: 'cohort-bench', originalError: 'Error' },
    });
  });

  it('should carry the suggestion of an unknown operation', () => {
    const logger = createTestLogger();
    let caught: unknown;
    try {
      selectOperations(['nope']);
    } catch (error) {
      caught = error;
    }

    reportFailure(caught, logger);

    const [entry] = logger.getLogsByLevel('error');
    expect(entry.message).toBe('Unknown query operation "nope"');
    expect(entry.context).toMatchObject({
      errorCode: ErrorCode.UNKNOWN_OPERATION,
      errorName: 'QueryError',
      suggestion:
        'Use one of: complex-chain, categorical-group-by, text-transform, manual-partition, bounded-projection',
    });
  });
});

describe('createProgram', () => {
  it('should list the operation ids', async () => {
    const { lines, write } = capture();

    await createProgram({ write }).parseAsync(['list'], { from: 'user' });

    expect(lines).toEqual([
      'complex-chain         Complex Chain',
      'categorical-group-by  GroupBy with Aggregation',
      'text-transform        String Operations',
      'manual-partition      Nested Queries',
      'bounded-projection    Projection with Filter',
    ]);
  });

  it('should print a JSON report for the selected operations', async () => {
    const { lines, write } = capture();
    const program = createProgram({
      env: quietEnv,
      write,
      createLogger: () => createNoopLogger(),
      now: () => NOW,
    });

    await program.parseAsync(
      ['run', '--size', '200', '--iterations', '3', '--warmup', '0', '--format', 'json', '--only', 'text-transform'],
      { from: 'user' }
    );

    expect(lines).toHaveLength(1);
    const report: unknown = JSON.parse(lines[0]);
    expect(report).toMatchObject({
      datasetSize: 200,
      settings: { measurementIterations: 3, warmupIterations: 0, forceGc: false },
      results: [{ operationId: 'text-transform', name: 'String Operations', rowsIn: 200 }],
    });
  });

  it('should print the table report by default', async () => {
    const { lines, write } = capture();
    const program = createProgram({
      env: { ...quietEnv, COHORT_DATASET_SIZE: '100' },
      write,
      createLogger: () => createNoopLogger(),
      now: () => NOW,
    });

    await program.parseAsync(['--iterations', '3', '--only', 'complex-chain', 'manual-partition'], { from: 'user' });

    expect(lines.slice(0, 4)).toEqual([
      '='.repeat(60),
      'Query Benchmark',
      '='.repeat(60),
      'Records: 100, Warm-up: 1, Iterations: 3',
    ]);
    expect(lines.filter(line => line.startsWith('Complex Chain:'))).toHaveLength(1);
    expect(lines.filter(line => line.startsWith('Nested Queries:'))).toHaveLength(1);
  });

  it('should log configuration warnings and dataset generation', async () => {
    const logger = createTestLogger();
    const program = createProgram({
      env: quietEnv,
      write: () => {},
      createLogger: () => logger,
      now: () => NOW,
    });

    await program.parseAsync(['run', '--size', '50', '--iterations', '3', '--only', 'text-transform'], {
      from: 'user',
    });

    const warnings = logger.getLogsByLevel('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].context).toMatchObject({
      service: 'benchmark',
      path: 'benchmark.warmupSampleSize',
    });
    const generated = logger.getLogs().find(entry => entry.message === 'Dataset generated');
    expect(generated?.context).toMatchObject({ service: 'benchmark', rowsProcessed: 50, seed: 42 });
  });
});
