/**
 * @cohort/benchmark - Query Benchmark Harness
 *
 * Seeded dataset generation, repeated timing of the query operations and
 * report printing.
 *
 * @example
 * ```typescript
 * import { BenchmarkRunner, generatePeople } from '@cohort/benchmark';
 * import { DEFAULT_CONFIG } from '@cohort/config';
 *
 * const now = new Date();
 * const people = generatePeople(DEFAULT_CONFIG.dataset, { now });
 * const runner = new BenchmarkRunner({ settings: DEFAULT_CONFIG.benchmark, now });
 * runner.printReport(await runner.runAll(people));
 * ```
 */

// Types
export type {
  BenchmarkReport,
  BenchmarkResult,
  BenchmarkRunnerOptions,
  LatencyMetrics,
  ReportFormat,
  RuntimeInfo,
} from './types.js';

// Runner
export {
  BenchmarkRunner,
  createBenchmarkRunner,
  exposedGc,
  formatReport,
  getRuntimeInfo,
} from './runner.js';

// Data generation
export {
  generatePeople,
  iteratePeople,
  type GeneratePeopleOptions,
} from './generators/person-generator.js';

// Command-line program
export {
  createProgram,
  parseFormatOption,
  parseIntegerOption,
  parseLogLevelOption,
  reportFailure,
  resolveRunConfig,
  selectOperations,
  type ProgramIO,
  type ResolvedRunConfig,
  type RunFlags,
} from './program.js';

// Utilities
export { SeededRandom, createRandom } from './utils/random.js';
export {
  computeLatencyMetrics,
  formatDuration,
  formatNumber,
  percentile,
} from './utils/metrics.js';
