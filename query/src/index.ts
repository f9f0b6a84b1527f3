/**
 * @cohort/query - Query Operations
 *
 * Five analytical query shapes over an in-memory Person dataset, each a
 * pure `(dataset, options?) -> result` function:
 * - Complex Chain: filter -> sort -> group -> aggregate
 * - Categorical Group-By: composite-key grouping on the derived age group
 * - Text Transform: filter -> map -> sort over names
 * - Manual Partition: the scan-per-department baseline
 * - Bounded Projection: filter -> sort -> first 1000
 *
 * @example
 * ```typescript
 * import { runComplexChain, getOperation } from '@cohort/query';
 *
 * const stats = runComplexChain(people);
 * const projection = getOperation('bounded-projection').run(people, { now });
 * ```
 */

export { runComplexChain } from './complex-chain.js';
export { runCategoricalGroupBy } from './categorical-group-by.js';
export {
  formatSalary,
  matchesNameFilter,
  runStringProjection,
  runTextTransform,
  toAsciiUpperCase,
} from './text-transform.js';
export { runManualPartition } from './manual-partition.js';
export {
  projectionCutoff,
  runBoundedProjection,
  runYoungProfessionalReport,
  salaryBracket,
} from './bounded-projection.js';
export { QUERY_OPERATIONS, getOperation, operationIds } from './registry.js';
export * from './constants.js';

export type {
  AgeGroupStats,
  DepartmentAnalysis,
  DepartmentStats,
  OperationId,
  PersonProjection,
  QueryOperation,
  QueryOptions,
  QueryResult,
  SalaryBracket,
  YoungProfessional,
} from './types.js';
