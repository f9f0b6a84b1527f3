/**
 * @cohort/query - Operation Registry
 *
 * The benchmarked query shapes, in report order.
 */

import { QueryError } from '@cohort/core';
import { runBoundedProjection } from './bounded-projection.js';
import { runCategoricalGroupBy } from './categorical-group-by.js';
import { runComplexChain } from './complex-chain.js';
import { runManualPartition } from './manual-partition.js';
import { runTextTransform } from './text-transform.js';
import type { OperationId, QueryOperation } from './types.js';

export const QUERY_OPERATIONS: readonly QueryOperation[] = [
  {
    id: 'complex-chain',
    name: 'Complex Chain',
    description: 'filter -> sort -> group by department -> aggregate',
    run: runComplexChain,
  },
  {
    id: 'categorical-group-by',
    name: 'GroupBy with Aggregation',
    description: 'group by (department, age group) -> aggregate',
    run: runCategoricalGroupBy,
  },
  {
    id: 'text-transform',
    name: 'String Operations',
    description: 'filter names -> uppercase -> sort',
    run: runTextTransform,
  },
  {
    id: 'manual-partition',
    name: 'Nested Queries',
    description: 'one full scan per department',
    run: runManualPartition,
  },
  {
    id: 'bounded-projection',
    name: 'Projection with Filter',
    description: 'filter -> sort by hire date -> first 1000',
    run: runBoundedProjection,
  },
];

export function operationIds(): OperationId[] {
  return QUERY_OPERATIONS.map(op => op.id);
}

/**
 * Look up an operation by id.
 *
 * @throws QueryError with code UNKNOWN_OPERATION when no operation has this id
 */
export function getOperation(id: string): QueryOperation {
  const operation = QUERY_OPERATIONS.find(op => op.id === id);
  if (!operation) {
    throw QueryError.unknownOperation(id, operationIds());
  }
  return operation;
}
