/**
 * @cohort/query - Complex Chain
 *
 * filter -> sort -> group by department -> per-group aggregate.
 */

import {
  compileFilters,
  computeAggregates,
  filterRows,
  groupBy,
  sortRows,
  type AggregateSpec,
  type Dataset,
  type Person,
} from '@cohort/core';
import {
  COMPLEX_CHAIN_MIN_AGE,
  COMPLEX_CHAIN_MIN_GROUP_SIZE,
  COMPLEX_CHAIN_MIN_SALARY,
} from './constants.js';
import type { DepartmentStats, QueryOptions } from './types.js';

const isEligible = compileFilters<Person>([
  { column: 'age', operator: 'gt', value: COMPLEX_CHAIN_MIN_AGE },
  { column: 'salary', operator: 'gt', value: COMPLEX_CHAIN_MIN_SALARY },
]);

const DEPARTMENT_AGGREGATES: readonly AggregateSpec<Person>[] = [
  { function: 'count', alias: 'count' },
  { function: 'avg', column: 'salary', alias: 'averageSalary' },
  { function: 'max', column: 'salary', alias: 'maxSalary' },
  { function: 'min', column: 'age', alias: 'minAge' },
];

/**
 * Department statistics for people older than 25 earning more than 50,000.
 *
 * Rows are sorted by (department asc, salary desc) before grouping, so each
 * bucket lists its members highest-paid first. Departments with 10 or fewer
 * eligible people are dropped. The result is ordered by average salary,
 * highest first.
 */
export function runComplexChain(dataset: Dataset, _options: QueryOptions = {}): DepartmentStats[] {
  const eligible = filterRows(dataset, isEligible);
  const ordered = sortRows(eligible, [
    { column: 'department', direction: 'asc' },
    { column: 'salary', direction: 'desc' },
  ]);
  const departments = groupBy(ordered, person => person.department);

  const stats: DepartmentStats[] = [];
  for (const [department, members] of departments) {
    if (members.length <= COMPLEX_CHAIN_MIN_GROUP_SIZE) continue;

    const [count, averageSalary, maxSalary, minAge] = computeAggregates(members, DEPARTMENT_AGGREGATES);
    stats.push({ department, count, averageSalary, maxSalary, minAge });
  }

  return sortRows(stats, [{ column: 'averageSalary', direction: 'desc' }]);
}
