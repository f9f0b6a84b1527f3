/**
 * @cohort/query - Categorical Group-By
 *
 * group by (department, age group) -> per-group aggregate.
 */

import {
  ageGroup,
  computeAggregates,
  groupByComposite,
  sortRows,
  tenureDays,
  type AggregateSpec,
  type Dataset,
  type Person,
} from '@cohort/core';
import { CATEGORICAL_MIN_GROUP_SIZE } from './constants.js';
import type { AgeGroupStats, QueryOptions } from './types.js';

function groupAggregates(now: Date): AggregateSpec<Person>[] {
  return [
    { function: 'count', alias: 'count' },
    { function: 'sum', column: 'salary', alias: 'totalSalary' },
    { function: 'avg', column: 'salary', alias: 'averageSalary' },
    { function: 'avg', value: person => tenureDays(person, now), alias: 'averageTenureDays' },
  ];
}

/**
 * Salary and tenure statistics per (department, age group).
 *
 * The age group is the memoized derived field, so the first run over a
 * dataset fills its cache and later runs read it. Groups of 5 or fewer
 * people are dropped. The result is ordered by department, then age group.
 */
export function runCategoricalGroupBy(dataset: Dataset, options: QueryOptions = {}): AgeGroupStats[] {
  const now = options.now ?? new Date();
  const specs = groupAggregates(now);
  const groups = groupByComposite(dataset, person => [person.department, ageGroup(person)] as const);

  const stats: AgeGroupStats[] = [];
  for (const { key: [department, group], rows } of groups) {
    if (rows.length <= CATEGORICAL_MIN_GROUP_SIZE) continue;

    const [count, totalSalary, averageSalary, averageTenureDays] = computeAggregates(rows, specs);
    stats.push({
      department,
      ageGroup: group,
      count,
      totalSalary,
      averageSalary,
      averageTenureDays,
    });
  }

  return sortRows(stats, [
    { column: 'department', direction: 'asc' },
    { column: 'ageGroup', direction: 'asc' },
  ]);
}
