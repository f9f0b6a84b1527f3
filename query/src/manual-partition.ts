/**
 * @cohort/query - Manual Partition
 *
 * The scan-per-department baseline: one full pass over the dataset for each
 * distinct department, O(departments x rows). The group-by operations do
 * the same partitioning in a single pass; keep this one as the contrast.
 */

import { compareStrings, distinctValues, type Dataset } from '@cohort/core';
import { HIGH_EARNER_SALARY, PARTITION_REPORT_MIN_SIZE } from './constants.js';
import type { DepartmentAnalysis, QueryOptions } from './types.js';

/**
 * Per-department member indices, high-earner count and age totals, in
 * department order. `averageAge` is only reported for departments with
 * more than 50 members.
 */
export function runManualPartition(dataset: Dataset, _options: QueryOptions = {}): DepartmentAnalysis[] {
  const departments = distinctValues(dataset, person => person.department).sort(compareStrings);

  const analyses: DepartmentAnalysis[] = [];
  for (const department of departments) {
    const memberIndices: number[] = [];
    let highEarners = 0;
    let totalAge = 0;

    for (let i = 0; i < dataset.length; i++) {
      const person = dataset[i];
      if (person.department !== department) continue;

      memberIndices.push(i);
      if (person.salary > HIGH_EARNER_SALARY) highEarners++;
      totalAge += person.age;
    }

    analyses.push({
      department,
      memberIndices,
      highEarners,
      totalAge,
      averageAge: memberIndices.length > PARTITION_REPORT_MIN_SIZE
        ? totalAge / memberIndices.length
        : null,
    });
  }

  return analyses;
}
