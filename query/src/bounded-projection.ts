/**
 * @cohort/query - Bounded Projection
 *
 * filter -> sort by hire date -> truncate.
 */

import {
  MS_PER_DAY,
  compileFilters,
  filterRows,
  limitRows,
  sortRows,
  tenureDays,
  type Dataset,
  type Person,
} from '@cohort/core';
import {
  DAYS_PER_YEAR,
  PROJECTION_LIMIT,
  PROJECTION_MAX_AGE,
  PROJECTION_MIN_SALARY,
  PROJECTION_WINDOW_DAYS,
} from './constants.js';
import type { QueryOptions, SalaryBracket, YoungProfessional } from './types.js';

/**
 * Earliest hire date (exclusive) that still falls inside the projection window.
 */
export function projectionCutoff(now: Date): Date {
  return new Date(now.getTime() - PROJECTION_WINDOW_DAYS * MS_PER_DAY);
}

/**
 * Recent young hires with a salary above 60,000, earliest hire first, at
 * most 1000 of them. Returns references into `dataset`.
 *
 * The sort is stable: people hired at the same instant keep dataset order.
 */
export function runBoundedProjection(dataset: Dataset, options: QueryOptions = {}): readonly Person[] {
  const now = options.now ?? new Date();
  const isRecentYoungHire = compileFilters<Person>([
    { column: 'hireDate', operator: 'gt', value: projectionCutoff(now) },
    { column: 'age', operator: 'lt', value: PROJECTION_MAX_AGE },
    { column: 'salary', operator: 'gt', value: PROJECTION_MIN_SALARY },
  ]);

  const matches = filterRows(dataset, isRecentYoungHire);
  const ordered = sortRows(matches, [{ column: 'hireDate', direction: 'asc' }]);
  return limitRows(ordered, PROJECTION_LIMIT);
}

/**
 * Salary band label: each band is 20,000 wide, with everything under
 * 40,000 as entry level and 100,000 and above as executive.
 */
export function salaryBracket(salary: number): SalaryBracket {
  switch (Math.trunc(salary / 20_000)) {
    case 0:
    case 1:
      return 'Entry Level';
    case 2:
      return 'Junior';
    case 3:
      return 'Mid Level';
    case 4:
      return 'Senior';
    default:
      return 'Executive';
  }
}

/**
 * The Bounded Projection rows with salary bracket and years of service.
 */
export function runYoungProfessionalReport(
  dataset: Dataset,
  options: QueryOptions = {}
): YoungProfessional[] {
  const now = options.now ?? new Date();
  return runBoundedProjection(dataset, { now }).map(person => ({
    id: person.id,
    name: person.name,
    age: person.age,
    salaryBracket: salaryBracket(person.salary),
    yearsOfService: tenureDays(person, now) / DAYS_PER_YEAR,
  }));
}
