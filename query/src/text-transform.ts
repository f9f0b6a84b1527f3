/**
 * @cohort/query - Text Transform
 *
 * filter by name -> uppercase -> sort.
 */

import { filterRows, sortRows, type Dataset, type Person } from '@cohort/core';
import {
  MANAGER_SALARY,
  TEXT_MIN_NAME_LENGTH,
  TEXT_REQUIRED_CHARACTERS,
} from './constants.js';
import type { PersonProjection, QueryOptions } from './types.js';

const currency = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

/**
 * Whether a name takes part in the text operations: it contains `a` or `e`
 * (case-sensitive) and is longer than five characters.
 */
export function matchesNameFilter(name: string): boolean {
  return TEXT_REQUIRED_CHARACTERS.some(ch => name.includes(ch)) &&
    name.length > TEXT_MIN_NAME_LENGTH;
}

/**
 * Uppercase `a`-`z` only. Other characters pass through unchanged, so the
 * result has the same length as the input.
 */
export function toAsciiUpperCase(name: string): string {
  return name.replace(/[a-z]/g, ch => String.fromCharCode(ch.charCodeAt(0) - 32));
}

function hasMatchingName(person: Person): boolean {
  return matchesNameFilter(person.name);
}

/**
 * ASCII-uppercased names of the matching people, in ascending code-unit
 * order.
 */
export function runTextTransform(dataset: Dataset, _options: QueryOptions = {}): string[] {
  const names = filterRows(dataset, hasMatchingName).map(person => toAsciiUpperCase(person.name));
  return sortRows(names, [{ value: name => name, direction: 'asc' }]);
}

/**
 * Format a salary as US-dollar currency text.
 */
export function formatSalary(salary: number): string {
  return currency.format(salary);
}

/**
 * Projection report over the same people as {@link runTextTransform},
 * ordered by uppercased name.
 */
export function runStringProjection(dataset: Dataset, _options: QueryOptions = {}): PersonProjection[] {
  const projections = filterRows(dataset, hasMatchingName).map((person): PersonProjection => ({
    id: person.id,
    upperName: toAsciiUpperCase(person.name),
    nameLength: person.name.length,
    formattedSalary: formatSalary(person.salary),
    isManager: person.name.endsWith('Manager') || person.salary > MANAGER_SALARY,
  }));
  return sortRows(projections, [{ column: 'upperName', direction: 'asc' }]);
}
