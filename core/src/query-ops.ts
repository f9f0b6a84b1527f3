/**
 * @cohort/core - Query Operations
 *
 * Stateless filter, sort, group-by and aggregation primitives used by the
 * query operations in @cohort/query. Every function allocates its own
 * output and leaves its input untouched.
 */

import { InvariantError, invariant } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Supported filter/predicate operators
 */
export type FilterOperator =
  | 'eq'       // =
  | 'ne'       // !=
  | 'gt'       // >
  | 'gte'      // >=
  | 'lt'       // <
  | 'lte'      // <=
  | 'in'       // IN (...)
  | 'notIn'    // NOT IN (...)
  | 'between'  // BETWEEN ... AND ... (inclusive)
  | 'contains'; // substring match, case-sensitive

/**
 * Declarative predicate over one column of a row type.
 */
export interface FilterPredicate<T> {
  column: keyof T & string;
  operator: FilterOperator;
  /** Value to compare against (eq, ne, gt, gte, lt, lte, contains) */
  value?: unknown;
  /** Candidate values (in, notIn) */
  values?: readonly unknown[];
  /** Lower bound (between) */
  lowerBound?: unknown;
  /** Upper bound (between) */
  upperBound?: unknown;
  /** Negate the predicate */
  not?: boolean;
}

export type SortDirection = 'asc' | 'desc';

/**
 * One key of a multi-key sort: either a column of the row or a computed value.
 */
export type SortSpec<T> =
  | { column: keyof T & string; direction: SortDirection }
  | { value: (row: T) => unknown; direction: SortDirection };

/**
 * Primitive component of a group key.
 */
export type KeyPart = string | number | boolean;

/**
 * A bucket produced by composite-key grouping.
 */
export interface CompositeGroup<K extends readonly KeyPart[], T> {
  key: K;
  rows: T[];
}

export type AggregateFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';

/**
 * Columns of `T` whose values are numbers.
 */
export type NumericColumn<T> = {
  [K in keyof T]-?: T[K] extends number ? K : never;
}[keyof T] & keyof T & string;

/**
 * Aggregation specification. `count` needs neither `column` nor `value`.
 */
export interface AggregateSpec<T> {
  function: AggregateFunction;
  /** Numeric column to aggregate */
  column?: NumericColumn<T>;
  /** Computed value to aggregate (takes precedence over `column`) */
  value?: (row: T) => number;
  /** Output label */
  alias: string;
}

/**
 * One-pass summary of a numeric value over a bucket.
 */
export interface NumericSummary {
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
}

// =============================================================================
// Comparison
// =============================================================================

/**
 * Compare two strings by UTF-16 code unit, independent of locale.
 */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare two values for sorting or filtering.
 * Returns negative if a < b, positive if a > b, 0 if equal.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (a === null || a === undefined) {
    return b === null || b === undefined ? 0 : -1;
  }
  if (b === null || b === undefined) {
    return 1;
  }

  if (typeof a === 'number' && typeof b === 'number') {
    return a < b ? -1 : a > b ? 1 : 0;
  }

  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b);
  }

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }

  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }

  return compareStrings(String(a), String(b));
}

/**
 * Compare values in the given direction.
 */
export function compareForSort(a: unknown, b: unknown, direction: SortDirection): number {
  const cmp = compareValues(a, b);
  return direction === 'asc' ? cmp : -cmp;
}

// =============================================================================
// Filtering
// =============================================================================

/**
 * Keep the rows that satisfy `predicate`, in their original order.
 * The predicate runs exactly once per row.
 */
export function filterRows<T>(
  rows: readonly T[],
  predicate: (row: T, index: number) => boolean
): T[] {
  const result: T[] = [];
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    if (predicate(row, i)) {
      result.push(row);
    }
  }
  return result;
}

function candidateValues<T>(filter: FilterPredicate<T>): readonly unknown[] {
  return filter.values ?? [];
}

/**
 * Evaluate a single filter predicate against a value
 */
export function evaluateFilter<T>(value: unknown, filter: FilterPredicate<T>): boolean {
  let matches: boolean;

  switch (filter.operator) {
    case 'eq':
      matches = value === filter.value ||
        (value instanceof Date && filter.value instanceof Date && compareValues(value, filter.value) === 0);
      break;

    case 'ne':
      matches = !(value === filter.value ||
        (value instanceof Date && filter.value instanceof Date && compareValues(value, filter.value) === 0));
      break;

    case 'gt':
      matches = compareValues(value, filter.value) > 0;
      break;

    case 'gte':
      matches = compareValues(value, filter.value) >= 0;
      break;

    case 'lt':
      matches = compareValues(value, filter.value) < 0;
      break;

    case 'lte':
      matches = compareValues(value, filter.value) <= 0;
      break;

    case 'in':
      matches = candidateValues(filter).includes(value);
      break;

    case 'notIn':
      matches = !candidateValues(filter).includes(value);
      break;

    case 'between':
      matches =
        compareValues(value, filter.lowerBound) >= 0 &&
        compareValues(value, filter.upperBound) <= 0;
      break;

    case 'contains':
      matches = typeof value === 'string' &&
        typeof filter.value === 'string' &&
        value.includes(filter.value);
      break;

    default: {
      const _exhaustiveCheck: never = filter.operator;
      throw new Error(`Unhandled filter operator: ${String(_exhaustiveCheck)}`);
    }
  }

  return filter.not ? !matches : matches;
}

/**
 * Compile filters into one AND-predicate. An empty list accepts every row.
 *
 * @example
 * ```typescript
 * const isSenior = compileFilters<Person>([
 *   { column: 'age', operator: 'gt', value: 25 },
 *   { column: 'salary', operator: 'gt', value: 50_000 },
 * ]);
 * const seniors = filterRows(people, isSenior);
 * ```
 */
export function compileFilters<T>(filters: readonly FilterPredicate<T>[]): (row: T) => boolean {
  const compiled = [...filters];
  if (compiled.length === 0) {
    return () => true;
  }

  return (row: T): boolean => {
    for (const filter of compiled) {
      if (!evaluateFilter(row[filter.column], filter)) {
        return false;
      }
    }
    return true;
  };
}

// =============================================================================
// Sorting
// =============================================================================

function sortAccessor<T>(spec: SortSpec<T>): (row: T) => unknown {
  if ('column' in spec) {
    const column = spec.column;
    return (row: T) => row[column];
  }
  return spec.value;
}

/**
 * Build a multi-key comparator: key 1 decides, ties fall through to key 2,
 * and so on. Rows equal on every key compare as 0.
 */
export function createComparator<T>(specs: readonly SortSpec<T>[]): (a: T, b: T) => number {
  const keys = specs.map(spec => ({
    get: sortAccessor(spec),
    direction: spec.direction,
  }));

  return (a: T, b: T): number => {
    for (const key of keys) {
      const cmp = compareForSort(key.get(a), key.get(b), key.direction);
      if (cmp !== 0) return cmp;
    }
    return 0;
  };
}

/**
 * Sort rows by multiple keys into a new array. The sort is stable, so rows
 * that tie on every key keep their input order.
 */
export function sortRows<T>(rows: readonly T[], specs: readonly SortSpec<T>[]): T[] {
  const result = rows.slice();
  if (specs.length === 0) {
    return result;
  }
  result.sort(createComparator(specs));
  return result;
}

/**
 * Apply limit and offset to rows
 *
 * @throws InvariantError if `limit` or `offset` is not a non-negative integer
 */
export function limitRows<T>(rows: readonly T[], limit: number, offset: number = 0): T[] {
  invariant(
    Number.isInteger(limit) && limit >= 0 && Number.isInteger(offset) && offset >= 0,
    'limit and offset must be non-negative integers',
    { limit, offset }
  );
  return rows.slice(offset, offset + limit);
}

// =============================================================================
// Grouping
// =============================================================================

/**
 * Partition rows into buckets of equal key. Buckets appear in the order
 * their first row was seen; rows keep their input order within a bucket.
 */
export function groupBy<T, K>(rows: readonly T[], keyFn: (row: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const row of rows) {
    const key = keyFn(row);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

/**
 * Like {@link groupBy}, but buckets hold indices into `rows` instead of the
 * rows themselves.
 */
export function groupIndices<T, K>(rows: readonly T[], keyFn: (row: T) => K): Map<K, number[]> {
  const groups = new Map<K, number[]>();
  for (let i = 0; i < rows.length; i++) {
    const key = keyFn(rows[i]);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(i);
    } else {
      groups.set(key, [i]);
    }
  }
  return groups;
}

/**
 * Hashable encoding of a composite key. Distinguishes component types, so
 * `['1', 2]` and `[1, 2]` are different keys.
 */
export function encodeCompositeKey(parts: readonly KeyPart[]): string {
  return JSON.stringify(parts);
}

/**
 * Group rows by a multi-component key compared component-wise.
 *
 * @example
 * ```typescript
 * const groups = groupByComposite(people, p => [p.department, ageGroup(p)] as const);
 * for (const { key: [department, group], rows } of groups) { ... }
 * ```
 */
export function groupByComposite<T, K extends readonly KeyPart[]>(
  rows: readonly T[],
  keyFn: (row: T) => K
): CompositeGroup<K, T>[] {
  const groups = new Map<string, CompositeGroup<K, T>>();
  for (const row of rows) {
    const key = keyFn(row);
    const encoded = encodeCompositeKey(key);
    const group = groups.get(encoded);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(encoded, { key, rows: [row] });
    }
  }
  return [...groups.values()];
}

/**
 * Order composite keys component by component; a shorter key that is a
 * prefix of a longer one sorts first.
 */
export function compareCompositeKeys(a: readonly KeyPart[], b: readonly KeyPart[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const cmp = compareValues(a[i], b[i]);
    if (cmp !== 0) return cmp;
  }
  return a.length - b.length;
}

/**
 * Distinct keys in first-seen order.
 */
export function distinctValues<T, K>(rows: readonly T[], keyFn: (row: T) => K): K[] {
  const seen = new Set<K>();
  for (const row of rows) {
    seen.add(keyFn(row));
  }
  return [...seen];
}

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Aggregator state for single-pass aggregation.
 */
interface Aggregator {
  update(value: unknown): void;
  finalize(): number;
}

function createAggregator(fn: AggregateFunction): Aggregator {
  switch (fn) {
    case 'count': {
      let count = 0;
      return {
        update() {
          count++;
        },
        finalize() {
          return count;
        },
      };
    }

    case 'sum': {
      let sum = 0;
      return {
        update(v: unknown) {
          if (typeof v === 'number') sum += v;
        },
        finalize() {
          return sum;
        },
      };
    }

    case 'avg': {
      let sum = 0;
      let count = 0;
      return {
        update(v: unknown) {
          if (typeof v === 'number') {
            sum += v;
            count++;
          }
        },
        finalize() {
          return count > 0 ? sum / count : Number.NaN;
        },
      };
    }

    case 'min': {
      let min = Number.POSITIVE_INFINITY;
      let seen = false;
      return {
        update(v: unknown) {
          if (typeof v === 'number') {
            seen = true;
            if (v < min) min = v;
          }
        },
        finalize() {
          return seen ? min : Number.NaN;
        },
      };
    }

    case 'max': {
      let max = Number.NEGATIVE_INFINITY;
      let seen = false;
      return {
        update(v: unknown) {
          if (typeof v === 'number') {
            seen = true;
            if (v > max) max = v;
          }
        },
        finalize() {
          return seen ? max : Number.NaN;
        },
      };
    }

    default: {
      const _exhaustiveCheck: never = fn;
      throw new Error(`Unhandled aggregate function: ${String(_exhaustiveCheck)}`);
    }
  }
}

function aggregateGetter<T>(spec: AggregateSpec<T>): (row: T) => unknown {
  if (spec.value) {
    return spec.value;
  }
  const column = spec.column;
  if (column !== undefined) {
    return (row: T) => row[column];
  }
  return () => undefined;
}

/**
 * Compute several aggregates over a non-empty bucket in a single pass.
 * Results come back in the order of `specs`.
 *
 * @throws InvariantError if `rows` is empty
 *
 * @example
 * ```typescript
 * const [count, avgSalary, minAge] = computeAggregates(bucket, [
 *   { function: 'count', alias: 'count' },
 *   { function: 'avg', column: 'salary', alias: 'averageSalary' },
 *   { function: 'min', column: 'age', alias: 'minAge' },
 * ]);
 * ```
 */
export function computeAggregates<T>(
  rows: readonly T[],
  specs: readonly AggregateSpec<T>[]
): number[] {
  if (rows.length === 0) {
    throw InvariantError.emptyBucket(specs.map(s => s.alias).join(', ') || 'aggregate');
  }

  const aggregators = specs.map(spec => createAggregator(spec.function));
  const getters = specs.map(spec => aggregateGetter(spec));

  for (const row of rows) {
    for (let i = 0; i < aggregators.length; i++) {
      aggregators[i].update(getters[i](row));
    }
  }

  return aggregators.map(agg => agg.finalize());
}

/**
 * Count, sum, average, minimum and maximum of `value` over a non-empty
 * bucket, in one pass.
 *
 * @throws InvariantError if `rows` is empty
 */
export function summarize<T>(rows: readonly T[], value: (row: T) => number): NumericSummary {
  if (rows.length === 0) {
    throw InvariantError.emptyBucket('summarize');
  }

  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;

  for (const row of rows) {
    const v = value(row);
    sum += v;
    if (v < min) min = v;
    if (v > max) max = v;
  }

  return {
    count: rows.length,
    sum,
    avg: sum / rows.length,
    min,
    max,
  };
}
