/**
 * @cohort/core - Property-Based Tests with fast-check
 *
 * Properties of the engine primitives:
 *
 * 1. Filter keeps exactly the matching rows, in order
 * 2. Group-by partitions its input
 * 3. Sort is an ordered, stable permutation
 * 4. Aggregates agree with each other
 * 5. The age group is a pure, idempotent function of age
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ageGroup, ageGroupOf, createPerson } from '../person.js';
import {
  computeAggregates,
  filterRows,
  groupBy,
  limitRows,
  sortRows,
  summarize,
} from '../query-ops.js';

interface Row {
  index: number;
  dept: string;
  score: number;
}

const rowsArbitrary: fc.Arbitrary<Row[]> = fc
  .array(
    fc.record({
      dept: fc.constantFrom('Engineering', 'Sales', 'HR'),
      score: fc.integer({ min: -1000, max: 1000 }),
    }),
    { maxLength: 60 }
  )
  .map(rows => rows.map((row, index) => ({ index, ...row })));

const nonEmptyRowsArbitrary = rowsArbitrary.filter(rows => rows.length > 0);

// =============================================================================
// 1. FILTER
// =============================================================================

describe('Property: Filter', () => {
  it('should keep exactly the matching rows in input order', () => {
    fc.assert(
      fc.property(rowsArbitrary, fc.integer({ min: -1000, max: 1000 }), (rows, threshold) => {
        const kept = filterRows(rows, r => r.score > threshold);

        expect(kept).toEqual(rows.filter(r => r.score > threshold));
        for (let i = 1; i < kept.length; i++) {
          expect(kept[i].index).toBeGreaterThan(kept[i - 1].index);
        }
      })
    );
  });
});

// =============================================================================
// 2. GROUP-BY
// =============================================================================

describe('Property: Group-By', () => {
  it('should partition the input without losing or duplicating rows', () => {
    fc.assert(
      fc.property(rowsArbitrary, rows => {
        const groups = groupBy(rows, r => r.dept);
        const members = [...groups.values()].flat();

        expect(members).toHaveLength(rows.length);
        expect(new Set(members.map(r => r.index)).size).toBe(rows.length);

        for (const [dept, bucket] of groups) {
          expect(bucket.length).toBeGreaterThan(0);
          expect(bucket.every(r => r.dept === dept)).toBe(true);
          for (let i = 1; i < bucket.length; i++) {
            expect(bucket[i].index).toBeGreaterThan(bucket[i - 1].index);
          }
        }
      })
    );
  });
});

// =============================================================================
// 3. SORT
// =============================================================================

describe('Property: Sort', () => {
  it('should return an ordered, stable permutation', () => {
    fc.assert(
      fc.property(rowsArbitrary, rows => {
        const sorted = sortRows(rows, [
          { column: 'dept', direction: 'asc' },
          { column: 'score', direction: 'desc' },
        ]);

        expect([...sorted].sort((a, b) => a.index - b.index)).toEqual(rows);

        for (let i = 1; i < sorted.length; i++) {
          const prev = sorted[i - 1];
          const curr = sorted[i];
          if (prev.dept === curr.dept) {
            expect(prev.score).toBeGreaterThanOrEqual(curr.score);
            if (prev.score === curr.score) {
              expect(prev.index).toBeLessThan(curr.index);
            }
          } else {
            expect(prev.dept < curr.dept).toBe(true);
          }
        }
      })
    );
  });

  it('should never return more than the limit', () => {
    fc.assert(
      fc.property(rowsArbitrary, fc.nat({ max: 80 }), (rows, limit) => {
        const limited = limitRows(rows, limit);
        expect(limited.length).toBe(Math.min(limit, rows.length));
        expect(limited).toEqual(rows.slice(0, limit));
      })
    );
  });
});

// =============================================================================
// 4. AGGREGATES
// =============================================================================

describe('Property: Aggregates', () => {
  it('should satisfy min <= avg <= max and avg = sum / count', () => {
    fc.assert(
      fc.property(nonEmptyRowsArbitrary, rows => {
        const summary = summarize(rows, r => r.score);

        expect(summary.count).toBe(rows.length);
        expect(summary.min).toBeLessThanOrEqual(summary.avg);
        expect(summary.avg).toBeLessThanOrEqual(summary.max);
        expect(summary.avg).toBe(summary.sum / summary.count);
      })
    );
  });

  it('should agree with summarize', () => {
    fc.assert(
      fc.property(nonEmptyRowsArbitrary, rows => {
        const summary = summarize(rows, r => r.score);
        const [count, sum, avg, min, max] = computeAggregates(rows, [
          { function: 'count', alias: 'count' },
          { function: 'sum', column: 'score', alias: 'sum' },
          { function: 'avg', column: 'score', alias: 'avg' },
          { function: 'min', column: 'score', alias: 'min' },
          { function: 'max', column: 'score', alias: 'max' },
        ]);

        expect({ count, sum, avg, min, max }).toEqual(summary);
      })
    );
  });
});

// =============================================================================
// 5. DERIVED FIELD
// =============================================================================

describe('Property: Age Group', () => {
  it('should be idempotent and equal the pure bucket of the age', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 120 }), age => {
        const person = createPerson({
          id: 1,
          name: 'Test1',
          age,
          department: 'HR',
          salary: 50_000,
          hireDate: new Date(0),
        });

        const first = ageGroup(person);
        const second = ageGroup(person);

        expect(first).toBe(ageGroupOf(age));
        expect(second).toBe(first);
        expect(first % 10).toBe(0);
        expect(age - first).toBeGreaterThanOrEqual(0);
        expect(age - first).toBeLessThan(10);
      })
    );
  });
});
