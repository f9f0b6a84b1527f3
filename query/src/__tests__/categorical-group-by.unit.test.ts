/**
 * @cohort/query - Categorical Group-By Tests
 */

import { describe, it, expect } from 'vitest';
import { MS_PER_DAY, isAgeGroupCached } from '@cohort/core';
import { runCategoricalGroupBy } from '../categorical-group-by.js';
import { NOW, daysBefore, dataset, repeat } from './fixtures/people.js';

function mixedDataset() {
  return dataset([
    ...repeat(6, i => ({
      department: 'Sales',
      age: 41 + i,
      salary: 50_000,
      hireDate: daysBefore(10 * (i + 1)),
    })),
    ...repeat(6, i => ({
      department: 'Engineering',
      age: 30 + i,
      salary: 60_000 + i * 1000,
      hireDate: daysBefore(100),
    })),
    ...repeat(5, () => ({ department: 'Engineering', age: 25, salary: 90_000 })),
    ...repeat(6, () => ({
      department: 'Engineering',
      age: 55,
      salary: 70_000,
      hireDate: new Date(NOW.getTime() - 365.5 * MS_PER_DAY),
    })),
  ]);
}

describe('runCategoricalGroupBy', () => {
  it('should return an empty result for an empty dataset', () => {
    expect(runCategoricalGroupBy(dataset([]), { now: NOW })).toEqual([]);
  });

  it('should aggregate each (department, age group) with more than five people', () => {
    expect(runCategoricalGroupBy(mixedDataset(), { now: NOW })).toEqual([
      {
        department: 'Engineering',
        ageGroup: 30,
        count: 6,
        totalSalary: 375_000,
        averageSalary: 62_500,
        averageTenureDays: 100,
      },
      {
        department: 'Engineering',
        ageGroup: 50,
        count: 6,
        totalSalary: 420_000,
        averageSalary: 70_000,
        averageTenureDays: 365,
      },
      {
        department: 'Sales',
        ageGroup: 40,
        count: 6,
        totalSalary: 300_000,
        averageSalary: 50_000,
        averageTenureDays: 35,
      },
    ]);
  });

  it('should fill the age group cache on the first run', () => {
    const people = mixedDataset();
    expect(people.some(isAgeGroupCached)).toBe(false);

    runCategoricalGroupBy(people, { now: NOW });

    expect(people.every(isAgeGroupCached)).toBe(true);
  });

  it('should give identical results with a cold and a warm cache', () => {
    const people = mixedDataset();

    const cold = runCategoricalGroupBy(people, { now: NOW });
    const warm = runCategoricalGroupBy(people, { now: NOW });

    expect(warm).toEqual(cold);
  });
});
