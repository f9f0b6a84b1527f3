/**
 * @cohort/benchmark - Person Generator
 *
 * Deterministic synthetic dataset: the same seed and `now` always produce
 * the same records.
 */

import type { DatasetConfig } from '@cohort/config';
import {
  MS_PER_DAY,
  createDataset,
  type CreateDatasetOptions,
  type Dataset,
  type Person,
} from '@cohort/core';
import { SeededRandom, createRandom } from '../utils/random.js';

export interface GeneratePeopleOptions extends CreateDatasetOptions {
  /** Reference time hire dates count back from */
  now: Date;
  /** Generator to draw from (default: seeded from `config.seed`) */
  random?: SeededRandom;
}

/**
 * Lazily yield `config.size` records with ids 1..size.
 *
 * Each record draws, in order: first name, age, department, salary and
 * days since hire.
 */
export function* iteratePeople(
  config: DatasetConfig,
  now: Date,
  random: SeededRandom = createRandom(config.seed)
): Generator<Person> {
  const nowMs = now.getTime();

  for (let id = 1; id <= config.size; id++) {
    const firstName = random.pick(config.firstNames);
    const age = random.int(config.minAge, config.maxAge);
    const department = random.pick(config.departments);
    const salary = random.float(config.minSalary, config.maxSalary);
    const daysAgo = random.int(1, config.maxTenureDays);

    yield {
      id,
      name: `${firstName}${id}`,
      age,
      department,
      salary,
      hireDate: new Date(nowMs - daysAgo * MS_PER_DAY),
    };
  }
}

/**
 * Generate a frozen dataset.
 *
 * @example
 * ```typescript
 * const people = generatePeople(config.dataset, { now: new Date() });
 * ```
 */
export function generatePeople(config: DatasetConfig, options: GeneratePeopleOptions): Dataset {
  return createDataset(iteratePeople(config, options.now, options.random), {
    precomputeDerived: options.precomputeDerived,
  });
}
