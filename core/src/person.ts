/**
 * @cohort/core - Record Model
 *
 * The Person entity, the dataset that owns a sequence of them, and the
 * memoized `ageGroup` derived field.
 *
 * Entities are frozen at construction. The derived field lives in a side
 * table keyed by entity rather than on the entity itself, so caching never
 * mutates a record. The side table is write-once per entity and every write
 * stores the same pure function of `age`, so repeated or racing writes are
 * harmless.
 */

/**
 * One immutable record of the dataset.
 */
export interface Person {
  /** Unique, sequential identity assigned at generation */
  readonly id: number;
  /** Display name (not unique) */
  readonly name: string;
  readonly age: number;
  /** Categorical label from a small closed set */
  readonly department: string;
  readonly salary: number;
  readonly hireDate: Date;
}

/**
 * The read-only, ordered sequence every query runs against.
 */
export type Dataset = readonly Person[];

export interface CreateDatasetOptions {
  /**
   * Fill the `ageGroup` side table while building the dataset instead of
   * on first access.
   */
  precomputeDerived?: boolean;
}

/** Milliseconds in one day */
export const MS_PER_DAY = 86_400_000;

const ageGroupCache = new WeakMap<Person, number>();

/**
 * Pure age-group bucket: `floor(age / 10) * 10`.
 */
export function ageGroupOf(age: number): number {
  return Math.floor(age / 10) * 10;
}

/**
 * Memoized age group of a person. The first call computes and stores the
 * value; later calls are a single lookup.
 */
export function ageGroup(person: Person): number {
  const cached = ageGroupCache.get(person);
  if (cached !== undefined) {
    return cached;
  }
  const value = ageGroupOf(person.age);
  ageGroupCache.set(person, value);
  return value;
}

/**
 * Whether the age group of `person` has already been computed.
 */
export function isAgeGroupCached(person: Person): boolean {
  return ageGroupCache.has(person);
}

/**
 * Create a frozen Person. `hireDate` is copied so later changes to the
 * caller's Date cannot leak into the record.
 */
export function createPerson(fields: Person): Person {
  return Object.freeze({
    id: fields.id,
    name: fields.name,
    age: fields.age,
    department: fields.department,
    salary: fields.salary,
    hireDate: new Date(fields.hireDate.getTime()),
  });
}

/**
 * Build a dataset from plain records.
 *
 * @example
 * ```typescript
 * const people = createDataset(rows, { precomputeDerived: true });
 * runCategoricalGroupBy(people);
 * ```
 */
export function createDataset(
  records: Iterable<Person>,
  options: CreateDatasetOptions = {}
): Dataset {
  const people: Person[] = [];
  for (const record of records) {
    const person = createPerson(record);
    if (options.precomputeDerived) {
      ageGroup(person);
    }
    people.push(person);
  }
  return Object.freeze(people);
}

/**
 * Whole days between `hireDate` and `now`, truncated toward zero.
 */
export function tenureDays(person: Person, now: Date): number {
  return Math.trunc((now.getTime() - person.hireDate.getTime()) / MS_PER_DAY);
}
