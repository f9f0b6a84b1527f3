/**
 * @cohort/query - Thresholds and limits of the query operations
 */

/** Complex Chain: minimum age (exclusive) */
export const COMPLEX_CHAIN_MIN_AGE = 25;

/** Complex Chain: minimum salary (exclusive) */
export const COMPLEX_CHAIN_MIN_SALARY = 50_000;

/** Complex Chain: departments with this many rows or fewer are dropped */
export const COMPLEX_CHAIN_MIN_GROUP_SIZE = 10;

/** Categorical Group-By: groups with this many rows or fewer are dropped */
export const CATEGORICAL_MIN_GROUP_SIZE = 5;

/** Text Transform: names must be strictly longer than this */
export const TEXT_MIN_NAME_LENGTH = 5;

/** Text Transform: a name must contain at least one of these */
export const TEXT_REQUIRED_CHARACTERS: readonly string[] = ['a', 'e'];

/** Manual Partition: salary (exclusive) above which a member is a high earner */
export const HIGH_EARNER_SALARY = 75_000;

/** Manual Partition: average age is reported only above this size */
export const PARTITION_REPORT_MIN_SIZE = 50;

/** Bounded Projection: hire-date window, five years of 365.25 days, in whole days */
export const PROJECTION_WINDOW_DAYS = Math.trunc(5 * 365.25);

/** Bounded Projection: maximum age (exclusive) */
export const PROJECTION_MAX_AGE = 30;

/** Bounded Projection: minimum salary (exclusive) */
export const PROJECTION_MIN_SALARY = 60_000;

/** Bounded Projection: maximum number of rows returned */
export const PROJECTION_LIMIT = 1000;

/** String projection: salary (exclusive) above which a person counts as a manager */
export const MANAGER_SALARY = 100_000;

/** Days per year used for years-of-service */
export const DAYS_PER_YEAR = 365.25;
