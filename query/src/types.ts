/**
 * @cohort/query - Type Definitions
 *
 * Result shapes of the query operations and the harness-facing operation
 * contract.
 */

import type { Dataset, Person } from '@cohort/core';

// =============================================================================
// Options
// =============================================================================

/**
 * Options shared by every query operation.
 */
export interface QueryOptions {
  /**
   * Evaluation time for tenure and date windows. Defaults to the time of
   * the call; pass a fixed Date for reproducible results.
   */
  now?: Date;
}

// =============================================================================
// Results
// =============================================================================

/**
 * Per-department aggregate of the Complex Chain operation.
 */
export interface DepartmentStats {
  department: string;
  count: number;
  averageSalary: number;
  maxSalary: number;
  minAge: number;
}

/**
 * Per-(department, age group) aggregate of the Categorical Group-By operation.
 */
export interface AgeGroupStats {
  department: string;
  ageGroup: number;
  count: number;
  totalSalary: number;
  averageSalary: number;
  /** Mean whole-day tenure at evaluation time */
  averageTenureDays: number;
}

/**
 * Per-department result of the Manual Partition operation.
 */
export interface DepartmentAnalysis {
  department: string;
  /** Indices of the department's members in the dataset, in dataset order */
  memberIndices: number[];
  /** Members with a salary above the high-earner threshold */
  highEarners: number;
  totalAge: number;
  /** Reported only for departments larger than the reporting threshold */
  averageAge: number | null;
}

/**
 * Row of the string projection report.
 */
export interface PersonProjection {
  id: number;
  upperName: string;
  nameLength: number;
  /** Salary as US-dollar currency text, e.g. "$60,000.00" */
  formattedSalary: string;
  isManager: boolean;
}

export type SalaryBracket = 'Entry Level' | 'Junior' | 'Mid Level' | 'Senior' | 'Executive';

/**
 * Row of the young professional report.
 */
export interface YoungProfessional {
  id: number;
  name: string;
  age: number;
  salaryBracket: SalaryBracket;
  /** Tenure in days divided by 365.25 */
  yearsOfService: number;
}

// =============================================================================
// Operation contract
// =============================================================================

/**
 * Result union of the benchmarked operations.
 */
export type QueryResult =
  | DepartmentStats[]
  | AgeGroupStats[]
  | string[]
  | DepartmentAnalysis[]
  | readonly Person[];

/**
 * Identifier of a benchmarked operation.
 */
export type OperationId =
  | 'complex-chain'
  | 'categorical-group-by'
  | 'text-transform'
  | 'manual-partition'
  | 'bounded-projection';

/**
 * A named query shape the benchmark harness can run repeatedly. `run` must
 * be a pure function of the dataset (and `options.now`).
 */
export interface QueryOperation<R extends QueryResult = QueryResult> {
  id: OperationId;
  /** Label used in benchmark reports */
  name: string;
  description: string;
  run(dataset: Dataset, options?: QueryOptions): R;
}
