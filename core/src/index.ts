// @cohort/core
// Record model and filter/sort/group/aggregate engine for in-memory analytics

// =============================================================================
// Record Model
// =============================================================================

export {
  MS_PER_DAY,
  ageGroup,
  ageGroupOf,
  createDataset,
  createPerson,
  isAgeGroupCached,
  tenureDays,
} from './person.js';

export type {
  CreateDatasetOptions,
  Dataset,
  Person,
} from './person.js';

// =============================================================================
// Query Operations
// =============================================================================

export {
  compareCompositeKeys,
  compareForSort,
  compareStrings,
  compareValues,
  compileFilters,
  computeAggregates,
  createComparator,
  distinctValues,
  encodeCompositeKey,
  evaluateFilter,
  filterRows,
  groupBy,
  groupByComposite,
  groupIndices,
  limitRows,
  sortRows,
  summarize,
} from './query-ops.js';

export type {
  AggregateFunction,
  AggregateSpec,
  CompositeGroup,
  FilterOperator,
  FilterPredicate,
  KeyPart,
  NumericColumn,
  NumericSummary,
  SortDirection,
  SortSpec,
} from './query-ops.js';

// =============================================================================
// Errors
// =============================================================================

export {
  CohortError,
  ErrorCode,
  InvariantError,
  QueryError,
  ValidationError,
  invariant,
  wrapError,
} from './errors.js';

export { captureStackTrace } from './stack-trace.js';

// =============================================================================
// Logging
// =============================================================================

export {
  LogLevels,
  createConsoleLogger,
  createLogger,
  createNoopLogger,
  createTestLogger,
  formatLogEntry,
  isLogContextValue,
  withContext,
} from './logging.js';

export type {
  ConsoleLoggerConfig,
  LogContext,
  LogContextValue,
  LogEntry,
  LogLevel,
  Logger,
  LoggerConfig,
  TestLogger,
} from './logging.js';
