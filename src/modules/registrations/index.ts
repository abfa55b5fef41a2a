/**
 * Registrations Module
 *
 * Vehicle registration analytics: filtering, grouped totals, growth,
 * market share and dataset insights over a pluggable record source.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export {
  VEHICLE_CATEGORIES,
  VEHICLE_CATEGORY_NAMES,
  GROUP_BY_FIELDS,
  RegistrationRecordSchema,
  FilterSpecSchema,
  isVehicleCategory,
  isGroupByField,
  type VehicleCategory,
  type GroupByField,
  type DimensionField,
  type RegistrationRecord,
  type FilterSpec,
  type Dimensions,
  type AggregatedPoint,
  type GrowthPoint,
  type MarketSharePoint,
  type Metric,
  type ComputedMetric,
  type NotComputableMetric,
  type NotComputableReason,
} from './core/types.js';

export {
  createInvalidInputError,
  createSourceReadError,
  getHttpStatusForError,
  REGISTRATION_ERROR_HTTP_STATUS,
  type InvalidInputError,
  type SourceReadError,
  type RegistrationAnalyticsError,
} from './core/errors.js';

export {
  parsePeriod,
  formatPeriod,
  formatQuarter,
  toQuarter,
  type Period,
  type Quarter,
} from './core/period.js';

export { computed, notComputable, metricValue } from './core/metric.js';

export type { RegistrationSource } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Engine
// ─────────────────────────────────────────────────────────────────────────────

export { aggregate, filterRecords } from './core/aggregate.js';
export { yearOverYear, quarterOverQuarter } from './core/growth.js';
export { marketShare } from './core/market-share.js';
export {
  summarizeRegistrations,
  listDimensions,
  type RegistrationSummary,
  type RegistrationDimensions,
  type CategorySummary,
  type StateSummary,
  SUMMARY_TOP_STATES,
  type PeriodRange,
} from './core/summary.js';
export {
  topPerformers,
  DEFAULT_TOP_PERFORMERS_LIMIT,
  type TopPerformers,
  type TopPerformer,
  type TopPerformersOptions,
  type PerformerDimension,
  type Granularity,
} from './core/top-performers.js';
export { analyzeTrend, type TrendAnalysis, type MonthlyTotal } from './core/trend.js';
export {
  toCsv,
  aggregateColumns,
  GROWTH_COLUMNS,
  MARKET_SHARE_COLUMNS,
  type CsvColumn,
} from './core/export.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { RegistrationUseCaseDeps } from './core/usecases/run-with-records.js';
export {
  getAggregatedSeries,
  getGrowthSeries,
  getMarketShare,
  DEFAULT_GROWTH_DIMENSIONS,
  type GrowthKind,
} from './core/usecases/get-registration-series.js';
export {
  getSummary,
  getDimensions,
  getTopPerformers,
  getTrend,
} from './core/usecases/get-registration-insights.js';
export {
  exportRegistrationSeries,
  type ExportableSeries,
} from './core/usecases/export-registration-series.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeRegistrationRoutes } from './shell/rest/routes.js';
export { makeInMemoryRegistrationSource } from './shell/source/in-memory-source.js';
export {
  makeFileRegistrationSource,
  makeJsonFileRegistrationSource,
  makeCsvFileRegistrationSource,
  type FileRegistrationSourceOptions,
} from './shell/source/file-sources.js';
