/**
 * Domain → wire mapping.
 *
 * Not-computable metrics become `{ value: null, reason }`. Absent optionals
 * become null.
 */

import type {
  DimensionsDto,
  GrowthPointDto,
  MarketSharePointDto,
  MetricDto,
  SummaryDto,
  TopPerformersDto,
  TrendDto,
} from './schemas.js';
import type { RegistrationDimensions, RegistrationSummary } from '../../core/summary.js';
import type { TopPerformers } from '../../core/top-performers.js';
import type { TrendAnalysis } from '../../core/trend.js';
import type { GrowthPoint, MarketSharePoint, Metric } from '../../core/types.js';

export const toMetricDto = (metric: Metric): MetricDto =>
  metric.status === 'computed'
    ? { value: metric.value }
    : { value: null, reason: metric.reason };

export const toGrowthPointDto = (point: GrowthPoint): GrowthPointDto => {
  const { baselineTotal, growth, ...rest } = point;
  return { ...rest, baselineTotal: baselineTotal ?? null, growth: toMetricDto(growth) };
};

export const toMarketSharePointDto = (point: MarketSharePoint): MarketSharePointDto => ({
  ...point,
  share: toMetricDto(point.share),
});

export const toSummaryDto = (summary: RegistrationSummary): SummaryDto => ({
  totalRecords: summary.totalRecords,
  totalRegistrations: summary.totalRegistrations,
  uniqueManufacturers: summary.uniqueManufacturers,
  uniqueStates: summary.uniqueStates,
  dateRange: summary.dateRange ?? null,
  averageMonthlyRegistrations: toMetricDto(summary.averageMonthlyRegistrations),
  latestMonthRegistrations: summary.latestMonthRegistrations ?? null,
  byCategory: summary.byCategory,
  byState: summary.byState,
});

export const toDimensionsDto = (dimensions: RegistrationDimensions): DimensionsDto => ({
  categories: dimensions.categories,
  manufacturers: dimensions.manufacturers,
  states: dimensions.states,
  periodRange: dimensions.periodRange ?? null,
});

export const toTopPerformersDto = (top: TopPerformers): TopPerformersDto => ({
  period: top.period ?? null,
  entries: top.entries,
});

export const toTrendDto = (trend: TrendAnalysis): TrendDto => ({
  monthly: trend.monthly,
  totalRegistrations: trend.totalRegistrations,
  averageMonthlyRegistrations: toMetricDto(trend.averageMonthlyRegistrations),
  overallGrowth: toMetricDto(trend.overallGrowth),
  volatility: toMetricDto(trend.volatility),
});
