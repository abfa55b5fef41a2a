/**
 * Registration Series Use Cases
 *
 * Aggregated totals, growth and market share over the source's records.
 * Each call re-aggregates from raw records so filters always apply before
 * any derived value is computed.
 */

import { err, type Result } from 'neverthrow';

import { aggregate } from '../aggregate.js';
import { quarterOverQuarter, yearOverYear } from '../growth.js';
import { marketShare } from '../market-share.js';
import { runWithRecords, type RegistrationUseCaseDeps } from './run-with-records.js';

import type { RegistrationAnalyticsError } from '../errors.js';
import type {
  AggregatedPoint,
  DimensionField,
  FilterSpec,
  GroupByField,
  GrowthPoint,
  MarketSharePoint,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type GrowthKind = 'yoy' | 'qoq';

/** Growth is tracked per category and manufacturer unless told otherwise */
export const DEFAULT_GROWTH_DIMENSIONS: readonly DimensionField[] = ['category', 'manufacturer'];

export interface GetAggregatedSeriesInput {
  filter?: FilterSpec;
  groupBy: readonly GroupByField[];
}

export interface GetGrowthSeriesInput {
  kind: GrowthKind;
  filter?: FilterSpec;
  /** Dimensions kept besides the period */
  dimensions?: readonly DimensionField[];
}

export interface GetMarketShareInput {
  filter?: FilterSpec;
}

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export const getAggregatedSeries = (
  deps: RegistrationUseCaseDeps,
  input: GetAggregatedSeriesInput
): Promise<Result<AggregatedPoint[], RegistrationAnalyticsError>> =>
  runWithRecords(deps, 'aggregate', (records) =>
    aggregate(records, input.filter ?? {}, input.groupBy)
  );

/**
 * Aggregates by period plus the requested dimensions, then derives
 * year-over-year or quarter-over-quarter growth.
 */
export const getGrowthSeries = (
  deps: RegistrationUseCaseDeps,
  input: GetGrowthSeriesInput
): Promise<Result<GrowthPoint[], RegistrationAnalyticsError>> => {
  const dimensions = input.dimensions ?? DEFAULT_GROWTH_DIMENSIONS;
  const calculate = input.kind === 'yoy' ? yearOverYear : quarterOverQuarter;

  return runWithRecords(deps, `growth.${input.kind}`, (records) => {
    const series = aggregate(records, input.filter ?? {}, ['period', ...dimensions]);
    if (series.isErr()) return err(series.error);
    return calculate(series.value);
  });
};

export const getMarketShare = (
  deps: RegistrationUseCaseDeps,
  input: GetMarketShareInput
): Promise<Result<MarketSharePoint[], RegistrationAnalyticsError>> =>
  runWithRecords(deps, 'market-share', (records) => {
    const series = aggregate(records, input.filter ?? {}, ['period', 'category', 'manufacturer']);
    if (series.isErr()) return err(series.error);
    return marketShare(series.value);
  });
