import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';
import { growthMetric } from './metric.js';
import { compareSeriesPoints, dimensionKey, pickDimensions } from './ordering.js';
import {
  formatPeriod,
  formatQuarter,
  parsePeriod,
  periodFromIndex,
  periodIndex,
  quarterFromIndex,
  quarterIndex,
  toQuarter,
  type Period,
} from './period.js';

import type { AggregatedPoint, Dimensions, GrowthPoint } from './types.js';

/**
 * How a comparison maps months onto buckets and which bucket is the baseline.
 */
interface GrowthComparison {
  /** Bucket index of a month (month index for YoY, quarter index for QoQ) */
  bucketOf(period: Period): number;
  /** Distance in buckets between a bucket and its baseline */
  lag: number;
  formatBucket(index: number): string;
}

interface KeyedSeries {
  dims: Dimensions;
  totals: Map<number, number>;
}

/**
 * Indexes a series by (grouping key, bucket), summing points that share both.
 * The grouping key is whatever dimension fields the points carry.
 */
function indexSeries(
  series: readonly AggregatedPoint[],
  comparison: GrowthComparison
): Result<Map<string, KeyedSeries>, InvalidInputError> {
  const index = new Map<string, KeyedSeries>();

  for (const [position, point] of series.entries()) {
    const field = `series[${String(position)}].period`;
    if (point.period === undefined) {
      return err(createInvalidInputError(field, 'Growth series points must carry a period'));
    }

    const period = parsePeriod(point.period, field);
    if (period.isErr()) return err(period.error);

    const key = dimensionKey(point);
    let keyed = index.get(key);
    if (keyed === undefined) {
      keyed = { dims: pickDimensions(point), totals: new Map() };
      index.set(key, keyed);
    }

    const bucket = comparison.bucketOf(period.value);
    keyed.totals.set(bucket, (keyed.totals.get(bucket) ?? 0) + point.total);
  }

  return ok(index);
}

function computeGrowth(
  series: readonly AggregatedPoint[],
  comparison: GrowthComparison
): Result<GrowthPoint[], InvalidInputError> {
  const indexed = indexSeries(series, comparison);
  if (indexed.isErr()) return err(indexed.error);

  const result: GrowthPoint[] = [];

  for (const { dims, totals } of indexed.value.values()) {
    for (const [bucket, total] of totals) {
      const baselineTotal = totals.get(bucket - comparison.lag);
      result.push({
        period: comparison.formatBucket(bucket),
        ...dims,
        total,
        ...(baselineTotal !== undefined && { baselineTotal }),
        growth: growthMetric(total, baselineTotal),
      });
    }
  }

  return ok(result.sort(compareSeriesPoints));
}

const YEAR_OVER_YEAR: GrowthComparison = {
  bucketOf: periodIndex,
  lag: 12,
  formatBucket: (index) => formatPeriod(periodFromIndex(index)),
};

const QUARTER_OVER_QUARTER: GrowthComparison = {
  bucketOf: (period) => quarterIndex(toQuarter(period)),
  lag: 1,
  formatBucket: (index) => formatQuarter(quarterFromIndex(index)),
};

/**
 * Year-over-year growth per grouping key.
 *
 * Each month is compared with the same month one year earlier. A missing or
 * zero baseline yields a `not_computable` growth; the period stays in the output.
 */
export function yearOverYear(
  series: readonly AggregatedPoint[]
): Result<GrowthPoint[], InvalidInputError> {
  return computeGrowth(series, YEAR_OVER_YEAR);
}

/**
 * Quarter-over-quarter growth per grouping key.
 *
 * Monthly totals are summed into calendar quarters first; each quarter is then
 * compared with the preceding one (Q1 follows Q4 of the previous year).
 */
export function quarterOverQuarter(
  series: readonly AggregatedPoint[]
): Result<GrowthPoint[], InvalidInputError> {
  return computeGrowth(series, QUARTER_OVER_QUARTER);
}
