import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';
import { shareMetric } from './metric.js';
import { compareSeriesPoints } from './ordering.js';
import { formatPeriod, parsePeriod } from './period.js';

import type { AggregatedPoint, MarketSharePoint, VehicleCategory } from './types.js';

/** One (period, category) slice and its manufacturer totals */
interface Slice {
  period: string;
  category: VehicleCategory;
  manufacturers: Map<string, number>;
}

/**
 * Share of each manufacturer within its category, per period.
 *
 * Points are expected to carry period, category and manufacturer. Any other
 * dimension (state) is summed over, so shares always partition a
 * (period, category) slice and add up to 100. A slice whose total is zero
 * reports every share as `not_computable`.
 */
export function marketShare(
  series: readonly AggregatedPoint[]
): Result<MarketSharePoint[], InvalidInputError> {
  const slices = new Map<string, Slice>();

  for (const [position, point] of series.entries()) {
    const field = `series[${String(position)}]`;
    const { category, manufacturer } = point;

    if (point.period === undefined || category === undefined || manufacturer === undefined) {
      return err(
        createInvalidInputError(
          field,
          'Market share requires points grouped by period, category and manufacturer'
        )
      );
    }

    const period = parsePeriod(point.period, `${field}.period`);
    if (period.isErr()) return err(period.error);

    const label = formatPeriod(period.value);
    const key = `${label}|${category}`;
    let slice = slices.get(key);
    if (slice === undefined) {
      slice = { period: label, category, manufacturers: new Map() };
      slices.set(key, slice);
    }
    slice.manufacturers.set(manufacturer, (slice.manufacturers.get(manufacturer) ?? 0) + point.total);
  }

  const result: MarketSharePoint[] = [];

  for (const slice of slices.values()) {
    let categoryTotal = 0;
    for (const total of slice.manufacturers.values()) {
      categoryTotal += total;
    }

    for (const [manufacturer, total] of slice.manufacturers) {
      result.push({
        period: slice.period,
        category: slice.category,
        manufacturer,
        total,
        categoryTotal,
        share: shareMetric(total, categoryTotal),
      });
    }
  }

  return ok(result.sort(compareSeriesPoints));
}
