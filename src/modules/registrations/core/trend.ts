import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { filterRecords } from './aggregate.js';
import { computed, growthMetric, notComputable } from './metric.js';
import { formatPeriod, periodFromIndex } from './period.js';
import { monthlyTotals } from './summary.js';

import type { InvalidInputError } from './errors.js';
import type { FilterSpec, Metric, RegistrationRecord } from './types.js';

export interface MonthlyTotal {
  period: string;
  total: number;
}

export interface TrendAnalysis {
  monthly: MonthlyTotal[];
  totalRegistrations: number;
  averageMonthlyRegistrations: Metric;
  /** Last month against first month */
  overallGrowth: Metric;
  /** Sample standard deviation of the monthly totals */
  volatility: Metric;
}

/**
 * Sample standard deviation (n - 1 denominator).
 */
function sampleStandardDeviation(values: readonly number[]): Decimal {
  const mean = Decimal.sum(...values).div(values.length);
  const squared = values.map((value) => new Decimal(value).minus(mean).pow(2));
  return Decimal.sum(...squared)
    .div(values.length - 1)
    .sqrt();
}

/**
 * Monthly trend of the filtered records with summary statistics.
 *
 * Months without records are not filled in; statistics are over the months
 * present.
 */
export function analyzeTrend(
  records: readonly RegistrationRecord[],
  filter: FilterSpec = {}
): Result<TrendAnalysis, InvalidInputError> {
  const matchedResult = filterRecords(records, filter);
  if (matchedResult.isErr()) return err(matchedResult.error);

  const monthly = [...monthlyTotals(matchedResult.value).entries()]
    .sort(([a], [b]) => a - b)
    .map(([index, total]) => ({ period: formatPeriod(periodFromIndex(index)), total }));

  const totals = monthly.map((month) => month.total);
  const totalRegistrations = totals.reduce((sum, total) => sum + total, 0);
  const first = monthly.at(0);
  const last = monthly.at(-1);

  return ok({
    monthly,
    totalRegistrations,
    averageMonthlyRegistrations:
      totals.length === 0
        ? notComputable('insufficient_data')
        : computed(new Decimal(totalRegistrations).div(totals.length).toNumber()),
    overallGrowth:
      first === undefined || last === undefined
        ? notComputable('insufficient_data')
        : growthMetric(last.total, first.total),
    volatility:
      totals.length < 2
        ? notComputable('insufficient_data')
        : computed(sampleStandardDeviation(totals).toNumber()),
  });
}
