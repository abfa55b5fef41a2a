import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { filterRecords, type MatchedRecord } from './aggregate.js';
import { computed, notComputable } from './metric.js';
import { compareText } from './ordering.js';
import { formatPeriod, periodFromIndex } from './period.js';

import type { InvalidInputError } from './errors.js';
import {
  VEHICLE_CATEGORY_NAMES,
  type FilterSpec,
  type Metric,
  type RegistrationRecord,
  type VehicleCategory,
} from './types.js';

export interface PeriodRange {
  from: string;
  to: string;
}

export interface CategorySummary {
  category: VehicleCategory;
  total: number;
  /** Mean registrations per record */
  average: number;
  records: number;
}

export interface StateSummary {
  state: string;
  total: number;
}

/** Number of states kept in the summary's state ranking */
export const SUMMARY_TOP_STATES = 10;

export interface RegistrationSummary {
  totalRecords: number;
  totalRegistrations: number;
  /** Distinct (category, manufacturer) pairs */
  uniqueManufacturers: number;
  uniqueStates: number;
  dateRange?: PeriodRange;
  averageMonthlyRegistrations: Metric;
  latestMonthRegistrations?: number;
  byCategory: CategorySummary[];
  /** States by total over the whole filtered range, largest first */
  byState: StateSummary[];
}

export interface RegistrationDimensions {
  categories: VehicleCategory[];
  manufacturers: { category: VehicleCategory; name: string; manufacturers: string[] }[];
  states: string[];
  periodRange?: PeriodRange;
}

/**
 * Sums counts per month. Keys are period indexes.
 */
export function monthlyTotals(matched: readonly MatchedRecord[]): Map<number, number> {
  const totals = new Map<number, number>();
  for (const { record, index } of matched) {
    totals.set(index, (totals.get(index) ?? 0) + record.count);
  }
  return totals;
}

function periodRangeOf(indexes: Iterable<number>): PeriodRange | undefined {
  let min: number | undefined;
  let max: number | undefined;
  for (const index of indexes) {
    if (min === undefined || index < min) min = index;
    if (max === undefined || index > max) max = index;
  }
  if (min === undefined || max === undefined) return undefined;
  return { from: formatPeriod(periodFromIndex(min)), to: formatPeriod(periodFromIndex(max)) };
}

const sortedText = (values: Iterable<string>): string[] => [...values].sort(compareText);

/**
 * Headline figures for the filtered dataset: totals, distinct counts,
 * covered months, a per-category breakdown and the top states.
 */
export function summarizeRegistrations(
  records: readonly RegistrationRecord[],
  filter: FilterSpec = {}
): Result<RegistrationSummary, InvalidInputError> {
  const matchedResult = filterRecords(records, filter);
  if (matchedResult.isErr()) return err(matchedResult.error);
  const matched = matchedResult.value;

  let totalRegistrations = 0;
  const manufacturers = new Set<string>();
  const states = new Map<string, number>();
  const categories = new Map<VehicleCategory, { total: number; records: number }>();

  for (const { record } of matched) {
    totalRegistrations += record.count;
    manufacturers.add(JSON.stringify([record.category, record.manufacturer]));
    states.set(record.state, (states.get(record.state) ?? 0) + record.count);

    const bucket = categories.get(record.category) ?? { total: 0, records: 0 };
    bucket.total += record.count;
    bucket.records += 1;
    categories.set(record.category, bucket);
  }

  const months = monthlyTotals(matched);
  const dateRange = periodRangeOf(months.keys());
  const latestIndex = dateRange === undefined ? undefined : Math.max(...months.keys());
  const latestMonthRegistrations = latestIndex === undefined ? undefined : months.get(latestIndex);

  const averageMonthlyRegistrations =
    months.size === 0
      ? notComputable('insufficient_data')
      : computed(new Decimal(totalRegistrations).div(months.size).toNumber());

  const byCategory = [...categories.entries()]
    .sort(([a], [b]) => compareText(a, b))
    .map(([category, bucket]) => ({
      category,
      total: bucket.total,
      average: new Decimal(bucket.total).div(bucket.records).toNumber(),
      records: bucket.records,
    }));

  const byState = [...states.entries()]
    .sort(([stateA, totalA], [stateB, totalB]) => totalB - totalA || compareText(stateA, stateB))
    .slice(0, SUMMARY_TOP_STATES)
    .map(([state, total]) => ({ state, total }));

  return ok({
    totalRecords: matched.length,
    totalRegistrations,
    uniqueManufacturers: manufacturers.size,
    uniqueStates: states.size,
    ...(dateRange !== undefined && { dateRange }),
    averageMonthlyRegistrations,
    ...(latestMonthRegistrations !== undefined && { latestMonthRegistrations }),
    byCategory,
    byState,
  });
}

/**
 * Distinct values available for filtering, each sorted.
 */
export function listDimensions(
  records: readonly RegistrationRecord[]
): Result<RegistrationDimensions, InvalidInputError> {
  const matchedResult = filterRecords(records);
  if (matchedResult.isErr()) return err(matchedResult.error);

  const byCategory = new Map<VehicleCategory, Set<string>>();
  const states = new Set<string>();
  const indexes = new Set<number>();

  for (const { record, index } of matchedResult.value) {
    const manufacturers = byCategory.get(record.category) ?? new Set<string>();
    manufacturers.add(record.manufacturer);
    byCategory.set(record.category, manufacturers);
    states.add(record.state);
    indexes.add(index);
  }

  const categories = [...byCategory.keys()].sort(compareText);
  const periodRange = periodRangeOf(indexes);

  return ok({
    categories,
    manufacturers: categories.map((category) => ({
      category,
      name: VEHICLE_CATEGORY_NAMES[category],
      manufacturers: sortedText(byCategory.get(category) ?? []),
    })),
    states: sortedText(states),
    ...(periodRange !== undefined && { periodRange }),
  });
}
