import { err, ok, type Result } from 'neverthrow';

import { filterRecords } from './aggregate.js';
import { createInvalidInputError, type InvalidInputError } from './errors.js';
import { compareDimensions } from './ordering.js';
import {
  formatPeriod,
  formatQuarter,
  periodFromIndex,
  quarterFromIndex,
  quarterIndex,
  toQuarter,
  type Period,
} from './period.js';

import type { Dimensions, FilterSpec, RegistrationRecord } from './types.js';

export type PerformerDimension = 'manufacturer' | 'category' | 'state';

export type Granularity = 'month' | 'quarter' | 'year';

export const DEFAULT_TOP_PERFORMERS_LIMIT = 10;

export interface TopPerformersOptions {
  by?: PerformerDimension;
  granularity?: Granularity;
  limit?: number;
}

export interface TopPerformer extends Dimensions {
  rank: number;
  total: number;
}

export interface TopPerformers {
  /** Latest period at the requested granularity; absent when nothing matched */
  period?: string;
  entries: TopPerformer[];
}

const bucketOf = (period: Period, index: number, granularity: Granularity): number => {
  switch (granularity) {
    case 'month':
      return index;
    case 'quarter':
      return quarterIndex(toQuarter(period));
    case 'year':
      return period.year;
  }
};

const formatBucket = (bucket: number, granularity: Granularity): string => {
  switch (granularity) {
    case 'month':
      return formatPeriod(periodFromIndex(bucket));
    case 'quarter':
      return formatQuarter(quarterFromIndex(bucket));
    case 'year':
      return String(bucket);
  }
};

/** Manufacturers stay scoped to their category. */
const dimensionsOf = (record: RegistrationRecord, by: PerformerDimension): Dimensions => {
  switch (by) {
    case 'manufacturer':
      return { category: record.category, manufacturer: record.manufacturer };
    case 'category':
      return { category: record.category };
    case 'state':
      return { state: record.state };
  }
};

/**
 * Ranks manufacturers, categories or states by registrations in the latest
 * period at the requested granularity. Ties are broken by name.
 */
export function topPerformers(
  records: readonly RegistrationRecord[],
  filter: FilterSpec = {},
  options: TopPerformersOptions = {}
): Result<TopPerformers, InvalidInputError> {
  const by = options.by ?? 'manufacturer';
  const granularity = options.granularity ?? 'year';
  const limit = options.limit ?? DEFAULT_TOP_PERFORMERS_LIMIT;

  if (!Number.isInteger(limit) || limit < 1) {
    return err(createInvalidInputError('limit', 'Limit must be a positive integer', limit));
  }

  const matchedResult = filterRecords(records, filter);
  if (matchedResult.isErr()) return err(matchedResult.error);

  const bucketed = matchedResult.value.map((matched) => ({
    record: matched.record,
    bucket: bucketOf(matched.period, matched.index, granularity),
  }));

  if (bucketed.length === 0) {
    return ok({ entries: [] });
  }

  const latest = bucketed.reduce((max, entry) => Math.max(max, entry.bucket), -Infinity);
  const totals = new Map<string, TopPerformer>();

  for (const { record, bucket } of bucketed) {
    if (bucket !== latest) continue;
    const dims = dimensionsOf(record, by);
    const key = JSON.stringify(dims);
    const existing = totals.get(key);
    if (existing !== undefined) {
      existing.total += record.count;
    } else {
      totals.set(key, { ...dims, rank: 0, total: record.count });
    }
  }

  const entries = [...totals.values()]
    .sort((a, b) => b.total - a.total || compareDimensions(a, b))
    .slice(0, limit)
    .map((entry, position) => ({ ...entry, rank: position + 1 }));

  return ok({ period: formatBucket(latest, granularity), entries });
}
