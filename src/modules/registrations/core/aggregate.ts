import { err, ok, type Result } from 'neverthrow';

import { createInvalidInputError, type InvalidInputError } from './errors.js';
import { compareSeriesPoints } from './ordering.js';
import { formatPeriod, parsePeriod, periodIndex, type Period } from './period.js';
import {
  isGroupByField,
  isVehicleCategory,
  type AggregatedPoint,
  type FilterSpec,
  type GroupByField,
  type RegistrationRecord,
  type VehicleCategory,
} from './types.js';

/**
 * A record whose period has been parsed and validated.
 */
export interface MatchedRecord {
  readonly record: RegistrationRecord;
  readonly period: Period;
  /** periodIndex(period), cached for range checks and bucketing */
  readonly index: number;
}

interface ResolvedFilter {
  fromIndex?: number;
  toIndex?: number;
  categories?: ReadonlySet<VehicleCategory>;
  manufacturers?: ReadonlySet<string>;
  states?: ReadonlySet<string>;
}

/** Empty selections mean "all", like an untouched multiselect. */
const toOptionalSet = <T>(values: readonly T[] | undefined): ReadonlySet<T> | undefined =>
  values !== undefined && values.length > 0 ? new Set(values) : undefined;

function resolveFilter(filter: FilterSpec): Result<ResolvedFilter, InvalidInputError> {
  let fromIndex: number | undefined;
  let toIndex: number | undefined;

  if (filter.dateFrom !== undefined) {
    const parsed = parsePeriod(filter.dateFrom, 'filter.dateFrom');
    if (parsed.isErr()) return err(parsed.error);
    fromIndex = periodIndex(parsed.value);
  }

  if (filter.dateTo !== undefined) {
    const parsed = parsePeriod(filter.dateTo, 'filter.dateTo');
    if (parsed.isErr()) return err(parsed.error);
    toIndex = periodIndex(parsed.value);
  }

  if (fromIndex !== undefined && toIndex !== undefined && fromIndex > toIndex) {
    return err(
      createInvalidInputError(
        'filter.dateFrom',
        `Filter bounds are inverted: dateFrom '${String(filter.dateFrom)}' is after dateTo '${String(filter.dateTo)}'`,
        { dateFrom: filter.dateFrom, dateTo: filter.dateTo }
      )
    );
  }

  const categories = toOptionalSet(filter.categories);
  const manufacturers = toOptionalSet(filter.manufacturers);
  const states = toOptionalSet(filter.states);

  return ok({
    ...(fromIndex !== undefined && { fromIndex }),
    ...(toIndex !== undefined && { toIndex }),
    ...(categories !== undefined && { categories }),
    ...(manufacturers !== undefined && { manufacturers }),
    ...(states !== undefined && { states }),
  });
}

function validateRecord(
  record: RegistrationRecord,
  position: number
): Result<MatchedRecord, InvalidInputError> {
  const field = `records[${String(position)}]`;

  const period = parsePeriod(record.period, `${field}.period`);
  if (period.isErr()) return err(period.error);

  if (!isVehicleCategory(record.category)) {
    return err(
      createInvalidInputError(
        `${field}.category`,
        `Unknown vehicle category '${String(record.category)}'`,
        record.category
      )
    );
  }

  if (!Number.isInteger(record.count) || record.count < 0) {
    return err(
      createInvalidInputError(
        `${field}.count`,
        'Registration count must be a non-negative integer',
        record.count
      )
    );
  }

  return ok({ record, period: period.value, index: periodIndex(period.value) });
}

function matches(matched: MatchedRecord, filter: ResolvedFilter): boolean {
  const { record, index } = matched;
  if (filter.fromIndex !== undefined && index < filter.fromIndex) return false;
  if (filter.toIndex !== undefined && index > filter.toIndex) return false;
  if (filter.categories !== undefined && !filter.categories.has(record.category)) return false;
  if (filter.manufacturers !== undefined && !filter.manufacturers.has(record.manufacturer)) {
    return false;
  }
  if (filter.states !== undefined && !filter.states.has(record.state)) return false;
  return true;
}

/**
 * Validates every record and keeps those matching all present filter fields.
 *
 * Every record is validated, including ones the filter would exclude, so a
 * malformed dataset fails regardless of the filter in use.
 */
export function filterRecords(
  records: readonly RegistrationRecord[],
  filter: FilterSpec = {}
): Result<MatchedRecord[], InvalidInputError> {
  const resolved = resolveFilter(filter);
  if (resolved.isErr()) return err(resolved.error);

  const matched: MatchedRecord[] = [];
  for (const [position, record] of records.entries()) {
    const validated = validateRecord(record, position);
    if (validated.isErr()) return err(validated.error);
    if (matches(validated.value, resolved.value)) {
      matched.push(validated.value);
    }
  }

  return ok(matched);
}

function resolveGroupBy(
  groupBy: Iterable<GroupByField>
): Result<ReadonlySet<GroupByField>, InvalidInputError> {
  const fields = new Set<GroupByField>();
  for (const field of groupBy) {
    if (!isGroupByField(field)) {
      return err(createInvalidInputError('groupBy', `Unknown group-by field '${String(field)}'`, field));
    }
    fields.add(field);
  }
  return ok(fields);
}

/**
 * Filters records, groups them by the requested fields and sums their counts.
 *
 * Fields not named in `groupBy` are summed over and absent from the output.
 * Output is ordered by period, then category, manufacturer and state, so
 * identical inputs always produce identically ordered output.
 *
 * @param records - Raw registration records
 * @param filter - Optional constraints, applied before grouping
 * @param groupBy - Fields to keep on each aggregated point
 */
export function aggregate(
  records: readonly RegistrationRecord[],
  filter: FilterSpec,
  groupBy: Iterable<GroupByField>
): Result<AggregatedPoint[], InvalidInputError> {
  const fieldsResult = resolveGroupBy(groupBy);
  if (fieldsResult.isErr()) return err(fieldsResult.error);
  const fields = fieldsResult.value;

  const matchedResult = filterRecords(records, filter);
  if (matchedResult.isErr()) return err(matchedResult.error);

  const groups = new Map<string, AggregatedPoint>();

  for (const { record, period } of matchedResult.value) {
    const point: AggregatedPoint = {
      ...(fields.has('period') && { period: formatPeriod(period) }),
      ...(fields.has('category') && { category: record.category }),
      ...(fields.has('manufacturer') && { manufacturer: record.manufacturer }),
      ...(fields.has('state') && { state: record.state }),
      total: 0,
    };
    const key = JSON.stringify([
      point.period ?? null,
      point.category ?? null,
      point.manufacturer ?? null,
      point.state ?? null,
    ]);

    const existing = groups.get(key);
    if (existing !== undefined) {
      existing.total += record.count;
    } else {
      groups.set(key, { ...point, total: record.count });
    }
  }

  return ok([...groups.values()].sort(compareSeriesPoints));
}
