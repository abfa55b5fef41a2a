import { stringify } from 'csv-stringify/sync';

import { metricValue } from './metric.js';

import type {
  AggregatedPoint,
  GrowthPoint,
  GroupByField,
  MarketSharePoint,
  Metric,
} from './types.js';

export type CsvCell = string | number | undefined;

export interface CsvColumn<T> {
  header: string;
  value: (row: T) => CsvCell;
}

/** Not-computable metrics export as empty cells. */
export const metricCell = (metric: Metric): CsvCell => metricValue(metric);

/**
 * Renders rows as CSV with a header line. Undefined cells are left empty.
 */
export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string {
  const header = columns.map((column) => column.header);
  const body = rows.map((row) =>
    columns.map((column) => {
      const cell = column.value(row);
      return cell === undefined ? '' : String(cell);
    })
  );
  return stringify([header, ...body]);
}

// ─────────────────────────────────────────────────────────────────────────────
// Column Sets
// ─────────────────────────────────────────────────────────────────────────────

const GROUP_BY_COLUMNS: Record<GroupByField, CsvColumn<AggregatedPoint>> = {
  period: { header: 'period', value: (row) => row.period },
  category: { header: 'category', value: (row) => row.category },
  manufacturer: { header: 'manufacturer', value: (row) => row.manufacturer },
  state: { header: 'state', value: (row) => row.state },
};

/**
 * Columns for an aggregated series, in the canonical field order.
 */
export function aggregateColumns(
  groupBy: Iterable<GroupByField>
): CsvColumn<AggregatedPoint>[] {
  const fields = new Set(groupBy);
  const columns = (['period', 'category', 'manufacturer', 'state'] as const)
    .filter((field) => fields.has(field))
    .map((field) => GROUP_BY_COLUMNS[field]);
  return [...columns, { header: 'total', value: (row) => row.total }];
}

export const GROWTH_COLUMNS: readonly CsvColumn<GrowthPoint>[] = [
  { header: 'period', value: (row) => row.period },
  { header: 'category', value: (row) => row.category },
  { header: 'manufacturer', value: (row) => row.manufacturer },
  { header: 'state', value: (row) => row.state },
  { header: 'total', value: (row) => row.total },
  { header: 'baseline_total', value: (row) => row.baselineTotal },
  { header: 'growth_percent', value: (row) => metricCell(row.growth) },
];

export const MARKET_SHARE_COLUMNS: readonly CsvColumn<MarketSharePoint>[] = [
  { header: 'period', value: (row) => row.period },
  { header: 'category', value: (row) => row.category },
  { header: 'manufacturer', value: (row) => row.manufacturer },
  { header: 'total', value: (row) => row.total },
  { header: 'category_total', value: (row) => row.categoryTotal },
  { header: 'share_percent', value: (row) => metricCell(row.share) },
];
