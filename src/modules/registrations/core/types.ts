/**
 * Registrations Module - Domain Types
 *
 * Raw registration records, filters and the derived series produced by the
 * aggregation and growth/share calculations.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Vehicle categories tracked by the registration feed */
export const VEHICLE_CATEGORIES = ['2W', '3W', '4W'] as const;

export type VehicleCategory = (typeof VEHICLE_CATEGORIES)[number];

export const VEHICLE_CATEGORY_NAMES: Record<VehicleCategory, string> = {
  '2W': 'Two Wheeler',
  '3W': 'Three Wheeler',
  '4W': 'Four Wheeler',
};

/** Dimensions a series can be grouped by */
export const GROUP_BY_FIELDS = ['period', 'category', 'manufacturer', 'state'] as const;

export type GroupByField = (typeof GROUP_BY_FIELDS)[number];

/** Grouping dimensions other than time */
export type DimensionField = Exclude<GroupByField, 'period'>;

export const isVehicleCategory = (value: unknown): value is VehicleCategory =>
  typeof value === 'string' && (VEHICLE_CATEGORIES as readonly string[]).includes(value);

export const isGroupByField = (value: unknown): value is GroupByField =>
  typeof value === 'string' && (GROUP_BY_FIELDS as readonly string[]).includes(value);

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** YYYY-MM, optionally followed by a day (YYYY-MM-DD) which is ignored */
export const PERIOD_LABEL_PATTERN = '^\\d{4}-(0[1-9]|1[0-2])(-\\d{2})?$';

export const PeriodLabelSchema = Type.String({
  pattern: PERIOD_LABEL_PATTERN,
  description: 'Calendar month as YYYY-MM',
});

export const VehicleCategorySchema = Type.Union([
  Type.Literal('2W'),
  Type.Literal('3W'),
  Type.Literal('4W'),
]);

export const GroupByFieldSchema = Type.Union([
  Type.Literal('period'),
  Type.Literal('category'),
  Type.Literal('manufacturer'),
  Type.Literal('state'),
]);

export const DimensionFieldSchema = Type.Union([
  Type.Literal('category'),
  Type.Literal('manufacturer'),
  Type.Literal('state'),
]);

export const RegistrationRecordSchema = Type.Object({
  period: PeriodLabelSchema,
  category: VehicleCategorySchema,
  manufacturer: Type.String({ minLength: 1 }),
  state: Type.String({ minLength: 1 }),
  count: Type.Integer({ minimum: 0 }),
});

/**
 * A single registration count for one (period, category, manufacturer, state).
 *
 * Manufacturer identity is scoped per category: "Honda" in 2W and "Honda" in 4W
 * are independent series.
 */
export type RegistrationRecord = Static<typeof RegistrationRecordSchema>;

export const FilterSpecSchema = Type.Object(
  {
    dateFrom: Type.Optional(PeriodLabelSchema),
    dateTo: Type.Optional(PeriodLabelSchema),
    categories: Type.Optional(Type.Array(VehicleCategorySchema)),
    manufacturers: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    states: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  },
  { additionalProperties: false }
);

/**
 * Optional constraints narrowing which records participate.
 * An absent or empty set means "no restriction". Date bounds are inclusive.
 */
export type FilterSpec = Static<typeof FilterSpecSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Derived Series
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dimension values carried by a derived point.
 * Only the dimensions the series was grouped by are present.
 */
export interface Dimensions {
  category?: VehicleCategory;
  manufacturer?: string;
  state?: string;
}

/**
 * Summed registrations for one group.
 * Fields absent from `groupBy` are not present (they were summed over).
 */
export interface AggregatedPoint extends Dimensions {
  period?: string;
  total: number;
}

export type NotComputableReason = 'missing_baseline' | 'zero_baseline' | 'insufficient_data';

export interface ComputedMetric {
  readonly status: 'computed';
  readonly value: number;
}

export interface NotComputableMetric {
  readonly status: 'not_computable';
  readonly reason: NotComputableReason;
}

/**
 * A derived percentage or statistic.
 * `not_computable` is distinct from a computed zero.
 */
export type Metric = ComputedMetric | NotComputableMetric;

export interface GrowthPoint extends Dimensions {
  /** YYYY-MM for year-over-year, YYYY-QN for quarter-over-quarter */
  period: string;
  total: number;
  /** Total of the comparison period, when it exists */
  baselineTotal?: number;
  growth: Metric;
}

export interface MarketSharePoint {
  period: string;
  category: VehicleCategory;
  manufacturer: string;
  total: number;
  categoryTotal: number;
  share: Metric;
}
