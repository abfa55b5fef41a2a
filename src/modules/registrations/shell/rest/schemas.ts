/**
 * Registrations Module REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

import {
  DimensionFieldSchema,
  FilterSpecSchema,
  GroupByFieldSchema,
  VehicleCategorySchema,
} from '../../core/types.js';

export const MAX_TOP_PERFORMERS_LIMIT = 100;

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const FilteredBodySchema = Type.Object(
  {
    filter: Type.Optional(FilterSpecSchema),
  },
  { additionalProperties: false }
);

export type FilteredBody = Static<typeof FilteredBodySchema>;

export const AggregateBodySchema = Type.Object(
  {
    filter: Type.Optional(FilterSpecSchema),
    groupBy: Type.Array(GroupByFieldSchema, {
      description: 'Fields kept on each point; all others are summed over',
    }),
  },
  { additionalProperties: false }
);

export type AggregateBody = Static<typeof AggregateBodySchema>;

export const GrowthBodySchema = Type.Object(
  {
    filter: Type.Optional(FilterSpecSchema),
    groupBy: Type.Optional(
      Type.Array(DimensionFieldSchema, {
        description: 'Dimensions kept besides the period. Defaults to category and manufacturer.',
      })
    ),
  },
  { additionalProperties: false }
);

export type GrowthBody = Static<typeof GrowthBodySchema>;

export const TopPerformersBodySchema = Type.Object(
  {
    filter: Type.Optional(FilterSpecSchema),
    by: Type.Optional(
      Type.Union([Type.Literal('manufacturer'), Type.Literal('category'), Type.Literal('state')])
    ),
    granularity: Type.Optional(
      Type.Union([Type.Literal('month'), Type.Literal('quarter'), Type.Literal('year')])
    ),
    limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_TOP_PERFORMERS_LIMIT })),
  },
  { additionalProperties: false }
);

export type TopPerformersBody = Static<typeof TopPerformersBodySchema>;

export const ExportBodySchema = Type.Object(
  {
    filter: Type.Optional(FilterSpecSchema),
    series: Type.Union([
      Type.Literal('aggregate'),
      Type.Literal('yoy'),
      Type.Literal('qoq'),
      Type.Literal('market-share'),
    ]),
    groupBy: Type.Optional(Type.Array(DimensionFieldSchema)),
  },
  { additionalProperties: false }
);

export type ExportBody = Static<typeof ExportBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A derived value; `value` is null when it cannot be computed.
 */
export const MetricSchema = Type.Object({
  value: Type.Union([Type.Number(), Type.Null()]),
  reason: Type.Optional(
    Type.Union([
      Type.Literal('missing_baseline'),
      Type.Literal('zero_baseline'),
      Type.Literal('insufficient_data'),
    ])
  ),
});

export type MetricDto = Static<typeof MetricSchema>;

const DimensionProperties = {
  category: Type.Optional(VehicleCategorySchema),
  manufacturer: Type.Optional(Type.String()),
  state: Type.Optional(Type.String()),
};

export const AggregatedPointSchema = Type.Object({
  period: Type.Optional(Type.String()),
  ...DimensionProperties,
  total: Type.Integer(),
});

export const GrowthPointSchema = Type.Object({
  period: Type.String(),
  ...DimensionProperties,
  total: Type.Integer(),
  baselineTotal: Type.Union([Type.Integer(), Type.Null()]),
  growth: MetricSchema,
});

export type GrowthPointDto = Static<typeof GrowthPointSchema>;

export const MarketSharePointSchema = Type.Object({
  period: Type.String(),
  category: VehicleCategorySchema,
  manufacturer: Type.String(),
  total: Type.Integer(),
  categoryTotal: Type.Integer(),
  share: MetricSchema,
});

export type MarketSharePointDto = Static<typeof MarketSharePointSchema>;

const PeriodRangeSchema = Type.Object({
  from: Type.String(),
  to: Type.String(),
});

export const SummarySchema = Type.Object({
  totalRecords: Type.Integer(),
  totalRegistrations: Type.Integer(),
  uniqueManufacturers: Type.Integer(),
  uniqueStates: Type.Integer(),
  dateRange: Type.Union([PeriodRangeSchema, Type.Null()]),
  averageMonthlyRegistrations: MetricSchema,
  latestMonthRegistrations: Type.Union([Type.Integer(), Type.Null()]),
  byCategory: Type.Array(
    Type.Object({
      category: VehicleCategorySchema,
      total: Type.Integer(),
      average: Type.Number(),
      records: Type.Integer(),
    })
  ),
  byState: Type.Array(Type.Object({ state: Type.String(), total: Type.Integer() })),
});

export type SummaryDto = Static<typeof SummarySchema>;

export const DimensionsSchema = Type.Object({
  categories: Type.Array(VehicleCategorySchema),
  manufacturers: Type.Array(
    Type.Object({
      category: VehicleCategorySchema,
      name: Type.String({ description: 'Display name of the category' }),
      manufacturers: Type.Array(Type.String()),
    })
  ),
  states: Type.Array(Type.String()),
  periodRange: Type.Union([PeriodRangeSchema, Type.Null()]),
});

export type DimensionsDto = Static<typeof DimensionsSchema>;

export const TopPerformersSchema = Type.Object({
  period: Type.Union([Type.String(), Type.Null()]),
  entries: Type.Array(
    Type.Object({
      rank: Type.Integer(),
      ...DimensionProperties,
      total: Type.Integer(),
    })
  ),
});

export type TopPerformersDto = Static<typeof TopPerformersSchema>;

export const TrendSchema = Type.Object({
  monthly: Type.Array(Type.Object({ period: Type.String(), total: Type.Integer() })),
  totalRegistrations: Type.Integer(),
  averageMonthlyRegistrations: MetricSchema,
  overallGrowth: MetricSchema,
  volatility: MetricSchema,
});

export type TrendDto = Static<typeof TrendSchema>;

/**
 * Wraps a data schema in the success envelope.
 */
export const okResponse = <T extends TSchema>(data: T) =>
  Type.Object({
    ok: Type.Literal(true),
    data,
  });

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
  field: Type.Optional(Type.String({ description: 'Offending input field' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
