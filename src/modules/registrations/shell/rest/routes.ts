/**
 * Registrations Module REST Routes
 *
 * - GET  /api/v1/registrations/dimensions: Filter picker values
 * - POST /api/v1/registrations/aggregate: Grouped totals
 * - POST /api/v1/registrations/growth/yoy: Year-over-year growth
 * - POST /api/v1/registrations/growth/qoq: Quarter-over-quarter growth
 * - POST /api/v1/registrations/market-share: Manufacturer share per category
 * - POST /api/v1/registrations/summary: Dataset summary
 * - POST /api/v1/registrations/top-performers: Leaderboard for the latest period
 * - POST /api/v1/registrations/trend: Monthly trend statistics
 * - POST /api/v1/registrations/export: Any series as CSV
 */

import { Type } from '@sinclair/typebox';

import {
  toDimensionsDto,
  toGrowthPointDto,
  toMarketSharePointDto,
  toSummaryDto,
  toTopPerformersDto,
  toTrendDto,
} from './dto.js';
import {
  AggregateBodySchema,
  AggregatedPointSchema,
  DimensionsSchema,
  ErrorResponseSchema,
  ExportBodySchema,
  FilteredBodySchema,
  GrowthBodySchema,
  GrowthPointSchema,
  MarketSharePointSchema,
  SummarySchema,
  TopPerformersBodySchema,
  TopPerformersSchema,
  TrendSchema,
  okResponse,
  type AggregateBody,
  type ExportBody,
  type FilteredBody,
  type GrowthBody,
  type TopPerformersBody,
} from './schemas.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { exportRegistrationSeries } from '../../core/usecases/export-registration-series.js';
import {
  getDimensions,
  getSummary,
  getTopPerformers,
  getTrend,
} from '../../core/usecases/get-registration-insights.js';
import {
  getAggregatedSeries,
  getGrowthSeries,
  getMarketShare,
  type GrowthKind,
} from '../../core/usecases/get-registration-series.js';

import type { RegistrationAnalyticsError } from '../../core/errors.js';
import type { RegistrationUseCaseDeps } from '../../core/usecases/run-with-records.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MakeRegistrationRoutesDeps = RegistrationUseCaseDeps;

const PREFIX = '/api/v1/registrations';

const errorResponses = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sends a domain error in the standard error envelope.
 */
function sendError(reply: FastifyReply, error: RegistrationAnalyticsError) {
  const status = getHttpStatusForError(error);
  return reply.status(status).send({
    ok: false,
    error: error.type,
    message: error.message,
    ...(error.type === 'InvalidInputError' && { field: error.field }),
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates registration analytics REST routes.
 */
export const makeRegistrationRoutes = (deps: MakeRegistrationRoutesDeps): FastifyPluginAsync => {
  return async (fastify) => {
    fastify.get(
      `${PREFIX}/dimensions`,
      {
        schema: {
          response: { 200: okResponse(DimensionsSchema), ...errorResponses },
        },
      },
      async (_request, reply) => {
        const result = await getDimensions(deps);
        if (result.isErr()) return sendError(reply, result.error);
        return reply.status(200).send({ ok: true, data: toDimensionsDto(result.value) });
      }
    );

    fastify.post<{ Body: AggregateBody }>(
      `${PREFIX}/aggregate`,
      {
        schema: {
          body: AggregateBodySchema,
          response: { 200: okResponse(Type.Array(AggregatedPointSchema)), ...errorResponses },
        },
      },
      async (request, reply) => {
        const { filter, groupBy } = request.body;
        const result = await getAggregatedSeries(deps, {
          groupBy,
          ...(filter !== undefined && { filter }),
        });
        if (result.isErr()) return sendError(reply, result.error);
        return reply.status(200).send({ ok: true, data: result.value });
      }
    );

    const registerGrowthRoute = (kind: GrowthKind) => {
      fastify.post<{ Body: GrowthBody }>(
        `${PREFIX}/growth/${kind}`,
        {
          schema: {
            body: GrowthBodySchema,
            response: { 200: okResponse(Type.Array(GrowthPointSchema)), ...errorResponses },
          },
        },
        async (request, reply) => {
          const { filter, groupBy } = request.body;
          const result = await getGrowthSeries(deps, {
            kind,
            ...(filter !== undefined && { filter }),
            ...(groupBy !== undefined && { dimensions: groupBy }),
          });
          if (result.isErr()) return sendError(reply, result.error);
          return reply.status(200).send({ ok: true, data: result.value.map(toGrowthPointDto) });
        }
      );
    };

    registerGrowthRoute('yoy');
    registerGrowthRoute('qoq');

    fastify.post<{ Body: FilteredBody }>(
      `${PREFIX}/market-share`,
      {
        schema: {
          body: FilteredBodySchema,
          response: { 200: okResponse(Type.Array(MarketSharePointSchema)), ...errorResponses },
        },
      },
      async (request, reply) => {
        const { filter } = request.body;
        const result = await getMarketShare(deps, { ...(filter !== undefined && { filter }) });
        if (result.isErr()) return sendError(reply, result.error);
        return reply
          .status(200)
          .send({ ok: true, data: result.value.map(toMarketSharePointDto) });
      }
    );

    fastify.post<{ Body: FilteredBody }>(
      `${PREFIX}/summary`,
      {
        schema: {
          body: FilteredBodySchema,
          response: { 200: okResponse(SummarySchema), ...errorResponses },
        },
      },
      async (request, reply) => {
        const { filter } = request.body;
        const result = await getSummary(deps, { ...(filter !== undefined && { filter }) });
        if (result.isErr()) return sendError(reply, result.error);
        return reply.status(200).send({ ok: true, data: toSummaryDto(result.value) });
      }
    );

    fastify.post<{ Body: TopPerformersBody }>(
      `${PREFIX}/top-performers`,
      {
        schema: {
          body: TopPerformersBodySchema,
          response: { 200: okResponse(TopPerformersSchema), ...errorResponses },
        },
      },
      async (request, reply) => {
        const { filter, by, granularity, limit } = request.body;
        const result = await getTopPerformers(deps, {
          ...(filter !== undefined && { filter }),
          options: {
            ...(by !== undefined && { by }),
            ...(granularity !== undefined && { granularity }),
            ...(limit !== undefined && { limit }),
          },
        });
        if (result.isErr()) return sendError(reply, result.error);
        return reply.status(200).send({ ok: true, data: toTopPerformersDto(result.value) });
      }
    );

    fastify.post<{ Body: FilteredBody }>(
      `${PREFIX}/trend`,
      {
        schema: {
          body: FilteredBodySchema,
          response: { 200: okResponse(TrendSchema), ...errorResponses },
        },
      },
      async (request, reply) => {
        const { filter } = request.body;
        const result = await getTrend(deps, { ...(filter !== undefined && { filter }) });
        if (result.isErr()) return sendError(reply, result.error);
        return reply.status(200).send({ ok: true, data: toTrendDto(result.value) });
      }
    );

    fastify.post<{ Body: ExportBody }>(
      `${PREFIX}/export`,
      {
        schema: {
          body: ExportBodySchema,
          response: errorResponses,
        },
      },
      async (request, reply) => {
        const { filter, series, groupBy } = request.body;
        const result = await exportRegistrationSeries(deps, {
          series,
          ...(filter !== undefined && { filter }),
          ...(groupBy !== undefined && { dimensions: groupBy }),
        });
        if (result.isErr()) return sendError(reply, result.error);
        return reply
          .status(200)
          .header('content-disposition', `attachment; filename="${series}.csv"`)
          .type('text/csv; charset=utf-8')
          .send(result.value);
      }
    );
  };
};
