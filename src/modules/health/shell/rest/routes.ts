/**
 * Probe routes
 *
 * - GET /health/live: 200 while the process runs; never touches the dataset
 * - GET /health/ready: dataset snapshot and checker results; 503 when unhealthy
 */

import {
  LivenessResponseSchema,
  ReadinessResponseSchema,
  type ReadinessResponse,
} from '../../core/types.js';
import { getReadiness, type GetReadinessDeps } from '../../core/usecases/get-readiness.js';

import type { FastifyPluginAsync } from 'fastify';

export type HealthRoutesDeps = GetReadinessDeps;

const httpStatusFor = (report: ReadinessResponse): 200 | 503 =>
  report.status === 'unhealthy' ? 503 : 200;

export const makeHealthRoutes = (deps: HealthRoutesDeps): FastifyPluginAsync => {
  const registeredAt = Date.now();

  return async (fastify) => {
    // Scoped to this plugin: probe answers are not cacheable
    fastify.addHook('onSend', async (_request, reply, payload) => {
      void reply.header('cache-control', 'no-store');
      return payload;
    });

    fastify.get(
      '/health/live',
      { schema: { response: { 200: LivenessResponseSchema } } },
      async () => ({ status: 'ok' as const })
    );

    fastify.get(
      '/health/ready',
      { schema: { response: { 200: ReadinessResponseSchema, 503: ReadinessResponseSchema } } },
      async (_request, reply) => {
        const report = await getReadiness(deps, {
          uptime: Math.floor((Date.now() - registeredAt) / 1000),
          timestamp: new Date().toISOString(),
        });
        return reply.status(httpStatusFor(report)).send(report);
      }
    );
  };
};
