/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import {
  fastify,
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import {
  makeHealthRoutes,
  makeSourceHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeFileRegistrationSource,
  makeRegistrationRoutes,
  type RegistrationSource,
} from '../modules/registrations/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from '../infra/logger/index.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Defaults to the file named by the configuration */
  registrationSource?: RegistrationSource;
  /** Defaults to a single check that the registration source loads */
  healthCheckers?: HealthChecker[];
  /** Logger for use cases; defaults to Fastify's own */
  logger?: Logger;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined) {
    throw new Error('Missing required dependencies: config');
  }

  const config = deps.config;
  const registrationSource =
    deps.registrationSource ??
    makeFileRegistrationSource({ filePath: config.registrations.filePath });

  const app = fastify({
    ...fastifyOptions,
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation != null) {
      request.log.debug({ err: error }, 'Request validation failed');
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  // Not found handler
  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [makeSourceHealthChecker(registrationSource)],
    })
  );

  await app.register(
    makeRegistrationRoutes({
      source: registrationSource,
      logger: deps.logger ?? app.log,
    })
  );

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
