/**
 * Security Headers Plugin
 *
 * Adds standard HTTP security headers through @fastify/helmet. The API
 * serves JSON and CSV only, so the content security policy is same-origin.
 */

import helmet from '@fastify/helmet';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/** One year, in seconds */
const HSTS_MAX_AGE = 31536000;

/**
 * Registers the security headers plugin. Skipped in the test environment.
 */
export async function registerSecurityHeaders(
  fastify: FastifyInstance,
  config: AppConfig
): Promise<void> {
  const { isProduction, isTest } = config.server;

  if (isTest) {
    fastify.log.debug('Security headers disabled in test environment');
    return;
  }

  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    hsts: isProduction ? { maxAge: HSTS_MAX_AGE, includeSubDomains: true } : false,
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    // Dashboards on other origins read the API
    crossOriginResourcePolicy: { policy: 'cross-origin' },
    crossOriginEmbedderPolicy: false,
  });

  fastify.log.debug({ production: isProduction }, 'Security headers plugin registered');
}
