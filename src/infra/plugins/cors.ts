/**
 * CORS plugin for Fastify
 * Lets dashboard front ends on other origins call the analytics API
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

/**
 * Parses the comma-separated ALLOWED_ORIGINS list
 */
export function getAllowedOriginsSet(config: AppConfig): Set<string> {
  const raw = config.cors.allowedOrigins ?? '';
  return new Set(
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s !== '')
  );
}

export function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
  } catch {
    return false;
  }
}

/**
 * Register CORS plugin with Fastify
 *
 * Development also accepts localhost origins; every other origin must be listed.
 */
export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const allowedOrigins = getAllowedOriginsSet(config);

  await fastify.register(cors, {
    origin: (origin, cb) => {
      // Server-to-server or same-origin requests
      if (origin === undefined || origin === '') {
        cb(null, true);
        return;
      }

      if (allowedOrigins.has(origin)) {
        cb(null, true);
        return;
      }

      if (config.server.isDevelopment && isLocalhostOrigin(origin)) {
        cb(null, true);
        return;
      }

      cb(null, false);
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept'],
    exposedHeaders: ['content-length', 'content-disposition'],
  });
}
