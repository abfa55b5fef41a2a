/**
 * Integration tests for CORS plugin
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeInMemoryRegistrationSource } from '@/modules/registrations/index.js';

import { makeTestConfig } from '../fixtures/builders.js';

import type { AppConfig } from '@/infra/config/index.js';
import type { FastifyInstance } from 'fastify';

describe('CORS Plugin', () => {
  let app: FastifyInstance;

  const start = async (config: AppConfig): Promise<FastifyInstance> => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        registrationSource: makeInMemoryRegistrationSource([]),
        config,
      },
    });
    return app;
  };

  const developmentConfig = makeTestConfig({
    server: { isDevelopment: true, isProduction: false, isTest: true, port: 3000, host: '0.0.0.0' },
  });

  const productionConfig = makeTestConfig({
    server: { isDevelopment: false, isProduction: true, isTest: true, port: 3000, host: '0.0.0.0' },
    cors: { allowedOrigins: 'https://dashboard.example.com, https://ops.example.com' },
  });

  afterEach(async () => {
    if (app != null) {
      await app.close();
    }
  });

  it('allows requests without origin header', async () => {
    await start(productionConfig);

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('allows origins from ALLOWED_ORIGINS', async () => {
    await start(productionConfig);

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'https://ops.example.com' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('https://ops.example.com');
    expect(String(response.headers['access-control-expose-headers']).split(/,\s*/)).toEqual([
      'content-length',
      'content-disposition',
    ]);
  });

  it('omits the allow-origin header for unlisted origins', async () => {
    await start(productionConfig);

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'https://elsewhere.example.com' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('allows localhost origins in development', async () => {
    await start(developmentConfig);

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'http://localhost:5173' },
    });

    expect(response.headers['access-control-allow-origin']).toBe('http://localhost:5173');
  });

  it('rejects localhost origins outside development', async () => {
    await start(productionConfig);

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'http://localhost:5173' },
    });

    expect(response.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('answers preflight requests for POST endpoints', async () => {
    await start(productionConfig);

    const response = await app.inject({
      method: 'OPTIONS',
      url: '/api/v1/registrations/aggregate',
      headers: {
        origin: 'https://dashboard.example.com',
        'access-control-request-method': 'POST',
      },
    });

    expect(response.statusCode).toBe(204);
    expect(response.headers['access-control-allow-origin']).toBe('https://dashboard.example.com');
    expect(String(response.headers['access-control-allow-methods']).split(/,\s*/)).toEqual([
      'GET',
      'POST',
      'OPTIONS',
    ]);
  });
});
