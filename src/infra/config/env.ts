/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

export const DEFAULT_REGISTRATIONS_FILE = 'data/registrations.sample.json';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Integer({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Data
  REGISTRATIONS_FILE: Type.String({ minLength: 1, default: DEFAULT_REGISTRATIONS_FILE }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value !== '' ? value : undefined;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const port = nonEmpty(env['PORT']);
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: port !== undefined ? Number(port) : 3000,
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REGISTRATIONS_FILE: nonEmpty(env['REGISTRATIONS_FILE']) ?? DEFAULT_REGISTRATIONS_FILE,
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  },
  registrations: {
    /** JSON or CSV file, picked by extension */
    filePath: env.REGISTRATIONS_FILE,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
