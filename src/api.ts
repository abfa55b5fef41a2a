/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger, PRETTY_TRANSPORT } from './infra/logger/index.js';
import { makeFileRegistrationSource } from './modules/registrations/index.js';

const getVersion = (): string => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'vehicle-registration-analytics',
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, registrations: config.registrations } },
    'Starting API server'
  );

  const registrationSource = makeFileRegistrationSource({
    filePath: config.registrations.filePath,
  });

  // Fail fast on an unreadable or invalid dataset
  const loaded = await registrationSource.loadRecords();
  if (loaded.isErr()) {
    logger.fatal({ err: loaded.error }, 'Failed to load registration records');
    process.exit(1);
  }
  logger.info({ records: loaded.value.length }, 'Registration records validated');

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: PRETTY_TRANSPORT }),
      },
    },
    deps: {
      config,
      registrationSource,
      logger,
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
