/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'vehicle-registration-analytics',
  pretty: false,
};

/**
 * Transport options shared by the standalone logger and Fastify's request logger
 */
export const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = PRETTY_TRANSPORT;
  }

  return pino(options);
};

export { type Logger } from 'pino';
