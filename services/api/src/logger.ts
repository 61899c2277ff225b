import type { FastifyBaseLogger, FastifyServerOptions } from 'fastify';
import type { AppConfig } from './config/index.js';

/**
 * The slice of Fastify's pino logger that services depend on.
 */
export type AppLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Fastify logger options: pino JSON by default, pino-pretty when `LOG_PRETTY=true`.
 */
export function loggerOptions(
  config: Pick<AppConfig, 'logLevel' | 'prettyLogs'>
): FastifyServerOptions['logger'] {
  if (!config.prettyLogs) {
    return { level: config.logLevel };
  }
  return {
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  };
}
