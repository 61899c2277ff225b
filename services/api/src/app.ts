import type { FastifyError, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { z } from 'zod';
import { DatastoreError } from './errors/DatastoreError.js';
import { HttpError } from './errors/HttpError.js';
import { adminRoutes, entryRoutes, healthRoutes } from './routes/index.js';
import type { TimecardServices } from './services.js';

declare module 'fastify' {
  interface FastifyInstance {
    timecards: TimecardServices;
  }
}

/**
 * Attach services, CORS, routes and the error handler to a Fastify instance.
 * Used by the server entrypoint and by tests through `fastify.inject`.
 */
export async function registerApp(
  fastify: FastifyInstance,
  services: TimecardServices
): Promise<FastifyInstance> {
  fastify.decorate('timecards', services);

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({
        error: 'Validation failed',
        details: error.errors,
      });
    }

    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({
        error: error.code ?? 'Error',
        message: error.message,
      });
    }

    if (error instanceof DatastoreError) {
      request.log.error({ err: error }, error.message);
      return reply.status(503).send({
        error: 'Service Unavailable',
        message: 'The time card service is temporarily unavailable. Please try again later.',
      });
    }

    // Fastify's own client errors: malformed JSON, unsupported content type.
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: 'Bad Request',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'Something went wrong',
    });
  });

  await fastify.register(healthRoutes);
  await fastify.register(entryRoutes);
  await fastify.register(adminRoutes);

  return fastify;
}
