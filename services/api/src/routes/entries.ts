import type { FastifyInstance } from 'fastify';
import { CreateEntrySchema, PeriodQuerySchema } from '@timecard/shared';
import { currentEmployee, requireAuth } from '../auth/middleware.js';
import { toHttpError } from '../errors/workflowErrors.js';

/**
 * Employee surface: submit and review one's own time-card entries.
 */
export async function entryRoutes(fastify: FastifyInstance): Promise<void> {
  const { store, aggregator } = fastify.timecards;

  /**
   * POST /v1/time-entries - Submit an entry for the authenticated employee.
   *
   * Either `startTime` + `endTime` (same-day interval) or `hours` (duration).
   */
  fastify.post('/v1/time-entries', { preHandler: [requireAuth] }, async (request, reply) => {
    const employee = currentEmployee(request);
    const body = CreateEntrySchema.parse(request.body);

    const result = await store.create(employee.id, body);
    if (!result.ok) {
      throw toHttpError(result.error);
    }

    request.log.info(
      { entryId: result.value.id, employeeId: employee.id, workDate: result.value.workDate },
      'Time card entry submitted'
    );
    return reply.status(201).send({ entry: result.value });
  });

  /**
   * GET /v1/time-entries?from&to - Own entries for a period.
   */
  fastify.get('/v1/time-entries', { preHandler: [requireAuth] }, async (request, reply) => {
    const employee = currentEmployee(request);
    const period = PeriodQuerySchema.parse(request.query);

    const entries = await store.listByEmployeeAndPeriod(employee.id, period.from, period.to);
    return reply.send({ entries });
  });

  /**
   * GET /v1/time-entries/summary?from&to - Own totals, anomaly flags and approved
   * hours per project for a period.
   */
  fastify.get('/v1/time-entries/summary', { preHandler: [requireAuth] }, async (request, reply) => {
    const employee = currentEmployee(request);
    const period = PeriodQuerySchema.parse(request.query);

    const [summary, projects] = await Promise.all([
      aggregator.summarize(employee.id, period.from, period.to),
      aggregator.projectHours(employee.id, period.from, period.to),
    ]);
    return reply.send({ summary, projects });
  });
}
