import type { FastifyInstance } from 'fastify';
import { EntryFilterSchema, RejectEntrySchema } from '@timecard/shared';
import { currentEmployee, requireAdmin, requireAuth } from '../../auth/middleware.js';
import { toHttpError } from '../../errors/workflowErrors.js';
import type { DecisionOutcome } from '../../workflow/approvalWorkflow.js';

function decisionResponse(outcome: DecisionOutcome) {
  const warnings = outcome.notification.ok
    ? []
    : [`The employee could not be notified: ${outcome.notification.error.reason}`];
  return { entry: outcome.entry, warnings };
}

export function registerAdminEntryRoutes(fastify: FastifyInstance): void {
  const { store, workflow } = fastify.timecards;

  /**
   * GET /v1/admin/time-entries - Review queue, filtered by status, employee, project and dates.
   */
  fastify.get(
    '/v1/admin/time-entries',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const filter = EntryFilterSchema.parse(request.query);
      const entries = await store.listEntries(filter);
      return reply.send({ entries });
    }
  );

  fastify.get<{ Params: { id: string } }>(
    '/v1/admin/time-entries/:id',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const result = await store.getById(request.params.id);
      if (!result.ok) {
        throw toHttpError(result.error);
      }
      return reply.send({ entry: result.value });
    }
  );

  /**
   * POST /v1/admin/time-entries/:id/approve
   *
   * The decision is committed before the employee is emailed; a failed email
   * shows up in `warnings` and leaves the decision in place.
   */
  fastify.post<{ Params: { id: string } }>(
    '/v1/admin/time-entries/:id/approve',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const admin = currentEmployee(request);
      const result = await workflow.approve(request.params.id, admin.id);
      if (!result.ok) {
        throw toHttpError(result.error);
      }
      return reply.send(decisionResponse(result.value));
    }
  );

  /**
   * POST /v1/admin/time-entries/:id/reject - Body `{ comment }`, required and non-blank.
   */
  fastify.post<{ Params: { id: string } }>(
    '/v1/admin/time-entries/:id/reject',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const admin = currentEmployee(request);
      const body = RejectEntrySchema.parse(request.body ?? {});

      const result = await workflow.reject(request.params.id, admin.id, body.comment);
      if (!result.ok) {
        throw toHttpError(result.error);
      }
      return reply.send(decisionResponse(result.value));
    }
  );
}
