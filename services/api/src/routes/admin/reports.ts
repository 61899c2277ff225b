import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { EntryFilterSchema, PeriodQuerySchema } from '@timecard/shared';
import { requireAdmin, requireAuth } from '../../auth/middleware.js';
import { HttpError } from '../../errors/HttpError.js';

const OptionalPeriodSchema = EntryFilterSchema.pick({ from: true, to: true });
const CsvFilterSchema = EntryFilterSchema.omit({ status: true });

export function registerAdminReportRoutes(fastify: FastifyInstance): void {
  const { aggregator, employees, store } = fastify.timecards;

  /**
   * GET /v1/admin/projects - Every project an entry has been logged against.
   */
  fastify.get(
    '/v1/admin/projects',
    { preHandler: [requireAuth, requireAdmin] },
    async (_request, reply) => {
      const projects = await store.listProjects();
      return reply.send({ projects });
    }
  );

  /**
   * GET /v1/admin/employees/:employeeId/summary?from&to - Period totals, anomalies and
   * approved hours per project.
   */
  fastify.get<{ Params: { employeeId: string } }>(
    '/v1/admin/employees/:employeeId/summary',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const employeeId = z.string().uuid().parse(request.params.employeeId);
      const period = PeriodQuerySchema.parse(request.query);

      const employee = await employees.findById(employeeId);
      if (!employee) {
        throw new HttpError(404, 'Employee not found.', { code: 'EmployeeNotFound' });
      }

      const [summary, projects] = await Promise.all([
        aggregator.summarize(employee.id, period.from, period.to),
        aggregator.projectHours(employee.id, period.from, period.to),
      ]);
      return reply.send({ employee, summary, projects });
    }
  );

  /**
   * GET /v1/admin/reports/employee-totals?from&to - Everyone, ranked by approved hours.
   */
  fastify.get(
    '/v1/admin/reports/employee-totals',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const period = OptionalPeriodSchema.parse(request.query);
      const totals = await aggregator.employeeTotals(period.from, period.to);
      return reply.send({ totals });
    }
  );

  fastify.get(
    '/v1/admin/reports/approved.csv',
    { preHandler: [requireAuth, requireAdmin] },
    async (request, reply) => {
      const filter = CsvFilterSchema.parse(request.query);
      const csv = await aggregator.exportApprovedCsv(filter);
      return reply
        .header('content-type', 'text/csv; charset=utf-8')
        .header('content-disposition', 'attachment; filename="approved-time-entries.csv"')
        .send(csv);
    }
  );
}
